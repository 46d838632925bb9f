import { Router } from 'express';
import { NotFoundError, classifyRequestSchema } from '@support-desk/shared';
import type { ClassifyResponse, Ticket, TicketStats } from '@support-desk/shared';
import type { StorageService } from '../services/storageService.js';
import { NO_SUGGESTIONS, type ClassifierService } from '../services/classifierService.js';

function parseTicketId(raw: string): number {
  const id = /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (!Number.isSafeInteger(id)) {
    throw new NotFoundError(`Ticket ${raw} not found`);
  }
  return id;
}

export function createTicketsRouter(storage: StorageService, classifier: ClassifierService) {
  const router = Router();

  // Create ticket; status is always 'open' regardless of the body
  router.post('/', (req, res, next) => {
    try {
      const ticket: Ticket = storage.createTicket(req.body);
      res.status(201).json(ticket);
    } catch (error) {
      next(error);
    }
  });

  // List tickets with optional filters
  router.get('/', (req, res, next) => {
    try {
      const tickets: Ticket[] = storage.getTickets(req.query);
      res.json(tickets);
    } catch (error) {
      next(error);
    }
  });

  router.get('/stats', (req, res, next) => {
    try {
      const stats: TicketStats = storage.getTicketStats();
      res.json(stats);
    } catch (error) {
      next(error);
    }
  });

  // Always 200: upstream failures degrade to null suggestions
  router.post('/classify', async (req, res) => {
    const { description } = classifyRequestSchema.parse(req.body);
    let suggestions: ClassifyResponse;
    try {
      suggestions = await classifier.classify(description);
    } catch (error) {
      console.error('[classifier] Classifier threw, returning no suggestions:', error);
      suggestions = NO_SUGGESTIONS;
    }
    res.json(suggestions);
  });

  // Get single ticket
  router.get('/:id', (req, res, next) => {
    try {
      const id = parseTicketId(req.params.id);
      const ticket = storage.getTicket(id);
      if (!ticket) {
        throw new NotFoundError(`Ticket ${id} not found`);
      }
      res.json(ticket);
    } catch (error) {
      next(error);
    }
  });

  // Partial update of status/category/priority
  router.patch('/:id', (req, res, next) => {
    try {
      const ticket = storage.updateTicket(parseTicketId(req.params.id), req.body);
      res.json(ticket);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
