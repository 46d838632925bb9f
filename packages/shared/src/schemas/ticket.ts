import { z } from 'zod';
import {
  TICKET_CATEGORIES,
  TICKET_PRIORITIES,
  TICKET_STATUSES,
  TITLE_MAX_LENGTH,
  characterCount,
} from '../types/ticket.js';
import { ValidationError, type FieldErrors } from '../errors.js';

export const ticketCategorySchema = z.enum(TICKET_CATEGORIES);
export const ticketPrioritySchema = z.enum(TICKET_PRIORITIES);
export const ticketStatusSchema = z.enum(TICKET_STATUSES);

// Anything not listed here (status, id, created_at) is stripped on create
export const createTicketSchema = z.object({
  title: z
    .string({ required_error: 'Title is required' })
    .trim()
    .min(1, 'Title is required')
    .refine(
      (title) => characterCount(title) <= TITLE_MAX_LENGTH,
      `Title must be at most ${TITLE_MAX_LENGTH} characters`
    ),
  description: z
    .string({ required_error: 'Description is required' })
    .trim()
    .min(1, 'Description is required'),
  category: ticketCategorySchema,
  priority: ticketPrioritySchema,
});

export const updateTicketSchema = z.object({
  status: ticketStatusSchema.optional(),
  category: ticketCategorySchema.optional(),
  priority: ticketPrioritySchema.optional(),
});

// Query strings arrive as '' when a select is reset to "All"
const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

export const ticketFiltersSchema = z.object({
  category: z.preprocess(blankToUndefined, ticketCategorySchema.optional()),
  priority: z.preprocess(blankToUndefined, ticketPrioritySchema.optional()),
  status: z.preprocess(blankToUndefined, ticketStatusSchema.optional()),
  search: z.preprocess(blankToUndefined, z.string().trim().optional()),
});

export const classifyRequestSchema = z
  .object({
    description: z.string().trim().catch(''),
  })
  .catch({ description: '' });

export type CreateTicketForm = z.input<typeof createTicketSchema>;

export function toFieldErrors(error: z.ZodError): FieldErrors {
  const fields: FieldErrors = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join('.') : 'non_field_errors';
    (fields[key] ??= []).push(issue.message);
  }
  return fields;
}

export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError('Invalid request', toFieldErrors(result.error));
  }
  return result.data;
}
