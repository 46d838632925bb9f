import type { TicketCategory, TicketPriority } from './ticket.js';
import type { FieldErrors } from '../errors.js';

export interface ApiErrorBody {
  error: string;
  code?: string;
  fields?: FieldErrors;
}

export interface TicketStats {
  total_tickets: number;
  open_tickets: number;
  avg_tickets_per_day: number;
  priority_breakdown: Record<TicketPriority, number>;
  category_breakdown: Record<TicketCategory, number>;
}

export interface ClassifyRequest {
  description: string;
}

export interface ClassifyResponse {
  suggested_category: TicketCategory | null;
  suggested_priority: TicketPriority | null;
}

export interface HealthResponse {
  status: 'ok';
  timestamp: string;
}
