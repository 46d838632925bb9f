import type {
  ApiErrorBody,
  ClassifyResponse,
  CreateTicketInput,
  FieldErrors,
  Ticket,
  TicketFilters,
  TicketStats,
  UpdateTicketInput,
} from '@support-desk/shared';

const API_BASE = '/api';

export class ApiRequestError extends Error {
  public readonly status: number;
  public readonly fields: FieldErrors;

  constructor(message: string, status: number, fields: FieldErrors = {}) {
    super(message);
    this.name = 'ApiRequestError';
    this.status = status;
    this.fields = fields;
  }
}

async function fetchApi<T>(
  endpoint: string,
  options?: RequestInit
): Promise<T> {
  const response = await fetch(`${API_BASE}${endpoint}`, {
    ...options,
    headers: {
      'Content-Type': 'application/json',
      ...options?.headers,
    },
  });

  if (!response.ok) {
    const body: Partial<ApiErrorBody> | null = await response.json().catch(() => null);
    throw new ApiRequestError(
      body?.error || `Request failed (${response.status})`,
      response.status,
      body?.fields
    );
  }

  const result: T = await response.json();
  return result;
}

// Tickets
export async function getTickets(filters: TicketFilters = {}): Promise<Ticket[]> {
  const params = new URLSearchParams();
  if (filters.category) params.set('category', filters.category);
  if (filters.priority) params.set('priority', filters.priority);
  if (filters.status) params.set('status', filters.status);
  if (filters.search?.trim()) params.set('search', filters.search.trim());
  const query = params.toString();
  return fetchApi<Ticket[]>(`/tickets/${query ? `?${query}` : ''}`);
}

export async function createTicket(input: CreateTicketInput): Promise<Ticket> {
  return fetchApi<Ticket>('/tickets/', {
    method: 'POST',
    body: JSON.stringify(input),
  });
}

export async function updateTicket(id: number, input: UpdateTicketInput): Promise<Ticket> {
  return fetchApi<Ticket>(`/tickets/${id}/`, {
    method: 'PATCH',
    body: JSON.stringify(input),
  });
}

// Stats
export async function getTicketStats(): Promise<TicketStats> {
  return fetchApi<TicketStats>('/tickets/stats/');
}

// Suggestions; the endpoint answers with nulls rather than failing
export async function classifyDescription(description: string): Promise<ClassifyResponse> {
  return fetchApi<ClassifyResponse>('/tickets/classify/', {
    method: 'POST',
    body: JSON.stringify({ description }),
  });
}
