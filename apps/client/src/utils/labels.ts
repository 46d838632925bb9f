import { TICKET_CATEGORIES, TICKET_PRIORITIES, TICKET_STATUSES } from '@support-desk/shared';
import type { TicketCategory, TicketPriority, TicketStatus } from '@support-desk/shared';

export interface Option<T extends string> {
  value: T;
  label: string;
}

const categoryLabels: Record<TicketCategory, string> = {
  billing: 'Billing',
  technical: 'Technical',
  account: 'Account',
  general: 'General',
};

const priorityLabels: Record<TicketPriority, string> = {
  low: 'Low',
  medium: 'Medium',
  high: 'High',
  critical: 'Critical',
};

const statusLabels: Record<TicketStatus, string> = {
  open: 'Open',
  in_progress: 'In Progress',
  resolved: 'Resolved',
  closed: 'Closed',
};

export const priorityBadgeClass: Record<TicketPriority, string> = {
  low: 'bg-slate-100 text-slate-600',
  medium: 'bg-sky-100 text-sky-700',
  high: 'bg-amber-100 text-amber-800',
  critical: 'bg-red-100 text-red-700',
};

export const categoryOptions: Option<TicketCategory>[] = TICKET_CATEGORIES.map((value) => ({
  value,
  label: categoryLabels[value],
}));

export const priorityOptions: Option<TicketPriority>[] = TICKET_PRIORITIES.map((value) => ({
  value,
  label: priorityLabels[value],
}));

export const statusOptions: Option<TicketStatus>[] = TICKET_STATUSES.map((value) => ({
  value,
  label: statusLabels[value],
}));

export function statusLabel(status: TicketStatus): string {
  return statusLabels[status];
}

export function truncate(text: string, length = 120): string {
  return text.length <= length ? text : `${text.slice(0, length)}...`;
}
