import type { Ticket, TicketStatus } from '@support-desk/shared';
import { statusOptions } from '../utils/labels';

interface TicketDetailModalProps {
  ticket: Ticket;
  isUpdating: boolean;
  onStatusChange: (status: TicketStatus) => void;
  onClose: () => void;
}

export function TicketDetailModal({ ticket, isUpdating, onStatusChange, onClose }: TicketDetailModalProps) {
  return (
    <div className="fixed inset-0 z-50 flex items-center justify-center">
      <div className="absolute inset-0 bg-black/50" onClick={onClose} />
      <div role="dialog" aria-label={ticket.title} className="panel relative mx-4 w-full max-w-lg">
        <h3 className="text-lg font-semibold text-slate-800">{ticket.title}</h3>
        <p className="mt-1 text-sm text-slate-500">
          {ticket.category} · {ticket.priority} · {new Date(ticket.created_at).toLocaleString()}
        </p>
        <p className="mt-3 whitespace-pre-wrap text-sm text-slate-700">{ticket.description}</p>

        <p className="mt-4 text-sm font-medium text-slate-700">Status</p>
        <div className="mt-2 flex flex-wrap gap-2">
          {statusOptions.map((option) => (
            <button
              key={option.value}
              type="button"
              aria-pressed={ticket.status === option.value}
              disabled={isUpdating || ticket.status === option.value}
              onClick={() => onStatusChange(option.value)}
              className={`btn ${ticket.status === option.value ? 'btn-primary' : 'btn-secondary'}`}
            >
              {option.label}
            </button>
          ))}
        </div>

        <div className="mt-4 flex justify-end">
          <button type="button" onClick={onClose} className="btn btn-secondary">
            Close
          </button>
        </div>
      </div>
    </div>
  );
}
