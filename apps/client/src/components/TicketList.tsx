import { useEffect, useState } from 'react';
import type { Ticket, TicketFilters, TicketStatus } from '@support-desk/shared';
import { useStore } from '../store/useStore';
import { getTickets, updateTicket } from '../utils/api';
import {
  categoryOptions,
  priorityBadgeClass,
  priorityOptions,
  statusLabel,
  statusOptions,
  truncate,
} from '../utils/labels';
import { SelectField } from './SelectField';
import { TicketDetailModal } from './TicketDetailModal';

export function TicketList() {
  const { refreshKey, bumpRefresh, showToast } = useStore();

  const [tickets, setTickets] = useState<Ticket[]>([]);
  const [filters, setFilters] = useState<TicketFilters>({});
  const [isLoading, setIsLoading] = useState(true);
  const [loadError, setLoadError] = useState<string | null>(null);
  const [selected, setSelected] = useState<Ticket | null>(null);
  const [isUpdating, setIsUpdating] = useState(false);

  // Every filter change and every refresh signal refetches from the server
  useEffect(() => {
    let cancelled = false;
    setIsLoading(true);
    getTickets(filters)
      .then((result) => {
        if (cancelled) return;
        setTickets(result);
        setLoadError(null);
      })
      .catch((error: unknown) => {
        if (cancelled) return;
        setLoadError(error instanceof Error ? error.message : 'Failed to load tickets');
      })
      .finally(() => {
        if (!cancelled) setIsLoading(false);
      });
    return () => {
      cancelled = true;
    };
  }, [filters, refreshKey]);

  const handleStatusChange = async (ticket: Ticket, status: TicketStatus) => {
    setIsUpdating(true);
    try {
      const updated = await updateTicket(ticket.id, { status });
      setSelected(updated);
      showToast(`Ticket #${updated.id} marked ${statusLabel(status)}`, 'success');
      bumpRefresh();
    } catch (error) {
      showToast(error instanceof Error ? error.message : 'Failed to update status', 'error');
    } finally {
      setIsUpdating(false);
    }
  };

  return (
    <section className="panel">
      <h2 className="mb-3 text-lg font-semibold text-slate-800">Tickets</h2>

      <div className="mb-4 grid grid-cols-1 gap-3 md:grid-cols-4">
        <div className="flex flex-col gap-1">
          <label htmlFor="filter-search" className="text-sm font-medium text-slate-700">
            Search
          </label>
          <input
            id="filter-search"
            type="search"
            value={filters.search ?? ''}
            onChange={(e) => setFilters((prev) => ({ ...prev, search: e.target.value }))}
            placeholder="Title or description"
            className="field"
          />
        </div>
        <SelectField
          id="filter-category"
          label="Category"
          value={filters.category ?? ''}
          options={categoryOptions}
          emptyLabel="All categories"
          onChange={(category) => setFilters((prev) => ({ ...prev, category: category || undefined }))}
        />
        <SelectField
          id="filter-priority"
          label="Priority"
          value={filters.priority ?? ''}
          options={priorityOptions}
          emptyLabel="All priorities"
          onChange={(priority) => setFilters((prev) => ({ ...prev, priority: priority || undefined }))}
        />
        <SelectField
          id="filter-status"
          label="Status"
          value={filters.status ?? ''}
          options={statusOptions}
          emptyLabel="All statuses"
          onChange={(status) => setFilters((prev) => ({ ...prev, status: status || undefined }))}
        />
      </div>

      {loadError ? (
        <p className="text-sm text-red-600">{loadError}</p>
      ) : isLoading && tickets.length === 0 ? (
        <p className="text-sm text-slate-500">Loading...</p>
      ) : tickets.length === 0 ? (
        <p className="py-6 text-center text-sm text-slate-500">No tickets match these filters.</p>
      ) : (
        <ul className="divide-y divide-slate-100">
          {tickets.map((ticket) => (
            <li key={ticket.id}>
              <button
                type="button"
                onClick={() => setSelected(ticket)}
                className="w-full py-3 text-left hover:bg-slate-50"
              >
                <div className="flex items-center gap-2 text-xs text-slate-500">
                  <span className={`badge ${priorityBadgeClass[ticket.priority]}`}>{ticket.priority}</span>
                  <span>
                    {ticket.category} · {statusLabel(ticket.status)}
                  </span>
                </div>
                <h3 className="mt-1 font-medium text-slate-800">{ticket.title}</h3>
                <p className="text-sm text-slate-600">{truncate(ticket.description)}</p>
                <p className="mt-1 text-xs text-slate-400">{new Date(ticket.created_at).toLocaleString()}</p>
              </button>
            </li>
          ))}
        </ul>
      )}

      {selected && (
        <TicketDetailModal
          ticket={selected}
          isUpdating={isUpdating}
          onStatusChange={(status) => handleStatusChange(selected, status)}
          onClose={() => setSelected(null)}
        />
      )}
    </section>
  );
}
