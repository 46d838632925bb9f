import { useEffect, useState } from 'react';
import type { TicketStats } from '@support-desk/shared';
import { useStore } from '../store/useStore';
import { getTicketStats } from '../utils/api';

function Breakdown({ title, counts }: { title: string; counts: Record<string, number> }) {
  return (
    <div>
      <p className="text-sm font-medium text-slate-700">{title}</p>
      <ul className="mt-1 flex flex-wrap gap-2 text-sm text-slate-600">
        {Object.entries(counts).map(([key, count]) => (
          <li key={key} className="rounded bg-slate-100 px-2 py-0.5">
            {key}: {count}
          </li>
        ))}
      </ul>
    </div>
  );
}

export function StatsPanel() {
  const { refreshKey } = useStore();
  const [stats, setStats] = useState<TicketStats | null>(null);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    let cancelled = false;
    getTicketStats()
      .then((result) => {
        if (cancelled) return;
        setStats(result);
        setError(null);
      })
      .catch(() => {
        if (!cancelled) setError('Failed to load stats');
      });
    return () => {
      cancelled = true;
    };
  }, [refreshKey]);

  if (error) {
    return (
      <section className="panel">
        <p className="text-sm text-red-600">{error}</p>
      </section>
    );
  }

  if (!stats) {
    return (
      <section className="panel">
        <p className="text-sm text-slate-500">Loading stats...</p>
      </section>
    );
  }

  const cards = [
    { label: 'Total tickets', value: stats.total_tickets },
    { label: 'Open', value: stats.open_tickets },
    { label: 'Avg per day', value: stats.avg_tickets_per_day },
  ];

  return (
    <section className="panel space-y-3">
      <h2 className="text-lg font-semibold text-slate-800">Stats</h2>
      <dl className="grid grid-cols-3 gap-3">
        {cards.map((card) => (
          <div key={card.label} className="rounded border border-slate-200 p-3 text-center">
            <dd className="text-2xl font-semibold text-indigo-700">{card.value}</dd>
            <dt className="text-xs uppercase text-slate-500">{card.label}</dt>
          </div>
        ))}
      </dl>
      <Breakdown title="Priority" counts={stats.priority_breakdown} />
      <Breakdown title="Category" counts={stats.category_breakdown} />
    </section>
  );
}
