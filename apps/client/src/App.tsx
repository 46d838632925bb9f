import { TicketForm } from './components/TicketForm';
import { TicketList } from './components/TicketList';
import { StatsPanel } from './components/StatsPanel';
import { Toast } from './components/Toast';

export default function App() {
  return (
    <div className="min-h-screen bg-slate-50">
      <header className="border-b border-slate-200 bg-white">
        <div className="mx-auto max-w-5xl px-4 py-3">
          <h1 className="text-xl font-semibold text-slate-800">Support Desk</h1>
        </div>
      </header>

      <main className="mx-auto grid max-w-5xl gap-4 px-4 py-6 lg:grid-cols-2">
        <TicketForm />
        <StatsPanel />
        <div className="lg:col-span-2">
          <TicketList />
        </div>
      </main>

      <Toast />
    </div>
  );
}
