// @vitest-environment jsdom
import { cleanup, render, screen, waitFor, within } from '@testing-library/react';
import userEvent from '@testing-library/user-event';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Ticket } from '@support-desk/shared';
import { TicketList } from '../TicketList';
import { useStore } from '../../store/useStore';
import { getTickets, updateTicket } from '../../utils/api';

vi.mock('../../utils/api', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../utils/api')>()),
  getTickets: vi.fn(),
  updateTicket: vi.fn(),
}));

const mockedGetTickets = vi.mocked(getTickets);
const mockedUpdateTicket = vi.mocked(updateTicket);

const loginTicket: Ticket = {
  id: 1,
  title: 'Cannot log in',
  description: 'Password reset email never arrives',
  category: 'general',
  priority: 'medium',
  status: 'open',
  created_at: '2026-03-01T09:00:00.000Z',
};

describe('TicketList', () => {
  beforeEach(() => {
    useStore.setState({ refreshKey: 0, toast: null });
    mockedGetTickets.mockResolvedValue([loginTicket]);
  });

  afterEach(() => {
    // Unmount first so no mounted component refetches against reset mocks
    cleanup();
    vi.resetAllMocks();
  });

  it('renders fetched tickets', async () => {
    render(<TicketList />);

    expect(await screen.findByText('Cannot log in')).toBeTruthy();
    expect(mockedGetTickets).toHaveBeenCalledWith({});
  });

  it('shows an empty state', async () => {
    mockedGetTickets.mockResolvedValue([]);
    render(<TicketList />);

    expect(await screen.findByText('No tickets match these filters.')).toBeTruthy();
  });

  it('refetches on every filter change', async () => {
    render(<TicketList />);
    const user = userEvent.setup();
    await screen.findByText('Cannot log in');

    await user.selectOptions(screen.getByLabelText('Status'), 'in_progress');
    await waitFor(() => expect(mockedGetTickets).toHaveBeenLastCalledWith({ status: 'in_progress' }));

    await user.selectOptions(screen.getByLabelText('Category'), 'billing');
    await waitFor(() =>
      expect(mockedGetTickets).toHaveBeenLastCalledWith({ status: 'in_progress', category: 'billing' })
    );

    await user.selectOptions(screen.getByLabelText('Status'), '');
    await waitFor(() =>
      expect(mockedGetTickets).toHaveBeenLastCalledWith({ status: undefined, category: 'billing' })
    );
  });

  it('refetches when the refresh signal changes', async () => {
    render(<TicketList />);
    await screen.findByText('Cannot log in');
    expect(mockedGetTickets).toHaveBeenCalledTimes(1);

    useStore.getState().bumpRefresh();

    await waitFor(() => expect(mockedGetTickets).toHaveBeenCalledTimes(2));
  });

  it('updates status from the detail view', async () => {
    const updated: Ticket = { ...loginTicket, status: 'in_progress' };
    mockedUpdateTicket.mockResolvedValue(updated);
    render(<TicketList />);
    const user = userEvent.setup();

    await user.click(await screen.findByText('Cannot log in'));
    const dialog = screen.getByRole('dialog', { name: 'Cannot log in' });
    await user.click(within(dialog).getByRole('button', { name: 'In Progress' }));

    expect(mockedUpdateTicket).toHaveBeenCalledWith(1, { status: 'in_progress' });
    await waitFor(() => expect(useStore.getState().refreshKey).toBe(1));
    expect(within(dialog).getByRole('button', { name: 'In Progress' })).toHaveProperty('disabled', true);
    expect(useStore.getState().toast).toEqual({ message: 'Ticket #1 marked In Progress', type: 'success' });
  });

  it('reports a failed status update', async () => {
    mockedUpdateTicket.mockRejectedValue(new Error('Ticket 1 not found'));
    render(<TicketList />);
    const user = userEvent.setup();

    await user.click(await screen.findByText('Cannot log in'));
    await user.click(screen.getByRole('button', { name: 'Resolved' }));

    await waitFor(() =>
      expect(useStore.getState().toast).toEqual({ message: 'Ticket 1 not found', type: 'error' })
    );
    expect(useStore.getState().refreshKey).toBe(0);
  });
});
