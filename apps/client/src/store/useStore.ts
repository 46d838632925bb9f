import { create } from 'zustand';

interface AppState {
  // Bumped after any write so the list and stats panel refetch
  refreshKey: number;
  toast: { message: string; type: 'success' | 'error' } | null;

  // Actions
  bumpRefresh: () => void;
  showToast: (message: string, type: 'success' | 'error') => void;
  hideToast: () => void;
}

export const useStore = create<AppState>((set) => ({
  // Initial state
  refreshKey: 0,
  toast: null,

  // Actions
  bumpRefresh: () => set((state) => ({ refreshKey: state.refreshKey + 1 })),
  showToast: (message, type) => set({ toast: { message, type } }),
  hideToast: () => set({ toast: null }),
}));
