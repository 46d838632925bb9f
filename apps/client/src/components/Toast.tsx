import { useEffect } from 'react';
import { useStore } from '../store/useStore';

export function Toast() {
  const { toast, hideToast } = useStore();

  useEffect(() => {
    if (toast) {
      const timer = setTimeout(hideToast, 3000);
      return () => clearTimeout(timer);
    }
  }, [toast, hideToast]);

  if (!toast) return null;

  const isSuccess = toast.type === 'success';

  return (
    <div className="fixed bottom-4 right-4 z-50" role="status">
      <div
        className={`flex items-center gap-3 rounded-lg border px-4 py-3 shadow-lg ${
          isSuccess ? 'border-green-500 bg-green-50 text-green-800' : 'border-red-500 bg-red-50 text-red-800'
        }`}
      >
        <span className="text-sm">{toast.message}</span>
        <button type="button" onClick={hideToast} aria-label="Dismiss" className="text-current opacity-60 hover:opacity-100">
          ✕
        </button>
      </div>
    </div>
  );
}
