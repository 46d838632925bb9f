import { useRef, useState, type FormEvent } from 'react';
import { TITLE_MAX_LENGTH, characterCount, createTicketSchema, toFieldErrors } from '@support-desk/shared';
import type { FieldErrors, TicketCategory, TicketPriority } from '@support-desk/shared';
import { useStore } from '../store/useStore';
import { ApiRequestError, classifyDescription, createTicket } from '../utils/api';
import { categoryOptions, priorityOptions } from '../utils/labels';
import { SelectField } from './SelectField';

interface FormState {
  title: string;
  description: string;
  category: TicketCategory;
  priority: TicketPriority;
}

const emptyForm: FormState = {
  title: '',
  description: '',
  category: 'general',
  priority: 'medium',
};

// Input maxLength counts UTF-16 units, so the limit is applied here instead
const clampTitle = (title: string) =>
  characterCount(title) > TITLE_MAX_LENGTH ? Array.from(title).slice(0, TITLE_MAX_LENGTH).join('') : title;

export function TicketForm() {
  const { bumpRefresh, showToast } = useStore();

  const [form, setForm] = useState<FormState>(emptyForm);
  const [fieldErrors, setFieldErrors] = useState<FieldErrors>({});
  const [isClassifying, setIsClassifying] = useState(false);
  const [isSubmitting, setIsSubmitting] = useState(false);

  // Bumped whenever an in-flight suggestion no longer describes the form
  const classifyRequest = useRef(0);
  // Selectors the user picked by hand; suggestions never override them
  const touched = useRef({ category: false, priority: false });

  const discardPendingSuggestion = () => {
    classifyRequest.current += 1;
    setIsClassifying(false);
  };

  // Suggestions only pre-fill the selectors; the user can still change them
  const handleDescriptionBlur = async () => {
    const description = form.description.trim();
    if (!description) return;
    const requestId = ++classifyRequest.current;
    setIsClassifying(true);
    try {
      const suggestion = await classifyDescription(description);
      if (requestId !== classifyRequest.current) return;
      setForm((prev) => ({
        ...prev,
        category: touched.current.category ? prev.category : suggestion.suggested_category ?? prev.category,
        priority: touched.current.priority ? prev.priority : suggestion.suggested_priority ?? prev.priority,
      }));
    } catch (error) {
      console.warn('[classify] Suggestions unavailable:', error);
    } finally {
      if (requestId === classifyRequest.current) {
        setIsClassifying(false);
      }
    }
  };

  const handleSubmit = async (e: FormEvent) => {
    e.preventDefault();
    const parsed = createTicketSchema.safeParse(form);
    if (!parsed.success) {
      setFieldErrors(toFieldErrors(parsed.error));
      return;
    }

    setFieldErrors({});
    setIsSubmitting(true);
    try {
      const ticket = await createTicket(parsed.data);
      discardPendingSuggestion();
      touched.current = { category: false, priority: false };
      setForm(emptyForm);
      showToast(`Ticket #${ticket.id} submitted`, 'success');
      bumpRefresh();
    } catch (error) {
      if (error instanceof ApiRequestError) {
        setFieldErrors(error.fields);
      }
      showToast(error instanceof Error ? error.message : 'Failed to submit ticket', 'error');
    } finally {
      setIsSubmitting(false);
    }
  };

  return (
    <section className="panel">
      <h2 className="mb-3 text-lg font-semibold text-slate-800">Submit a ticket</h2>
      <form onSubmit={handleSubmit} className="space-y-3" noValidate>
        <div className="flex flex-col gap-1">
          <label htmlFor="ticket-title" className="text-sm font-medium text-slate-700">
            Title
          </label>
          <input
            id="ticket-title"
            value={form.title}
            onChange={(e) => setForm((prev) => ({ ...prev, title: clampTitle(e.target.value) }))}
            placeholder="Brief summary"
            className="field"
          />
          {fieldErrors.title && <p className="text-xs text-red-600">{fieldErrors.title.join(' ')}</p>}
        </div>

        <div className="flex flex-col gap-1">
          <label htmlFor="ticket-description" className="text-sm font-medium text-slate-700">
            Description
          </label>
          <textarea
            id="ticket-description"
            value={form.description}
            onChange={(e) => {
              discardPendingSuggestion();
              setForm((prev) => ({ ...prev, description: e.target.value }));
            }}
            onBlur={handleDescriptionBlur}
            rows={4}
            placeholder="Describe the issue. Category and priority will be suggested."
            className="field"
          />
          {isClassifying && <p className="text-xs text-slate-500">Suggesting category and priority...</p>}
          {fieldErrors.description && (
            <p className="text-xs text-red-600">{fieldErrors.description.join(' ')}</p>
          )}
        </div>

        <div className="grid grid-cols-2 gap-3">
          <SelectField
            id="ticket-category"
            label="Category"
            value={form.category}
            options={categoryOptions}
            onChange={(category) => {
              if (!category) return;
              touched.current.category = true;
              setForm((prev) => ({ ...prev, category }));
            }}
            error={fieldErrors.category}
          />
          <SelectField
            id="ticket-priority"
            label="Priority"
            value={form.priority}
            options={priorityOptions}
            onChange={(priority) => {
              if (!priority) return;
              touched.current.priority = true;
              setForm((prev) => ({ ...prev, priority }));
            }}
            error={fieldErrors.priority}
          />
        </div>

        <button type="submit" disabled={isSubmitting} className="btn btn-primary">
          {isSubmitting ? 'Submitting...' : 'Submit ticket'}
        </button>
      </form>
    </section>
  );
}
