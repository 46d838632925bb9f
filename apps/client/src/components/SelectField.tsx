import type { ChangeEvent } from 'react';
import type { Option } from '../utils/labels';

interface SelectFieldProps<T extends string> {
  id: string;
  label: string;
  value: T | '';
  options: Option<T>[];
  onChange: (value: T | '') => void;
  // Renders a leading "any" option mapped to ''
  emptyLabel?: string;
  error?: string[];
}

export function SelectField<T extends string>({
  id,
  label,
  value,
  options,
  onChange,
  emptyLabel,
  error,
}: SelectFieldProps<T>) {
  const handleChange = (e: ChangeEvent<HTMLSelectElement>) => {
    const selected = options.find((option) => option.value === e.target.value);
    onChange(selected ? selected.value : '');
  };

  return (
    <div className="flex flex-col gap-1">
      <label htmlFor={id} className="text-sm font-medium text-slate-700">
        {label}
      </label>
      <select id={id} value={value} onChange={handleChange} className="field">
        {emptyLabel !== undefined && <option value="">{emptyLabel}</option>}
        {options.map((option) => (
          <option key={option.value} value={option.value}>
            {option.label}
          </option>
        ))}
      </select>
      {error && <p className="text-xs text-red-600">{error.join(' ')}</p>}
    </div>
  );
}
