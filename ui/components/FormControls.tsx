import { useState, type ReactNode } from "react";
import { FolderOpen, Loader2, Play } from "lucide-react";
import { cn } from "@/lib/utils";
import { PathPicker, type PathPickerProps } from "./PathPicker";

const inputClass =
  "w-full rounded-md border bg-background-primary px-2.5 py-1.5 text-sm text-slate-100 placeholder:text-slate-600 focus:outline-none focus:ring-1 focus:ring-primary-500 disabled:opacity-60";

interface FieldProps {
  id: string;
  label: string;
  error?: string;
  hint?: string;
  children: ReactNode;
}

export function Field({ id, label, error, hint, children }: FieldProps) {
  return (
    <div className="space-y-1">
      <label htmlFor={id} className="block text-xs font-medium text-slate-400">
        {label}
      </label>
      {children}
      {error ? (
        <p className="text-xs text-error-light">{error}</p>
      ) : (
        hint && <p className="text-xs text-slate-500">{hint}</p>
      )}
    </div>
  );
}

interface TextFieldProps {
  id: string;
  label: string;
  value: string;
  onChange: (value: string) => void;
  error?: string;
  hint?: string;
  placeholder?: string;
  disabled?: boolean;
}

export function TextField({ id, label, value, onChange, error, hint, placeholder, disabled }: TextFieldProps) {
  return (
    <Field id={id} label={label} error={error} hint={hint}>
      <input
        id={id}
        type="text"
        value={value}
        placeholder={placeholder}
        disabled={disabled}
        onChange={(e) => onChange(e.target.value)}
        className={cn(inputClass, error ? "border-error" : "border-slate-700")}
      />
    </Field>
  );
}

interface PathFieldProps extends TextFieldProps {
  picker: Pick<PathPickerProps, "title" | "mode" | "extensions">;
  /** Extra buttons after Browse */
  actions?: ReactNode;
}

/**
 * Text input with a Browse button opening a PathPicker.
 */
export function PathField({ picker, actions, ...field }: PathFieldProps) {
  const [browsing, setBrowsing] = useState(false);

  return (
    <Field id={field.id} label={field.label} error={field.error} hint={field.hint}>
      <div className="flex gap-2">
        <input
          id={field.id}
          type="text"
          value={field.value}
          placeholder={field.placeholder}
          disabled={field.disabled}
          onChange={(e) => field.onChange(e.target.value)}
          className={cn(inputClass, "font-mono", field.error ? "border-error" : "border-slate-700")}
        />
        <button
          type="button"
          disabled={field.disabled}
          onClick={() => setBrowsing(true)}
          className="flex items-center gap-1.5 rounded-md border border-slate-700 px-2.5 text-xs text-slate-300 hover:bg-surface-secondary disabled:opacity-50"
        >
          <FolderOpen className="w-3.5 h-3.5" />
          Browse
        </button>
        {actions}
      </div>
      {browsing && (
        <PathPicker
          {...picker}
          initialPath={field.value}
          onClose={() => setBrowsing(false)}
          onSelect={(selected) => {
            setBrowsing(false);
            field.onChange(selected);
          }}
        />
      )}
    </Field>
  );
}

interface CheckboxProps {
  id: string;
  label: string;
  checked: boolean;
  onChange: (checked: boolean) => void;
  disabled?: boolean;
}

export function Checkbox({ id, label, checked, onChange, disabled }: CheckboxProps) {
  return (
    <label htmlFor={id} className="flex items-center gap-2 text-sm text-slate-300 select-none">
      <input
        id={id}
        type="checkbox"
        checked={checked}
        disabled={disabled}
        onChange={(e) => onChange(e.target.checked)}
        className="h-4 w-4 rounded border-slate-600 bg-background-primary accent-primary-500"
      />
      {label}
    </label>
  );
}

interface RunButtonProps {
  label: string;
  running: boolean;
  submitting: boolean;
  onClick: () => void;
}

/**
 * Disabled and relabelled for exactly as long as the panel is running.
 */
export function RunButton({ label, running, submitting, onClick }: RunButtonProps) {
  const busy = running || submitting;
  return (
    <button
      type="button"
      onClick={onClick}
      disabled={busy}
      aria-busy={busy}
      className={cn(
        "flex items-center justify-center gap-2 rounded-md px-4 py-2 text-sm font-medium text-white transition-colors",
        busy ? "bg-surface-secondary cursor-not-allowed" : "bg-primary-600 hover:bg-primary-500"
      )}
    >
      {busy ? <Loader2 className="w-4 h-4 animate-spin" /> : <Play className="w-4 h-4" />}
      {running ? "Running…" : label}
    </button>
  );
}

export function Notice({ message }: { message: string | null }) {
  if (!message) return null;
  return (
    <p role="alert" className="rounded-md border border-warning/40 bg-warning/10 px-3 py-2 text-xs text-warning-light">
      {message}
    </p>
  );
}
