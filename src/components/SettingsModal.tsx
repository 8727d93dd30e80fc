import { useEffect, useMemo, useRef } from "react";
import { createPortal } from "react-dom";

export type SettingsField =
  | { key: string; label: string; description?: string; type: "boolean" }
  | { key: string; label: string; description?: string; type: "number"; min?: number; max?: number; step?: number };

type SettingsModalProps = {
  isOpen: boolean;
  title: string;
  description?: string;
  fields: SettingsField[];
  values: Record<string, unknown>;
  onChange: (key: string, value: unknown) => void;
  onClose: () => void;
  onReset?: () => void;
};

const FOCUSABLE_SELECTORS = "button:not([disabled]), input:not([disabled]), [tabindex]:not([tabindex='-1'])";

function usePortalRoot(id: string) {
  return useMemo(() => {
    const existing = document.getElementById(id);
    if (existing) {
      return existing;
    }
    const element = document.createElement("div");
    element.id = id;
    document.body.appendChild(element);
    return element;
  }, [id]);
}

function trapFocus(event: KeyboardEvent, dialog: HTMLElement) {
  const focusable = Array.from(dialog.querySelectorAll<HTMLElement>(FOCUSABLE_SELECTORS));
  if (!focusable.length) {
    return;
  }
  const first = focusable[0];
  const last = focusable[focusable.length - 1];
  if (event.shiftKey && document.activeElement === first) {
    event.preventDefault();
    last.focus();
  } else if (!event.shiftKey && document.activeElement === last) {
    event.preventDefault();
    first.focus();
  }
}

export function SettingsModal({
  isOpen,
  title,
  description,
  fields,
  values,
  onChange,
  onClose,
  onReset,
}: SettingsModalProps) {
  const portalRoot = usePortalRoot("modal-root");
  const dialogRef = useRef<HTMLDivElement | null>(null);
  const onCloseRef = useRef(onClose);
  useEffect(() => {
    onCloseRef.current = onClose;
  }, [onClose]);

  useEffect(() => {
    if (!isOpen) {
      return;
    }
    const previouslyFocused = document.activeElement instanceof HTMLElement ? document.activeElement : null;
    const handleKey = (event: KeyboardEvent) => {
      if (event.key === "Escape") {
        event.preventDefault();
        onCloseRef.current();
      } else if (event.key === "Tab" && dialogRef.current) {
        trapFocus(event, dialogRef.current);
      }
    };
    document.addEventListener("keydown", handleKey);
    const previousOverflow = document.body.style.overflow;
    document.body.style.overflow = "hidden";
    dialogRef.current?.querySelector<HTMLElement>(FOCUSABLE_SELECTORS)?.focus({ preventScroll: true });
    return () => {
      document.removeEventListener("keydown", handleKey);
      document.body.style.overflow = previousOverflow;
      previouslyFocused?.focus({ preventScroll: true });
    };
  }, [isOpen]);

  if (!isOpen) {
    return null;
  }

  const renderField = (field: SettingsField) => {
    const value = values[field.key];
    const fieldId = `settings-${field.key}`;
    const hint = field.description ? <span className="modal__hint">{field.description}</span> : null;
    if (field.type === "boolean") {
      return (
        <label key={field.key} className="modal__field modal__field--switch" htmlFor={fieldId}>
          <span className="modal__label">{field.label}</span>
          {hint}
          <span className="switch">
            <input
              id={fieldId}
              type="checkbox"
              checked={Boolean(value)}
              onChange={(event) => onChange(field.key, event.target.checked)}
            />
            <span className="switch__decor" aria-hidden="true" />
          </span>
        </label>
      );
    }
    return (
      <label key={field.key} className="modal__field" htmlFor={fieldId}>
        <span className="modal__label">{field.label}</span>
        {hint}
        <input
          id={fieldId}
          type="number"
          value={typeof value === "number" && Number.isFinite(value) ? String(value) : ""}
          onChange={(event) => onChange(field.key, event.target.value === "" ? undefined : Number(event.target.value))}
          min={field.min}
          max={field.max}
          step={field.step}
        />
      </label>
    );
  };

  return createPortal(
    <div className="modal-overlay" role="presentation">
      <div
        className="modal"
        role="dialog"
        aria-modal="true"
        aria-labelledby="settings-modal-title"
        aria-describedby={description ? "settings-modal-description" : undefined}
        ref={dialogRef}
      >
        <header className="modal__header">
          <h2 id="settings-modal-title" className="modal__title">
            {title}
          </h2>
          <button type="button" className="modal__close" onClick={onClose} aria-label="Close settings">
            ×
          </button>
        </header>
        {description ? (
          <p id="settings-modal-description" className="modal__description">
            {description}
          </p>
        ) : null}
        <form className="modal__form" onSubmit={(event) => event.preventDefault()}>
          {fields.map(renderField)}
        </form>
        <footer className="modal__footer">
          {onReset ? (
            <button type="button" className="modal__reset" onClick={onReset}>
              Reset to defaults
            </button>
          ) : null}
          <button type="button" className="modal__close-button" onClick={onClose}>
            Done
          </button>
        </footer>
      </div>
    </div>,
    portalRoot,
  );
}
