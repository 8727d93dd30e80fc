import type { SliderRange } from "../config";
import { parseRadius } from "../useClassification";

type RadiusControlProps = {
  id: string;
  label: string;
  hint?: string;
  range: SliderRange;
  value: string;
  invalid?: boolean;
  onChange: (value: string) => void;
};

export function RadiusControl({ id, label, hint, range, value, invalid = false, onChange }: RadiusControlProps) {
  const parsed = parseRadius(value);
  const sliderValue = Number.isFinite(parsed) ? Math.min(Math.max(parsed, range.min), range.max) : range.default;
  const hintId = hint ? `${id}-hint` : undefined;

  return (
    <div className="form-field radius-control" data-invalid={invalid || undefined}>
      <label className="form-field__label" htmlFor={`${id}-slider`}>
        {label}
      </label>
      <div className="radius-control__inputs">
        <input
          id={`${id}-slider`}
          type="range"
          min={range.min}
          max={range.max}
          step={range.step}
          value={sliderValue}
          aria-describedby={hintId}
          onChange={(event) => onChange(event.target.value)}
        />
        <input
          id={`${id}-value`}
          className="radius-control__number"
          type="number"
          inputMode="decimal"
          step={range.step}
          aria-label={`${label} value`}
          aria-invalid={invalid}
          value={value}
          onChange={(event) => onChange(event.target.value)}
        />
      </div>
      {hint ? (
        <p className="form-field__hint" id={hintId}>
          {hint}
        </p>
      ) : null}
    </div>
  );
}
