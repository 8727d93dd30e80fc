export type SliderRange = {
  min: number;
  max: number;
  step: number;
  default: number;
};

export type RadiusRatioConfig = {
  docs: string;
  cation: SliderRange;
  anion: SliderRange;
};

export const RADIUS_RATIO_SLUG = "radius_ratio";

export const DEFAULT_RADIUS_RATIO_CONFIG: RadiusRatioConfig = {
  docs: "/help/radius_ratio",
  cation: { min: 0.1, max: 2.0, step: 0.01, default: 1.0 },
  anion: { min: 0.1, max: 2.5, step: 0.01, default: 1.4 },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readNumber(value: unknown, fallback: number): number {
  const parsed = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  return typeof parsed === "number" && Number.isFinite(parsed) ? parsed : fallback;
}

function resolveRange(raw: unknown, fallback: SliderRange): SliderRange {
  if (!isRecord(raw)) {
    return { ...fallback };
  }
  const min = readNumber(raw.min, fallback.min);
  const max = readNumber(raw.max, fallback.max);
  if (min <= 0 || min >= max) {
    return { ...fallback };
  }
  const step = readNumber(raw.step, fallback.step);
  const preferred = readNumber(raw.default, fallback.default);
  return {
    min,
    max,
    step: step > 0 ? step : fallback.step,
    default: Math.min(Math.max(preferred, min), max),
  };
}

/** Merges `pluginSettings.radius_ratio` over the defaults, field by field. */
export function resolveRadiusRatioConfig(raw: unknown): RadiusRatioConfig {
  if (!isRecord(raw)) {
    return {
      docs: DEFAULT_RADIUS_RATIO_CONFIG.docs,
      cation: { ...DEFAULT_RADIUS_RATIO_CONFIG.cation },
      anion: { ...DEFAULT_RADIUS_RATIO_CONFIG.anion },
    };
  }
  return {
    docs: typeof raw.docs === "string" && raw.docs.trim() ? raw.docs : DEFAULT_RADIUS_RATIO_CONFIG.docs,
    cation: resolveRange(raw.cation, DEFAULT_RADIUS_RATIO_CONFIG.cation),
    anion: resolveRange(raw.anion, DEFAULT_RADIUS_RATIO_CONFIG.anion),
  };
}
