/** Easing names accepted in configuration. */
export type EasingName = 'linear' | 'easein' | 'easeout' | 'easeinout';

/** Curve identifiers the fade stage understands. */
export type FadeCurve = 'linear' | 'quadratic' | 'cubic';

export const FALLBACK_CURVE: FadeCurve = 'linear';

// Approximate mapping: ffmpeg's fade has no true ease curves
export const EASING_TO_CURVE: Readonly<Record<EasingName, FadeCurve>> = {
  linear: 'linear',
  easein: 'quadratic',
  easeout: 'quadratic',
  easeinout: 'cubic',
};

function isEasingName(name: string): name is EasingName {
  return Object.prototype.hasOwnProperty.call(EASING_TO_CURVE, name);
}

/** Unknown or missing names map to FALLBACK_CURVE. */
export function normalizeEasing(name: string | undefined): FadeCurve {
  const key = (name ?? '').trim().toLowerCase();
  return isEasingName(key) ? EASING_TO_CURVE[key] : FALLBACK_CURVE;
}
