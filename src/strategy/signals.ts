export type Signal = 'overbought' | 'near-upper' | 'neutral' | 'near-lower' | 'oversold';

export const SIGNAL_THRESHOLDS = {
  overbought: 95,
  nearUpper: 80,
  nearLower: 20,
  oversold: 5,
} as const;

export const SIGNAL_LABELS: Record<Signal, string> = {
  overbought: '🔴 Overbought',
  'near-upper': '🟡 Near Upper',
  neutral: '⚪ Neutral',
  'near-lower': '🟡 Near Lower',
  oversold: '🟢 Oversold',
};

/**
 * Maps a band position (0 = lower band, 100 = upper band) to a signal.
 * All comparisons are strict: exactly 95 is Near Upper, 80 and 20 are
 * Neutral, and 5 is Near Lower.
 */
export const classifySignal = (positionPct: number): Signal => {
  if (positionPct > SIGNAL_THRESHOLDS.overbought) return 'overbought';
  if (positionPct > SIGNAL_THRESHOLDS.nearUpper) return 'near-upper';
  if (positionPct < SIGNAL_THRESHOLDS.oversold) return 'oversold';
  if (positionPct < SIGNAL_THRESHOLDS.nearLower) return 'near-lower';
  return 'neutral';
};
