export type IntervalUnit = 'minute' | 'hour' | 'day';

export type Lookback = {
  amount: number;
  unit: IntervalUnit;
};

const LOOKBACK_RE = /^(\d+)\s*(minute|hour|day)s?$/i;

/** Parses windows like `30 minutes`, `2 hours`, `1 day`; null when the text is not one. */
export const parseLookback = (text: string): Lookback | null => {
  const m = LOOKBACK_RE.exec(text.trim());
  if (!m) return null;
  const amount = Number(m[1]);
  if (amount < 1) return null;
  const unit = m[2].toLowerCase();
  if (unit !== 'minute' && unit !== 'hour' && unit !== 'day') return null;
  return { amount, unit };
};
