export type TemporalPattern = {
  format: string;
  hasTime: boolean;
  matches: (value: string) => boolean;
};

const inRange = (n: number, min: number, max: number) => Number.isInteger(n) && n >= min && n <= max;

const validDate = (year: number, month: number, day: number) =>
  inRange(year, 1, 9999) && inRange(month, 1, 12) && inRange(day, 1, 31);

const validTime = (hour: number, minute: number, second = 0) =>
  inRange(hour, 0, 23) && inRange(minute, 0, 59) && inRange(second, 0, 59);

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_DATETIME = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?$/;
const YMD_SLASH = /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/;
const SLASH_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const SLASH_DATETIME = /^(\d{1,2})\/(\d{1,2})\/(\d{4}) (\d{1,2}):(\d{2})(?::(\d{2}))?$/;
const DOT_DATE = /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/;
const EPOCH_SECONDS = /^\d{10}$/;

// 2000-01-01 .. 2100-01-01
const EPOCH_MIN = 946684800;
const EPOCH_MAX = 4102444800;

const groups = (re: RegExp, value: string): number[] | null => {
  const m = re.exec(value);
  if (!m) return null;
  return m.slice(1).map(g => (g === undefined ? 0 : Number(g)));
};

/** Ordered: when two patterns match the same number of values the earlier one wins. */
export const TEMPORAL_PATTERNS: readonly TemporalPattern[] = [
  {
    format: '%Y-%m-%d',
    hasTime: false,
    matches: v => {
      const g = groups(ISO_DATE, v);
      return !!g && validDate(g[0], g[1], g[2]);
    }
  },
  {
    format: '%Y-%m-%dT%H:%M:%S',
    hasTime: true,
    matches: v => {
      const g = groups(ISO_DATETIME, v);
      return !!g && validDate(g[0], g[1], g[2]) && validTime(g[3], g[4], g[5]);
    }
  },
  {
    format: '%Y/%m/%d',
    hasTime: false,
    matches: v => {
      const g = groups(YMD_SLASH, v);
      return !!g && validDate(g[0], g[1], g[2]);
    }
  },
  {
    format: '%m/%d/%Y',
    hasTime: false,
    matches: v => {
      const g = groups(SLASH_DATE, v);
      return !!g && validDate(g[2], g[0], g[1]);
    }
  },
  {
    format: '%d/%m/%Y',
    hasTime: false,
    matches: v => {
      const g = groups(SLASH_DATE, v);
      return !!g && validDate(g[2], g[1], g[0]);
    }
  },
  {
    format: '%m/%d/%Y %H:%M:%S',
    hasTime: true,
    matches: v => {
      const g = groups(SLASH_DATETIME, v);
      return !!g && validDate(g[2], g[0], g[1]) && validTime(g[3], g[4], g[5]);
    }
  },
  {
    format: '%d.%m.%Y',
    hasTime: false,
    matches: v => {
      const g = groups(DOT_DATE, v);
      return !!g && validDate(g[2], g[1], g[0]);
    }
  },
  {
    format: 'epoch',
    hasTime: true,
    matches: v => EPOCH_SECONDS.test(v) && inRange(Number(v), EPOCH_MIN, EPOCH_MAX)
  }
];

export type TemporalMatch = {
  pattern: TemporalPattern;
  matched: number;
  ratio: number;
};

/** Finds the single pattern matching the most values; null when nothing matches. */
export const bestTemporalMatch = (values: string[]): TemporalMatch | null => {
  if (!values.length) return null;
  let best: TemporalMatch | null = null;
  for (const pattern of TEMPORAL_PATTERNS) {
    const matched = values.filter(pattern.matches).length;
    if (matched > 0 && (!best || matched > best.matched)) {
      best = { pattern, matched, ratio: matched / values.length };
    }
  }
  return best;
};
