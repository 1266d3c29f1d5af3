/**
 * Turns an arbitrary header into a warehouse-safe identifier:
 * `"Order Date (UTC)"` becomes `order_date_utc`, `"2024 total"` becomes `_2024_total`.
 */
export const standardizeColumnName = (name: string) => {
  let out = name
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  if (!out) return 'column';
  if (/^\d/.test(out)) out = `_${out}`;
  return out;
};

/** Standardizes every name and suffixes collisions (`name`, `name_2`, `name_3`). */
export const standardizeColumnNames = (names: string[]) => {
  const used = new Set<string>();
  const mapping = new Map<string, string>();
  const result = names.map(original => {
    const base = standardizeColumnName(original);
    let candidate = base;
    let n = 2;
    while (used.has(candidate)) {
      candidate = `${base}_${n}`;
      n++;
    }
    used.add(candidate);
    if (!mapping.has(original)) mapping.set(original, candidate);
    return candidate;
  });
  return { names: result, mapping };
};
