/** Largest edit distance still reported as a likely typo. */
export function typoThreshold(name: string): number {
  return Math.min(3, Math.max(1, Math.floor(name.length / 3)));
}

/**
 * Levenshtein distance, abandoning early once every cell in a row exceeds
 * `max`. Returns `max + 1` in that case.
 */
export function editDistance(a: string, b: string, max = Infinity): number {
  if (Math.abs(a.length - b.length) > max) return max + 1;
  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const row = [i];
    let rowMin = i;
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      const v = Math.min(prev[j] + 1, row[j - 1] + 1, prev[j - 1] + cost);
      row.push(v);
      if (v < rowMin) rowMin = v;
    }
    if (rowMin > max) return max + 1;
    prev = row;
  }
  return prev[b.length];
}

export interface Suggestion {
  name: string;
  distance: number;
}

/**
 * Existing names close to `requested`, nearest first; equal distances are
 * ordered by name (code unit order).
 */
export function suggestMarkers(
  requested: string,
  existing: readonly string[],
  max: number = typoThreshold(requested),
): Suggestion[] {
  const out: Suggestion[] = [];
  for (const name of new Set(existing)) {
    if (name === requested) continue;
    const distance = editDistance(requested, name, max);
    if (distance <= max) out.push({ name, distance });
  }
  return out.sort((x, y) => x.distance - y.distance || byName(x.name, y.name));
}

function byName(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
