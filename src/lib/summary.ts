export type ValueRange = { min: string; max: string };

/** Lexicographic span of the non-empty values. */
export function valueRange(values: string[]): ValueRange | null {
  const present = values.filter((v) => v !== "").sort();
  if (present.length === 0) return null;
  return { min: present[0], max: present[present.length - 1] };
}

export function countBy(values: string[]): Record<string, number> {
  const out: Record<string, number> = {};
  for (const v of values) out[v] = (out[v] ?? 0) + 1;
  return out;
}

export function uniqueCount(values: string[]): number {
  return new Set(values).size;
}
