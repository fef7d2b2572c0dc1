/** String keys of T whose values are numeric (possibly absent). */
export type NumericKey<T> = keyof T & string & {
  [K in keyof T]-?: NonNullable<T[K]> extends number ? K : never;
}[keyof T];

export type FieldSelector<T> = NumericKey<T> | ((item: T) => unknown);

// Missing, non-numeric and non-finite values read as 0. Market data is noisy;
// analytics never throw on it.
export function toNumber(v: unknown): number {
  if (typeof v === 'number') return Number.isFinite(v) ? v : 0;
  if (typeof v === 'string' && v.trim() !== '') {
    const n = Number(v);
    return Number.isFinite(n) ? n : 0;
  }
  return 0;
}

export function readField<T>(item: T, field: FieldSelector<T>): number {
  if (typeof field === 'string') return toNumber(item[field]);
  return toNumber(field(item));
}
