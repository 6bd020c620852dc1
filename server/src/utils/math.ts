export const clamp = (value: number, min: number, max: number) => Math.min(max, Math.max(min, value));

export function roundTo(value: number, digits = 2): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function mean(values: readonly number[]): number | null {
  if (!values.length) {
    return null;
  }
  return values.reduce((acc, value) => acc + value, 0) / values.length;
}

export const sum = (values: readonly number[]) => values.reduce((acc, value) => acc + value, 0);

/** Code-unit order, independent of the runtime locale. */
export const compareKeys = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);
