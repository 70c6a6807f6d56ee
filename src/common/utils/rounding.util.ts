// Every percentage, total and mean the engine reports goes through here, so
// report and dashboard values never drift apart.
export const PERCENTAGE_PRECISION = 1;

export function roundScore(value: number, precision: number = PERCENTAGE_PRECISION): number {
  const factor = 10 ** precision;
  return Math.round((value + Number.EPSILON) * factor) / factor;
}

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}
