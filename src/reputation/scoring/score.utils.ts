export function clampScore(value: number): number {
  return Math.max(0, Math.min(1, value));
}

/**
 * Four-decimal rendering used in every score log line.
 */
export function formatScore(value: number): string {
  return value.toFixed(4);
}
