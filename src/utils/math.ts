/**
 * @fileoverview Number formatting shared by the signal analyzers.
 */

/** `0.423` -> `"42%"` */
export function formatPercent(fraction: number): string {
  return `${Math.round(fraction * 100)}%`;
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
