/** Format a probability in [0, 1] as a percentage, e.g. 0.1234 -> "12.3%". */
export function formatProbability(p: number): string {
  return `${(p * 100).toFixed(1)}%`;
}
