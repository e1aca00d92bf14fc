/**
 * Smallest multiple of 0.1 that is >= x. Applied to final scores only,
 * never to impact or exploitability sub-scores.
 */
export function roundUp(x: number): number {
  return Math.ceil(x * 10) / 10;
}
