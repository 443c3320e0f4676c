/**
 * Presentation formatting. Two decimals, applied once at the edge.
 */
export function formatMetricValue(value: number): string {
  const fixed = value.toFixed(2);
  // toFixed keeps the sign of tiny negatives ("-0.00")
  return fixed === "-0.00" ? "0.00" : fixed;
}
