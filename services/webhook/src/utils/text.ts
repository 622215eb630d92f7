/**
 * Two-decimal formatting that rounds exact ties to even (0.125 -> "0.12") and keeps the sign of -0.
 * A double is an exact hundredths tie only when x * 8 is an odd integer.
 */
export function toFixed2(x: number): string {
  if (Object.is(x, -0)) return "-0.00";
  const eighths = x * 8;
  if (Number.isInteger(eighths) && Math.abs(eighths) % 2 === 1) {
    const lo = Math.floor(x * 100);
    const n = lo % 2 === 0 ? lo : lo + 1;
    const s = (n / 100).toFixed(2);
    return x < 0 && n === 0 ? "-0.00" : s;
  }
  return x.toFixed(2);
}

/** Percentages print as decimals: 59 -> "59.0", 12.5 -> "12.5". */
export function formatPercent(x: number): string {
  return Number.isInteger(x) ? x.toFixed(1) : String(x);
}

/** Keeps the first `max` characters, counting by code point so surrogate pairs are never split. */
export function truncateChars(text: string, max: number): string {
  if (text.length <= max) return text;
  return Array.from(text).slice(0, max).join("");
}
