/**
 * Capitalizes the first letter of every run of letters and lowercases the
 * rest: "light rain" -> "Light Rain", "NEW YORK" -> "New York".
 */
export function toTitleCase(text: string): string {
  return text.replace(/\p{L}+/gu, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

/**
 * Values too large to scale have no fractional digits left and are
 * returned as they are.
 */
export function roundTo(value: number, places: number): number {
  const factor = 10 ** places;
  const scaled = value * factor;
  if (!Number.isFinite(scaled)) {
    return value;
  }
  return Math.round(scaled) / factor;
}
