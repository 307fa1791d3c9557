const THRESHOLD = 0.02

/**
 * Format a shopping-list quantity for plain-text display.
 *
 * Quantities arrive already rounded to one decimal place, so the only
 * fraction worth spelling out is a half.
 *
 * Examples:
 * - 2.0 -> "2"
 * - 0.5 -> "1/2"
 * - 1.5 -> "1 1/2"
 * - 10.7 -> "10.7"
 */
export function formatQuantity(value: number): string {
  if (value <= 0) return '0'

  const whole = Math.floor(value)
  const fractional = value - whole

  if (fractional < THRESHOLD) {
    return String(whole)
  }

  if (Math.abs(fractional - 0.5) < THRESHOLD) {
    return whole > 0 ? `${whole} 1/2` : '1/2'
  }

  return Number(value.toFixed(1)).toString()
}
