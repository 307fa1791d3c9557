/** Round to one decimal place. Applied once, to final display quantities. */
export function roundQuantity(value: number): number {
  return Number(value.toFixed(1))
}
