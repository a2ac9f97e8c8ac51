/** Rounds a currency amount to cents, half away from zero. */
export function roundCurrency(amount: number): number {
  return Math.sign(amount) * Math.round((Math.abs(amount) + Number.EPSILON) * 100) / 100;
}
