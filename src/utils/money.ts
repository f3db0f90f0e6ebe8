/** Round half-up to 2 decimal places. */
export function roundMoney(value: number): number {
  return roundTo(value, 2);
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const sign = value < 0 ? -1 : 1;
  return (sign * Math.round((Math.abs(value) + Number.EPSILON) * factor)) / factor;
}

export function percentOf(amount: number, percentage: number): number {
  return roundMoney((amount * percentage) / 100);
}

/** A null or zero cap leaves the amount uncapped. */
export function capAmount(amount: number, cap: number | null): number {
  return cap !== null && cap > 0 && amount > cap ? cap : amount;
}
