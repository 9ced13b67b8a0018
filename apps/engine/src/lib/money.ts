// Amounts are carried as integer minor units (cents); ratios as fixed-point millionths.
const RATIO_SCALE = 1_000_000n;

export function toCents(amount: number): number {
  if (!Number.isFinite(amount) || amount < 0) {
    throw new Error(`not a non-negative finite amount: ${amount}`);
  }
  return Math.round(amount * 100);
}

export function fromCents(cents: number): number {
  return cents / 100;
}

function toMicros(ratio: number): bigint {
  if (!Number.isFinite(ratio) || ratio < 0) {
    throw new Error(`not a non-negative finite ratio: ${ratio}`);
  }
  return BigInt(Math.round(ratio * 1_000_000));
}

/** cents × ratio, rounded half-up to whole cents. */
export function mulRatio(cents: number, ratio: number): number {
  const product = BigInt(cents) * toMicros(ratio);
  return Number((product + RATIO_SCALE / 2n) / RATIO_SCALE);
}

/** Duty on a dutiable amount at an ad-valorem rate given as a fraction (0.25 = 25%). */
export function applyRate(cents: number, rate: number): number {
  return mulRatio(cents, rate);
}

/** Share of an amount for a percentage in [0, 100]. */
export function shareOf(cents: number, pct: number): number {
  return mulRatio(cents, pct / 100);
}

/** Percentage to basis points, for exact comparisons of 2-decimal percentages. */
export function toBasisPoints(pct: number): number {
  return Math.round(pct * 100);
}
