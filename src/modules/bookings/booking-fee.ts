export interface ChargeAmount {
    amount_cents: number;
}

export function computeBaseFee(rentalDays: number, dailyRateCents: number): number {
    return rentalDays * dailyRateCents;
}

export function sumCharges(charges: readonly ChargeAmount[]): number {
    return charges.reduce((total, charge) => total + charge.amount_cents, 0);
}

/**
 * The booking total is always derived from its parts; the stored
 * total_fee_cents is a cache of this value.
 */
export function computeTotalFee(
    rentalDays: number,
    dailyRateCents: number,
    charges: readonly ChargeAmount[] = [],
): number {
    return computeBaseFee(rentalDays, dailyRateCents) + sumCharges(charges);
}
