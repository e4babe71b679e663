/** Largest value a PostgreSQL INTEGER column holds. */
export const INT4_MAX = 2147483647;

export const MAX_RENT_DAYS = 365;
export const MAX_DAILY_RATE_CENTS = 1_000_000;
export const MAX_MILEAGE = 10_000_000;

/** Bound on a single charge (either sign) or maintenance cost. */
export const MAX_AMOUNT_CENTS = 10_000_000;

// Longest rental at the highest rate plus a full list of extras stays inside INTEGER
export const MAX_EXTRAS = 20;
