/**
 * Frozen protocol constants.
 *
 * Changing any of these changes which transactions the validator accepts,
 * i.e. it is a new script with a new hash.
 */

// ── Reward accrual ─────────────────────────────────────────────────
export const ANNUAL_REWARD_RATE_PERCENT = 8n;
export const DAYS_PER_YEAR = 365n;
export const SECONDS_PER_DAY = 86_400n;

// ── Datum / redeemer constructor tags ──────────────────────────────
export const STAKE_DATUM_CONSTRUCTOR = 0;
export const ACTION_MINT_CONSTRUCTOR = 0;
export const ACTION_BURN_CONSTRUCTOR = 1;
export const ACTION_DEPOSIT_REWARD_CONSTRUCTOR = 2;

// ── Identifier sizes (hex chars) ───────────────────────────────────
export const HASH28_HEX_LENGTH = 56; // policy ids, key hashes, script hashes
export const TX_HASH_HEX_LENGTH = 64;
export const TOKEN_NAME_MAX_HEX_LENGTH = 64; // 32 bytes
