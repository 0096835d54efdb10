/**
 * Staking duration.
 *
 * The validator has no clock. "Now" is whatever the caller supplies; by
 * default it is the transaction's declared validity upper bound, which the
 * ledger guarantees has not yet passed when the transaction is included.
 */

import { SECONDS_PER_DAY, STAKE_DATUM_CONSTRUCTOR } from "./constants.js";
import { fail, REASONS } from "./errors.js";
import type { Input, PlutusData, PosixTime, ValidityRange } from "./types.js";

/**
 * Read the start time out of a staking record datum: Constr 0 [Int start].
 * Returns undefined for any other shape.
 */
export function parseStakeDatum(datum: PlutusData): PosixTime | undefined {
  if (!("constr" in datum)) return undefined;
  if (datum.constr !== STAKE_DATUM_CONSTRUCTOR) return undefined;
  const [first] = datum.fields;
  if (first === undefined || !("int" in first)) return undefined;
  return first.int;
}

/** Start time from an explicit datum. DataError if it is not a staking record. */
export function stakeStartFromDatum(datum: PlutusData): PosixTime {
  const start = parseStakeDatum(datum);
  if (start === undefined) fail("DataError", REASONS.malformedStakingRecord);
  return start;
}

/**
 * Start time from the first input that carries a datum.
 * DataError when no input carries one, or when that datum is malformed.
 */
export function findStakeStart(inputs: readonly Input[]): PosixTime {
  const record = inputs.find((i) => i.output.datum !== undefined)?.output.datum;
  if (record === undefined) fail("DataError", REASONS.noStakingRecord);
  return stakeStartFromDatum(record);
}

/** The declared validity upper bound, used as "now". */
export function validityNow(validity: ValidityRange): PosixTime {
  if (validity.upper === undefined) fail("DataError", REASONS.noUpperBound);
  return validity.upper;
}

/** Whole days from `start` to `now`, floored (so negative spans round down). */
export function stakingDurationDays(start: PosixTime, now: PosixTime): bigint {
  return floorDiv(now - start, SECONDS_PER_DAY);
}

function floorDiv(a: bigint, b: bigint): bigint {
  const q = a / b;
  return a % b !== 0n && (a < 0n) !== (b < 0n) ? q - 1n : q;
}
