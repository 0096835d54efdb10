/**
 * Rejection taxonomy.
 *
 * Every rejection is a value from the host's point of view: the entry points
 * return a Verdict, they never crash on a bad transaction. Helpers signal a
 * rejection by throwing ValidationFailure; the entry points turn exactly that
 * class into a Verdict and let anything else propagate.
 */

export type FailureKind =
  | "StructuralError" // own input missing, non-script address
  | "RuleViolation" // quantity check failed
  | "AuthorizationError" // admin signature absent
  | "DataError" // staking record / validity bound unusable
  | "UnknownAction"; // redeemer not recognized

export const REASONS = {
  ownInputNotFound: "own input not found",
  notScriptInput: "not a script input",
  unexpectedLpMint: "unexpected LP mint during spend",
  lpNotBurned: "LP not burned during spend",
  insufficientReward: "insufficient escrowed reward",
  stakeMintMismatch: "stake/mint mismatch",
  burnNotNegative: "burn amount not negative",
  adminSignatureMissing: "admin signature missing",
  invalidAction: "invalid redeemer action",
  noStakingRecord: "no staking record",
  malformedStakingRecord: "malformed staking record",
  noUpperBound: "validity interval has no upper bound",
  negativeDuration: "negative staking duration",
} as const;

export type Reason = (typeof REASONS)[keyof typeof REASONS];

export class ValidationFailure extends Error {
  readonly kind: FailureKind;
  readonly reason: Reason;

  constructor(kind: FailureKind, reason: Reason) {
    super(`${kind}: ${reason}`);
    this.name = "ValidationFailure";
    this.kind = kind;
    this.reason = reason;
  }
}

export type Verdict =
  | { ok: true }
  | { ok: false; kind: FailureKind; reason: Reason };

/** Reject the transaction. */
export function fail(kind: FailureKind, reason: Reason): never {
  throw new ValidationFailure(kind, reason);
}

/**
 * Run a predicate body and convert a ValidationFailure into a rejection.
 * The body returns normally only when every check passed.
 */
export function evaluate(body: () => void): Verdict {
  try {
    body();
    return { ok: true };
  } catch (err) {
    if (err instanceof ValidationFailure) {
      return { ok: false, kind: err.kind, reason: err.reason };
    }
    throw err;
  }
}
