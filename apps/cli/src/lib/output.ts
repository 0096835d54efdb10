/**
 * Verdict printing.
 */

import type { Verdict } from "@lpstake/validator";

export function formatVerdict(verdict: Verdict): string {
  return verdict.ok ? "accept" : `reject  ${verdict.kind}: ${verdict.reason}`;
}
