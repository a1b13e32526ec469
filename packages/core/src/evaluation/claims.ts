/**
 * Shared extract-then-verify flow used by claim-based evaluators.
 */

import type { ClaimVerdict, Judge } from './judge/judge.js';
import type { Verdict } from './types.js';

export interface ClaimDetail {
  readonly claim: string;
  readonly verdict: Verdict;
  readonly evidence: string;
}

export interface ClaimVerificationResult {
  readonly claimDetails: readonly ClaimDetail[];
  readonly verdicts: readonly ClaimVerdict[];
  /** Extraction plus every verification */
  readonly totalTokens: number;
  /** True when the response yielded no claims */
  readonly claimsEmpty: boolean;
}

/**
 * Extract claims from `response` and verify each against `context`.
 * Verifications run in parallel; details keep claim order.
 */
export async function verifyAllClaims(
  response: string,
  context: readonly string[],
  judge: Judge,
): Promise<ClaimVerificationResult> {
  const { claims, tokensUsed } = await judge.extractClaims(response);

  if (claims.length === 0) {
    return { claimDetails: [], verdicts: [], totalTokens: tokensUsed, claimsEmpty: true };
  }

  const verdicts = await Promise.all(claims.map((claim) => judge.verifyClaim(claim, context)));

  return {
    claimDetails: verdicts.map((verdict, index) => ({
      claim: claims[index],
      verdict: verdict.verdict,
      evidence: verdict.evidence,
    })),
    verdicts,
    totalTokens: verdicts.reduce((total, verdict) => total + verdict.tokensUsed, tokensUsed),
    claimsEmpty: false,
  };
}
