import { describe, expect, it } from 'vitest';

import { verifyAllClaims } from '../../src/evaluation/claims.js';
import { createStubJudge, delay } from '../support/stub-judge.js';

describe('verifyAllClaims', () => {
  it('marks the result empty when no claims are extracted', async () => {
    const judge = createStubJudge({
      extractClaims: async () => ({ claims: [], tokensUsed: 7 }),
    });

    const result = await verifyAllClaims('Hello!', ['doc'], judge);

    expect(result).toEqual({ claimDetails: [], verdicts: [], totalTokens: 7, claimsEmpty: true });
    expect(judge.verifyClaim).not.toHaveBeenCalled();
  });

  it('verifies each claim, keeps claim order and sums tokens', async () => {
    const judge = createStubJudge({
      extractClaims: async () => ({ claims: ['slow claim', 'fast claim'], tokensUsed: 10 }),
      verifyClaim: async (claim) => {
        if (claim === 'slow claim') {
          await delay(20);
          return { verdict: 'SUPPORTED', evidence: 'Doc 1', tokensUsed: 5 };
        }
        return { verdict: 'CONTRADICTED', evidence: 'Doc 2', tokensUsed: 6 };
      },
    });

    const result = await verifyAllClaims('response', ['doc'], judge);

    expect(result.claimsEmpty).toBe(false);
    expect(result.totalTokens).toBe(21);
    expect(result.claimDetails).toEqual([
      { claim: 'slow claim', verdict: 'SUPPORTED', evidence: 'Doc 1' },
      { claim: 'fast claim', verdict: 'CONTRADICTED', evidence: 'Doc 2' },
    ]);
    expect(result.verdicts.map((verdict) => verdict.tokensUsed)).toEqual([5, 6]);
    expect(judge.verifyClaim).toHaveBeenCalledWith('slow claim', ['doc']);
  });

  it('starts all verifications before any finishes', async () => {
    let started = 0;
    let startedWhenFirstFinished = 0;
    const judge = createStubJudge({
      extractClaims: async () => ({ claims: ['a', 'b', 'c'], tokensUsed: 0 }),
      verifyClaim: async () => {
        started++;
        await delay(5);
        if (startedWhenFirstFinished === 0) {
          startedWhenFirstFinished = started;
        }
        return { verdict: 'SUPPORTED', evidence: '', tokensUsed: 0 };
      },
    });

    await verifyAllClaims('response', ['doc'], judge);

    expect(startedWhenFirstFinished).toBe(3);
  });

  it('propagates verification errors', async () => {
    const judge = createStubJudge({
      extractClaims: async () => ({ claims: ['a'], tokensUsed: 0 }),
      verifyClaim: async () => {
        throw new Error('verification failed');
      },
    });

    await expect(verifyAllClaims('response', ['doc'], judge)).rejects.toThrow('verification failed');
  });
});
