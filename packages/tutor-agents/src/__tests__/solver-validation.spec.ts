import { describe, expect, it } from 'vitest';
import { CancelledError } from '@studyhall/tutor-core';
import { LLMClient, type LLMCompleteOptions, type LLMProvider } from '@studyhall/tutor-llm';
import { createSpecialists } from '../registry.js';
import { SolverAgent } from '../specialists/solver.js';
import { LLMSolutionValidator, type SolutionValidator } from '../validation.js';

interface RecordingProvider extends LLMProvider {
  requests: LLMCompleteOptions[];
}

function provider(id: string, replies: string[]): RecordingProvider {
  const requests: LLMCompleteOptions[] = [];
  return {
    id,
    requests,
    async complete(options: LLMCompleteOptions) {
      const reply = replies[Math.min(requests.length, replies.length - 1)];
      requests.push(options);
      return { text: reply ?? '' };
    },
  };
}

function client(p: LLMProvider): LLMClient {
  return new LLMClient([{ provider: p, settings: { retries: 0, backoffBaseMs: 0, timeoutMs: 1000 } }]);
}

const profile = { grade: 7, subject: 'algebra' };
const query = { tenantId: 't1', text: 'Solve 2x = 6' };
const wrong = '{"steps":["Divide both sides by 3"],"finalAnswer":"x = 2"}';
const right = '{"steps":["Divide both sides by 2"],"finalAnswer":"x = 3"}';
const rejected = '{"valid":false,"issues":["Step 1 divides by the wrong number"]}';

describe('solver validation', () => {
  it('regenerates a rejected solution with the review issues', async () => {
    const p = provider('primary', [wrong, rejected, right, '{"valid":true}']);
    const { solver } = createSpecialists(client(p), { solverValidation: { enabled: true } });

    const result = await solver?.run({ query, profile, context: [] });

    expect(result?.payload).toEqual({
      text: '1. Divide both sides by 2\nAnswer: x = 3',
      steps: ['Divide both sides by 2'],
      finalAnswer: 'x = 3',
      sources: [],
      validated: true,
      regenerations: 1,
    });
    expect(p.requests).toHaveLength(4);
    expect(p.requests[1]?.systemPrompt).toContain('You check worked solutions');
    expect(p.requests[2]?.prompt).toContain(
      'A previous solution was rejected. Fix these issues:\n- Step 1 divides by the wrong number\n\nProblem: Solve 2x = 6',
    );
    expect(result?.attempts).toHaveLength(2);
  });

  it('stops after three regenerations and reports the solution as unverified', async () => {
    const p = provider('primary', [wrong, rejected, wrong, rejected, wrong, rejected, wrong, rejected, right]);
    const { solver } = createSpecialists(client(p), { solverValidation: { enabled: true } });

    const result = await solver?.run({ query, profile, context: [] });

    expect(p.requests).toHaveLength(8);
    expect(result?.payload.finalAnswer).toBe('x = 2');
    expect(result?.payload.validated).toBe(false);
    expect(result?.payload.validationIssues).toEqual(['Step 1 divides by the wrong number']);
    expect(result?.payload.regenerations).toBe(3);
  });

  it('honours a smaller regeneration budget', async () => {
    const p = provider('primary', [wrong, rejected, wrong, rejected, right]);
    const { solver } = createSpecialists(client(p), { solverValidation: { enabled: true, maxRegenerations: 1 } });

    const result = await solver?.run({ query, profile, context: [] });

    expect(p.requests).toHaveLength(4);
    expect(result?.payload.regenerations).toBe(1);
    expect(result?.payload.validated).toBe(false);
  });

  it('does not review when validation is off', async () => {
    const p = provider('primary', [wrong]);
    const { solver } = createSpecialists(client(p));

    const result = await solver?.run({ query, profile, context: [] });

    expect(p.requests).toHaveLength(1);
    expect(result?.payload.validated).toBeUndefined();
    expect(result?.payload.regenerations).toBeUndefined();
  });

  it('names an issue when the reviewer rejects without one', async () => {
    const p = provider('primary', [wrong, '{"valid":false}']);
    const llm = client(p);
    const solver = new SolverAgent({ llm, validator: new LLMSolutionValidator({ llm }), maxRegenerations: 0 });

    const result = await solver.run({ query, profile, context: [] });

    expect(result.payload.validationIssues).toEqual(['Solution was rejected without a stated reason']);
    expect(result.payload.regenerations).toBe(0);
  });

  it('keeps the solution unverified when the review fails', async () => {
    const p = provider('primary', [right]);
    const validator: SolutionValidator = {
      async review() {
        throw new Error('reviewer offline');
      },
    };
    const solver = new SolverAgent({ llm: client(p), validator });

    const result = await solver.run({ query, profile, context: [] });

    expect(p.requests).toHaveLength(1);
    expect(result.payload.finalAnswer).toBe('x = 3');
    expect(result.payload.validated).toBe(false);
    expect(result.payload.validationIssues).toEqual(['Review unavailable: reviewer offline']);
    expect(result.payload.regenerations).toBe(0);
  });

  it('lets cancellation during review escape', async () => {
    const validator: SolutionValidator = {
      async review() {
        throw new CancelledError('solution review');
      },
    };
    const solver = new SolverAgent({ llm: client(provider('primary', [right])), validator });

    await expect(solver.run({ query, profile, context: [] })).rejects.toBeInstanceOf(CancelledError);
  });
});
