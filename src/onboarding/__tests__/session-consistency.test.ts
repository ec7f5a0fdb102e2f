import { describe, it, expect, vi } from 'vitest';
import { OnboardingSession } from '../session';
import { RuleBasedExtractor } from '../../services/extraction/rules';
import { OnboardingConsistencyError } from '../../utils/errors';

vi.mock('../validators', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../validators')>();
  return {
    ...actual,
    validateFinal: vi.fn(() => ({ ok: false, reason: 'capacity_hint does not match resources' })),
  };
});

describe('OnboardingSession final validation', () => {
  it('raises a consistency error instead of re-asking when the final configuration is rejected', async () => {
    const session = new OnboardingSession(new RuleBasedExtractor());
    const replies = ['123 Bistro', '4-seat table x5, 6-seat table x4', 'A', 'every day 08:00-17:00', 'yes', 'you decide'];
    for (const text of replies) await session.reply(text);
    expect(session.state).toBe('AcceptOrModifyRecommendation');

    const error = await session.reply('A').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(OnboardingConsistencyError);
    expect(error).toMatchObject({
      reason: 'capacity_hint does not match resources',
      configuration: { store_name: '123 Bistro', capacity_hint: 44 },
    });
    expect(session.done).toBe(false);
    expect(session.configuration).toBeNull();
  });
});
