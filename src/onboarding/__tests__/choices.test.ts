import { describe, it, expect } from 'vitest';
import { ChoiceOption, isSimplifyTrigger, matchChoice, matchChoices, normalizeChoice } from '../choices';

const options: ChoiceOption[] = [
  { key: 'A', label: 'Weekday lunch', aliases: ['weekday lunch'], value: 'weekday_lunch' },
  { key: 'B', label: 'Weekday dinner', aliases: ['weekday dinner'], value: 'weekday_dinner' },
  { key: 'C', label: 'Weekend brunch', aliases: ['weekend brunch'], value: 'weekend_brunch' },
  { key: 'D', label: 'Weekend dinner', aliases: ['weekend dinner'], value: 'weekend_dinner' },
];

describe('normalizeChoice', () => {
  it('trims, lower-cases and drops trailing punctuation', () => {
    expect(normalizeChoice('  You Decide!! ')).toBe('you decide');
    expect(normalizeChoice('I don’t care.')).toBe("i don't care");
  });
});

describe('isSimplifyTrigger', () => {
  it.each(['you decide', 'Whatever.', 'I dont understand', 'never mind!', "Don't care"])('recognizes "%s"', (text) => {
    expect(isSimplifyTrigger(text)).toBe(true);
  });

  it('ignores phrases that only contain a trigger', () => {
    expect(isSimplifyTrigger('you decide the hours')).toBe(false);
    expect(isSimplifyTrigger('A')).toBe(false);
  });
});

describe('matchChoice', () => {
  it('matches option letters in common forms', () => {
    expect(matchChoice('b', options)?.value).toBe('weekday_dinner');
    expect(matchChoice('(C)', options)?.value).toBe('weekend_brunch');
    expect(matchChoice('Option A', options)?.value).toBe('weekday_lunch');
    expect(matchChoice('D.', options)?.value).toBe('weekend_dinner');
  });

  it('matches whole-utterance aliases', () => {
    expect(matchChoice('Weekend dinner', options)?.key).toBe('D');
  });

  it('returns null for anything else', () => {
    expect(matchChoice('saturday nights mostly', options)).toBeNull();
    expect(matchChoice('   ', options)).toBeNull();
  });
});

describe('matchChoices', () => {
  it('accepts several letters', () => {
    expect(matchChoices('A, D', options)?.map((o) => o.key)).toEqual(['A', 'D']);
    expect(matchChoices('b and c', options)?.map((o) => o.key)).toEqual(['B', 'C']);
    expect(matchChoices('a,a', options)?.map((o) => o.key)).toEqual(['A']);
  });

  it('rejects a list with an unknown letter', () => {
    expect(matchChoices('A, Z', options)).toBeNull();
  });
});
