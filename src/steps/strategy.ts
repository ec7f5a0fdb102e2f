import { StepDefinition } from './types';
import { ChoiceOption, renderChoices } from '../onboarding/choices';

const mergeChoices: readonly ChoiceOption[] = [
  { key: 'A', label: 'Yes, tables can be pushed together', aliases: ['yes', 'y', 'yeah', 'sure', 'we can'], value: true },
  { key: 'B', label: 'No, tables stay as they are', aliases: ['no', 'n', 'nope', "we can't", 'cannot'], value: false },
];

export const mergePolicyStep: StepDefinition = {
  kind: 'merge_policy',
  accepts: ['strategy.can_merge_tables'],
  question: () => `Can you combine tables for larger groups?\n${renderChoices(mergeChoices)}`,
  retryHint: 'Please answer A (yes) or B (no).',
  choices: mergeChoices,
  guide: '{"strategy": {"can_merge_tables": boolean}}',
};

export const maxPartySizeStep: StepDefinition = {
  kind: 'max_party_size',
  accepts: ['strategy.max_party_size'],
  question: () => "What's the largest party you can seat with tables combined? Just a number is fine.",
  retryHint: 'Please give the largest party size as a number, e.g. 12.',
  guide: '{"strategy": {"max_party_size": integer > 0}}',
};

const onlineRoleChoices: readonly ChoiceOption[] = [
  { key: 'A', label: 'Main channel: fill as many seats as possible', aliases: ['primary', 'main'], value: 'primary' },
  { key: 'B', label: 'Helper: smooth out the queue at busy times', aliases: ['assistant', 'helper'], value: 'assistant' },
  { key: 'C', label: 'Minimal: we mostly serve walk-ins', aliases: ['minimal', 'walk-ins', 'walkins'], value: 'minimal' },
];

export const onlineRoleStep: StepDefinition = {
  kind: 'online_role',
  accepts: ['strategy.online_role'],
  question: () => `What role should online booking play?\n${renderChoices(onlineRoleChoices)}`,
  retryHint: 'Please pick A, B or C.',
  choices: onlineRoleChoices,
  guide: '{"strategy": {"online_role": "primary" | "assistant" | "minimal"}}',
};

const peakPeriodChoices: readonly ChoiceOption[] = [
  { key: 'A', label: 'Weekday lunch', aliases: ['weekday lunch'], value: 'weekday_lunch' },
  { key: 'B', label: 'Weekday dinner', aliases: ['weekday dinner'], value: 'weekday_dinner' },
  { key: 'C', label: 'Weekend brunch', aliases: ['weekend brunch'], value: 'weekend_brunch' },
  { key: 'D', label: 'Weekend dinner', aliases: ['weekend dinner'], value: 'weekend_dinner' },
  { key: 'E', label: 'Not sure (assume weekend dinner)', aliases: ['not sure', 'no idea'], value: 'weekend_dinner' },
];

export const peakPeriodStep: StepDefinition = {
  kind: 'peak_period',
  accepts: ['strategy.peak_periods'],
  question: () => `When are you busiest? You can pick more than one, e.g. "A, D".\n${renderChoices(peakPeriodChoices)}`,
  retryHint: 'Please pick one or more letters from A to E.',
  choices: peakPeriodChoices,
  multiSelect: true,
  guide:
    '{"strategy": {"peak_periods": ["weekday_lunch" | "weekday_dinner" | "weekend_brunch" | "weekend_dinner"]}} non-empty',
};

const peakRatioChoices: readonly ChoiceOption[] = [
  { key: 'A', label: 'Most of it (about 80%)', aliases: ['most', '80%', '80'], value: 0.8 },
  { key: 'B', label: 'About half', aliases: ['half', '50%', '50'], value: 0.5 },
  { key: 'C', label: 'A little (about 20%)', aliases: ['a little', 'little', '20%', '20'], value: 0.2 },
];

export const peakRatioStep: StepDefinition = {
  kind: 'peak_ratio',
  accepts: ['strategy.peak_online_quota_ratio'],
  question: () => `At peak times, how much of your seating should be bookable online?\n${renderChoices(peakRatioChoices)}`,
  retryHint: 'Please pick A, B or C.',
  choices: peakRatioChoices,
  guide: '{"strategy": {"peak_online_quota_ratio": 0.8 | 0.5 | 0.2 | 0.0}} 0.0 means no online bookings at peak',
};

const peakStrategyChoices: readonly ChoiceOption[] = [
  { key: 'A', label: 'Online bookings first', aliases: ['online first', 'online'], value: 'online_first' },
  { key: 'B', label: 'Walk-ins first', aliases: ['walk-ins first', 'walkins first', 'walk-in first', 'walk-ins'], value: 'walkin_first' },
  { key: 'C', label: 'No online bookings at peak', aliases: ['no online', 'none'], value: 'no_online' },
];

export const peakStrategyStep: StepDefinition = {
  kind: 'peak_strategy',
  accepts: ['strategy.peak_strategy'],
  question: () => `When it's busy, who gets the table first?\n${renderChoices(peakStrategyChoices)}`,
  retryHint: 'Please pick A, B or C.',
  choices: peakStrategyChoices,
  guide: '{"strategy": {"peak_strategy": "online_first" | "walkin_first" | "no_online"}}',
};

const noShowChoices: readonly ChoiceOption[] = [
  { key: 'A', label: 'Low: no-shows hurt, be careful', aliases: ['low'], value: 'low' },
  { key: 'B', label: 'Medium', aliases: ['medium', 'normal'], value: 'medium' },
  { key: 'C', label: "High: I'd rather risk a few no-shows", aliases: ['high'], value: 'high' },
];

export const noShowToleranceStep: StepDefinition = {
  kind: 'no_show_tolerance',
  accepts: ['strategy.no_show_tolerance'],
  question: () => `How much can you tolerate no-shows?\n${renderChoices(noShowChoices)}`,
  retryHint: 'Please pick A, B or C.',
  choices: noShowChoices,
  guide: '{"strategy": {"no_show_tolerance": "low" | "medium" | "high"}}',
};
