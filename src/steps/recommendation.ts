import { StepDefinition } from './types';
import { ChoiceOption } from '../onboarding/choices';

export const DECISION_CHOICES: readonly ChoiceOption[] = [
  {
    key: 'A',
    label: 'Accept',
    aliases: ['accept', 'yes', 'y', 'ok', 'okay', 'looks good', 'sounds good', 'good', 'confirm', 'fine'],
    value: 'accept',
  },
  { key: 'B', label: 'Modify', aliases: ['modify', 'change', 'edit', 'no', 'n', 'adjust'], value: 'modify' },
];

export const recommendationPatchStep: StepDefinition = {
  kind: 'recommendation_patch',
  accepts: [
    'booking_hours',
    'strategy.peak_strategy',
    'strategy.peak_online_quota_ratio',
    'strategy.peak_slot_minutes',
    'strategy.peak_online_seat_budget',
    'strategy.peak_online_party_limit_per_slot',
  ],
  question: () =>
    'What would you like to change? e.g. "last booking at 20:00", "only 10 seats online", ' +
    '"at most 2 parties per slot", "15-minute slots" or "no online bookings at peak".',
  retryHint: 'Tell me which number or time to change, e.g. "only 10 seats online".',
  guide:
    '{"booking_hours"?: [{"open": {"day", "time"}, "close": {"day", "time"}}], "strategy"?: {' +
    '"peak_strategy"?: "online_first" | "walkin_first" | "no_online", "peak_online_quota_ratio"?: 0.8 | 0.5 | 0.2 | 0.0, ' +
    '"peak_slot_minutes"?: integer, "peak_online_seat_budget"?: integer, "peak_online_party_limit_per_slot"?: integer}} ' +
    'include only what the text asks to change',
};
