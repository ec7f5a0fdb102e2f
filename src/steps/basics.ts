import { StepDefinition } from './types';
import { ChoiceOption, renderChoices } from '../onboarding/choices';
import { summarizeBusinessHours } from '../onboarding/render';

const DAY_CONVENTION = 'day is 0=Monday .. 6=Sunday; time is a zero-padded 24h "HHMM" string without a colon';

export const storeNameStep: StepDefinition = {
  kind: 'store_name',
  accepts: ['store_name'],
  question: () => "Welcome! Let's set up online reservations. What's the name of your restaurant?",
  retryHint: "I didn't catch the name. What is your restaurant called?",
  guide: '{"store_name": string}',
};

export const resourcesStep: StepDefinition = {
  kind: 'resources',
  accepts: ['resources'],
  question: (ctx) =>
    `Thanks${ctx.slots.store_name ? `, ${ctx.slots.store_name}` : ''}! What tables do you have? ` +
    'Give each table size and how many, e.g. "4-seat table x5, 6-seat table x4".',
  retryHint: 'Please list table sizes with their counts, like "4-seat table x2, 6-seat table x1".',
  guide:
    '{"resources": [{"party_size": integer > 0, "spots_total": integer >= 0}]} ' +
    'one entry per table size; omit "resources" unless the text names both a size and a count',
};

const durationChoices: readonly ChoiceOption[] = [
  { key: 'A', label: '1 hour', aliases: ['1', '60', '1 hour', 'one hour', '60 minutes', '60 min'], value: 3600 },
  { key: 'B', label: '1.5 hours', aliases: ['1.5', '90', '1.5 hours', '90 minutes', '90 min'], value: 5400 },
  { key: 'C', label: '2 hours', aliases: ['2', '120', '2 hours', 'two hours', '120 minutes', '120 min'], value: 7200 },
];

export const durationStep: StepDefinition = {
  kind: 'duration',
  accepts: ['duration_sec'],
  question: () => `How long does a party usually stay at the table?\n${renderChoices(durationChoices)}`,
  retryHint: 'Pick A, B or C, or tell me the usual stay in minutes.',
  choices: durationChoices,
  guide: '{"duration_sec": integer seconds > 0}',
};

export const businessHoursStep: StepDefinition = {
  kind: 'business_hours',
  accepts: ['business_hours'],
  question: () => 'What are your opening hours? e.g. "Mon-Sat 11:00-22:00, closed Sunday".',
  retryHint: 'Please give days and times, like "every day 08:00-17:00" or "weekdays 11:30-14:00 and 17:30-22:00".',
  guide:
    '{"business_hours": [{"open": {"day": 0-6, "time": "HHMM"}, "close": {"day": 0-6, "time": "HHMM"}}]} ' +
    `one entry per opening window; ${DAY_CONVENTION}; closed days have no entry`,
};

const confirmChoices: readonly ChoiceOption[] = [
  { key: 'A', label: 'Yes, that is right', aliases: ['yes', 'y', 'yeah', 'yep', 'correct', 'right', 'ok', 'okay', 'confirm'], value: true },
  { key: 'B', label: 'No, let me fix it', aliases: ['no', 'n', 'nope', 'wrong', 'incorrect'], value: false },
];

export const businessHoursConfirmStep: StepDefinition = {
  kind: 'business_hours_confirm',
  accepts: ['confirm'],
  question: (ctx) => {
    const summary = ctx.pendingBusinessHours ? summarizeBusinessHours(ctx.pendingBusinessHours) : 'not set';
    return `Let me confirm your hours: ${summary}. Is that right?\n${renderChoices(confirmChoices)}`;
  },
  retryHint: 'Please answer yes or no.',
  choices: confirmChoices,
  guide: '{"confirm": boolean}',
};
