import { z } from 'zod';
import {
  GOAL_TYPES,
  NO_SHOW_TOLERANCES,
  ONLINE_ROLES,
  PEAK_PERIODS,
  PEAK_STRATEGIES,
  QUOTA_RATIOS,
  QuotaRatio,
} from '../types';

export type ValidationResult<T> =
  | { ok: true; reason: 'ok'; value: T }
  | { ok: false; reason: string };

// Four ASCII digits. Hour/minute ranges are deliberately not checked here.
export const HHMM_PATTERN = /^\d{4}$/;

const requiredParams = (invalid: string) => ({ required_error: 'is required', invalid_type_error: invalid });

function enumParams(values: readonly string[]) {
  const message = `must be one of ${values.join(', ')}`;
  const errorMap: z.ZodErrorMap = (_issue, ctx) => ({
    message: ctx.data === undefined ? 'is required' : message,
  });
  return { errorMap };
}

export function isQuotaRatio(value: unknown): value is QuotaRatio {
  return QUOTA_RATIOS.some((r) => r === value);
}

const POSITIVE_INT = 'must be a positive integer';
const NON_NEGATIVE_INT = 'must be an integer >= 0';
const DAY = 'must be an integer from 0 to 6';
const TIME = 'must be a four-digit HHMM string';
const RATIO = `must be one of ${QUOTA_RATIOS.map((r) => r.toFixed(1)).join(', ')}`;

const positiveInt = () => z.number(requiredParams(POSITIVE_INT)).int(POSITIVE_INT).positive(POSITIVE_INT);
const nonNegativeInt = () => z.number(requiredParams(NON_NEGATIVE_INT)).int(NON_NEGATIVE_INT).min(0, NON_NEGATIVE_INT);

export const resourceSchema = z.object(
  {
    party_size: positiveInt(),
    spots_total: nonNegativeInt(),
  },
  requiredParams('must be an object'),
);

export const resourcesSchema = z
  .array(resourceSchema, requiredParams('must be a non-empty list'))
  .min(1, 'must be a non-empty list');

const dayTimeSchema = z.object(
  {
    day: z.number(requiredParams(DAY)).int(DAY).min(0, DAY).max(6, DAY),
    time: z.string(requiredParams(TIME)).regex(HHMM_PATTERN, TIME),
  },
  requiredParams('must be an object'),
);

export const businessHoursEntrySchema = z.object(
  { open: dayTimeSchema, close: dayTimeSchema },
  requiredParams('must be an object'),
);

export const businessHoursSchema = z
  .array(businessHoursEntrySchema, requiredParams('must be a non-empty list'))
  .min(1, 'must be a non-empty list');

export const goalTypeSchema = z.enum(GOAL_TYPES, enumParams(GOAL_TYPES));
export const onlineRoleSchema = z.enum(ONLINE_ROLES, enumParams(ONLINE_ROLES));
export const peakPeriodSchema = z.enum(PEAK_PERIODS, enumParams(PEAK_PERIODS));
export const peakStrategySchema = z.enum(PEAK_STRATEGIES, enumParams(PEAK_STRATEGIES));
export const noShowToleranceSchema = z.enum(NO_SHOW_TOLERANCES, enumParams(NO_SHOW_TOLERANCES));
export const quotaRatioSchema = z.number(requiredParams(RATIO)).refine(isQuotaRatio, RATIO);

const strategyShape = {
  goal_type: goalTypeSchema,
  online_role: onlineRoleSchema,
  peak_periods: z
    .array(peakPeriodSchema, requiredParams('must be a non-empty list'))
    .min(1, 'must be a non-empty list'),
  peak_strategy: peakStrategySchema,
  peak_online_quota_ratio: quotaRatioSchema,
  no_show_tolerance: noShowToleranceSchema,
  can_merge_tables: z.boolean(requiredParams('must be a boolean')),
  max_party_size: positiveInt(),
};

function checkQuotaEntailment(
  s: { peak_strategy?: string; peak_online_quota_ratio?: number },
  ctx: z.RefinementCtx,
): void {
  if (s.peak_strategy === undefined || s.peak_online_quota_ratio === undefined) return;
  if ((s.peak_strategy === 'no_online') !== (s.peak_online_quota_ratio === 0)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['peak_online_quota_ratio'],
      message: 'must be 0.0 exactly when peak_strategy is no_online',
    });
  }
}

export const strategySchema = z.object(strategyShape, requiredParams('must be an object')).superRefine(checkQuotaEntailment);

export const strategyPatchSchema = z
  .object(strategyShape, requiredParams('must be an object'))
  .partial()
  .superRefine(checkQuotaEntailment);

const finalStrategySchema = z
  .object(
    {
      ...strategyShape,
      peak_slot_minutes: z
        .number(requiredParams('must be an integer from 10 to 120'))
        .int('must be an integer from 10 to 120')
        .min(10, 'must be an integer from 10 to 120')
        .max(120, 'must be an integer from 10 to 120')
        .optional(),
      peak_online_seat_budget: nonNegativeInt().optional(),
      peak_online_party_limit_per_slot: nonNegativeInt().optional(),
      peak_online_resources: resourcesSchema.optional(),
    },
    requiredParams('must be an object'),
  )
  .superRefine((s, ctx) => {
    checkQuotaEntailment(s, ctx);
    if (s.peak_strategy !== 'no_online') return;
    if ((s.peak_online_seat_budget ?? 0) !== 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['peak_online_seat_budget'], message: 'must be 0 when peak_strategy is no_online' });
    }
    if ((s.peak_online_party_limit_per_slot ?? 0) !== 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['peak_online_party_limit_per_slot'], message: 'must be 0 when peak_strategy is no_online' });
    }
  });

const finalSchema = z
  .object(
    {
      store_id: z.number(requiredParams('must be null or an integer')).int('must be null or an integer').nullable(),
      store_name: z
        .string(requiredParams('must be a non-empty string'))
        .refine((s) => s.trim().length > 0, 'must be a non-empty string'),
      capacity_hint: positiveInt(),
      resources: resourcesSchema,
      duration_sec: positiveInt(),
      business_hours: businessHoursSchema,
      booking_hours: businessHoursSchema,
      strategy: finalStrategySchema,
    },
    requiredParams('must be an object'),
  )
  .superRefine((c, ctx) => {
    const seats = c.resources.reduce((sum, r) => sum + r.party_size * r.spots_total, 0);
    if (c.capacity_hint !== seats) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['capacity_hint'],
        message: `must equal the seat total of resources (${seats})`,
      });
    }
    const budget = c.strategy.peak_online_seat_budget;
    if (budget !== undefined && budget > c.capacity_hint) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['strategy', 'peak_online_seat_budget'],
        message: `must not exceed capacity_hint (${c.capacity_hint})`,
      });
    }
  });

export type ValidatedFinal = z.infer<typeof finalSchema>;

function formatPath(path: (string | number)[]): string {
  return path.map((p, i) => (typeof p === 'number' ? `[${p}]` : i === 0 ? p : `.${p}`)).join('');
}

function describeIssue(root: string, issue: z.ZodIssue): string {
  const path = formatPath(issue.path);
  let subject: string;
  if (!path) subject = root;
  else if (!root) subject = path;
  else subject = path.startsWith('[') ? `${root}${path}` : `${root}.${path}`;
  return `${subject} ${issue.message}`;
}

function run<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, root: string): ValidationResult<T> {
  const parsed = schema.safeParse(value);
  if (parsed.success) return { ok: true, reason: 'ok', value: parsed.data };
  return { ok: false, reason: describeIssue(root, parsed.error.issues[0]) };
}

export function validateResources(value: unknown) {
  return run(resourcesSchema, value, 'resources');
}

export function validateBusinessHours(value: unknown) {
  return run(businessHoursSchema, value, 'business_hours');
}

export function validateStrategy(value: unknown) {
  return run(strategySchema, value, 'strategy');
}

export function validateStrategyPatch(value: unknown) {
  return run(strategyPatchSchema, value, 'strategy');
}

export function validateFinal(value: unknown): ValidationResult<ValidatedFinal> {
  const parsed = finalSchema.safeParse(value);
  if (parsed.success) return { ok: true, reason: 'ok', value: parsed.data };
  const issue = parsed.error.issues[0];
  return { ok: false, reason: describeIssue(issue.path.length === 0 ? 'configuration' : '', issue) };
}
