import {
  BusinessHoursEntry,
  GoalType,
  NoShowTolerance,
  Patch,
  PeakPolicy,
  PeakStrategy,
  QuotaRatio,
  Recommendation,
  Resource,
} from '../types';
import { hhmmToMinutes, minutesToHhmm } from '../utils/hhmm';
import { isRecord } from '../utils/guards';
import { reconcileQuota } from './strategy';
import { isQuotaRatio, peakStrategySchema, validateBusinessHours } from './validators';

export const DEFAULT_SLOT_MINUTES = 30;
export const MIN_SLOT_MINUTES = 10;
export const MAX_SLOT_MINUTES = 120;

const GOAL_FACTORS: Record<GoalType, number> = { fill_seats: 1.05, control_queue: 1.0, keep_walkin: 0.8 };
const NO_SHOW_FACTORS: Record<NoShowTolerance, number> = { low: 0.9, medium: 1.0, high: 1.05 };

function clamp(value: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(value, hi));
}

// absorbs binary rounding, e.g. 100 * 0.95 = 94.99999999999999
function floorSafe(value: number): number {
  return Math.floor(value + 1e-9);
}

/**
 * Coerces an untrusted numeric suggestion into [lo, hi]. Returns null when the
 * value is not a number at all, so the caller can ignore it.
 */
export function clampInt(value: unknown, lo: number, hi: number): number | null {
  let n: number;
  if (typeof value === 'number') {
    n = value;
  } else if (typeof value === 'string' && /^\s*-?\d+(\.\d+)?\s*$/.test(value)) {
    n = parseFloat(value);
  } else {
    return null;
  }
  if (!Number.isFinite(n)) return null;
  return clamp(Math.trunc(n), lo, hi);
}

/**
 * Latest seatable start per same-day window: close minus one seating. Windows too
 * short for a single seating keep their close time; cross-day windows pass through.
 */
export function computeBookingHours(businessHours: BusinessHoursEntry[], durationSec: number): BusinessHoursEntry[] {
  const durationMinutes = Math.max(0, Math.floor(durationSec / 60));

  return businessHours.map(({ open, close }) => {
    if (open.day !== close.day) {
      return { open: { ...open }, close: { ...close } };
    }
    const openMinutes = hhmmToMinutes(open.time);
    const closeMinutes = hhmmToMinutes(close.time);
    const lastStart = closeMinutes - durationMinutes;

    if (lastStart > openMinutes) {
      return { open: { ...open }, close: { day: close.day, time: minutesToHhmm(lastStart) } };
    }
    // An inverted input window collapses to its open time rather than staying inverted.
    const fallback = closeMinutes > openMinutes ? close.time : open.time;
    return { open: { ...open }, close: { day: close.day, time: fallback } };
  });
}

/** Weighted median of party_size, weighted by spots_total. */
export function typicalPartySize(resources: Resource[]): number {
  if (resources.length === 0) return 1;
  const weighted = resources.filter((r) => r.spots_total > 0).sort((a, b) => a.party_size - b.party_size);
  if (weighted.length === 0) {
    return Math.max(...resources.map((r) => r.party_size));
  }
  const total = weighted.reduce((sum, r) => sum + r.spots_total, 0);
  let cumulative = 0;
  for (const r of weighted) {
    cumulative += r.spots_total;
    if (cumulative * 2 >= total) return r.party_size;
  }
  return weighted[weighted.length - 1].party_size;
}

export function partyLimitFor(seatBudget: number, typicalParty: number, durationSlots: number): number {
  const limit = Math.floor(seatBudget / Math.max(1, typicalParty * durationSlots));
  return seatBudget > 0 && limit === 0 ? 1 : limit;
}

export interface PeakPolicyInput {
  capacityHint: number;
  resources: Resource[];
  durationSec: number;
  ratio: number;
  peakStrategy: PeakStrategy;
  goalType: GoalType;
  noShowTolerance: NoShowTolerance;
  slotMinutes?: number;
}

/**
 * Slot-based admission control for peak periods: an online seat budget sized from
 * capacity and the quota ratio, then a per-slot cap on new online parties.
 */
export function computePeakPolicy(input: PeakPolicyInput): PeakPolicy {
  const slotMinutes = clamp(Math.trunc(input.slotMinutes ?? DEFAULT_SLOT_MINUTES), MIN_SLOT_MINUTES, MAX_SLOT_MINUTES);
  const typical = typicalPartySize(input.resources);
  const durationSlots = Math.max(1, Math.ceil(input.durationSec / 60 / slotMinutes));

  if (input.peakStrategy === 'no_online') {
    return {
      slot_minutes: slotMinutes,
      online_seat_budget: 0,
      online_party_limit_per_slot: 0,
      typical_party_size: typical,
      duration_slots: durationSlots,
    };
  }

  const base = floorSafe(input.capacityHint * input.ratio);
  const adjusted = floorSafe(base * GOAL_FACTORS[input.goalType] * NO_SHOW_FACTORS[input.noShowTolerance]);
  const seatBudget = clamp(adjusted, 0, input.capacityHint);

  return {
    slot_minutes: slotMinutes,
    online_seat_budget: seatBudget,
    online_party_limit_per_slot: partyLimitFor(seatBudget, typical, durationSlots),
    typical_party_size: typical,
    duration_slots: durationSlots,
  };
}

/** Per-table-type variant: a share of each table size is bookable online at peak. */
export function computePeakOnlineResources(resources: Resource[], ratio: number, peakStrategy: PeakStrategy): Resource[] {
  return resources.map((r) => {
    if (peakStrategy === 'no_online' || ratio <= 0 || r.spots_total === 0) {
      return { party_size: r.party_size, spots_total: 0 };
    }
    const share = Math.max(1, Math.round(r.spots_total * ratio));
    return { party_size: r.party_size, spots_total: Math.min(share, r.spots_total) };
  });
}

export interface RecommendationInputs {
  business_hours: BusinessHoursEntry[];
  duration_sec: number;
  resources: Resource[];
  capacity_hint: number;
  goal_type: GoalType;
  no_show_tolerance: NoShowTolerance;
  peak_strategy: PeakStrategy;
  peak_online_quota_ratio: QuotaRatio;
}

interface Draft {
  booking_hours: BusinessHoursEntry[];
  peak_strategy: PeakStrategy;
  peak_online_quota_ratio: QuotaRatio;
  slot_minutes: number;
  overrides: Recommendation['overrides'];
}

function settle(inputs: RecommendationInputs, draft: Draft): Recommendation {
  const policy = computePeakPolicy({
    capacityHint: inputs.capacity_hint,
    resources: inputs.resources,
    durationSec: inputs.duration_sec,
    ratio: draft.peak_online_quota_ratio,
    peakStrategy: draft.peak_strategy,
    goalType: inputs.goal_type,
    noShowTolerance: inputs.no_show_tolerance,
    slotMinutes: draft.slot_minutes,
  });
  const overrides = draft.peak_strategy === 'no_online' ? {} : { ...draft.overrides };

  if (overrides.online_seat_budget !== undefined) {
    policy.online_seat_budget = clamp(overrides.online_seat_budget, 0, inputs.capacity_hint);
    policy.online_party_limit_per_slot = partyLimitFor(
      policy.online_seat_budget,
      policy.typical_party_size,
      policy.duration_slots,
    );
  }
  if (overrides.online_party_limit_per_slot !== undefined) {
    policy.online_party_limit_per_slot = clamp(overrides.online_party_limit_per_slot, 0, policy.online_seat_budget);
  }

  return {
    booking_hours: draft.booking_hours,
    peak_strategy: draft.peak_strategy,
    peak_online_quota_ratio: draft.peak_online_quota_ratio,
    policy,
    peak_online_resources: computePeakOnlineResources(inputs.resources, draft.peak_online_quota_ratio, draft.peak_strategy),
    overrides,
  };
}

export function recommend(inputs: RecommendationInputs, slotMinutes = DEFAULT_SLOT_MINUTES): Recommendation {
  const computed = computeBookingHours(inputs.business_hours, inputs.duration_sec);
  const bookingHours = validateBusinessHours(computed).ok
    ? computed
    : inputs.business_hours.map(({ open, close }) => ({ open: { ...open }, close: { ...close } }));

  const quota = reconcileQuota(
    { peak_strategy: inputs.peak_strategy, peak_online_quota_ratio: inputs.peak_online_quota_ratio },
    { strategy: true, ratio: false },
  );

  return settle(inputs, {
    booking_hours: bookingHours,
    peak_strategy: quota.peak_strategy ?? inputs.peak_strategy,
    peak_online_quota_ratio: quota.peak_online_quota_ratio ?? inputs.peak_online_quota_ratio,
    slot_minutes: slotMinutes,
    overrides: {},
  });
}

export interface RecommendationPatchResult {
  recommendation: Recommendation;
  changed: string[];
  ignored: string[];
}

/**
 * Applies a merchant- or model-proposed edit. Enumerated fields must be valid to
 * take effect; numeric fields are clamped into bounds rather than rejected.
 */
export function applyRecommendationPatch(
  current: Recommendation,
  inputs: RecommendationInputs,
  patch: Patch,
): RecommendationPatchResult {
  const changed: string[] = [];
  const ignored: string[] = [];
  let bookingHours = current.booking_hours;
  let peakStrategy = current.peak_strategy;
  let ratio = current.peak_online_quota_ratio;
  let slotMinutes = current.policy.slot_minutes;
  let overrides = { ...current.overrides };

  if ('booking_hours' in patch) {
    const hours = validateBusinessHours(patch.booking_hours);
    if (hours.ok) {
      bookingHours = hours.value;
      changed.push('booking_hours');
    } else {
      ignored.push(hours.reason.replace(/^business_hours/, 'booking_hours'));
    }
  }

  const s = isRecord(patch.strategy) ? patch.strategy : {};
  let strategyChanged = false;
  let ratioChanged = false;

  if ('peak_strategy' in s) {
    const parsed = peakStrategySchema.safeParse(s.peak_strategy);
    if (parsed.success) {
      peakStrategy = parsed.data;
      strategyChanged = true;
      changed.push('peak_strategy');
    } else {
      ignored.push('peak_strategy must be one of online_first, walkin_first, no_online');
    }
  }
  if ('peak_online_quota_ratio' in s) {
    const value = s.peak_online_quota_ratio;
    if (isQuotaRatio(value)) {
      ratio = value;
      ratioChanged = true;
      changed.push('peak_online_quota_ratio');
    } else {
      ignored.push('peak_online_quota_ratio must be one of 0.8, 0.5, 0.2, 0.0');
    }
  }

  if (strategyChanged || ratioChanged) {
    const quota = reconcileQuota(
      { peak_strategy: peakStrategy, peak_online_quota_ratio: ratio },
      { strategy: strategyChanged, ratio: ratioChanged },
    );
    peakStrategy = quota.peak_strategy ?? peakStrategy;
    ratio = quota.peak_online_quota_ratio ?? ratio;
    overrides = {};
  }

  if ('peak_slot_minutes' in s) {
    const value = clampInt(s.peak_slot_minutes, MIN_SLOT_MINUTES, MAX_SLOT_MINUTES);
    if (value === null) {
      ignored.push('peak_slot_minutes must be a number');
    } else {
      slotMinutes = value;
      changed.push('peak_slot_minutes');
    }
  }
  if ('peak_online_seat_budget' in s) {
    const value = clampInt(s.peak_online_seat_budget, 0, inputs.capacity_hint);
    if (value === null) {
      ignored.push('peak_online_seat_budget must be a number');
    } else {
      overrides.online_seat_budget = value;
      changed.push('peak_online_seat_budget');
    }
  }
  if ('peak_online_party_limit_per_slot' in s) {
    const value = clampInt(s.peak_online_party_limit_per_slot, 0, Number.MAX_SAFE_INTEGER);
    if (value === null) {
      ignored.push('peak_online_party_limit_per_slot must be a number');
    } else {
      overrides.online_party_limit_per_slot = value;
      changed.push('peak_online_party_limit_per_slot');
    }
  }

  const recommendation = settle(inputs, {
    booking_hours: bookingHours,
    peak_strategy: peakStrategy,
    peak_online_quota_ratio: ratio,
    slot_minutes: slotMinutes,
    overrides,
  });
  return { recommendation, changed, ignored };
}
