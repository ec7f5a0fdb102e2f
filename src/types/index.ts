export type StepKind =
  | 'store_name'
  | 'resources'
  | 'duration'
  | 'business_hours'
  | 'business_hours_confirm'
  | 'merge_policy'
  | 'max_party_size'
  | 'online_role'
  | 'peak_period'
  | 'peak_ratio'
  | 'peak_strategy'
  | 'no_show_tolerance'
  | 'recommendation_patch';

export const GOAL_TYPES = ['fill_seats', 'control_queue', 'keep_walkin'] as const;
export const ONLINE_ROLES = ['primary', 'assistant', 'minimal'] as const;
export const PEAK_PERIODS = ['weekday_lunch', 'weekday_dinner', 'weekend_brunch', 'weekend_dinner'] as const;
export const PEAK_STRATEGIES = ['online_first', 'walkin_first', 'no_online'] as const;
export const QUOTA_RATIOS = [0.8, 0.5, 0.2, 0.0] as const;
export const NO_SHOW_TOLERANCES = ['low', 'medium', 'high'] as const;

export type GoalType = (typeof GOAL_TYPES)[number];
export type OnlineRole = (typeof ONLINE_ROLES)[number];
export type PeakPeriod = (typeof PEAK_PERIODS)[number];
export type PeakStrategy = (typeof PEAK_STRATEGIES)[number];
export type QuotaRatio = (typeof QUOTA_RATIOS)[number];
export type NoShowTolerance = (typeof NO_SHOW_TOLERANCES)[number];

export interface Resource {
  party_size: number;
  spots_total: number;
}

/** Day 0 is Monday, 6 is Sunday. Time is zero-padded 24h "HHMM". */
export interface DayTime {
  day: number;
  time: string;
}

export interface BusinessHoursEntry {
  open: DayTime;
  close: DayTime;
}

export interface Strategy {
  goal_type: GoalType;
  online_role: OnlineRole;
  peak_periods: PeakPeriod[];
  peak_strategy: PeakStrategy;
  peak_online_quota_ratio: QuotaRatio;
  no_show_tolerance: NoShowTolerance;
  can_merge_tables: boolean;
  max_party_size: number;
}

export interface PeakPolicy {
  slot_minutes: number;
  online_seat_budget: number;
  online_party_limit_per_slot: number;
  typical_party_size: number;
  duration_slots: number;
}

export interface Recommendation {
  booking_hours: BusinessHoursEntry[];
  peak_strategy: PeakStrategy;
  peak_online_quota_ratio: QuotaRatio;
  policy: PeakPolicy;
  peak_online_resources: Resource[];
  /** Values the merchant set explicitly; they survive recomputation until the ratio or strategy changes. */
  overrides: {
    online_seat_budget?: number;
    online_party_limit_per_slot?: number;
  };
}

export interface SlotSnapshot {
  store_id: number | null;
  store_name: string | null;
  resources: Resource[] | null;
  capacity_hint: number | null;
  duration_sec: number | null;
  business_hours: BusinessHoursEntry[] | null;
  strategy: Partial<Strategy>;
  booking_hours: BusinessHoursEntry[] | null;
  peak_policy: PeakPolicy | null;
  peak_online_resources: Resource[] | null;
}

export interface FinalStrategy extends Strategy {
  peak_slot_minutes: number;
  peak_online_seat_budget: number;
  peak_online_party_limit_per_slot: number;
  peak_online_resources: Resource[];
}

export interface FinalConfiguration {
  store_id: number | null;
  store_name: string;
  capacity_hint: number;
  resources: Resource[];
  duration_sec: number;
  business_hours: BusinessHoursEntry[];
  booking_hours: BusinessHoursEntry[];
  strategy: FinalStrategy;
}

/** Sparse update produced by one extraction call. Untrusted until validated. */
export type Patch = Record<string, unknown>;
