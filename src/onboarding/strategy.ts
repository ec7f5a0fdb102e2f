import { GoalType, OnlineRole, PeakStrategy, QuotaRatio, Strategy } from '../types';

/** Written in one go when the merchant asks us to decide for them. */
export const SIMPLIFIED_STRATEGY: Strategy = {
  goal_type: 'control_queue',
  online_role: 'assistant',
  peak_periods: ['weekend_dinner'],
  peak_strategy: 'online_first',
  peak_online_quota_ratio: 0.5,
  no_show_tolerance: 'medium',
  can_merge_tables: true,
  max_party_size: 8,
};

export const DEFAULT_QUOTA_RATIO: QuotaRatio = 0.5;

export function deriveGoalType(onlineRole: OnlineRole | undefined): GoalType {
  if (onlineRole === 'primary') return 'fill_seats';
  if (onlineRole === 'assistant') return 'control_queue';
  return 'keep_walkin';
}

export interface QuotaSettings {
  peak_strategy?: PeakStrategy;
  peak_online_quota_ratio?: QuotaRatio;
}

/**
 * Keeps `no_online` and a 0.0 quota ratio in lockstep. `changed` names the field the
 * merchant just set; when both changed, the strategy wins.
 */
export function reconcileQuota(
  current: QuotaSettings,
  changed: { strategy: boolean; ratio: boolean },
): QuotaSettings {
  const next: QuotaSettings = { ...current };

  if (changed.ratio && !changed.strategy && next.peak_online_quota_ratio !== undefined) {
    if (next.peak_online_quota_ratio === 0) {
      next.peak_strategy = 'no_online';
    } else if (next.peak_strategy === 'no_online') {
      next.peak_strategy = 'online_first';
    }
    return next;
  }

  if (changed.strategy && next.peak_strategy !== undefined) {
    if (next.peak_strategy === 'no_online') {
      next.peak_online_quota_ratio = 0;
    } else if (next.peak_online_quota_ratio === 0) {
      next.peak_online_quota_ratio = DEFAULT_QUOTA_RATIO;
    }
  }
  return next;
}
