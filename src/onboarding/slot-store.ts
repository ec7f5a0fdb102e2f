import {
  BusinessHoursEntry,
  FinalConfiguration,
  PeakPolicy,
  Recommendation,
  Resource,
  SlotSnapshot,
  Strategy,
} from '../types';
import { reconcileQuota } from './strategy';
import {
  ValidationResult,
  validateBusinessHours,
  validateResources,
  validateStrategy,
  validateStrategyPatch,
} from './validators';

export function capacityFromResources(resources: Resource[]): number {
  return resources.reduce((sum, r) => sum + r.party_size * r.spots_total, 0);
}

/** One entry per table size, spots summed, ascending by size. */
export function mergeResources(resources: Resource[]): Resource[] {
  const merged = new Map<number, number>();
  for (const r of resources) {
    merged.set(r.party_size, (merged.get(r.party_size) ?? 0) + r.spots_total);
  }
  return [...merged.entries()]
    .sort(([a], [b]) => a - b)
    .map(([party_size, spots_total]) => ({ party_size, spots_total }));
}

function cloneHours(hours: BusinessHoursEntry[]): BusinessHoursEntry[] {
  return hours.map((h) => ({ open: { ...h.open }, close: { ...h.close } }));
}

function cloneResources(resources: Resource[]): Resource[] {
  return resources.map((r) => ({ ...r }));
}

function cloneStrategy(strategy: Partial<Strategy>): Partial<Strategy> {
  const copy = { ...strategy };
  if (strategy.peak_periods) copy.peak_periods = strategy.peak_periods.slice();
  return copy;
}

/**
 * The record of everything collected in one onboarding session. Every write goes
 * through a validator first; a rejected candidate leaves the store untouched.
 */
export class SlotStore {
  private readonly storeId: number | null;
  private storeName: string | null = null;
  private resources: Resource[] | null = null;
  private durationSec: number | null = null;
  private businessHours: BusinessHoursEntry[] | null = null;
  private strategy: Partial<Strategy> = {};
  private bookingHours: BusinessHoursEntry[] | null = null;
  private peakPolicy: PeakPolicy | null = null;
  private peakOnlineResources: Resource[] | null = null;

  constructor(storeId: number | null = null) {
    if (storeId !== null && !Number.isInteger(storeId)) {
      throw new Error(`store_id must be null or an integer, got ${storeId}`);
    }
    this.storeId = storeId;
  }

  get capacityHint(): number | null {
    return this.resources ? capacityFromResources(this.resources) : null;
  }

  get currentResources(): Resource[] | null {
    return this.resources ? cloneResources(this.resources) : null;
  }

  get currentStrategy(): Partial<Strategy> {
    return cloneStrategy(this.strategy);
  }

  get hasBusinessHours(): boolean {
    return this.businessHours !== null;
  }

  commitStoreName(value: unknown): ValidationResult<string> {
    if (this.storeName !== null) {
      return { ok: false, reason: 'store_name is already set' };
    }
    if (typeof value !== 'string' || !value.trim()) {
      return { ok: false, reason: 'store_name must be a non-empty string' };
    }
    this.storeName = value.trim();
    return { ok: true, reason: 'ok', value: this.storeName };
  }

  commitResources(value: unknown): ValidationResult<Resource[]> {
    const result = validateResources(value);
    if (!result.ok) return result;
    const merged = mergeResources(result.value);
    if (capacityFromResources(merged) <= 0) {
      return { ok: false, reason: 'resources must add up to at least one seat' };
    }
    this.resources = merged;
    return { ok: true, reason: 'ok', value: cloneResources(merged) };
  }

  commitDuration(value: unknown): ValidationResult<number> {
    if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
      return { ok: false, reason: 'duration_sec must be a positive integer' };
    }
    this.durationSec = value;
    return { ok: true, reason: 'ok', value };
  }

  commitBusinessHours(value: unknown): ValidationResult<BusinessHoursEntry[]> {
    const result = validateBusinessHours(value);
    if (!result.ok) return result;
    this.businessHours = result.value;
    return { ok: true, reason: 'ok', value: cloneHours(result.value) };
  }

  /** Merges a partial strategy, keeping `no_online` and a 0.0 ratio consistent. */
  commitStrategy(patch: unknown): ValidationResult<Partial<Strategy>> {
    const result = validateStrategyPatch(patch);
    if (!result.ok) return result;
    const changes = result.value;
    const quota = reconcileQuota(
      {
        peak_strategy: changes.peak_strategy ?? this.strategy.peak_strategy,
        peak_online_quota_ratio: changes.peak_online_quota_ratio ?? this.strategy.peak_online_quota_ratio,
      },
      {
        strategy: changes.peak_strategy !== undefined,
        ratio: changes.peak_online_quota_ratio !== undefined,
      },
    );
    const merged: Partial<Strategy> = { ...this.strategy, ...changes };
    if (quota.peak_strategy !== undefined) merged.peak_strategy = quota.peak_strategy;
    if (quota.peak_online_quota_ratio !== undefined) merged.peak_online_quota_ratio = quota.peak_online_quota_ratio;

    const check = validateStrategyPatch(merged);
    if (!check.ok) return check;
    this.strategy = merged;
    return { ok: true, reason: 'ok', value: cloneStrategy(merged) };
  }

  acceptRecommendation(recommendation: Recommendation): ValidationResult<Recommendation> {
    const hours = validateBusinessHours(recommendation.booking_hours);
    if (!hours.ok) return { ok: false, reason: hours.reason.replace(/^business_hours/, 'booking_hours') };
    const quota = this.commitStrategy({
      peak_strategy: recommendation.peak_strategy,
      peak_online_quota_ratio: recommendation.peak_online_quota_ratio,
    });
    if (!quota.ok) return quota;
    this.bookingHours = hours.value;
    this.peakPolicy = { ...recommendation.policy };
    this.peakOnlineResources = cloneResources(recommendation.peak_online_resources);
    return { ok: true, reason: 'ok', value: recommendation };
  }

  snapshot(): SlotSnapshot {
    return {
      store_id: this.storeId,
      store_name: this.storeName,
      resources: this.currentResources,
      capacity_hint: this.capacityHint,
      duration_sec: this.durationSec,
      business_hours: this.businessHours ? cloneHours(this.businessHours) : null,
      strategy: cloneStrategy(this.strategy),
      booking_hours: this.bookingHours ? cloneHours(this.bookingHours) : null,
      peak_policy: this.peakPolicy ? { ...this.peakPolicy } : null,
      peak_online_resources: this.peakOnlineResources ? cloneResources(this.peakOnlineResources) : null,
    };
  }

  /** Builds the hand-off object; fails if any slot the configuration needs is still empty. */
  assemble(): ValidationResult<FinalConfiguration> {
    const missing: string[] = [];
    if (this.storeName === null) missing.push('store_name');
    if (this.resources === null) missing.push('resources');
    if (this.durationSec === null) missing.push('duration_sec');
    if (this.businessHours === null) missing.push('business_hours');
    if (this.bookingHours === null) missing.push('booking_hours');
    if (this.peakPolicy === null || this.peakOnlineResources === null) missing.push('peak_policy');
    if (
      this.storeName === null ||
      this.resources === null ||
      this.durationSec === null ||
      this.businessHours === null ||
      this.bookingHours === null ||
      this.peakPolicy === null ||
      this.peakOnlineResources === null
    ) {
      return { ok: false, reason: `missing slots: ${missing.join(', ')}` };
    }

    const strategy = validateStrategy(this.strategy);
    if (!strategy.ok) return strategy;

    return {
      ok: true,
      reason: 'ok',
      value: {
        store_id: this.storeId,
        store_name: this.storeName,
        capacity_hint: capacityFromResources(this.resources),
        resources: cloneResources(this.resources),
        duration_sec: this.durationSec,
        business_hours: cloneHours(this.businessHours),
        booking_hours: cloneHours(this.bookingHours),
        strategy: {
          ...strategy.value,
          peak_slot_minutes: this.peakPolicy.slot_minutes,
          peak_online_seat_budget: this.peakPolicy.online_seat_budget,
          peak_online_party_limit_per_slot: this.peakPolicy.online_party_limit_per_slot,
          peak_online_resources: cloneResources(this.peakOnlineResources),
        },
      },
    };
  }
}
