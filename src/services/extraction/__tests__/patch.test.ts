import { describe, it, expect, vi } from 'vitest';
import { extractPatch, filterPatch, setPath } from '../patch';
import { ExtractionPort, ExtractionRequest } from '../types';
import { SlotStore } from '../../../onboarding/slot-store';

const request: ExtractionRequest = { step: 'store_name', text: '123 Bistro', state: new SlotStore().snapshot() };

function port(extract: ExtractionPort['extract']): ExtractionPort {
  return { name: 'test', extract };
}

describe('setPath', () => {
  it('nests dotted paths one level deep', () => {
    expect(setPath('duration_sec', 3600)).toEqual({ duration_sec: 3600 });
    expect(setPath('strategy.max_party_size', 12)).toEqual({ strategy: { max_party_size: 12 } });
  });
});

describe('filterPatch', () => {
  it('keeps only whitelisted fields', () => {
    expect(filterPatch({ resources: [], duration_sec: 3600 }, ['resources'])).toEqual({ resources: [] });
    expect(
      filterPatch({ strategy: { max_party_size: 12, goal_type: 'fill_seats' } }, ['strategy.max_party_size']),
    ).toEqual({ strategy: { max_party_size: 12 } });
  });

  it('moves a flattened nested field under its parent', () => {
    expect(filterPatch({ max_party_size: 12 }, ['strategy.max_party_size'])).toEqual({
      strategy: { max_party_size: 12 },
    });
  });

  it('collects several fields of the same parent', () => {
    expect(
      filterPatch({ strategy: { peak_slot_minutes: 15, peak_online_seat_budget: 10 } }, [
        'strategy.peak_slot_minutes',
        'strategy.peak_online_seat_budget',
      ]),
    ).toEqual({ strategy: { peak_slot_minutes: 15, peak_online_seat_budget: 10 } });
  });

  it('returns an empty patch for non-objects', () => {
    expect(filterPatch('store_name', ['store_name'])).toEqual({});
    expect(filterPatch(['store_name'], ['store_name'])).toEqual({});
    expect(filterPatch(null, ['store_name'])).toEqual({});
  });
});

describe('extractPatch', () => {
  it('passes the request through and filters the result', async () => {
    const extract = vi.fn().mockResolvedValue({ store_name: '123 Bistro', resources: [] });
    const patch = await extractPatch(port(extract), request, { timeoutMs: 1000, accepts: ['store_name'] });
    expect(patch).toEqual({ store_name: '123 Bistro' });
    expect(extract).toHaveBeenCalledWith(request, expect.any(AbortSignal));
  });

  it('turns a failure into an empty patch', async () => {
    const extract = vi.fn().mockRejectedValue(new Error('connection reset'));
    expect(await extractPatch(port(extract), request, { timeoutMs: 1000, accepts: ['store_name'] })).toEqual({});
  });

  it('turns a non-object result into an empty patch', async () => {
    const extract = vi.fn().mockResolvedValue('123 Bistro');
    expect(await extractPatch(port(extract), request, { timeoutMs: 1000, accepts: ['store_name'] })).toEqual({});
  });

  it('gives up after the timeout and aborts the call', async () => {
    let signal: AbortSignal | undefined;
    const slow = port((_req, s) => {
      signal = s;
      return new Promise(() => {});
    });
    expect(await extractPatch(slow, request, { timeoutMs: 20, accepts: ['store_name'] })).toEqual({});
    expect(signal?.aborted).toBe(true);
  });
});
