import { describe, it, expect } from 'vitest';
import { RuleBasedExtractor, parseBusinessHours, parseDurationSec, parseResources } from '../rules';
import { ExtractionRequest } from '../types';
import { SlotStore } from '../../../onboarding/slot-store';
import { SlotSnapshot } from '../../../types';

const extractor = new RuleBasedExtractor();
const empty = new SlotStore().snapshot();

function run(step: ExtractionRequest['step'], text: string, state: SlotSnapshot = empty) {
  return extractor.extractSync({ step, text, state });
}

describe('parseResources', () => {
  it('reads "size x count" lists', () => {
    expect(parseResources('4-seat table ×2, 6-seat table ×1')).toEqual([
      { party_size: 4, spots_total: 2 },
      { party_size: 6, spots_total: 1 },
    ]);
  });

  it('reads "count size" phrases with number words', () => {
    expect(parseResources('five 2-top tables and an 8-seat table')).toEqual([
      { party_size: 2, spots_total: 5 },
      { party_size: 8, spots_total: 1 },
    ]);
  });

  it('reads "count tables of size"', () => {
    expect(parseResources('5 tables of 4')).toEqual([{ party_size: 4, spots_total: 5 }]);
  });

  it('returns null for arithmetic or vague answers', () => {
    expect(parseResources('1+1')).toBeNull();
    expect(parseResources('a few tables')).toBeNull();
  });
});

describe('parseDurationSec', () => {
  it.each([
    ['90 minutes', 5400],
    ['an hour and a half', 5400],
    ['1.5 hours', 5400],
    ['about an hour', 3600],
    ['2 hours', 7200],
    ['1 hour 30 minutes', 5400],
    ['half an hour', 1800],
    ['1h30', 5400],
    ['90', 5400],
    ['1.5', 5400],
    ['2', 7200],
  ])('reads "%s"', (text, expected) => {
    expect(parseDurationSec(text)).toBe(expected);
  });

  it('returns null without a unit', () => {
    expect(parseDurationSec('it depends')).toBeNull();
  });
});

describe('parseBusinessHours', () => {
  it('reads a daily window', () => {
    const hours = parseBusinessHours('every day 08:00-17:00');
    expect(hours).toHaveLength(7);
    expect(hours?.[3]).toEqual({ open: { day: 3, time: '0800' }, close: { day: 3, time: '1700' } });
  });

  it('reads day ranges and closed days', () => {
    const hours = parseBusinessHours('Mon-Sat 11:00-22:00, closed Sunday');
    expect(hours?.map((h) => h.open.day)).toEqual([0, 1, 2, 3, 4, 5]);
    expect(hours?.[5]).toEqual({ open: { day: 5, time: '1100' }, close: { day: 5, time: '2200' } });
  });

  it('reads split shifts and weekends', () => {
    const hours = parseBusinessHours('weekdays 11:30-14:00 and 17:30-22:00; weekends 10-23');
    expect(hours).toHaveLength(12);
    expect(hours?.slice(0, 2)).toEqual([
      { open: { day: 0, time: '1130' }, close: { day: 0, time: '1400' } },
      { open: { day: 0, time: '1730' }, close: { day: 0, time: '2200' } },
    ]);
    expect(hours?.[11]).toEqual({ open: { day: 6, time: '1000' }, close: { day: 6, time: '2300' } });
  });

  it('reads 12-hour clock times', () => {
    expect(parseBusinessHours('9am to 5pm on Monday')).toEqual([
      { open: { day: 0, time: '0900' }, close: { day: 0, time: '1700' } },
    ]);
    expect(parseBusinessHours('Tuesday 9-5')).toEqual([{ open: { day: 1, time: '0900' }, close: { day: 1, time: '1700' } }]);
  });

  it('closes past midnight on the next day', () => {
    expect(parseBusinessHours('Friday 18:00-02:00')).toEqual([
      { open: { day: 4, time: '1800' }, close: { day: 5, time: '0200' } },
    ]);
  });

  it('keeps a midnight close on the opening day', () => {
    expect(parseBusinessHours('Sunday 17:00 to midnight')).toEqual([
      { open: { day: 6, time: '1700' }, close: { day: 6, time: '2400' } },
    ]);
    expect(parseBusinessHours('Saturday 18:00-00:00')).toEqual([
      { open: { day: 5, time: '1800' }, close: { day: 5, time: '2400' } },
    ]);
  });

  it('does not read day names out of other words', () => {
    const hours = parseBusinessHours('11:00-21:00 every day; closed the first week of every month');
    expect(hours).toHaveLength(7);
    expect(hours?.every((h) => h.open.time === '1100' && h.close.time === '2100')).toBe(true);

    expect(parseBusinessHours('sunset 17:00-19:00')?.map((h) => h.open.day)).toEqual([0, 1, 2, 3, 4, 5, 6]);
  });

  it('reads full and abbreviated day names', () => {
    expect(parseBusinessHours('tues-thurs 12-15')?.map((h) => h.open.day)).toEqual([1, 2, 3]);
    expect(parseBusinessHours('Saturdays and Sundays 10:00-16:00')?.map((h) => h.open.day)).toEqual([5, 6]);
  });

  it('carries days named without times into the next clause', () => {
    expect(parseBusinessHours('Monday, Tuesday 9-17')?.map((h) => h.open.day)).toEqual([0, 1]);
  });

  it('returns null without any time', () => {
    expect(parseBusinessHours('we are open most days')).toBeNull();
  });
});

describe('RuleBasedExtractor', () => {
  it('strips a name preamble', () => {
    expect(run('store_name', "It's 123 Bistro.")).toEqual({ store_name: '123 Bistro' });
  });

  it('returns an empty patch for malformed tables', () => {
    expect(run('resources', '1+1')).toEqual({});
  });

  it('answers yes/no confirmations', () => {
    expect(run('business_hours_confirm', "Yes, that's right")).toEqual({ confirm: true });
    expect(run('business_hours_confirm', 'nope')).toEqual({ confirm: false });
    expect(run('business_hours_confirm', 'maybe')).toEqual({});
  });

  it('reads the merge policy', () => {
    expect(run('merge_policy', 'we can push tables together')).toEqual({ strategy: { can_merge_tables: true } });
    expect(run('merge_policy', "No, we can't")).toEqual({ strategy: { can_merge_tables: false } });
  });

  it('reads the largest party', () => {
    expect(run('max_party_size', 'about 12 people')).toEqual({ strategy: { max_party_size: 12 } });
    expect(run('max_party_size', 'twelve')).toEqual({ strategy: { max_party_size: 12 } });
  });

  it('reads the online role', () => {
    expect(run('online_role', 'mostly walk-ins')).toEqual({ strategy: { online_role: 'minimal' } });
    expect(run('online_role', "it's our main channel")).toEqual({ strategy: { online_role: 'primary' } });
  });

  it('reads peak periods', () => {
    expect(run('peak_period', 'weekday lunch and weekend dinner')).toEqual({
      strategy: { peak_periods: ['weekday_lunch', 'weekend_dinner'] },
    });
    expect(run('peak_period', 'dinner at sunset')).toEqual({ strategy: { peak_periods: ['weekday_dinner'] } });
    expect(run('peak_period', 'saturday dinner')).toEqual({ strategy: { peak_periods: ['weekend_dinner'] } });
  });

  it('snaps quota percentages to the nearest allowed ratio', () => {
    expect(run('peak_ratio', 'about 30%')).toEqual({ strategy: { peak_online_quota_ratio: 0.2 } });
    expect(run('peak_ratio', 'half')).toEqual({ strategy: { peak_online_quota_ratio: 0.5 } });
    expect(run('peak_ratio', 'none')).toEqual({ strategy: { peak_online_quota_ratio: 0 } });
  });

  it('reads peak strategy and no-show tolerance', () => {
    expect(run('peak_strategy', 'walk-ins first')).toEqual({ strategy: { peak_strategy: 'walkin_first' } });
    expect(run('no_show_tolerance', "we don't mind")).toEqual({ strategy: { no_show_tolerance: 'high' } });
  });

  it('reads numeric recommendation edits', () => {
    expect(run('recommendation_patch', 'only 10 seats online and at most 2 parties per slot')).toEqual({
      strategy: { peak_online_seat_budget: 10, peak_online_party_limit_per_slot: 2 },
    });
    expect(run('recommendation_patch', '15-minute slots')).toEqual({ strategy: { peak_slot_minutes: 15 } });
  });

  it('moves the last booking time on the hours under discussion', () => {
    const state = {
      ...empty,
      booking_hours: [{ open: { day: 0, time: '0800' }, close: { day: 0, time: '1600' } }],
    };
    expect(run('recommendation_patch', 'last booking at 20:00', state)).toEqual({
      booking_hours: [{ open: { day: 0, time: '0800' }, close: { day: 0, time: '2000' } }],
    });
    expect(run('recommendation_patch', 'last booking at 8', state)).toEqual({
      booking_hours: [{ open: { day: 0, time: '0800' }, close: { day: 0, time: '2000' } }],
    });
  });

  it('returns an empty patch for unrelated text', () => {
    expect(run('recommendation_patch', 'hmm')).toEqual({});
    expect(run('online_role', 'pizza')).toEqual({});
  });
});
