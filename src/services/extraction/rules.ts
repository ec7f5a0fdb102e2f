import {
  BusinessHoursEntry,
  OnlineRole,
  NoShowTolerance,
  Patch,
  PeakPeriod,
  PeakStrategy,
  QUOTA_RATIOS,
  QuotaRatio,
  Resource,
} from '../../types';
import { minutesToHhmm, hhmmToMinutes } from '../../utils/hhmm';
import { ExtractionPort, ExtractionRequest } from './types';

const NUMBER_WORDS: Record<string, number> = {
  a: 1, an: 1, one: 1, two: 2, three: 3, four: 4, five: 5, six: 6, seven: 7, eight: 8, nine: 9, ten: 10,
  eleven: 11, twelve: 12, thirteen: 13, fourteen: 14, fifteen: 15, sixteen: 16, seventeen: 17, eighteen: 18,
  nineteen: 19, twenty: 20,
};

const NUM = `(\\d+|(?:${Object.keys(NUMBER_WORDS).join('|')})\\b)`;
const SIZE_UNIT = `(?:\\s*-\\s*|\\s+)?(?:seats?|seaters?|tops?|persons?|people|pax)\\b`;

function toNumber(token: string): number | null {
  if (/^\d+$/.test(token)) return parseInt(token, 10);
  return NUMBER_WORDS[token] ?? null;
}

function normalize(text: string): string {
  return text
    .toLowerCase()
    .replace(/[’‘]/g, "'")
    .replace(/[×*]/g, 'x')
    .replace(/[–—~]/g, '-')
    .replace(/：/g, ':');
}

// ---------------------------------------------------------------------------
// Tables

type ResourceRule = { pattern: RegExp; size: number; count: number };

const RESOURCE_RULES: ResourceRule[] = [
  // "4-seat table x2", "6 seats x 3"
  { pattern: new RegExp(`\\b${NUM}${SIZE_UNIT}(?:\\s*tables?)?\\s*x\\s*${NUM}`), size: 1, count: 2 },
  // "4-seat tables: 5"
  { pattern: new RegExp(`\\b${NUM}${SIZE_UNIT}(?:\\s*tables?)?\\s*[:=]\\s*${NUM}`), size: 1, count: 2 },
  // "5 tables of 4", "two tables for 6"
  { pattern: new RegExp(`\\b${NUM}\\s+tables?\\s+(?:of|for|with|seating)\\s+${NUM}`), size: 2, count: 1 },
  // "five 2-top tables", "3 x 8-seat"
  { pattern: new RegExp(`\\b${NUM}(?:\\s*x\\s*|\\s+)${NUM}${SIZE_UNIT}`), size: 2, count: 1 },
];

export function parseResources(text: string): Resource[] | null {
  const resources: Resource[] = [];
  for (const segment of normalize(text).split(/[,;\n]|\band\b/)) {
    for (const rule of RESOURCE_RULES) {
      const m = rule.pattern.exec(segment);
      if (!m) continue;
      const size = toNumber(m[rule.size]);
      const count = toNumber(m[rule.count]);
      if (size !== null && count !== null && size > 0) {
        resources.push({ party_size: size, spots_total: count });
      }
      break;
    }
  }
  return resources.length ? resources : null;
}

// ---------------------------------------------------------------------------
// Durations

export function parseDurationSec(text: string): number | null {
  const s = normalize(text);
  if (/\bhalf an hour\b/.test(s)) return 1800;

  // "1h30" has no word boundary after the unit
  const hours =
    /\b(an?|one|two|three|\d+(?:\.\d+)?)\s*(?:hours?|hrs?|h)(?![a-z])(?:\s*(?:and\s*)?(a half|(\d+)\s*(?:minutes?|mins?|m)?(?![a-z\d])))?/.exec(s);
  if (hours) {
    const base = toNumber(hours[1]) ?? parseFloat(hours[1]);
    const extra = hours[2] === 'a half' ? 30 : hours[3] ? parseInt(hours[3], 10) : 0;
    const seconds = Math.round(base * 3600 + extra * 60);
    return seconds > 0 ? seconds : null;
  }

  const minutes = /\b(\d+)\s*(?:minutes?|mins?|m)\b/.exec(s);
  if (minutes) {
    const seconds = parseInt(minutes[1], 10) * 60;
    return seconds > 0 ? seconds : null;
  }

  // A bare number: hours up to 12, minutes above
  const bare = /^\s*(\d+(?:\.\d+)?)\s*$/.exec(s);
  if (bare) {
    const value = parseFloat(bare[1]);
    const seconds = Math.round(value <= 12 ? value * 3600 : value * 60);
    return seconds > 0 ? seconds : null;
  }
  return null;
}

// ---------------------------------------------------------------------------
// Opening hours

const ALL_DAYS = [0, 1, 2, 3, 4, 5, 6];
const DAY = '(mon(?:day)?|tues?(?:day)?|wed(?:nesday)?|thu(?:rs?)?(?:day)?|fri(?:day)?|sat(?:urday)?|sun(?:day)?)s?\\b';
const DAY_RANGE = new RegExp(`\\b${DAY}\\s*(?:-|to|through|thru)\\s*${DAY}`, 'g');
const DAY_SINGLE = new RegExp(`\\b${DAY}`, 'g');
const DAY_INDEX: Record<string, number> = { mon: 0, tue: 1, wed: 2, thu: 3, fri: 4, sat: 5, sun: 6 };

const CLOCK = '(\\d{1,2})(?:[:.h](\\d{2})|(\\d{2}))?\\s*(am|pm)?';
const TIME_RANGE = new RegExp(`\\b${CLOCK}\\s*(?:-|to|until|till)\\s*${CLOCK}`, 'g');

function daysIn(clause: string): number[] {
  const days = new Set<number>();
  if (/\b(?:every ?day|daily|all week|7 days)\b/.test(clause)) ALL_DAYS.forEach((d) => days.add(d));
  if (/\bweekdays?\b/.test(clause)) [0, 1, 2, 3, 4].forEach((d) => days.add(d));
  if (/\bweekends?\b/.test(clause)) [5, 6].forEach((d) => days.add(d));

  let rest = clause;
  for (const m of clause.matchAll(DAY_RANGE)) {
    const from = DAY_INDEX[m[1].slice(0, 3)];
    const to = DAY_INDEX[m[2].slice(0, 3)];
    for (let d = from; ; d = (d + 1) % 7) {
      days.add(d);
      if (d === to) break;
    }
    rest = rest.replace(m[0], ' ');
  }
  for (const m of rest.matchAll(DAY_SINGLE)) {
    days.add(DAY_INDEX[m[1].slice(0, 3)]);
  }
  return [...days].sort((a, b) => a - b);
}

function to24(hour: number, meridiem: string | undefined): number {
  if (meridiem === 'am') return hour === 12 ? 0 : hour;
  if (meridiem === 'pm') return hour === 12 ? 12 : hour + 12;
  return hour;
}

interface TimeRange {
  open: number;
  close: number;
}

function toRange(m: RegExpMatchArray): TimeRange | null {
  const startMin = parseInt(m[2] ?? m[3] ?? '0', 10);
  const endMin = parseInt(m[6] ?? m[7] ?? '0', 10);
  let startHour = to24(parseInt(m[1], 10), m[4]);
  let endHour = to24(parseInt(m[5], 10), m[8]);
  if (startMin > 59 || endMin > 59) return null;

  // "5-9pm": the start shares the end's meridiem when that keeps the order
  if (!m[4] && m[8] === 'pm' && startHour < 12 && startHour + 12 <= endHour) startHour += 12;
  // "9-5": an end before the start on a 12h clock is afternoon
  const open = startHour * 60 + startMin;
  if (!m[4] && !m[8] && endHour < 12 && endHour * 60 + endMin <= open && (endHour + 12) * 60 + endMin > open) {
    endHour += 12;
  }
  const close = endHour * 60 + endMin;
  if (startHour > 23 || endHour > 24 || open === close) return null;
  return { open, close };
}

function timesIn(clause: string): TimeRange[] {
  const ranges: TimeRange[] = [];
  for (const m of clause.matchAll(TIME_RANGE)) {
    const range = toRange(m);
    if (range) ranges.push(range);
  }
  return ranges.sort((a, b) => a.open - b.open);
}

function toEntry(day: number, range: TimeRange): BusinessHoursEntry {
  const open = { day, time: minutesToHhmm(range.open) };
  // a midnight close stays on the opening day as "2400"
  if (range.close === 0 || range.close === 24 * 60) {
    return { open, close: { day, time: '2400' } };
  }
  if (range.close > 24 * 60) {
    return { open, close: { day: (day + 1) % 7, time: minutesToHhmm(range.close - 24 * 60) } };
  }
  if (range.close <= range.open) {
    return { open, close: { day: (day + 1) % 7, time: minutesToHhmm(range.close) } };
  }
  return { open, close: { day, time: minutesToHhmm(range.close) } };
}

/**
 * Reads phrases like "Mon-Sat 11:00-22:00, closed Sunday" or "weekdays 11:30-14:00
 * and 17:30-22:00; weekends 10-23". Clauses without days reuse the previous clause's
 * days; a reply that names no day at all means every day.
 */
export function parseBusinessHours(text: string): BusinessHoursEntry[] | null {
  const s = normalize(text).replace(/\bnoon\b/g, '12:00').replace(/\bmidnight\b/g, '24:00');
  const hours = new Map<number, TimeRange[]>();
  let pending: number[] = [];
  let last: number[] | null = null;

  for (const clause of s.split(/[;\n]|,|\.\s/)) {
    const days = daysIn(clause);
    const times = timesIn(clause);
    const closed = /\b(?:closed|shut)\b/.test(clause);

    if (!times.length && !closed) {
      pending.push(...days);
      continue;
    }
    if (closed && !times.length) {
      for (const d of [...pending, ...days]) hours.set(d, []);
      pending = [];
      continue;
    }
    const target: number[] = days.length ? [...pending, ...days] : pending.length ? pending : (last ?? ALL_DAYS);
    for (const d of target) hours.set(d, times);
    last = target;
    pending = [];
  }

  const entries: BusinessHoursEntry[] = [];
  for (const day of ALL_DAYS) {
    for (const range of hours.get(day) ?? []) entries.push(toEntry(day, range));
  }
  return entries.length ? entries : null;
}

// ---------------------------------------------------------------------------
// Short answers

const YES = /^(?:yes|yeah|yep|yup|y|sure|correct|right|that's right|that is right|ok|okay|confirm(?:ed)?|of course|absolutely)\b/;
const NO = /^(?:no|nope|nah|n|not really|wrong|incorrect|that's wrong|that is wrong)\b/;

export function parseYesNo(text: string): boolean | null {
  const s = normalize(text).trim();
  if (NO.test(s)) return false;
  if (YES.test(s)) return true;
  return null;
}

function parseMergeTables(text: string): boolean | null {
  const s = normalize(text);
  if (/\b(?:can't|cannot|can not|don't|do not|won't|never)\b.*\b(?:combine|merge|push|join)/.test(s)) return false;
  if (/\b(?:can|we do|sometimes|usually)\b.*\b(?:combine|merge|push|join)/.test(s)) return true;
  return parseYesNo(s);
}

export function parseFirstInteger(text: string): number | null {
  const s = normalize(text);
  const digits = /\b(\d+)\b/.exec(s);
  if (digits) return parseInt(digits[1], 10);
  const word = new RegExp(`\\b(${Object.keys(NUMBER_WORDS).filter((w) => w.length > 2).join('|')})\\b`).exec(s);
  return word ? toNumber(word[1]) : null;
}

function parseOnlineRole(text: string): OnlineRole | null {
  const s = normalize(text);
  if (/\b(?:minimal|rarely|barely|hardly|mostly walk-?ins?|walk-?ins? mostly|not much)\b/.test(s)) return 'minimal';
  if (/\b(?:help|helper|assist|assistant|queue|supplement|smooth)\b/.test(s)) return 'assistant';
  if (/\b(?:main|primary|mostly online|as many|fill|most important)\b/.test(s)) return 'primary';
  return null;
}

function parsePeakPeriods(text: string): PeakPeriod[] | null {
  const found = new Set<PeakPeriod>();
  for (const clause of normalize(text).split(/[,;\n]|\band\b|\bplus\b/)) {
    const weekend = /\b(?:weekends?|sat(?:urday)?s?|sun(?:day)?s?)\b/.test(clause);
    if (/\bbrunch\b/.test(clause)) found.add('weekend_brunch');
    if (/\blunch\b/.test(clause)) found.add('weekday_lunch');
    if (/\b(?:dinner|evenings?|nights?|supper)\b/.test(clause)) found.add(weekend ? 'weekend_dinner' : 'weekday_dinner');
  }
  return found.size ? [...found] : null;
}

export function nearestQuotaRatio(fraction: number): QuotaRatio {
  let best: QuotaRatio = QUOTA_RATIOS[0];
  for (const r of QUOTA_RATIOS) {
    if (Math.abs(r - fraction) < Math.abs(best - fraction)) best = r;
  }
  return best;
}

function parseQuotaRatio(text: string): QuotaRatio | null {
  const s = normalize(text);
  const percent = /\b(\d{1,3})\s*(?:%|percent)/.exec(s);
  if (percent) return nearestQuotaRatio(parseInt(percent[1], 10) / 100);
  const decimal = /\b(0?\.\d+|1\.0|0)\b/.exec(s);
  if (decimal) return nearestQuotaRatio(parseFloat(decimal[1]));
  if (/\b(?:none|nothing|zero|no online)\b/.test(s)) return 0;
  if (/\b(?:most|majority)\b/.test(s)) return 0.8;
  if (/\bhalf\b/.test(s)) return 0.5;
  if (/\b(?:a little|little|few|some|small)\b/.test(s)) return 0.2;
  return null;
}

function parsePeakStrategy(text: string): PeakStrategy | null {
  const s = normalize(text);
  if (
    /\bno online\b|\bwalk-?ins? only\b|\bonly walk-?ins?\b|\bno (?:bookings|reservations)\b|\bdon't take (?:bookings|reservations)\b/.test(s)
  ) {
    return 'no_online';
  }
  if (/\bwalk-?ins? first\b|\bprioriti[sz]e walk-?ins?\b|\bwalk-?ins? (?:get )?priority\b/.test(s)) return 'walkin_first';
  if (/\bonline first\b|\bprioriti[sz]e online\b|\bonline (?:bookings? )?(?:get )?priority\b|\b(?:bookings?|reservations?) first\b/.test(s)) {
    return 'online_first';
  }
  return null;
}

function parseNoShowTolerance(text: string): NoShowTolerance | null {
  const s = normalize(text);
  if (/\bhigh\b|\bdon't mind\b|\bnot a big deal\b|\brelaxed\b|\bfine with\b/.test(s)) return 'high';
  if (/\blow\b|\bstrict\b|\bcareful\b|\bcan't afford\b|\bhate\b/.test(s)) return 'low';
  if (/\bmedium\b|\bmoderate\b|\bnormal\b|\baverage\b|\bsomewhat\b/.test(s)) return 'medium';
  return null;
}

// ---------------------------------------------------------------------------
// Recommendation edits

const LAST_START = new RegExp(`\\blast\\s+(?:booking|seating|reservation|start|order)s?\\s*(?:time\\s*)?(?:at|by|is|:|=)?\\s*${CLOCK}`);

function moveLastStart(bookingHours: BusinessHoursEntry[], m: RegExpExecArray): BusinessHoursEntry[] | null {
  const minute = parseInt(m[2] ?? m[3] ?? '0', 10);
  const hour = to24(parseInt(m[1], 10), m[4]);
  if (minute > 59 || hour > 23) return null;
  const at = hour * 60 + minute;

  return bookingHours.map(({ open, close }) => {
    if (open.day !== close.day) return { open: { ...open }, close: { ...close } };
    const opens = hhmmToMinutes(open.time);
    // "last booking at 8" reads as 20:00 when 08:00 would precede opening
    const candidate = at > opens ? at : !m[4] && at + 12 * 60 > opens && at + 12 * 60 < 24 * 60 ? at + 12 * 60 : null;
    if (candidate === null) return { open: { ...open }, close: { ...close } };
    return { open: { ...open }, close: { day: close.day, time: minutesToHhmm(candidate) } };
  });
}

function parseRecommendationPatch(text: string, request: ExtractionRequest): Patch {
  const s = normalize(text);
  const patch: Patch = {};
  const strategy: Record<string, unknown> = {};

  const last = LAST_START.exec(s);
  if (last && request.state.booking_hours) {
    const moved = moveLastStart(request.state.booking_hours, last);
    if (moved) patch.booking_hours = moved;
  } else if (/\b(?:booking|reservation)s?\b.*\b(?:from|between|hours?)\b/.test(s)) {
    const hours = parseBusinessHours(s);
    if (hours) patch.booking_hours = hours;
  }

  const seats = /\b(\d+)\s*(?:online\s*)?seats?\b|\bonline\s*(?:seats?|seat budget|budget)\s*(?:to|of|at|=|:)?\s*(\d+)/.exec(s);
  if (seats) strategy.peak_online_seat_budget = parseInt(seats[1] ?? seats[2], 10);

  const parties =
    /\b(\d+)\s*(?:new\s*)?(?:online\s*)?(?:parties|party|groups?|bookings?)\s*(?:per|a|each|every)\s*slot\b|\b(?:parties|groups)\s*per\s*slot\s*(?:to|of|at|=|:)?\s*(\d+)/.exec(s);
  if (parties) strategy.peak_online_party_limit_per_slot = parseInt(parties[1] ?? parties[2], 10);

  const slot = /\b(\d+)\s*-?\s*min(?:ute)?s?\s*slots?\b|\bslots?\s*(?:of|to|=|:)?\s*(\d+)\s*min/.exec(s);
  if (slot) strategy.peak_slot_minutes = parseInt(slot[1] ?? slot[2], 10);

  const peakStrategy = parsePeakStrategy(s);
  if (peakStrategy) strategy.peak_strategy = peakStrategy;

  const percent = /\b(\d{1,3})\s*(?:%|percent)/.exec(s);
  if (percent) strategy.peak_online_quota_ratio = nearestQuotaRatio(parseInt(percent[1], 10) / 100);

  if (Object.keys(strategy).length) patch.strategy = strategy;
  return patch;
}

// ---------------------------------------------------------------------------

function stripNamePreamble(text: string): string {
  return text
    .trim()
    .replace(/^(?:it's|it is|we're|we are|the name is|our name is|my restaurant is|(?:we're |it's |we are )?called)\s+/i, '')
    .replace(/[.!]+$/, '')
    .trim();
}

/**
 * Deterministic English extractor. Each step reads only its own fields and returns
 * `{}` when the reply does not clearly answer the question.
 */
export class RuleBasedExtractor implements ExtractionPort {
  readonly name = 'rules';

  async extract(request: ExtractionRequest): Promise<Patch> {
    return this.extractSync(request);
  }

  extractSync(request: ExtractionRequest): Patch {
    const { text } = request;
    switch (request.step) {
      case 'store_name': {
        const name = stripNamePreamble(text);
        return name ? { store_name: name } : {};
      }
      case 'resources': {
        const resources = parseResources(text);
        return resources ? { resources } : {};
      }
      case 'duration': {
        const duration = parseDurationSec(text);
        return duration ? { duration_sec: duration } : {};
      }
      case 'business_hours': {
        const hours = parseBusinessHours(text);
        return hours ? { business_hours: hours } : {};
      }
      case 'business_hours_confirm': {
        const answer = parseYesNo(text);
        return answer === null ? {} : { confirm: answer };
      }
      case 'merge_policy': {
        const merge = parseMergeTables(text);
        return merge === null ? {} : { strategy: { can_merge_tables: merge } };
      }
      case 'max_party_size': {
        const size = parseFirstInteger(text);
        return size === null ? {} : { strategy: { max_party_size: size } };
      }
      case 'online_role': {
        const role = parseOnlineRole(text);
        return role ? { strategy: { online_role: role } } : {};
      }
      case 'peak_period': {
        const periods = parsePeakPeriods(text);
        return periods ? { strategy: { peak_periods: periods } } : {};
      }
      case 'peak_ratio': {
        const ratio = parseQuotaRatio(text);
        return ratio === null ? {} : { strategy: { peak_online_quota_ratio: ratio } };
      }
      case 'peak_strategy': {
        const strategy = parsePeakStrategy(text);
        return strategy ? { strategy: { peak_strategy: strategy } } : {};
      }
      case 'no_show_tolerance': {
        const tolerance = parseNoShowTolerance(text);
        return tolerance ? { strategy: { no_show_tolerance: tolerance } } : {};
      }
      case 'recommendation_patch':
        return parseRecommendationPatch(text, request);
    }
  }
}
