import { BusinessHoursEntry, PeakPeriod, Recommendation, Resource } from '../types';
import { hhmmToColon } from '../utils/hhmm';

export const DAY_NAMES = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'] as const;

export const PEAK_PERIOD_LABELS: Record<PeakPeriod, string> = {
  weekday_lunch: 'weekday lunch',
  weekday_dinner: 'weekday dinner',
  weekend_brunch: 'weekend brunch',
  weekend_dinner: 'weekend dinner',
};

function formatInterval({ open, close }: BusinessHoursEntry): string {
  const span = `${hhmmToColon(open.time)}–${hhmmToColon(close.time)}`;
  if (open.day === close.day) return span;
  if (close.day === (open.day + 1) % 7) return `${span} (next day)`;
  return `${span} (${DAY_NAMES[close.day]})`;
}

/**
 * Compact one-line summary, consecutive days with identical intervals merged into a
 * range: "Mon–Sat 08:00–17:00; Sun closed". Cross-day windows count for their open day.
 */
export function summarizeBusinessHours(hours: BusinessHoursEntry[]): string {
  const perDay: string[][] = DAY_NAMES.map(() => []);
  const ordered = [...hours].sort((a, b) => a.open.time.localeCompare(b.open.time));
  for (const entry of ordered) {
    perDay[entry.open.day].push(formatInterval(entry));
  }
  const labels = perDay.map((intervals) => (intervals.length ? intervals.join(', ') : 'closed'));

  const parts: string[] = [];
  let start = 0;
  for (let day = 1; day <= DAY_NAMES.length; day++) {
    if (day < DAY_NAMES.length && labels[day] === labels[start]) continue;
    const range = day - 1 === start ? DAY_NAMES[start] : `${DAY_NAMES[start]}–${DAY_NAMES[day - 1]}`;
    parts.push(`${range} ${labels[start]}`);
    start = day;
  }
  return parts.join('; ');
}

export function summarizeResources(resources: Resource[]): string {
  if (resources.length === 0) return 'no tables';
  return resources.map((r) => `${r.spots_total} × ${r.party_size}-seat`).join(', ');
}

export function formatDuration(durationSec: number): string {
  const minutes = Math.round(durationSec / 60);
  if (minutes % 60 === 0) {
    const hours = minutes / 60;
    return hours === 1 ? '1 hour' : `${hours} hours`;
  }
  return `${minutes} minutes`;
}

export function formatRatio(ratio: number): string {
  return `${Math.round(ratio * 100)}%`;
}

export function renderRecommendation(rec: Recommendation): string {
  const lines = [
    'Here is what I suggest:',
    `1) Latest online booking start: ${summarizeBusinessHours(rec.booking_hours)}`,
  ];

  if (rec.peak_strategy === 'no_online') {
    lines.push('2) Peak periods: no online bookings; every seat stays with walk-ins.');
  } else {
    const { policy } = rec;
    lines.push(
      `2) Peak periods (${rec.peak_strategy === 'online_first' ? 'online first' : 'walk-ins first'}, ${formatRatio(rec.peak_online_quota_ratio)} online):`,
      `   - ${policy.slot_minutes}-minute booking slots`,
      `   - about ${policy.online_seat_budget} seats bookable online`,
      `   - at most ${policy.online_party_limit_per_slot} new online parties per slot`,
      `   - by table: ${summarizeResources(rec.peak_online_resources)}`,
    );
  }
  lines.push('', 'A) Accept', 'B) Modify');
  return lines.join('\n');
}
