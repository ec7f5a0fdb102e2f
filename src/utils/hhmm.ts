/**
 * Helpers for the zero-padded 24h "HHMM" strings used in business hours.
 */
export function hhmmToMinutes(hhmm: string): number {
  const s = hhmm.padStart(4, '0');
  return parseInt(s.slice(0, 2), 10) * 60 + parseInt(s.slice(2), 10);
}

export function minutesToHhmm(minutes: number): string {
  const total = Math.max(0, Math.trunc(minutes));
  const hh = Math.floor(total / 60);
  const mm = total % 60;
  return `${String(hh).padStart(2, '0')}${String(mm).padStart(2, '0')}`;
}

export function hhmmToColon(hhmm: string): string {
  const s = hhmm.padStart(4, '0');
  return `${s.slice(0, 2)}:${s.slice(2)}`;
}

export function toHhmm(hours: number, minutes: number): string {
  return `${String(hours).padStart(2, '0')}${String(minutes).padStart(2, '0')}`;
}
