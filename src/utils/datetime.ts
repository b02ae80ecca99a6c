/**
 * DateTime helpers on Luxon.
 *
 * Instants are stored as UTC ISO strings; anything shown to the user is
 * converted to the care timezone first.
 */

import { DateTime } from 'luxon';

// ============= Testing Support =============

/**
 * Mock "now" for deterministic tests. Set via setMockNow(), cleared via
 * clearMockNow().
 */
let mockNow: DateTime | null = null;

export function setMockNow(date: Date | DateTime): void {
  mockNow = date instanceof DateTime ? date.toUTC() : DateTime.fromJSDate(date).toUTC();
}

export function clearMockNow(): void {
  mockNow = null;
}

export function now(): DateTime {
  return mockNow ?? DateTime.utc();
}

export function nowInZone(zone: string): DateTime {
  return now().setZone(zone);
}

// ============= DB conversion =============

/**
 * Always ends in 'Z'.
 */
export function toDbString(dt: DateTime): string {
  return dt.toUTC().toISO() ?? new Date(dt.toMillis()).toISOString();
}

export function fromDbString(isoString: string): DateTime {
  const normalized = isoString.endsWith('Z') ? isoString : isoString + 'Z';
  return DateTime.fromISO(normalized, { zone: 'utc' });
}

// ============= Greeting =============

export type DayPart = 'morning' | 'afternoon' | 'night';

/**
 * [0,12) morning, [12,18) afternoon, rest night.
 */
export function dayPartForHour(hour: number): DayPart {
  if (hour < 12) return 'morning';
  if (hour < 18) return 'afternoon';
  return 'night';
}

const GREETINGS: Record<DayPart, string> = {
  morning: 'Buenos dias',
  afternoon: 'Buenas tardes',
  night: 'Buenas noches',
};

export function timeBasedGreeting(zone: string): string {
  return GREETINGS[dayPartForHour(nowInZone(zone).hour)];
}

// ============= Relative labels =============

/**
 * "en 2h 5m", "en 40 minutos" or "ahora".
 */
export function formatTimeUntil(target: DateTime): string {
  const totalMinutes = Math.floor(Math.max(0, target.toMillis() - now().toMillis()) / 60_000);
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;

  if (hours > 0) {
    return `en ${hours}h ${minutes}m`;
  }
  if (minutes > 0) {
    return `en ${minutes} minutos`;
  }
  return 'ahora';
}

const DEFAULT_LOCALE = 'es';

/**
 * "Hoy a las 10:30", "Manana a las 09:00", "En 3 dias" (within a week), or
 * the long date.
 */
export function formatRelativeDay(target: DateTime, zone: string, locale: string = DEFAULT_LOCALE): string {
  const local = target.setZone(zone);
  const today = nowInZone(zone).startOf('day');
  const daysUntil = Math.round(local.startOf('day').diff(today, 'days').days);
  const time = local.toFormat('HH:mm');

  if (daysUntil === 0) {
    return `Hoy a las ${time}`;
  }
  if (daysUntil === 1) {
    return `Manana a las ${time}`;
  }
  if (daysUntil > 1 && daysUntil <= 7) {
    return `En ${daysUntil} dias`;
  }
  return local.setLocale(locale).toLocaleString(DateTime.DATE_FULL);
}

/**
 * Whole years between a birth date and now.
 */
export function ageFrom(dateOfBirth: string, zone: string): number {
  const birth = DateTime.fromISO(dateOfBirth, { zone });
  if (!birth.isValid) {
    return 0;
  }
  return Math.max(0, Math.floor(nowInZone(zone).diff(birth, 'years').years));
}

/**
 * Milliseconds until an instant, never negative.
 */
export function msUntil(dt: DateTime): number {
  return Math.max(0, dt.toMillis() - now().toMillis());
}

export { DateTime } from 'luxon';
