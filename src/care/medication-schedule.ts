/**
 * Medication and appointment derived values.
 */

import { DateTime, formatRelativeDay, formatTimeUntil, now, nowInZone } from '../utils/datetime.js';
import type { Appointment, Medication, MedicationDose } from './types.js';

/** How many days ahead the next-dose search looks, today excluded */
export const NEXT_DOSE_SEARCH_DAYS = 7;

/** A pending dose is overdue, and later missed, this long after its slot */
export const DOSE_GRACE_MINUTES = 60;

/** Taken within this many minutes of the slot, either side, counts as on time */
export const ON_TIME_WINDOW_MINUTES = 30;

export function formatDosage(medication: Pick<Medication, 'dosage' | 'dosageUnit'>): string {
  return `${medication.dosage} ${medication.dosageUnit}`;
}

export function needsRefill(medication: Pick<Medication, 'currentStock' | 'lowStockThreshold'>): boolean {
  return medication.currentStock <= medication.lowStockThreshold;
}

/**
 * "08:30" → { hour: 8, minute: 30 }. Times are validated on write.
 */
export function parseTimeOfDay(time: string): { hour: number; minute: number } {
  const [hour = 0, minute = 0] = time.split(':').map((part) => parseInt(part, 10));
  return { hour, minute };
}

/**
 * First scheduled time strictly after now, looking at today and the next
 * seven days. Null for inactive medications or when nothing is scheduled.
 */
export function nextScheduledDose(
  medication: Pick<Medication, 'isActive' | 'scheduledTimes' | 'daysOfWeek'>,
  zone: string
): DateTime | null {
  if (!medication.isActive || medication.scheduledTimes.length === 0) {
    return null;
  }

  const current = nowInZone(zone);
  const times = [...medication.scheduledTimes].sort().map(parseTimeOfDay);

  for (let offset = 0; offset <= NEXT_DOSE_SEARCH_DAYS; offset++) {
    const day = current.startOf('day').plus({ days: offset });
    if (!medication.daysOfWeek.includes(day.weekday)) {
      continue;
    }

    for (const { hour, minute } of times) {
      const candidate = day.set({ hour, minute, second: 0, millisecond: 0 });
      if (candidate.toMillis() > current.toMillis()) {
        return candidate;
      }
    }
  }

  return null;
}

export function timeUntilNextDose(
  medication: Pick<Medication, 'isActive' | 'scheduledTimes' | 'daysOfWeek'>,
  zone: string
): string | null {
  const next = nextScheduledDose(medication, zone);
  return next ? formatTimeUntil(next) : null;
}

/**
 * Scheduled slot closest to now: yesterday, today or tomorrow. Ties go to
 * the earlier slot. Null when nothing is scheduled.
 */
export function nearestScheduledSlot(
  medication: Pick<Medication, 'scheduledTimes' | 'daysOfWeek'>,
  zone: string
): DateTime | null {
  const current = nowInZone(zone);
  const times = [...medication.scheduledTimes].sort().map(parseTimeOfDay);
  let nearest: DateTime | null = null;
  let nearestDistance = Number.POSITIVE_INFINITY;

  for (let offset = -1; offset <= 1; offset++) {
    const day = current.startOf('day').plus({ days: offset });
    if (!medication.daysOfWeek.includes(day.weekday)) {
      continue;
    }
    for (const { hour, minute } of times) {
      const candidate = day.set({ hour, minute, second: 0, millisecond: 0 });
      const distance = Math.abs(candidate.toMillis() - current.toMillis());
      if (distance < nearestDistance) {
        nearest = candidate;
        nearestDistance = distance;
      }
    }
  }

  return nearest;
}

export function isDoseOverdue(dose: Pick<MedicationDose, 'status' | 'scheduledTime'>): boolean {
  if (dose.status !== 'pending') {
    return false;
  }
  return now().toMillis() > dose.scheduledTime.getTime() + DOSE_GRACE_MINUTES * 60_000;
}

export function wasTakenOnTime(dose: Pick<MedicationDose, 'status' | 'scheduledTime' | 'takenTime'>): boolean {
  if (dose.status !== 'taken' || !dose.takenTime) {
    return false;
  }
  return Math.abs(dose.takenTime.getTime() - dose.scheduledTime.getTime()) <= ON_TIME_WINDOW_MINUTES * 60_000;
}

export function isUpcoming(appointment: Pick<Appointment, 'appointmentDate' | 'status'>): boolean {
  return appointment.status === 'scheduled' && appointment.appointmentDate.getTime() > now().toMillis();
}

export function appointmentRelativeDate(appointment: Pick<Appointment, 'appointmentDate'>, zone: string): string {
  return formatRelativeDay(DateTime.fromJSDate(appointment.appointmentDate), zone);
}
