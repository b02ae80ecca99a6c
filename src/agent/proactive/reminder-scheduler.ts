/**
 * Reminder Scheduler
 *
 * Medication reminders are node-cron tasks, one per scheduled time, in the
 * care timezone; each firing also records a pending dose for that slot.
 * Appointment reminders are one-shot timers at
 * `appointmentDate - reminderOffsetMinutes`. Refill reminders are one-shot
 * timers an hour after a medication is found low on stock.
 *
 * Delivery goes through a NotificationSink; a failing sink is logged and the
 * schedule keeps running.
 */

import * as cron from 'node-cron';
import { config } from '../../utils/config.js';
import { createLogger } from '../../utils/logger.js';
import { DateTime, msUntil, nowInZone } from '../../utils/datetime.js';
import type { CareStore } from '../../care/store.js';
import type { MedicationFrequency } from '../../care/schemas.js';
import type { Appointment, Medication } from '../../care/types.js';
import {
  appointmentRelativeDate,
  formatDosage,
  isUpcoming,
  needsRefill,
  parseTimeOfDay,
} from '../../care/medication-schedule.js';
import type { NotificationMetadata, NotificationSink } from '../../interfaces/types.js';

const logger = createLogger('reminder-scheduler');

// setTimeout fires immediately above this
const MAX_TIMER_MS = 2_147_483_647;

export const REFILL_REMINDER_DELAY_MS = 60 * 60 * 1000;

/** Taken when needed or on a custom plan: no fixed reminders */
const UNSCHEDULED_FREQUENCIES: ReadonlySet<MedicationFrequency> = new Set<MedicationFrequency>([
  'Segun sea necesario',
  'Personalizado',
]);

type ScheduledEntry =
  | { kind: 'medication'; tasks: cron.ScheduledTask[] }
  | { kind: 'appointment' | 'refill'; timer: NodeJS.Timeout };

export interface ReminderSchedulerConfig {
  timezone: string;
  /** Where pending doses are recorded when a medication reminder fires */
  doseLog?: Pick<CareStore, 'recordPendingDose'>;
}

const DEFAULT_CONFIG: ReminderSchedulerConfig = {
  timezone: config.timezone,
};

export function formatMedicationReminder(medication: Pick<Medication, 'name' | 'dosage' | 'dosageUnit'>): string {
  return `Hora de tu medicina: ${medication.name} - ${formatDosage(medication)}`;
}

export function formatAppointmentReminder(
  appointment: Pick<Appointment, 'title' | 'doctorName' | 'location' | 'appointmentDate'>,
  zone: string
): string {
  const when = appointmentRelativeDate(appointment, zone);
  return `Cita medica: ${appointment.title} con ${appointment.doctorName} en ${appointment.location}, ${when}`;
}

export function formatRefillReminder(
  medication: Pick<Medication, 'name' | 'currentStock' | 'dosageUnit'>
): string {
  return `Recarga necesaria: tu medicamento ${medication.name} esta por agotarse. Quedan ${medication.currentStock} ${medication.dosageUnit}`;
}

export function refillReminderId(medicationId: string): string {
  return `refill:${medicationId}`;
}

/**
 * "m h * * dows". Every day collapses to "*". ISO weekdays are valid cron
 * values as they are (7 = Sunday).
 */
export function medicationCronExpression(time: string, daysOfWeek: readonly number[]): string {
  const { hour, minute } = parseTimeOfDay(time);
  const days = [...new Set(daysOfWeek)].sort((a, b) => a - b);
  const dow = days.length === 0 || days.length === 7 ? '*' : days.join(',');
  return `${minute} ${hour} * * ${dow}`;
}

export class ReminderScheduler {
  private sink: NotificationSink;
  private config: ReminderSchedulerConfig;
  private entries = new Map<string, ScheduledEntry>();

  constructor(sink: NotificationSink, config?: Partial<ReminderSchedulerConfig>) {
    this.sink = sink;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Replaces any earlier schedule for the same medication.
   * @returns number of cron tasks created
   */
  scheduleMedication(medication: Medication): number {
    this.cancel(medication.id);

    if (
      !medication.isActive ||
      medication.scheduledTimes.length === 0 ||
      UNSCHEDULED_FREQUENCIES.has(medication.frequency)
    ) {
      logger.debug('medication_not_scheduled', {
        id: medication.id,
        active: medication.isActive,
        frequency: medication.frequency,
      });
      return 0;
    }

    const message = formatMedicationReminder(medication);
    const metadata: NotificationMetadata = { type: 'medication', referenceId: medication.id, priority: 'high' };
    const tasks: cron.ScheduledTask[] = [];

    for (const time of medication.scheduledTimes) {
      const expression = medicationCronExpression(time, medication.daysOfWeek);
      if (!cron.validate(expression)) {
        logger.warn('invalid_cron_expression', { id: medication.id, expression });
        continue;
      }
      tasks.push(
        cron.schedule(
          expression,
          () => {
            this.recordDose(medication, time);
            this.deliver(message, metadata);
          },
          { timezone: this.config.timezone }
        )
      );
    }

    if (tasks.length > 0) {
      this.entries.set(medication.id, { kind: 'medication', tasks });
    }

    logger.info('medication_scheduled', {
      id: medication.id,
      name: medication.name,
      times: medication.scheduledTimes,
      tasks: tasks.length,
    });
    return tasks.length;
  }

  /**
   * Skipped (false) for appointments that are not upcoming or whose
   * reminder time has already passed.
   */
  scheduleAppointment(appointment: Appointment): boolean {
    this.cancel(appointment.id);

    if (!isUpcoming(appointment)) {
      logger.debug('appointment_not_scheduled', { id: appointment.id, status: appointment.status });
      return false;
    }

    const remindAt = DateTime.fromJSDate(appointment.appointmentDate).minus({
      minutes: appointment.reminderOffsetMinutes,
    });
    if (msUntil(remindAt) <= 0) {
      logger.debug('appointment_reminder_in_past', { id: appointment.id });
      return false;
    }

    this.armTimer(appointment, remindAt);
    logger.info('appointment_scheduled', {
      id: appointment.id,
      remind_at: remindAt.toISO(),
    });
    return true;
  }

  /**
   * One reminder an hour from now while stock is at or below the threshold.
   * Replaces an earlier refill reminder for the same medication.
   */
  scheduleRefillReminder(medication: Medication): boolean {
    const id = refillReminderId(medication.id);
    this.cancel(id);

    if (!medication.isActive || !needsRefill(medication)) {
      return false;
    }

    const timer = setTimeout(() => {
      this.entries.delete(id);
      this.deliver(formatRefillReminder(medication), {
        type: 'refill',
        referenceId: medication.id,
        priority: 'normal',
      });
    }, REFILL_REMINDER_DELAY_MS);
    timer.unref();
    this.entries.set(id, { kind: 'refill', timer });

    logger.info('refill_scheduled', { id: medication.id, stock: medication.currentStock });
    return true;
  }

  cancel(id: string): boolean {
    const entry = this.entries.get(id);
    if (!entry) {
      return false;
    }

    if (entry.kind === 'medication') {
      for (const task of entry.tasks) {
        task.stop();
      }
    } else {
      clearTimeout(entry.timer);
    }

    this.entries.delete(id);
    logger.debug('reminder_cancelled', { id, kind: entry.kind });
    return true;
  }

  cancelAll(): void {
    for (const id of [...this.entries.keys()]) {
      this.cancel(id);
    }
  }

  scheduledIds(): string[] {
    return [...this.entries.keys()];
  }

  /**
   * Schedules every active medication, refill and upcoming appointment of a
   * profile.
   */
  restore(store: CareStore, profileId: string): { medications: number; appointments: number; refills: number } {
    let medications = 0;
    let appointments = 0;
    let refills = 0;

    for (const medication of store.listMedications(profileId, { activeOnly: true })) {
      if (this.scheduleMedication(medication) > 0) {
        medications++;
      }
      if (this.scheduleRefillReminder(medication)) {
        refills++;
      }
    }
    for (const appointment of store.listUpcomingAppointments(profileId)) {
      if (this.scheduleAppointment(appointment)) {
        appointments++;
      }
    }

    logger.info('reminders_restored', { profile_id: profileId, medications, appointments, refills });
    return { medications, appointments, refills };
  }

  private recordDose(medication: Medication, time: string): void {
    if (!this.config.doseLog) {
      return;
    }
    const { hour, minute } = parseTimeOfDay(time);
    const slot = nowInZone(this.config.timezone).set({ hour, minute, second: 0, millisecond: 0 });
    try {
      this.config.doseLog.recordPendingDose(medication.id, slot.toJSDate());
    } catch (error) {
      logger.error('dose_record_failed', {
        id: medication.id,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }

  private armTimer(appointment: Appointment, remindAt: DateTime): void {
    const delay = msUntil(remindAt);

    if (delay > MAX_TIMER_MS) {
      // Re-arm closer to the date
      const timer = setTimeout(() => this.armTimer(appointment, remindAt), MAX_TIMER_MS);
      timer.unref();
      this.entries.set(appointment.id, { kind: 'appointment', timer });
      return;
    }

    const timer = setTimeout(() => {
      this.entries.delete(appointment.id);
      this.deliver(formatAppointmentReminder(appointment, this.config.timezone), {
        type: 'appointment',
        referenceId: appointment.id,
        priority: 'high',
      });
    }, delay);
    timer.unref();
    this.entries.set(appointment.id, { kind: 'appointment', timer });
  }

  private deliver(message: string, metadata: NotificationMetadata): void {
    if (!this.sink.isAvailable()) {
      logger.warn('reminder_sink_unavailable', { type: metadata.type, id: metadata.referenceId });
      return;
    }

    this.sink
      .send(message, metadata)
      .then((sent) => {
        if (sent) {
          logger.info('reminder_delivered', { type: metadata.type, id: metadata.referenceId });
        } else {
          logger.warn('reminder_not_delivered', { type: metadata.type, id: metadata.referenceId });
        }
      })
      .catch((error: unknown) => {
        logger.error('reminder_delivery_failed', {
          type: metadata.type,
          id: metadata.referenceId,
          error: error instanceof Error ? error.message : 'Unknown error',
        });
      });
  }
}
