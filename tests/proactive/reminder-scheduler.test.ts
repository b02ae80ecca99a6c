/**
 * Reminder scheduler tests. node-cron is mocked; appointment timers run on
 * fake timers.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const cronMocks = vi.hoisted(() => ({
  schedule: vi.fn(),
  validate: vi.fn(),
}));

vi.mock('node-cron', () => ({
  schedule: cronMocks.schedule,
  validate: cronMocks.validate,
}));

import {
  REFILL_REMINDER_DELAY_MS,
  ReminderScheduler,
  formatAppointmentReminder,
  formatMedicationReminder,
  formatRefillReminder,
  medicationCronExpression,
  refillReminderId,
} from '../../src/agent/proactive/reminder-scheduler.js';
import { CareStore, openCareDatabase } from '../../src/care/store.js';
import type { Appointment, Medication } from '../../src/care/types.js';
import type { NotificationMetadata } from '../../src/interfaces/types.js';
import { clearMockNow, setMockNow } from '../../src/utils/datetime.js';

const NOW = new Date('2026-03-10T09:00:00Z');
const MAX_TIMER_MS = 2_147_483_647;

function medication(overrides: Partial<Medication> = {}): Medication {
  return {
    id: 'med-1',
    profileId: 'p1',
    name: 'Metformina',
    dosage: '850',
    dosageUnit: 'mg',
    frequency: 'Dos veces al dia',
    scheduledTimes: ['08:00', '20:00'],
    daysOfWeek: [1, 2, 3, 4, 5, 6, 7],
    instructions: null,
    isActive: true,
    currentStock: 30,
    lowStockThreshold: 7,
    createdAt: NOW,
    updatedAt: NOW,
    ...overrides,
  };
}

function appointment(overrides: Partial<Appointment> = {}): Appointment {
  return {
    id: 'apt-1',
    profileId: 'p1',
    title: 'Revision',
    doctorName: 'Dra. Salinas',
    specialty: null,
    location: 'Clinica del Centro',
    appointmentDate: new Date('2026-03-12T10:00:00Z'),
    durationMinutes: 60,
    reminderOffsetMinutes: 1440,
    notes: null,
    status: 'scheduled',
    createdAt: NOW,
    updatedAt: NOW,
    ...overrides,
  };
}

function createSink() {
  return {
    send: vi.fn(async (_message: string, _metadata?: NotificationMetadata) => true),
    isAvailable: vi.fn(() => true),
  };
}

function cronCallback(index: number): () => void {
  const callback: unknown = cronMocks.schedule.mock.calls[index]?.[1];
  if (typeof callback !== 'function') {
    throw new Error(`No cron callback at ${index}`);
  }
  return () => {
    callback();
  };
}

describe('reminder formatting', () => {
  beforeEach(() => setMockNow(NOW));
  afterEach(() => clearMockNow());

  it('formats medication reminders', () => {
    expect(formatMedicationReminder(medication())).toBe('Hora de tu medicina: Metformina - 850 mg');
  });

  it('formats appointment reminders', () => {
    expect(formatAppointmentReminder(appointment(), 'UTC')).toBe(
      'Cita medica: Revision con Dra. Salinas en Clinica del Centro, En 2 dias'
    );
  });

  it('formats refill reminders', () => {
    expect(formatRefillReminder(medication({ currentStock: 5 }))).toBe(
      'Recarga necesaria: tu medicamento Metformina esta por agotarse. Quedan 5 mg'
    );
  });

  it('builds cron expressions', () => {
    expect(medicationCronExpression('08:30', [1, 2, 3, 4, 5, 6, 7])).toBe('30 8 * * *');
    expect(medicationCronExpression('20:00', [5, 1, 1])).toBe('0 20 * * 1,5');
    expect(medicationCronExpression('07:05', [])).toBe('5 7 * * *');
  });
});

describe('ReminderScheduler', () => {
  let sink: ReturnType<typeof createSink>;
  let scheduler: ReminderScheduler;

  beforeEach(() => {
    vi.useFakeTimers();
    setMockNow(NOW);
    cronMocks.schedule.mockReset();
    cronMocks.schedule.mockImplementation(() => ({ stop: vi.fn() }));
    cronMocks.validate.mockReset();
    cronMocks.validate.mockReturnValue(true);
    sink = createSink();
    scheduler = new ReminderScheduler(sink, { timezone: 'UTC' });
  });

  afterEach(() => {
    scheduler.cancelAll();
    clearMockNow();
    vi.useRealTimers();
  });

  describe('medications', () => {
    it('creates one cron task per scheduled time', () => {
      expect(scheduler.scheduleMedication(medication())).toBe(2);

      expect(cronMocks.schedule).toHaveBeenCalledTimes(2);
      expect(cronMocks.schedule.mock.calls[0]?.[0]).toBe('0 8 * * *');
      expect(cronMocks.schedule.mock.calls[1]?.[0]).toBe('0 20 * * *');
      expect(cronMocks.schedule.mock.calls[0]?.[2]).toEqual({ timezone: 'UTC' });
      expect(scheduler.scheduledIds()).toEqual(['med-1']);
    });

    it('delivers the reminder when the task fires', async () => {
      scheduler.scheduleMedication(medication());
      cronCallback(0)();
      await vi.advanceTimersByTimeAsync(0);

      expect(sink.send).toHaveBeenCalledWith('Hora de tu medicina: Metformina - 850 mg', {
        type: 'medication',
        referenceId: 'med-1',
        priority: 'high',
      });
    });

    it('replaces the previous tasks when rescheduled', () => {
      scheduler.scheduleMedication(medication());
      const firstTask: unknown = cronMocks.schedule.mock.results[0]?.value;

      scheduler.scheduleMedication(medication({ scheduledTimes: ['09:00'] }));

      expect(firstTask).toMatchObject({ stop: expect.any(Function) });
      if (firstTask && typeof firstTask === 'object' && 'stop' in firstTask) {
        expect(firstTask.stop).toHaveBeenCalledTimes(1);
      }
      expect(cronMocks.schedule).toHaveBeenCalledTimes(3);
    });

    it('does not schedule inactive medications', () => {
      expect(scheduler.scheduleMedication(medication({ isActive: false }))).toBe(0);
      expect(cronMocks.schedule).not.toHaveBeenCalled();
      expect(scheduler.scheduledIds()).toEqual([]);
    });

    it('does not schedule as-needed or custom plans', () => {
      expect(
        scheduler.scheduleMedication(medication({ frequency: 'Segun sea necesario', scheduledTimes: ['08:00'] }))
      ).toBe(0);
      expect(scheduler.scheduleMedication(medication({ frequency: 'Personalizado', scheduledTimes: ['08:00'] }))).toBe(
        0
      );
      expect(cronMocks.schedule).not.toHaveBeenCalled();
      expect(scheduler.scheduledIds()).toEqual([]);
    });

    it('drops earlier tasks when a medication becomes as-needed', () => {
      scheduler.scheduleMedication(medication());
      expect(scheduler.scheduleMedication(medication({ frequency: 'Segun sea necesario' }))).toBe(0);
      expect(scheduler.scheduledIds()).toEqual([]);
    });

    it('records a pending dose for the slot that fired', async () => {
      const doseLog = { recordPendingDose: vi.fn() };
      scheduler = new ReminderScheduler(sink, { timezone: 'UTC', doseLog });
      scheduler.scheduleMedication(medication());

      cronCallback(0)();
      await vi.advanceTimersByTimeAsync(0);

      expect(doseLog.recordPendingDose).toHaveBeenCalledWith('med-1', new Date('2026-03-10T08:00:00.000Z'));
      expect(sink.send).toHaveBeenCalledTimes(1);
    });

    it('still delivers when the dose cannot be recorded', async () => {
      const doseLog = {
        recordPendingDose: vi.fn(() => {
          throw new Error('database is locked');
        }),
      };
      scheduler = new ReminderScheduler(sink, { timezone: 'UTC', doseLog });
      scheduler.scheduleMedication(medication());

      cronCallback(1)();
      await vi.advanceTimersByTimeAsync(0);

      expect(doseLog.recordPendingDose).toHaveBeenCalledWith('med-1', new Date('2026-03-10T20:00:00.000Z'));
      expect(sink.send).toHaveBeenCalledTimes(1);
    });

    it('skips expressions node-cron rejects', () => {
      cronMocks.validate.mockReturnValue(false);
      expect(scheduler.scheduleMedication(medication())).toBe(0);
      expect(scheduler.scheduledIds()).toEqual([]);
    });

    it('does not send when the sink is unavailable', async () => {
      sink.isAvailable.mockReturnValue(false);
      scheduler.scheduleMedication(medication());
      cronCallback(0)();
      await vi.advanceTimersByTimeAsync(0);

      expect(sink.send).not.toHaveBeenCalled();
    });

    it('keeps running when the sink fails', async () => {
      sink.send.mockRejectedValueOnce(new Error('terminal closed'));
      scheduler.scheduleMedication(medication());

      cronCallback(0)();
      await vi.advanceTimersByTimeAsync(0);
      cronCallback(1)();
      await vi.advanceTimersByTimeAsync(0);

      expect(sink.send).toHaveBeenCalledTimes(2);
      expect(scheduler.scheduledIds()).toEqual(['med-1']);
    });
  });

  describe('appointments', () => {
    it('fires reminderOffsetMinutes before the appointment', async () => {
      expect(scheduler.scheduleAppointment(appointment())).toBe(true);

      // Reminder due at 2026-03-11T10:00Z, 25 hours from now
      await vi.advanceTimersByTimeAsync(25 * 60 * 60 * 1000 - 1);
      expect(sink.send).not.toHaveBeenCalled();

      setMockNow(new Date('2026-03-11T10:00:00Z'));
      await vi.advanceTimersByTimeAsync(1);

      expect(sink.send).toHaveBeenCalledWith(
        'Cita medica: Revision con Dra. Salinas en Clinica del Centro, Manana a las 10:00',
        { type: 'appointment', referenceId: 'apt-1', priority: 'high' }
      );
      expect(scheduler.scheduledIds()).toEqual([]);
    });

    it('skips reminders whose time has passed', () => {
      const soon = appointment({ appointmentDate: new Date('2026-03-10T12:00:00Z') });
      expect(scheduler.scheduleAppointment(soon)).toBe(false);
      expect(scheduler.scheduledIds()).toEqual([]);
    });

    it('skips appointments that are not scheduled', () => {
      expect(scheduler.scheduleAppointment(appointment({ status: 'cancelled' }))).toBe(false);
    });

    it('re-arms timers longer than the platform maximum', async () => {
      const date = new Date('2026-05-01T10:00:00Z');
      expect(scheduler.scheduleAppointment(appointment({ appointmentDate: date, reminderOffsetMinutes: 0 }))).toBe(true);

      setMockNow(new Date(date.getTime() - 1000));
      await vi.advanceTimersByTimeAsync(MAX_TIMER_MS);
      expect(sink.send).not.toHaveBeenCalled();
      expect(scheduler.scheduledIds()).toEqual(['apt-1']);

      await vi.advanceTimersByTimeAsync(1000);
      expect(sink.send).toHaveBeenCalledTimes(1);
    });

    it('cancels a pending reminder', async () => {
      scheduler.scheduleAppointment(appointment());
      expect(scheduler.cancel('apt-1')).toBe(true);
      expect(scheduler.cancel('apt-1')).toBe(false);

      await vi.advanceTimersByTimeAsync(25 * 60 * 60 * 1000);
      expect(sink.send).not.toHaveBeenCalled();
    });
  });

  describe('refills', () => {
    it('reminds an hour later when stock is at the threshold', async () => {
      expect(scheduler.scheduleRefillReminder(medication({ currentStock: 7 }))).toBe(true);
      expect(scheduler.scheduledIds()).toEqual([refillReminderId('med-1')]);

      await vi.advanceTimersByTimeAsync(REFILL_REMINDER_DELAY_MS - 1);
      expect(sink.send).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(1);
      expect(sink.send).toHaveBeenCalledWith(
        'Recarga necesaria: tu medicamento Metformina esta por agotarse. Quedan 7 mg',
        { type: 'refill', referenceId: 'med-1', priority: 'normal' }
      );
      expect(scheduler.scheduledIds()).toEqual([]);
    });

    it('does nothing while stock is above the threshold', () => {
      expect(scheduler.scheduleRefillReminder(medication({ currentStock: 8 }))).toBe(false);
      expect(scheduler.scheduledIds()).toEqual([]);
    });

    it('cancels a pending refill reminder once restocked', async () => {
      scheduler.scheduleRefillReminder(medication({ currentStock: 2 }));
      expect(scheduler.scheduleRefillReminder(medication({ currentStock: 30 }))).toBe(false);

      await vi.advanceTimersByTimeAsync(REFILL_REMINDER_DELAY_MS);
      expect(sink.send).not.toHaveBeenCalled();
    });

    it('keeps refill and medication reminders apart', () => {
      scheduler.scheduleMedication(medication({ currentStock: 3 }));
      scheduler.scheduleRefillReminder(medication({ currentStock: 3 }));
      expect(scheduler.scheduledIds()).toEqual(['med-1', 'refill:med-1']);
    });
  });

  describe('restore', () => {
    it('schedules active medications and upcoming appointments of a profile', () => {
      const store = new CareStore(openCareDatabase(':memory:'));
      try {
        const profileId = store.createProfile({ firstName: 'Ana', lastName: 'Lopez', dateOfBirth: '1946-03-14' }).id;
        const base = { profileId, dosage: '1', dosageUnit: 'tableta', frequency: 'Una vez al dia' } as const;
        store.addMedication({ ...base, name: 'Con horario', scheduledTimes: ['08:00'] });
        store.addMedication({ ...base, name: 'Sin horario' });
        store.addMedication({ ...base, name: 'Suspendida', scheduledTimes: ['08:00'], isActive: false });
        store.addAppointment({
          profileId,
          title: 'Revision',
          doctorName: 'Dra. Salinas',
          location: 'Clinica del Centro',
          appointmentDate: '2026-03-12T10:00:00Z',
        });
        store.addAppointment({
          profileId,
          title: 'Pasada',
          doctorName: 'Dr. Ruiz',
          location: 'Hospital',
          appointmentDate: '2026-03-01T10:00:00Z',
        });

        expect(scheduler.restore(store, profileId)).toEqual({ medications: 1, appointments: 1, refills: 0 });
        expect(scheduler.scheduledIds()).toHaveLength(2);
      } finally {
        store.close();
      }
    });

    it('schedules refill reminders for low stock', () => {
      const store = new CareStore(openCareDatabase(':memory:'));
      try {
        const profileId = store.createProfile({ firstName: 'Ana', lastName: 'Lopez', dateOfBirth: '1946-03-14' }).id;
        const low = store.addMedication({
          profileId,
          name: 'Losartan',
          dosage: '50',
          dosageUnit: 'mg',
          frequency: 'Segun sea necesario',
          currentStock: 4,
        });

        expect(scheduler.restore(store, profileId)).toEqual({ medications: 0, appointments: 0, refills: 1 });
        expect(scheduler.scheduledIds()).toEqual([refillReminderId(low.id)]);
      } finally {
        store.close();
      }
    });
  });
});
