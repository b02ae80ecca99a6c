/**
 * Care Data Commands
 *
 * Terminal commands that read and write the care repository: medications and
 * their doses, vital readings, appointments and emergency contacts. Every
 * change that affects a reminder is pushed to the scheduler.
 */

import { DateTime, nowInZone } from '../utils/datetime.js';
import { createLogger } from '../utils/logger.js';
import type { ReminderScheduler } from '../agent/proactive/reminder-scheduler.js';
import type { VitalSummary } from '../agent/router/types.js';
import type { CareStore } from '../care/store.js';
import {
  CareValidationError,
  ContactRelationshipSchema,
  DosageUnitSchema,
  type MedicationFrequency,
  type VitalType,
} from '../care/schemas.js';
import type { Medication, MedicationDose } from '../care/types.js';
import {
  appointmentRelativeDate,
  formatDosage,
  isDoseOverdue,
  nearestScheduledSlot,
  needsRefill,
  wasTakenOnTime,
} from '../care/medication-schedule.js';
import { DIASTOLIC_RANGE, VITAL_TYPES, summarizeVital } from '../care/vitals.js';
import type { CommandHandler } from './types.js';

const logger = createLogger('care-commands');

export type CareReminders = Pick<
  ReminderScheduler,
  'scheduleMedication' | 'scheduleAppointment' | 'scheduleRefillReminder'
>;

export interface CareCommandsDeps {
  store: CareStore;
  profileId: string;
  timezone: string;
  reminders?: CareReminders;
}

export const USAGE = {
  medicamento: 'Uso: /medicamento <nombre> <dosis> <unidad> [HH:mm,HH:mm]',
  tomar: 'Uso: /tomar <medicamento>',
  omitir: 'Uso: /omitir <medicamento> [| motivo]',
  signo: 'Uso: /signo <presion|pulso|oxigeno|temperatura|glucosa|peso|respiracion> <valor>',
  cita: 'Uso: /cita <AAAA-MM-DD> <HH:mm> | <titulo> | <doctor> | <lugar>',
  contacto: 'Uso: /contacto <nombre> | <relacion> | <telefono> [| principal]',
} as const;

const VITAL_ALIASES: Record<string, VitalType> = {
  presion: 'blood_pressure',
  pulso: 'heart_rate',
  ritmo: 'heart_rate',
  oxigeno: 'blood_oxygen',
  temperatura: 'temperature',
  glucosa: 'blood_glucose',
  peso: 'weight',
  respiracion: 'respiratory_rate',
};

const STATUS_LABELS: Record<VitalSummary['status'], string> = {
  low: 'bajo',
  normal: 'normal',
  high: 'alto',
};

const FREQUENCY_BY_TIMES: Record<number, MedicationFrequency> = {
  0: 'Segun sea necesario',
  1: 'Una vez al dia',
  2: 'Dos veces al dia',
  3: 'Tres veces al dia',
  4: 'Cuatro veces al dia',
};

const TIME_LIST = /^([01]\d|2[0-3]):[0-5]\d(,([01]\d|2[0-3]):[0-5]\d)*$/;

/**
 * Lower case without accents, for matching what the user typed.
 */
export function normalizeName(text: string): string {
  return text
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .trim();
}

/**
 * "36,8" and "36.8" both read as 36.8.
 */
export function parseReading(raw: string): number | null {
  if (!/^-?\d+([.,]\d+)?$/.test(raw)) {
    return null;
  }
  return Number(raw.replace(',', '.'));
}

function splitFields(args: string): string[] {
  return args.split('|').map((part) => part.trim());
}

export function describeDose(dose: MedicationDose): string {
  switch (dose.status) {
    case 'taken':
      return wasTakenOnTime(dose) ? 'tomada a tiempo' : 'tomada tarde';
    case 'skipped':
      return dose.skippedReason ? `omitida (${dose.skippedReason})` : 'omitida';
    case 'missed':
      return 'perdida';
    case 'pending':
      return isDoseOverdue(dose) ? 'atrasada' : 'pendiente';
  }
}

export class CareDataCommands implements CommandHandler {
  private deps: CareCommandsDeps;

  constructor(deps: CareCommandsDeps) {
    this.deps = deps;
  }

  async handle(command: string, args: string): Promise<string | null> {
    try {
      return this.dispatch(command, args.trim());
    } catch (error) {
      if (error instanceof CareValidationError) {
        logger.warn('care_input_rejected', { command, fields: Object.keys(error.fieldErrors) });
        return `No se pudo guardar, revisa: ${Object.keys(error.fieldErrors).join(', ') || 'los datos'}.`;
      }
      throw error;
    }
  }

  private dispatch(command: string, args: string): string | null {
    switch (command) {
      case 'medicamentos':
        return this.listMedications();
      case 'medicamento':
        return this.addMedication(args);
      case 'tomar':
        return this.takeDose(args);
      case 'omitir':
        return this.skipDose(args);
      case 'signos':
        return this.listVitals();
      case 'signo':
        return this.recordVital(args);
      case 'citas':
        return this.listAppointments();
      case 'cita':
        return this.addAppointment(args);
      case 'contactos':
        return this.listContacts();
      case 'contacto':
        return this.addContact(args);
      case 'emergencia':
        return this.showEmergency();
      default:
        return null;
    }
  }

  // ----- Medications -----

  private listMedications(): string {
    const { store, profileId, timezone } = this.deps;
    const medications = store.listMedications(profileId, { activeOnly: true });
    if (medications.length === 0) {
      return 'No hay medicamentos activos.';
    }

    const lines = medications.map((m) => {
      const times = m.scheduledTimes.length > 0 ? m.scheduledTimes.join(', ') : 'sin horario';
      const refill = needsRefill(m) ? ', recargar pronto' : '';
      return `- ${m.name} ${formatDosage(m)} | ${times} | quedan ${m.currentStock}${refill}`;
    });

    const today = nowInZone(timezone).startOf('day');
    const doses = store.listDosesBetween(profileId, today.toJSDate(), today.plus({ days: 1 }).toJSDate());
    if (doses.length > 0) {
      const names = new Map(store.listMedications(profileId).map((m) => [m.id, m.name]));
      lines.push('Hoy:');
      for (const dose of doses) {
        const time = DateTime.fromJSDate(dose.scheduledTime).setZone(timezone).toFormat('HH:mm');
        lines.push(`  ${time} ${names.get(dose.medicationId) ?? '?'}: ${describeDose(dose)}`);
      }
    }

    return lines.join('\n');
  }

  /**
   * Tokens are read from the end: optional time list, unit, dose; the rest
   * is the name.
   */
  private addMedication(args: string): string {
    const tokens = args.split(/\s+/).filter(Boolean);
    const last = tokens[tokens.length - 1];
    const times = last !== undefined && TIME_LIST.test(last) ? (tokens.pop() ?? '').split(',') : [];
    const unit = DosageUnitSchema.safeParse(normalizeName(tokens.pop() ?? ''));
    const dosage = tokens.pop();
    const name = tokens.join(' ');

    if (!unit.success || !dosage || !name) {
      return `${USAGE.medicamento}\nUnidades: ${DosageUnitSchema.options.join(', ')}`;
    }

    const medication = this.deps.store.addMedication({
      profileId: this.deps.profileId,
      name,
      dosage,
      dosageUnit: unit.data,
      frequency: FREQUENCY_BY_TIMES[times.length] ?? 'Personalizado',
      scheduledTimes: times,
    });
    this.deps.reminders?.scheduleMedication(medication);

    const when = times.length > 0 ? `a las ${times.join(', ')}` : 'sin horario fijo';
    return `Medicamento agregado: ${medication.name} ${formatDosage(medication)} ${when}.`;
  }

  private findMedication(query: string): Medication | null {
    const wanted = normalizeName(query);
    const active = this.deps.store.listMedications(this.deps.profileId, { activeOnly: true });
    return (
      active.find((m) => normalizeName(m.name) === wanted) ??
      active.find((m) => normalizeName(m.name).startsWith(wanted)) ??
      null
    );
  }

  /**
   * The dose is booked against the scheduled slot closest to now, or the
   * current minute for medications without a schedule.
   */
  private doseSlot(medication: Medication): DateTime {
    const { timezone } = this.deps;
    return nearestScheduledSlot(medication, timezone) ?? nowInZone(timezone).startOf('minute');
  }

  private takeDose(args: string): string {
    if (!args) {
      return USAGE.tomar;
    }
    const medication = this.findMedication(args);
    if (!medication) {
      return `No encontre el medicamento "${args}".`;
    }

    const slot = this.doseSlot(medication);
    const result = this.deps.store.takeDose({ medicationId: medication.id, scheduledTime: slot.toJSDate() });
    const time = slot.toFormat('HH:mm');

    if (!result.changed) {
      return `Ya registraste la dosis de ${medication.name} de las ${time}.`;
    }

    this.deps.reminders?.scheduleRefillReminder(result.medication);
    const reply = `Dosis registrada: ${medication.name} ${formatDosage(medication)} (${time}). Quedan ${result.medication.currentStock}.`;
    return needsRefill(result.medication) ? `${reply} Quedan pocas dosis, recuerda recargar.` : reply;
  }

  private skipDose(args: string): string {
    const [name = '', reason] = splitFields(args);
    if (!name) {
      return USAGE.omitir;
    }
    const medication = this.findMedication(name);
    if (!medication) {
      return `No encontre el medicamento "${name}".`;
    }

    const slot = this.doseSlot(medication);
    const result = this.deps.store.skipDose({
      medicationId: medication.id,
      scheduledTime: slot.toJSDate(),
      reason: reason || undefined,
    });
    const time = slot.toFormat('HH:mm');

    return result.changed
      ? `Dosis omitida: ${medication.name} (${time}).`
      : `La dosis de ${medication.name} de las ${time} ya estaba tomada.`;
  }

  // ----- Vital signs -----

  private listVitals(): string {
    const latest = this.deps.store.latestVitals(this.deps.profileId);
    if (latest.length === 0) {
      return 'No hay lecturas registradas. Usa /signo <tipo> <valor>.';
    }
    return latest
      .map(summarizeVital)
      .map((v) => `- ${v.label}: ${v.value} (${STATUS_LABELS[v.status]})`)
      .join('\n');
  }

  private recordVital(args: string): string {
    const [alias = '', raw = ''] = args.split(/\s+/);
    const type = VITAL_ALIASES[normalizeName(alias)];
    if (!type) {
      return USAGE.signo;
    }

    const [first = '', second] = raw.split('/');
    const value = parseReading(first);
    const secondaryValue = second === undefined ? undefined : parseReading(second);
    if (value === null || secondaryValue === null || (type === 'blood_pressure' && secondaryValue === undefined)) {
      return type === 'blood_pressure' ? 'Escribe la presion como 120/80.' : USAGE.signo;
    }

    const info = VITAL_TYPES[type];
    try {
      const vital = this.deps.store.recordVital({ profileId: this.deps.profileId, type, value, secondaryValue });
      const summary = summarizeVital(vital);
      return `Registrado: ${summary.label} ${summary.value} (${STATUS_LABELS[summary.status]}).`;
    } catch (error) {
      if (!(error instanceof CareValidationError)) {
        throw error;
      }
      if (error.fieldErrors.value) {
        const [min, max] = info.inputRange;
        return `Valor fuera de rango para ${info.label} (${min} a ${max} ${info.defaultUnit}).`;
      }
      const [low, high] = DIASTOLIC_RANGE;
      return `Valor fuera de rango para la diastolica (${low} a ${high} mmHg).`;
    }
  }

  // ----- Appointments -----

  private listAppointments(): string {
    const upcoming = this.deps.store.listUpcomingAppointments(this.deps.profileId);
    if (upcoming.length === 0) {
      return 'No tienes citas programadas.';
    }
    return upcoming
      .map(
        (a) =>
          `- ${a.title} con ${a.doctorName} en ${a.location}, ${appointmentRelativeDate(a, this.deps.timezone)}`
      )
      .join('\n');
  }

  private addAppointment(args: string): string {
    const [when = '', title, doctorName, location] = splitFields(args);
    if (!title || !doctorName || !location) {
      return USAGE.cita;
    }

    const date = DateTime.fromFormat(when, 'yyyy-MM-dd HH:mm', { zone: this.deps.timezone });
    if (!date.isValid) {
      return USAGE.cita;
    }
    if (date.toMillis() <= nowInZone(this.deps.timezone).toMillis()) {
      return 'Esa fecha ya paso.';
    }

    const appointment = this.deps.store.addAppointment({
      profileId: this.deps.profileId,
      title,
      doctorName,
      location,
      appointmentDate: date.toJSDate(),
    });
    this.deps.reminders?.scheduleAppointment(appointment);

    return `Cita agregada: ${appointment.title} con ${appointment.doctorName}, ${appointmentRelativeDate(appointment, this.deps.timezone)}.`;
  }

  // ----- Emergency contacts -----

  private listContacts(): string {
    const contacts = this.deps.store.listEmergencyContacts(this.deps.profileId);
    if (contacts.length === 0) {
      return 'No hay contactos de emergencia.';
    }
    return contacts
      .map((c) => `- ${c.name} (${c.relationship}): ${c.phoneNumber}${c.isPrimary ? ' [principal]' : ''}`)
      .join('\n');
  }

  private addContact(args: string): string {
    const [name, relationshipRaw = '', phoneNumber, flag] = splitFields(args);
    if (!name || !phoneNumber) {
      return USAGE.contacto;
    }

    const relationship = ContactRelationshipSchema.options.find(
      (option) => normalizeName(option) === normalizeName(relationshipRaw)
    );
    if (!relationship) {
      return `Relacion no valida. Opciones: ${ContactRelationshipSchema.options.join(', ')}.`;
    }

    const contact = this.deps.store.addEmergencyContact({
      profileId: this.deps.profileId,
      name,
      relationship,
      phoneNumber,
      isPrimary: normalizeName(flag ?? '') === 'principal',
    });
    return `Contacto agregado: ${contact.name} (${contact.relationship})${contact.isPrimary ? ', principal' : ''}.`;
  }

  private showEmergency(): string {
    const { store, profileId } = this.deps;
    const primary = store.getPrimaryContact(profileId);
    if (!primary) {
      return 'No hay contacto principal. Agrega uno con /contacto <nombre> | <relacion> | <telefono> | principal.';
    }

    const lines = [`Contacto principal: ${primary.name} (${primary.relationship}), ${primary.phoneNumber}`];
    if (primary.alternatePhone) {
      lines.push(`Telefono alterno: ${primary.alternatePhone}`);
    }
    const notes = store.getProfile(profileId)?.emergencyNotes;
    if (notes) {
      lines.push(`Notas: ${notes}`);
    }
    return lines.join('\n');
  }
}
