/**
 * Response Templates
 *
 * Fixed Spanish answers the on-device assistant gives without any model.
 * Every template starts with the greeting line "<greeting>, <name>.".
 */

import type { VitalSummary } from '../router/types.js';

type TemplateFunction<T = void> = (data: T) => string;

export interface GreetingData {
  greeting: string;
  name: string;
}

interface NextMedicationData extends GreetingData {
  medication: string;
  dosage: string;
  timeUntil: string;
}

interface NextAppointmentData extends GreetingData {
  doctorName: string;
  relativeDate: string;
  location: string;
}

interface VitalsData extends GreetingData {
  readings: readonly VitalSummary[];
}

const STATUS_LABELS: Record<VitalSummary['status'], string> = {
  low: 'bajo',
  normal: 'normal',
  high: 'alto',
};

const greet = (d: GreetingData): string => `${d.greeting}, ${d.name}.`;

export const MEDICATION_TEMPLATES: {
  next: TemplateFunction<NextMedicationData>;
  none: TemplateFunction<GreetingData>;
} = {
  next: (d) => `${greet(d)} Tu proxima medicina es ${d.medication} ${d.dosage}, ${d.timeUntil}.`,
  none: (d) => `${greet(d)} No tienes medicamentos programados proximamente.`,
};

export const APPOINTMENT_TEMPLATES: {
  next: TemplateFunction<NextAppointmentData>;
  none: TemplateFunction<GreetingData>;
} = {
  next: (d) => `${greet(d)} Tu proxima cita es con ${d.doctorName}, ${d.relativeDate} en ${d.location}.`,
  none: (d) => `${greet(d)} No tienes citas programadas.`,
};

export function formatVitalReading(vital: VitalSummary): string {
  return `${vital.label} ${vital.value} (${STATUS_LABELS[vital.status]})`;
}

export const VITALS_TEMPLATES: {
  latest: TemplateFunction<VitalsData>;
  none: TemplateFunction<GreetingData>;
} = {
  latest: (d) => `${greet(d)} Tus ultimas mediciones: ${d.readings.map(formatVitalReading).join(', ')}.`,
  none: (d) => `${greet(d)} Aun no hay signos vitales registrados. Pide a tu cuidador que anote tus mediciones.`,
};

export const DEFAULT_TEMPLATE: TemplateFunction<GreetingData> = (d) =>
  `${greet(d)} Entiendo tu pregunta. Para obtener una respuesta mas completa, te recomiendo consultar con tu medico o cuidador.`;

/**
 * Prefix for answers from the local model.
 */
export const LOCAL_MODEL_TEMPLATE: TemplateFunction<GreetingData & { answer: string }> = (d) =>
  `${greet(d)} ${d.answer}`;
