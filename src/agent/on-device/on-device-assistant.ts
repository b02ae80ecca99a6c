/**
 * On-Device Assistant
 *
 * Answers without leaving the machine: fixed templates for medication,
 * appointment and vital-sign questions, and an optional local model for the
 * rest. Also builds the patient context for the hybrid pipeline and adds the
 * greeting to cloud answers.
 *
 * No method rejects. A local-model failure degrades to the default template.
 */

import { config } from '../../utils/config.js';
import { createLogger } from '../../utils/logger.js';
import { DateTime, formatRelativeDay, formatTimeUntil, timeBasedGreeting } from '../../utils/datetime.js';
import { generateWithOllama } from '../../llm/ollama.js';
import type { MedicationSummary, OnDeviceCapability, ProfileSnapshot } from '../router/types.js';
import {
  APPOINTMENT_TEMPLATES,
  DEFAULT_TEMPLATE,
  LOCAL_MODEL_TEMPLATE,
  MEDICATION_TEMPLATES,
  VITALS_TEMPLATES,
  type GreetingData,
} from './response-templates.js';

const logger = createLogger('on-device');

export const DEFAULT_NAME = 'amigo';

export interface LocalModel {
  generate(prompt: string): Promise<string>;
}

export interface OnDeviceAssistantConfig {
  /** Zone used for greetings and relative dates */
  timezone: string;
  /** Ask the local model when no template matches */
  localModelEnabled: boolean;
}

const DEFAULT_CONFIG: OnDeviceAssistantConfig = {
  timezone: config.timezone,
  localModelEnabled: config.ollama.enabled,
};

const ollamaModel: LocalModel = {
  generate: (prompt) => generateWithOllama(prompt),
};

/**
 * "Paciente: Ana Lopez, 78 anos. Condiciones: …. Alergias: …. Medicamentos: …. "
 * Sections without entries are left out; no profile gives "".
 */
export function buildProfileContext(profile?: ProfileSnapshot | null): string {
  if (!profile) {
    return '';
  }

  let context = `Paciente: ${profile.firstName} ${profile.lastName}, ${profile.age} anos. `;

  if (profile.medicalConditions.length > 0) {
    context += `Condiciones: ${profile.medicalConditions.join(', ')}. `;
  }

  if (profile.allergies.length > 0) {
    context += `Alergias: ${profile.allergies.join(', ')}. `;
  }

  const meds = profile.activeMedications.map((m) => `${m.name} ${m.dosage}`);
  if (meds.length > 0) {
    context += `Medicamentos: ${meds.join(', ')}. `;
  }

  return context;
}

/**
 * Medication with the earliest upcoming dose.
 */
export function nextMedication(
  medications: readonly MedicationSummary[]
): (MedicationSummary & { nextDoseAt: Date }) | null {
  let best: (MedicationSummary & { nextDoseAt: Date }) | null = null;

  for (const med of medications) {
    const at = med.nextDoseAt;
    if (at && (!best || at.getTime() < best.nextDoseAt.getTime())) {
      best = { ...med, nextDoseAt: at };
    }
  }

  return best;
}

function buildLocalPrompt(query: string, profile?: ProfileSnapshot | null): string {
  const context = buildProfileContext(profile) || 'No hay contexto disponible';
  return [
    'Eres un asistente de salud amable para personas mayores.',
    'Responde en espanol, en dos o tres frases claras y sencillas.',
    'No des diagnosticos; sugiere consultar al medico cuando haga falta.',
    '',
    `Contexto: ${context}`,
    '',
    `Pregunta: ${query}`,
  ].join('\n');
}

export class OnDeviceAssistant implements OnDeviceCapability {
  private config: OnDeviceAssistantConfig;
  private localModel: LocalModel;

  constructor(config?: Partial<OnDeviceAssistantConfig>, localModel: LocalModel = ollamaModel) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.localModel = localModel;
  }

  async process(query: string, profile?: ProfileSnapshot | null): Promise<string> {
    const data: GreetingData = {
      greeting: timeBasedGreeting(this.config.timezone),
      name: profile?.firstName ?? DEFAULT_NAME,
    };
    const lower = query.toLowerCase();

    if ((lower.includes('proxima') || lower.includes('próxima')) && lower.includes('medic')) {
      const med = nextMedication(profile?.activeMedications ?? []);
      if (med) {
        return MEDICATION_TEMPLATES.next({
          ...data,
          medication: med.name,
          dosage: med.dosage,
          timeUntil: formatTimeUntil(DateTime.fromJSDate(med.nextDoseAt)),
        });
      }
      return MEDICATION_TEMPLATES.none(data);
    }

    if (lower.includes('cita')) {
      const appointment = profile?.upcomingAppointments[0];
      if (appointment) {
        return APPOINTMENT_TEMPLATES.next({
          ...data,
          doctorName: appointment.doctorName,
          relativeDate: formatRelativeDay(DateTime.fromJSDate(appointment.date), this.config.timezone),
          location: appointment.location,
        });
      }
      return APPOINTMENT_TEMPLATES.none(data);
    }

    if (lower.includes('signos') || lower.includes('vitales')) {
      const readings = profile?.latestVitals ?? [];
      return readings.length > 0 ? VITALS_TEMPLATES.latest({ ...data, readings }) : VITALS_TEMPLATES.none(data);
    }

    if (this.config.localModelEnabled) {
      const answer = await this.askLocalModel(query, profile);
      if (answer) {
        return LOCAL_MODEL_TEMPLATE({ ...data, answer });
      }
    }

    return DEFAULT_TEMPLATE(data);
  }

  async buildContext(profile?: ProfileSnapshot | null): Promise<string> {
    return buildProfileContext(profile);
  }

  async personalize(text: string, profile?: ProfileSnapshot | null): Promise<string> {
    if (!profile) {
      return text;
    }
    return `${timeBasedGreeting(this.config.timezone)}, ${profile.firstName}. ${text}`;
  }

  /**
   * Returns null on any failure or an empty answer.
   */
  private async askLocalModel(query: string, profile?: ProfileSnapshot | null): Promise<string | null> {
    const startTime = Date.now();
    try {
      const answer = (await this.localModel.generate(buildLocalPrompt(query, profile))).trim();
      logger.debug('local_model_answer', {
        latency_ms: Date.now() - startTime,
        length: answer.length,
      });
      return answer || null;
    } catch (error) {
      logger.warn('local_model_failed', {
        error: error instanceof Error ? error.message : 'Unknown error',
        latency_ms: Date.now() - startTime,
      });
      return null;
    }
  }
}
