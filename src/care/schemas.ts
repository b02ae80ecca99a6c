/**
 * Zod Schemas for Care Data
 *
 * Every repository write goes through one of these before it reaches SQL.
 */

import { z } from 'zod';
import { AI_MODES } from '../agent/router/types.js';
import { DIASTOLIC_RANGE, VITAL_TYPES } from './vitals.js';

// ============= Enums =============

export const BloodTypeSchema = z.enum(['A+', 'A-', 'B+', 'B-', 'AB+', 'AB-', 'O+', 'O-']);
export type BloodType = z.infer<typeof BloodTypeSchema>;

export const AIModeSchema = z.enum(AI_MODES);

export const DosageUnitSchema = z.enum(['mg', 'ml', 'tableta', 'capsula', 'gotas', 'parche', 'inyeccion', 'unidades']);
export type DosageUnit = z.infer<typeof DosageUnitSchema>;

export const MedicationFrequencySchema = z.enum([
  'Una vez al dia',
  'Dos veces al dia',
  'Tres veces al dia',
  'Cuatro veces al dia',
  'Cada dos dias',
  'Semanal',
  'Segun sea necesario',
  'Personalizado',
]);
export type MedicationFrequency = z.infer<typeof MedicationFrequencySchema>;

export const AppointmentStatusSchema = z.enum(['scheduled', 'completed', 'cancelled', 'rescheduled', 'no_show']);
export type AppointmentStatus = z.infer<typeof AppointmentStatusSchema>;

export const VitalTypeSchema = z.enum([
  'blood_pressure',
  'heart_rate',
  'blood_oxygen',
  'temperature',
  'blood_glucose',
  'weight',
  'respiratory_rate',
]);
export type VitalType = z.infer<typeof VitalTypeSchema>;

export const MeasurementSourceSchema = z.enum(['manual', 'device', 'imported']);
export type MeasurementSource = z.infer<typeof MeasurementSourceSchema>;

export const MessageRoleSchema = z.enum(['user', 'assistant', 'system']);

export const DoseStatusSchema = z.enum(['pending', 'taken', 'skipped', 'missed']);
export type DoseStatus = z.infer<typeof DoseStatusSchema>;

export const ContactRelationshipSchema = z.enum([
  'Esposo/a',
  'Hijo',
  'Hija',
  'Hermano/a',
  'Padre/Madre',
  'Nieto/a',
  'Amigo/a',
  'Vecino/a',
  'Cuidador',
  'Medico',
  'Enfermero/a',
  'Otro',
]);
export type ContactRelationship = z.infer<typeof ContactRelationshipSchema>;

// ============= Shared =============

const trimmed = (max: number) => z.string().trim().min(1).max(max);

/** "08:00", "21:30" */
export const TimeOfDaySchema = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Expected HH:mm');

const IsoDateSchema = z.string().refine((s) => !Number.isNaN(Date.parse(s)), 'Expected an ISO date');

const DateInputSchema = z.union([z.date(), IsoDateSchema.transform((s) => new Date(s))]);

/** Digits with optional +, spaces, dashes and parentheses */
const PhoneSchema = z
  .string()
  .trim()
  .regex(/^\+?[0-9\s()-]{7,20}$/, 'Expected a phone number');

// ============= Inputs =============

export const ProfileInputSchema = z.object({
  firstName: trimmed(100),
  lastName: trimmed(100),
  dateOfBirth: IsoDateSchema,
  bloodType: BloodTypeSchema.optional(),
  allergies: z.array(trimmed(100)).default([]),
  medicalConditions: z.array(trimmed(200)).default([]),
  emergencyNotes: z.string().trim().max(1000).optional(),
  preferredLanguage: z.string().min(2).max(10).default('es'),
  preferredAIMode: AIModeSchema.optional(),
});
export type ProfileInput = z.input<typeof ProfileInputSchema>;

export const MedicationInputSchema = z.object({
  profileId: z.string().uuid(),
  name: trimmed(200),
  dosage: trimmed(50),
  dosageUnit: DosageUnitSchema,
  frequency: MedicationFrequencySchema,
  scheduledTimes: z.array(TimeOfDaySchema).default([]),
  daysOfWeek: z
    .array(z.number().int().min(1).max(7))
    .nonempty()
    .default([1, 2, 3, 4, 5, 6, 7]),
  instructions: z.string().trim().max(1000).optional(),
  isActive: z.boolean().default(true),
  currentStock: z.number().int().min(0).default(30),
  lowStockThreshold: z.number().int().min(0).default(7),
});
export type MedicationInput = z.input<typeof MedicationInputSchema>;

export const AppointmentInputSchema = z.object({
  profileId: z.string().uuid(),
  title: trimmed(200),
  doctorName: trimmed(200),
  specialty: z.string().trim().max(100).optional(),
  location: trimmed(300),
  appointmentDate: DateInputSchema,
  durationMinutes: z.number().int().positive().default(60),
  reminderOffsetMinutes: z.number().int().min(0).default(1440),
  notes: z.string().trim().max(1000).optional(),
  status: AppointmentStatusSchema.default('scheduled'),
});
export type AppointmentInput = z.input<typeof AppointmentInputSchema>;

export const VitalSignInputSchema = z
  .object({
    profileId: z.string().uuid(),
    type: VitalTypeSchema,
    value: z.number().finite(),
    secondaryValue: z.number().finite().optional(),
    unit: z.string().trim().min(1).max(20).optional(),
    measuredAt: DateInputSchema.optional(),
    source: MeasurementSourceSchema.default('manual'),
    notes: z.string().trim().max(1000).optional(),
  })
  .superRefine((v, ctx) => {
    const [min, max] = VITAL_TYPES[v.type].inputRange;
    if (v.value < min || v.value > max) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['value'], message: `Expected ${min} to ${max}` });
    }

    if (v.type !== 'blood_pressure') {
      return;
    }
    if (v.secondaryValue === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['secondaryValue'],
        message: 'Blood pressure needs the diastolic value',
      });
      return;
    }
    const [low, high] = DIASTOLIC_RANGE;
    if (v.secondaryValue < low || v.secondaryValue > high) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['secondaryValue'], message: `Expected ${low} to ${high}` });
    }
  });
export type VitalSignInput = z.input<typeof VitalSignInputSchema>;

/**
 * Taking or skipping the dose of one scheduled slot.
 */
export const DoseActionInputSchema = z.object({
  medicationId: z.string().uuid(),
  scheduledTime: DateInputSchema,
  notes: z.string().trim().max(500).optional(),
  reason: z.string().trim().max(500).optional(),
});
export type DoseActionInput = z.input<typeof DoseActionInputSchema>;

/**
 * Notification flags left out default to isPrimary; notifyOnEmergency
 * defaults to true.
 */
export const EmergencyContactInputSchema = z.object({
  profileId: z.string().uuid(),
  name: trimmed(200),
  relationship: ContactRelationshipSchema,
  phoneNumber: PhoneSchema,
  alternatePhone: PhoneSchema.optional(),
  email: z.string().trim().email().optional(),
  address: z.string().trim().max(300).optional(),
  isPrimary: z.boolean().default(false),
  order: z.number().int().min(0).default(0),
  notifyOnEmergency: z.boolean().default(true),
  notifyOnMissedMedication: z.boolean().optional(),
  notifyOnAbnormalVitals: z.boolean().optional(),
  notifyOnMissedAppointment: z.boolean().optional(),
});
export type EmergencyContactInput = z.input<typeof EmergencyContactInputSchema>;

export const ChatMessageInputSchema = z.object({
  profileId: z.string().uuid().nullable().default(null),
  role: MessageRoleSchema,
  content: z.string(),
  isVoiceInput: z.boolean().default(false),
  provider: z.enum(AI_MODES).nullable().default(null),
  processingTimeMs: z.number().min(0).nullable().default(null),
  isError: z.boolean().default(false),
  errorMessage: z.string().nullable().default(null),
});
export type ChatMessageInput = z.input<typeof ChatMessageInputSchema>;

// ============= Validation =============

export class CareValidationError extends Error {
  readonly entity: string;
  readonly fieldErrors: Record<string, string[] | undefined>;

  constructor(entity: string, fieldErrors: Record<string, string[] | undefined>) {
    const fields = Object.keys(fieldErrors).join(', ');
    super(`Invalid ${entity}: ${fields || 'input'}`);
    this.name = 'CareValidationError';
    this.entity = entity;
    this.fieldErrors = fieldErrors;
  }
}

/**
 * Parses or throws CareValidationError with the flattened field errors.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown, entity: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new CareValidationError(entity, result.error.flatten().fieldErrors);
  }
  return result.data;
}
