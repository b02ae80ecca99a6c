import type { AIMode, Provider } from '../agent/router/types.js';
import type {
  AppointmentStatus,
  BloodType,
  ContactRelationship,
  DosageUnit,
  DoseStatus,
  MeasurementSource,
  MedicationFrequency,
  VitalType,
} from './schemas.js';

export interface Profile {
  id: string;
  firstName: string;
  lastName: string;
  /** ISO date, "1946-03-14" */
  dateOfBirth: string;
  bloodType: BloodType | null;
  allergies: string[];
  medicalConditions: string[];
  emergencyNotes: string | null;
  preferredLanguage: string;
  preferredAIMode: AIMode | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface Medication {
  id: string;
  profileId: string;
  name: string;
  dosage: string;
  dosageUnit: DosageUnit;
  frequency: MedicationFrequency;
  /** "HH:mm" in the care timezone */
  scheduledTimes: string[];
  /** ISO weekdays, 1 = Monday */
  daysOfWeek: number[];
  instructions: string | null;
  isActive: boolean;
  currentStock: number;
  lowStockThreshold: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface Appointment {
  id: string;
  profileId: string;
  title: string;
  doctorName: string;
  specialty: string | null;
  location: string;
  appointmentDate: Date;
  durationMinutes: number;
  reminderOffsetMinutes: number;
  notes: string | null;
  status: AppointmentStatus;
  createdAt: Date;
  updatedAt: Date;
}

export interface VitalSign {
  id: string;
  profileId: string;
  type: VitalType;
  value: number;
  secondaryValue: number | null;
  unit: string;
  measuredAt: Date;
  source: MeasurementSource;
  notes: string | null;
  createdAt: Date;
}

/**
 * One scheduled slot of a medication and what happened to it.
 */
export interface MedicationDose {
  id: string;
  medicationId: string;
  scheduledTime: Date;
  takenTime: Date | null;
  status: DoseStatus;
  notes: string | null;
  skippedReason: string | null;
  createdAt: Date;
}

export interface EmergencyContact {
  id: string;
  profileId: string;
  name: string;
  relationship: ContactRelationship;
  phoneNumber: string;
  alternatePhone: string | null;
  email: string | null;
  address: string | null;
  isPrimary: boolean;
  order: number;
  notifyOnEmergency: boolean;
  notifyOnMissedMedication: boolean;
  notifyOnAbnormalVitals: boolean;
  notifyOnMissedAppointment: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface ChatMessage {
  id: string;
  profileId: string | null;
  role: 'user' | 'assistant' | 'system';
  content: string;
  isVoiceInput: boolean;
  provider: Provider | null;
  processingTimeMs: number | null;
  isError: boolean;
  errorMessage: string | null;
  createdAt: Date;
}
