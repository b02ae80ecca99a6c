import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../utils/config.js';
import { createLogger } from '../utils/logger.js';
import { fromDbString, now, toDbString, DateTime } from '../utils/datetime.js';
import type { AIMode, Provider } from '../agent/router/types.js';
import {
  AIModeSchema,
  AppointmentInputSchema,
  AppointmentStatusSchema,
  BloodTypeSchema,
  ChatMessageInputSchema,
  ContactRelationshipSchema,
  DosageUnitSchema,
  DoseActionInputSchema,
  DoseStatusSchema,
  EmergencyContactInputSchema,
  MeasurementSourceSchema,
  MedicationFrequencySchema,
  MedicationInputSchema,
  MessageRoleSchema,
  ProfileInputSchema,
  VitalSignInputSchema,
  VitalTypeSchema,
  parseInput,
  type AppointmentInput,
  type AppointmentStatus,
  type ChatMessageInput,
  type DoseActionInput,
  type EmergencyContactInput,
  type MedicationInput,
  type ProfileInput,
  type VitalSignInput,
  type VitalType,
} from './schemas.js';
import type {
  Appointment,
  ChatMessage,
  EmergencyContact,
  Medication,
  MedicationDose,
  Profile,
  VitalSign,
} from './types.js';
import { VITAL_TYPES } from './vitals.js';
import { DOSE_GRACE_MINUTES } from './medication-schedule.js';

const logger = createLogger('care:store');

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS schema_version (
    id INTEGER PRIMARY KEY CHECK (id = 1),
    version INTEGER NOT NULL DEFAULT 0,
    updated_at TEXT DEFAULT (datetime('now'))
  );

  CREATE TABLE IF NOT EXISTS profiles (
    id TEXT PRIMARY KEY,
    first_name TEXT NOT NULL,
    last_name TEXT NOT NULL,
    date_of_birth TEXT NOT NULL,
    blood_type TEXT,
    allergies TEXT NOT NULL DEFAULT '[]',
    medical_conditions TEXT NOT NULL DEFAULT '[]',
    emergency_notes TEXT,
    preferred_language TEXT NOT NULL DEFAULT 'es',
    preferred_ai_mode TEXT CHECK (preferred_ai_mode IN ('on_device', 'cloud', 'hybrid')),
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS medications (
    id TEXT PRIMARY KEY,
    profile_id TEXT NOT NULL REFERENCES profiles(id) ON DELETE CASCADE,
    name TEXT NOT NULL,
    dosage TEXT NOT NULL,
    dosage_unit TEXT NOT NULL,
    frequency TEXT NOT NULL,
    scheduled_times TEXT NOT NULL DEFAULT '[]',
    days_of_week TEXT NOT NULL DEFAULT '[1,2,3,4,5,6,7]',
    instructions TEXT,
    is_active INTEGER NOT NULL DEFAULT 1,
    current_stock INTEGER NOT NULL DEFAULT 30,
    low_stock_threshold INTEGER NOT NULL DEFAULT 7,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_medications_profile ON medications(profile_id);

  CREATE TABLE IF NOT EXISTS appointments (
    id TEXT PRIMARY KEY,
    profile_id TEXT NOT NULL REFERENCES profiles(id) ON DELETE CASCADE,
    title TEXT NOT NULL,
    doctor_name TEXT NOT NULL,
    specialty TEXT,
    location TEXT NOT NULL,
    appointment_date TEXT NOT NULL,
    duration_minutes INTEGER NOT NULL DEFAULT 60,
    reminder_offset_minutes INTEGER NOT NULL DEFAULT 1440,
    notes TEXT,
    status TEXT NOT NULL DEFAULT 'scheduled'
      CHECK (status IN ('scheduled', 'completed', 'cancelled', 'rescheduled', 'no_show')),
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_appointments_profile_date ON appointments(profile_id, appointment_date);

  CREATE TABLE IF NOT EXISTS vital_signs (
    id TEXT PRIMARY KEY,
    profile_id TEXT NOT NULL REFERENCES profiles(id) ON DELETE CASCADE,
    type TEXT NOT NULL,
    value REAL NOT NULL,
    secondary_value REAL,
    unit TEXT NOT NULL,
    measured_at TEXT NOT NULL,
    source TEXT NOT NULL DEFAULT 'manual' CHECK (source IN ('manual', 'device', 'imported')),
    notes TEXT,
    created_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_vitals_profile_type ON vital_signs(profile_id, type, measured_at DESC);

  CREATE TABLE IF NOT EXISTS chat_messages (
    id TEXT PRIMARY KEY,
    seq INTEGER NOT NULL,
    profile_id TEXT REFERENCES profiles(id) ON DELETE CASCADE,
    role TEXT NOT NULL CHECK (role IN ('user', 'assistant', 'system')),
    content TEXT NOT NULL,
    is_voice_input INTEGER NOT NULL DEFAULT 0,
    provider TEXT CHECK (provider IN ('on_device', 'cloud', 'hybrid')),
    processing_time_ms REAL,
    is_error INTEGER NOT NULL DEFAULT 0,
    error_message TEXT,
    created_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_chat_profile_seq ON chat_messages(profile_id, seq);
`;

interface Migration {
  version: number;
  name: string;
  sql: string;
}

/**
 * SCHEMA is version 1. Each migration runs once when its version is greater
 * than the stored one.
 */
const MIGRATIONS: Migration[] = [
  {
    version: 2,
    name: 'doses_and_emergency_contacts',
    sql: `
      CREATE TABLE IF NOT EXISTS medication_doses (
        id TEXT PRIMARY KEY,
        medication_id TEXT NOT NULL REFERENCES medications(id) ON DELETE CASCADE,
        scheduled_time TEXT NOT NULL,
        taken_time TEXT,
        status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending', 'taken', 'skipped', 'missed')),
        notes TEXT,
        skipped_reason TEXT,
        created_at TEXT NOT NULL,
        UNIQUE (medication_id, scheduled_time)
      );
      CREATE INDEX IF NOT EXISTS idx_doses_scheduled ON medication_doses(scheduled_time);

      CREATE TABLE IF NOT EXISTS emergency_contacts (
        id TEXT PRIMARY KEY,
        profile_id TEXT NOT NULL REFERENCES profiles(id) ON DELETE CASCADE,
        name TEXT NOT NULL,
        relationship TEXT NOT NULL,
        phone_number TEXT NOT NULL,
        alternate_phone TEXT,
        email TEXT,
        address TEXT,
        is_primary INTEGER NOT NULL DEFAULT 0,
        sort_order INTEGER NOT NULL DEFAULT 0,
        notify_on_emergency INTEGER NOT NULL DEFAULT 1,
        notify_on_missed_medication INTEGER NOT NULL DEFAULT 0,
        notify_on_abnormal_vitals INTEGER NOT NULL DEFAULT 0,
        notify_on_missed_appointment INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_contacts_profile ON emergency_contacts(profile_id);
    `,
  },
];

export const CARE_SCHEMA_VERSION = MIGRATIONS.reduce((latest, m) => Math.max(latest, m.version), 1);

// ============= Rows =============

interface ProfileRow {
  id: string;
  first_name: string;
  last_name: string;
  date_of_birth: string;
  blood_type: string | null;
  allergies: string;
  medical_conditions: string;
  emergency_notes: string | null;
  preferred_language: string;
  preferred_ai_mode: string | null;
  created_at: string;
  updated_at: string;
}

interface MedicationRow {
  id: string;
  profile_id: string;
  name: string;
  dosage: string;
  dosage_unit: string;
  frequency: string;
  scheduled_times: string;
  days_of_week: string;
  instructions: string | null;
  is_active: number;
  current_stock: number;
  low_stock_threshold: number;
  created_at: string;
  updated_at: string;
}

interface AppointmentRow {
  id: string;
  profile_id: string;
  title: string;
  doctor_name: string;
  specialty: string | null;
  location: string;
  appointment_date: string;
  duration_minutes: number;
  reminder_offset_minutes: number;
  notes: string | null;
  status: string;
  created_at: string;
  updated_at: string;
}

interface VitalSignRow {
  id: string;
  profile_id: string;
  type: string;
  value: number;
  secondary_value: number | null;
  unit: string;
  measured_at: string;
  source: string;
  notes: string | null;
  created_at: string;
}

interface MedicationDoseRow {
  id: string;
  medication_id: string;
  scheduled_time: string;
  taken_time: string | null;
  status: string;
  notes: string | null;
  skipped_reason: string | null;
  created_at: string;
}

interface EmergencyContactRow {
  id: string;
  profile_id: string;
  name: string;
  relationship: string;
  phone_number: string;
  alternate_phone: string | null;
  email: string | null;
  address: string | null;
  is_primary: number;
  sort_order: number;
  notify_on_emergency: number;
  notify_on_missed_medication: number;
  notify_on_abnormal_vitals: number;
  notify_on_missed_appointment: number;
  created_at: string;
  updated_at: string;
}

interface ChatMessageRow {
  id: string;
  seq: number;
  profile_id: string | null;
  role: string;
  content: string;
  is_voice_input: number;
  provider: string | null;
  processing_time_ms: number | null;
  is_error: number;
  error_message: string | null;
  created_at: string;
}

// ============= Row mapping =============

function parseStringArray(raw: string, column: string): string[] {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (Array.isArray(parsed)) {
      return parsed.filter((v): v is string => typeof v === 'string');
    }
  } catch (error) {
    logger.error('Corrupt JSON column', { column, raw: raw.slice(0, 100), error });
  }
  return [];
}

function parseNumberArray(raw: string, column: string): number[] {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (Array.isArray(parsed)) {
      return parsed.filter((v): v is number => typeof v === 'number');
    }
  } catch (error) {
    logger.error('Corrupt JSON column', { column, raw: raw.slice(0, 100), error });
  }
  return [];
}

function toDate(raw: string): Date {
  return fromDbString(raw).toJSDate();
}

function dbNow(): string {
  return toDbString(now());
}

function dbDate(date: Date): string {
  return toDbString(DateTime.fromJSDate(date));
}

function rowToProfile(row: ProfileRow): Profile {
  const bloodType = BloodTypeSchema.safeParse(row.blood_type);
  const mode = AIModeSchema.safeParse(row.preferred_ai_mode);
  return {
    id: row.id,
    firstName: row.first_name,
    lastName: row.last_name,
    dateOfBirth: row.date_of_birth,
    bloodType: bloodType.success ? bloodType.data : null,
    allergies: parseStringArray(row.allergies, 'allergies'),
    medicalConditions: parseStringArray(row.medical_conditions, 'medical_conditions'),
    emergencyNotes: row.emergency_notes,
    preferredLanguage: row.preferred_language,
    preferredAIMode: mode.success ? mode.data : null,
    createdAt: toDate(row.created_at),
    updatedAt: toDate(row.updated_at),
  };
}

function rowToMedication(row: MedicationRow): Medication {
  return {
    id: row.id,
    profileId: row.profile_id,
    name: row.name,
    dosage: row.dosage,
    dosageUnit: DosageUnitSchema.parse(row.dosage_unit),
    frequency: MedicationFrequencySchema.parse(row.frequency),
    scheduledTimes: parseStringArray(row.scheduled_times, 'scheduled_times'),
    daysOfWeek: parseNumberArray(row.days_of_week, 'days_of_week'),
    instructions: row.instructions,
    isActive: row.is_active === 1,
    currentStock: row.current_stock,
    lowStockThreshold: row.low_stock_threshold,
    createdAt: toDate(row.created_at),
    updatedAt: toDate(row.updated_at),
  };
}

function rowToAppointment(row: AppointmentRow): Appointment {
  return {
    id: row.id,
    profileId: row.profile_id,
    title: row.title,
    doctorName: row.doctor_name,
    specialty: row.specialty,
    location: row.location,
    appointmentDate: toDate(row.appointment_date),
    durationMinutes: row.duration_minutes,
    reminderOffsetMinutes: row.reminder_offset_minutes,
    notes: row.notes,
    status: AppointmentStatusSchema.parse(row.status),
    createdAt: toDate(row.created_at),
    updatedAt: toDate(row.updated_at),
  };
}

function rowToVitalSign(row: VitalSignRow): VitalSign {
  return {
    id: row.id,
    profileId: row.profile_id,
    type: VitalTypeSchema.parse(row.type),
    value: row.value,
    secondaryValue: row.secondary_value,
    unit: row.unit,
    measuredAt: toDate(row.measured_at),
    source: MeasurementSourceSchema.parse(row.source),
    notes: row.notes,
    createdAt: toDate(row.created_at),
  };
}

function rowToDose(row: MedicationDoseRow): MedicationDose {
  return {
    id: row.id,
    medicationId: row.medication_id,
    scheduledTime: toDate(row.scheduled_time),
    takenTime: row.taken_time ? toDate(row.taken_time) : null,
    status: DoseStatusSchema.parse(row.status),
    notes: row.notes,
    skippedReason: row.skipped_reason,
    createdAt: toDate(row.created_at),
  };
}

function rowToContact(row: EmergencyContactRow): EmergencyContact {
  return {
    id: row.id,
    profileId: row.profile_id,
    name: row.name,
    relationship: ContactRelationshipSchema.parse(row.relationship),
    phoneNumber: row.phone_number,
    alternatePhone: row.alternate_phone,
    email: row.email,
    address: row.address,
    isPrimary: row.is_primary === 1,
    order: row.sort_order,
    notifyOnEmergency: row.notify_on_emergency === 1,
    notifyOnMissedMedication: row.notify_on_missed_medication === 1,
    notifyOnAbnormalVitals: row.notify_on_abnormal_vitals === 1,
    notifyOnMissedAppointment: row.notify_on_missed_appointment === 1,
    createdAt: toDate(row.created_at),
    updatedAt: toDate(row.updated_at),
  };
}

function toProvider(raw: string | null): Provider | null {
  const parsed = AIModeSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

function rowToChatMessage(row: ChatMessageRow): ChatMessage {
  return {
    id: row.id,
    profileId: row.profile_id,
    role: MessageRoleSchema.parse(row.role),
    content: row.content,
    isVoiceInput: row.is_voice_input === 1,
    provider: toProvider(row.provider),
    processingTimeMs: row.processing_time_ms,
    isError: row.is_error === 1,
    errorMessage: row.error_message,
    createdAt: toDate(row.created_at),
  };
}

// ============= Database =============

export function getSchemaVersion(database: Database.Database): number {
  const row = database
    .prepare<[], { version: number }>('SELECT version FROM schema_version WHERE id = 1')
    .get();
  return row?.version ?? 0;
}

function setSchemaVersion(database: Database.Database, version: number): void {
  database
    .prepare(
      `INSERT INTO schema_version (id, version) VALUES (1, ?)
       ON CONFLICT(id) DO UPDATE SET version = excluded.version, updated_at = datetime('now')`
    )
    .run(version);
}

function runMigrations(database: Database.Database): void {
  let currentVersion = getSchemaVersion(database);

  if (currentVersion === 0) {
    setSchemaVersion(database, 1);
    currentVersion = 1;
    logger.info('Initialized schema version', { version: currentVersion });
  }

  for (const migration of MIGRATIONS) {
    if (migration.version > currentVersion) {
      logger.info('Applying migration', { version: migration.version, name: migration.name });
      database.transaction(() => {
        database.exec(migration.sql);
        setSchemaVersion(database, migration.version);
      })();
    }
  }
}

/**
 * Opens (creating if needed) a care database. ':memory:' is accepted.
 */
export function openCareDatabase(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    const dir = dirname(dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
      logger.info(`Created data directory: ${dir}`);
    }
  }

  const database = new Database(dbPath);
  database.pragma('journal_mode = WAL');
  // Needed for ON DELETE CASCADE
  database.pragma('foreign_keys = ON');
  initializeCareSchema(database);

  logger.info(`Database initialized: ${dbPath}`);
  return database;
}

/**
 * Creates the base tables and applies pending migrations.
 */
export function initializeCareSchema(database: Database.Database): void {
  database.exec(SCHEMA);
  runMigrations(database);
}

// ============= Store =============

export interface DoseChange {
  dose: MedicationDose;
  /** Medication after the change, stock included */
  medication: Medication;
  /** false when the slot was already taken */
  changed: boolean;
}

export class CareStore {
  private db: Database.Database;

  constructor(database: Database.Database) {
    this.db = database;
  }

  // ----- Profiles -----

  createProfile(input: ProfileInput): Profile {
    const data = parseInput(ProfileInputSchema, input, 'profile');
    const id = uuidv4();
    const timestamp = dbNow();

    this.db
      .prepare(
        `INSERT INTO profiles (id, first_name, last_name, date_of_birth, blood_type, allergies,
           medical_conditions, emergency_notes, preferred_language, preferred_ai_mode, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        id,
        data.firstName,
        data.lastName,
        data.dateOfBirth,
        data.bloodType ?? null,
        JSON.stringify(data.allergies),
        JSON.stringify(data.medicalConditions),
        data.emergencyNotes ?? null,
        data.preferredLanguage,
        data.preferredAIMode ?? null,
        timestamp,
        timestamp
      );

    logger.info('profile_created', { id });
    return this.requireProfile(id);
  }

  getProfile(id: string): Profile | null {
    const row = this.db.prepare<[string], ProfileRow>('SELECT * FROM profiles WHERE id = ?').get(id);
    return row ? rowToProfile(row) : null;
  }

  listProfiles(): Profile[] {
    return this.db
      .prepare<[], ProfileRow>('SELECT * FROM profiles ORDER BY created_at ASC, rowid ASC')
      .all()
      .map(rowToProfile);
  }

  /**
   * Replaces the given fields; the merged profile is validated as a whole.
   */
  updateProfile(id: string, patch: Partial<ProfileInput>): Profile {
    const current = this.requireProfile(id);
    const data = parseInput(
      ProfileInputSchema,
      {
        firstName: current.firstName,
        lastName: current.lastName,
        dateOfBirth: current.dateOfBirth,
        bloodType: current.bloodType ?? undefined,
        allergies: current.allergies,
        medicalConditions: current.medicalConditions,
        emergencyNotes: current.emergencyNotes ?? undefined,
        preferredLanguage: current.preferredLanguage,
        preferredAIMode: current.preferredAIMode ?? undefined,
        ...patch,
      },
      'profile'
    );

    this.db
      .prepare(
        `UPDATE profiles SET first_name = ?, last_name = ?, date_of_birth = ?, blood_type = ?, allergies = ?,
           medical_conditions = ?, emergency_notes = ?, preferred_language = ?, preferred_ai_mode = ?, updated_at = ?
         WHERE id = ?`
      )
      .run(
        data.firstName,
        data.lastName,
        data.dateOfBirth,
        data.bloodType ?? null,
        JSON.stringify(data.allergies),
        JSON.stringify(data.medicalConditions),
        data.emergencyNotes ?? null,
        data.preferredLanguage,
        data.preferredAIMode ?? null,
        dbNow(),
        id
      );

    return this.requireProfile(id);
  }

  /** null clears the preference */
  setPreferredAIMode(id: string, mode: AIMode | null): Profile {
    this.requireProfile(id);
    this.db.prepare('UPDATE profiles SET preferred_ai_mode = ?, updated_at = ? WHERE id = ?').run(mode, dbNow(), id);
    logger.info('preferred_mode_changed', { id, mode });
    return this.requireProfile(id);
  }

  /**
   * Also removes the profile's medications (with their doses), appointments,
   * vitals, emergency contacts and chat.
   */
  deleteProfile(id: string): boolean {
    const result = this.db.prepare('DELETE FROM profiles WHERE id = ?').run(id);
    if (result.changes > 0) {
      logger.info('profile_deleted', { id });
    }
    return result.changes > 0;
  }

  private requireProfile(id: string): Profile {
    const profile = this.getProfile(id);
    if (!profile) {
      throw new Error(`Profile not found: ${id}`);
    }
    return profile;
  }

  // ----- Medications -----

  addMedication(input: MedicationInput): Medication {
    const data = parseInput(MedicationInputSchema, input, 'medication');
    this.requireProfile(data.profileId);
    const id = uuidv4();
    const timestamp = dbNow();

    this.db
      .prepare(
        `INSERT INTO medications (id, profile_id, name, dosage, dosage_unit, frequency, scheduled_times,
           days_of_week, instructions, is_active, current_stock, low_stock_threshold, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        id,
        data.profileId,
        data.name,
        data.dosage,
        data.dosageUnit,
        data.frequency,
        JSON.stringify(data.scheduledTimes),
        JSON.stringify(data.daysOfWeek),
        data.instructions ?? null,
        data.isActive ? 1 : 0,
        data.currentStock,
        data.lowStockThreshold,
        timestamp,
        timestamp
      );

    logger.debug('medication_added', { id, profile_id: data.profileId });
    return this.requireMedication(id);
  }

  getMedication(id: string): Medication | null {
    const row = this.db.prepare<[string], MedicationRow>('SELECT * FROM medications WHERE id = ?').get(id);
    return row ? rowToMedication(row) : null;
  }

  listMedications(profileId: string, options: { activeOnly?: boolean } = {}): Medication[] {
    const sql = options.activeOnly
      ? 'SELECT * FROM medications WHERE profile_id = ? AND is_active = 1 ORDER BY name ASC'
      : 'SELECT * FROM medications WHERE profile_id = ? ORDER BY name ASC';
    return this.db.prepare<[string], MedicationRow>(sql).all(profileId).map(rowToMedication);
  }

  setMedicationActive(id: string, isActive: boolean): Medication {
    this.requireMedication(id);
    this.db.prepare('UPDATE medications SET is_active = ?, updated_at = ? WHERE id = ?').run(isActive ? 1 : 0, dbNow(), id);
    return this.requireMedication(id);
  }

  /**
   * One dose taken. Stock never goes below zero.
   */
  decrementStock(id: string): Medication {
    this.requireMedication(id);
    this.db
      .prepare('UPDATE medications SET current_stock = MAX(current_stock - 1, 0), updated_at = ? WHERE id = ?')
      .run(dbNow(), id);
    return this.requireMedication(id);
  }

  refillStock(id: string, amount: number): Medication {
    if (!Number.isInteger(amount) || amount <= 0) {
      throw new Error(`Refill amount must be a positive integer, got ${amount}`);
    }
    this.requireMedication(id);
    this.db
      .prepare('UPDATE medications SET current_stock = current_stock + ?, updated_at = ? WHERE id = ?')
      .run(amount, dbNow(), id);
    return this.requireMedication(id);
  }

  deleteMedication(id: string): boolean {
    return this.db.prepare('DELETE FROM medications WHERE id = ?').run(id).changes > 0;
  }

  private requireMedication(id: string): Medication {
    const medication = this.getMedication(id);
    if (!medication) {
      throw new Error(`Medication not found: ${id}`);
    }
    return medication;
  }

  // ----- Doses -----

  /**
   * Pending dose for one slot; returns the existing dose when the slot is
   * already recorded.
   */
  recordPendingDose(medicationId: string, scheduledTime: Date): MedicationDose {
    this.requireMedication(medicationId);
    const scheduledAt = dbDate(scheduledTime);

    this.db
      .prepare(
        `INSERT OR IGNORE INTO medication_doses (id, medication_id, scheduled_time, status, created_at)
         VALUES (?, ?, ?, 'pending', ?)`
      )
      .run(uuidv4(), medicationId, scheduledAt, dbNow());

    const dose = this.findDose(medicationId, scheduledAt);
    if (!dose) {
      throw new Error(`Dose not found after insert: ${medicationId} ${scheduledAt}`);
    }
    return dose;
  }

  /**
   * Marks the slot taken and takes one unit from stock. A slot that is
   * already taken is left as it is.
   */
  takeDose(input: DoseActionInput): DoseChange {
    const data = parseInput(DoseActionInputSchema, input, 'dose');

    return this.db.transaction((): DoseChange => {
      const dose = this.recordPendingDose(data.medicationId, data.scheduledTime);
      if (dose.status === 'taken') {
        return { dose, medication: this.requireMedication(data.medicationId), changed: false };
      }

      this.db
        .prepare(
          `UPDATE medication_doses SET status = 'taken', taken_time = ?, notes = ?, skipped_reason = NULL
           WHERE id = ?`
        )
        .run(dbNow(), data.notes ?? null, dose.id);
      const medication = this.decrementStock(data.medicationId);

      logger.info('dose_taken', { medication_id: data.medicationId, stock: medication.currentStock });
      return { dose: this.requireDose(dose.id), medication, changed: true };
    })();
  }

  /**
   * Taken doses cannot be skipped afterwards.
   */
  skipDose(input: DoseActionInput): DoseChange {
    const data = parseInput(DoseActionInputSchema, input, 'dose');

    return this.db.transaction((): DoseChange => {
      const dose = this.recordPendingDose(data.medicationId, data.scheduledTime);
      const medication = this.requireMedication(data.medicationId);
      if (dose.status === 'taken') {
        return { dose, medication, changed: false };
      }

      this.db
        .prepare(`UPDATE medication_doses SET status = 'skipped', skipped_reason = ?, notes = ? WHERE id = ?`)
        .run(data.reason ?? null, data.notes ?? null, dose.id);

      logger.info('dose_skipped', { medication_id: data.medicationId });
      return { dose: this.requireDose(dose.id), medication, changed: true };
    })();
  }

  /**
   * Pending doses older than the grace period become missed.
   * @returns number of doses updated
   */
  markOverdueDosesMissed(profileId: string): number {
    const cutoff = toDbString(now().minus({ minutes: DOSE_GRACE_MINUTES }));
    const result = this.db
      .prepare(
        `UPDATE medication_doses SET status = 'missed'
         WHERE status = 'pending' AND scheduled_time < ?
           AND medication_id IN (SELECT id FROM medications WHERE profile_id = ?)`
      )
      .run(cutoff, profileId);

    if (result.changes > 0) {
      logger.info('doses_missed', { profile_id: profileId, count: result.changes });
    }
    return result.changes;
  }

  /**
   * Newest slot first.
   */
  listDoses(medicationId: string, limit: number = 20): MedicationDose[] {
    return this.db
      .prepare<[string, number], MedicationDoseRow>(
        'SELECT * FROM medication_doses WHERE medication_id = ? ORDER BY scheduled_time DESC LIMIT ?'
      )
      .all(medicationId, limit)
      .map(rowToDose);
  }

  /**
   * Doses of a profile with slots in [from, to), earliest first.
   */
  listDosesBetween(profileId: string, from: Date, to: Date): MedicationDose[] {
    return this.db
      .prepare<[string, string, string], MedicationDoseRow>(
        `SELECT d.* FROM medication_doses d
         JOIN medications m ON m.id = d.medication_id
         WHERE m.profile_id = ? AND d.scheduled_time >= ? AND d.scheduled_time < ?
         ORDER BY d.scheduled_time ASC, m.name ASC`
      )
      .all(profileId, dbDate(from), dbDate(to))
      .map(rowToDose);
  }

  private findDose(medicationId: string, scheduledAt: string): MedicationDose | null {
    const row = this.db
      .prepare<[string, string], MedicationDoseRow>(
        'SELECT * FROM medication_doses WHERE medication_id = ? AND scheduled_time = ?'
      )
      .get(medicationId, scheduledAt);
    return row ? rowToDose(row) : null;
  }

  private requireDose(id: string): MedicationDose {
    const row = this.db.prepare<[string], MedicationDoseRow>('SELECT * FROM medication_doses WHERE id = ?').get(id);
    if (!row) {
      throw new Error(`Dose not found: ${id}`);
    }
    return rowToDose(row);
  }

  // ----- Appointments -----

  addAppointment(input: AppointmentInput): Appointment {
    const data = parseInput(AppointmentInputSchema, input, 'appointment');
    this.requireProfile(data.profileId);
    const id = uuidv4();
    const timestamp = dbNow();

    this.db
      .prepare(
        `INSERT INTO appointments (id, profile_id, title, doctor_name, specialty, location, appointment_date,
           duration_minutes, reminder_offset_minutes, notes, status, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        id,
        data.profileId,
        data.title,
        data.doctorName,
        data.specialty ?? null,
        data.location,
        dbDate(data.appointmentDate),
        data.durationMinutes,
        data.reminderOffsetMinutes,
        data.notes ?? null,
        data.status,
        timestamp,
        timestamp
      );

    logger.debug('appointment_added', { id, profile_id: data.profileId });
    return this.requireAppointment(id);
  }

  getAppointment(id: string): Appointment | null {
    const row = this.db.prepare<[string], AppointmentRow>('SELECT * FROM appointments WHERE id = ?').get(id);
    return row ? rowToAppointment(row) : null;
  }

  listAppointments(profileId: string): Appointment[] {
    return this.db
      .prepare<[string], AppointmentRow>('SELECT * FROM appointments WHERE profile_id = ? ORDER BY appointment_date ASC')
      .all(profileId)
      .map(rowToAppointment);
  }

  /**
   * Scheduled appointments after now, soonest first.
   */
  listUpcomingAppointments(profileId: string): Appointment[] {
    return this.db
      .prepare<[string, string], AppointmentRow>(
        `SELECT * FROM appointments
         WHERE profile_id = ? AND status = 'scheduled' AND appointment_date > ?
         ORDER BY appointment_date ASC`
      )
      .all(profileId, dbNow())
      .map(rowToAppointment);
  }

  updateAppointmentStatus(id: string, status: AppointmentStatus): Appointment {
    const parsed = parseInput(AppointmentStatusSchema, status, 'appointment status');
    this.requireAppointment(id);
    this.db.prepare('UPDATE appointments SET status = ?, updated_at = ? WHERE id = ?').run(parsed, dbNow(), id);
    return this.requireAppointment(id);
  }

  /**
   * Moves the appointment and marks it rescheduled.
   */
  rescheduleAppointment(id: string, date: Date): Appointment {
    this.requireAppointment(id);
    this.db
      .prepare(`UPDATE appointments SET appointment_date = ?, status = 'rescheduled', updated_at = ? WHERE id = ?`)
      .run(dbDate(date), dbNow(), id);
    return this.requireAppointment(id);
  }

  deleteAppointment(id: string): boolean {
    return this.db.prepare('DELETE FROM appointments WHERE id = ?').run(id).changes > 0;
  }

  private requireAppointment(id: string): Appointment {
    const appointment = this.getAppointment(id);
    if (!appointment) {
      throw new Error(`Appointment not found: ${id}`);
    }
    return appointment;
  }

  // ----- Vital signs -----

  recordVital(input: VitalSignInput): VitalSign {
    const data = parseInput(VitalSignInputSchema, input, 'vital sign');
    this.requireProfile(data.profileId);
    const id = uuidv4();
    const timestamp = dbNow();

    this.db
      .prepare(
        `INSERT INTO vital_signs (id, profile_id, type, value, secondary_value, unit, measured_at, source, notes, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        id,
        data.profileId,
        data.type,
        data.value,
        data.secondaryValue ?? null,
        data.unit ?? VITAL_TYPES[data.type].defaultUnit,
        data.measuredAt ? dbDate(data.measuredAt) : timestamp,
        data.source,
        data.notes ?? null,
        timestamp
      );

    const row = this.db.prepare<[string], VitalSignRow>('SELECT * FROM vital_signs WHERE id = ?').get(id);
    if (!row) {
      throw new Error(`Vital sign not found after insert: ${id}`);
    }
    return rowToVitalSign(row);
  }

  /**
   * Newest first.
   */
  listVitals(profileId: string, options: { type?: VitalType; limit?: number } = {}): VitalSign[] {
    const limit = options.limit ?? 50;
    const rows = options.type
      ? this.db
          .prepare<[string, string, number], VitalSignRow>(
            'SELECT * FROM vital_signs WHERE profile_id = ? AND type = ? ORDER BY measured_at DESC, rowid DESC LIMIT ?'
          )
          .all(profileId, options.type, limit)
      : this.db
          .prepare<[string, number], VitalSignRow>(
            'SELECT * FROM vital_signs WHERE profile_id = ? ORDER BY measured_at DESC, rowid DESC LIMIT ?'
          )
          .all(profileId, limit);
    return rows.map(rowToVitalSign);
  }

  /**
   * Most recent reading of each type, in VITAL_TYPES order.
   */
  latestVitals(profileId: string): VitalSign[] {
    const latest: VitalSign[] = [];
    for (const type of VitalTypeSchema.options) {
      const [newest] = this.listVitals(profileId, { type, limit: 1 });
      if (newest) {
        latest.push(newest);
      }
    }
    return latest;
  }

  // ----- Emergency contacts -----

  addEmergencyContact(input: EmergencyContactInput): EmergencyContact {
    const data = parseInput(EmergencyContactInputSchema, input, 'emergency contact');
    this.requireProfile(data.profileId);
    const id = uuidv4();
    const timestamp = dbNow();
    const flag = (value: boolean | undefined) => ((value ?? data.isPrimary) ? 1 : 0);

    this.db.transaction(() => {
      if (data.isPrimary) {
        this.clearPrimaryContact(data.profileId);
      }
      this.db
        .prepare(
          `INSERT INTO emergency_contacts (id, profile_id, name, relationship, phone_number, alternate_phone, email,
             address, is_primary, sort_order, notify_on_emergency, notify_on_missed_medication,
             notify_on_abnormal_vitals, notify_on_missed_appointment, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          id,
          data.profileId,
          data.name,
          data.relationship,
          data.phoneNumber,
          data.alternatePhone ?? null,
          data.email ?? null,
          data.address ?? null,
          data.isPrimary ? 1 : 0,
          data.order,
          data.notifyOnEmergency ? 1 : 0,
          flag(data.notifyOnMissedMedication),
          flag(data.notifyOnAbnormalVitals),
          flag(data.notifyOnMissedAppointment),
          timestamp,
          timestamp
        );
    })();

    logger.debug('emergency_contact_added', { id, profile_id: data.profileId, primary: data.isPrimary });
    return this.requireContact(id);
  }

  /**
   * Primary contact first, then by order and name.
   */
  listEmergencyContacts(profileId: string): EmergencyContact[] {
    return this.db
      .prepare<[string], EmergencyContactRow>(
        `SELECT * FROM emergency_contacts WHERE profile_id = ?
         ORDER BY is_primary DESC, sort_order ASC, name ASC`
      )
      .all(profileId)
      .map(rowToContact);
  }

  getPrimaryContact(profileId: string): EmergencyContact | null {
    const row = this.db
      .prepare<[string], EmergencyContactRow>(
        'SELECT * FROM emergency_contacts WHERE profile_id = ? AND is_primary = 1 LIMIT 1'
      )
      .get(profileId);
    return row ? rowToContact(row) : null;
  }

  /**
   * The previous primary contact loses the flag; the new one is notified of
   * everything.
   */
  setPrimaryContact(id: string): EmergencyContact {
    const contact = this.requireContact(id);

    this.db.transaction(() => {
      this.clearPrimaryContact(contact.profileId);
      this.db
        .prepare(
          `UPDATE emergency_contacts SET is_primary = 1, notify_on_emergency = 1, notify_on_missed_medication = 1,
             notify_on_abnormal_vitals = 1, notify_on_missed_appointment = 1, updated_at = ?
           WHERE id = ?`
        )
        .run(dbNow(), id);
    })();

    return this.requireContact(id);
  }

  deleteEmergencyContact(id: string): boolean {
    return this.db.prepare('DELETE FROM emergency_contacts WHERE id = ?').run(id).changes > 0;
  }

  private clearPrimaryContact(profileId: string): void {
    this.db
      .prepare('UPDATE emergency_contacts SET is_primary = 0, updated_at = ? WHERE profile_id = ? AND is_primary = 1')
      .run(dbNow(), profileId);
  }

  private requireContact(id: string): EmergencyContact {
    const row = this.db
      .prepare<[string], EmergencyContactRow>('SELECT * FROM emergency_contacts WHERE id = ?')
      .get(id);
    if (!row) {
      throw new Error(`Emergency contact not found: ${id}`);
    }
    return rowToContact(row);
  }

  // ----- Chat history -----

  saveChatMessage(input: ChatMessageInput): ChatMessage {
    const data = parseInput(ChatMessageInputSchema, input, 'chat message');
    const id = uuidv4();
    const seqRow = this.db
      .prepare<[], { next: number }>('SELECT COALESCE(MAX(seq), 0) + 1 AS next FROM chat_messages')
      .get();
    const seq = seqRow?.next ?? 1;

    this.db
      .prepare(
        `INSERT INTO chat_messages (id, seq, profile_id, role, content, is_voice_input, provider,
           processing_time_ms, is_error, error_message, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        id,
        seq,
        data.profileId,
        data.role,
        data.content,
        data.isVoiceInput ? 1 : 0,
        data.provider,
        data.processingTimeMs,
        data.isError ? 1 : 0,
        data.errorMessage,
        dbNow()
      );

    logger.debug('Saved message', { id, role: data.role });

    const row = this.db.prepare<[string], ChatMessageRow>('SELECT * FROM chat_messages WHERE id = ?').get(id);
    if (!row) {
      throw new Error(`Chat message not found after insert: ${id}`);
    }
    return rowToChatMessage(row);
  }

  /**
   * Last `limit` messages of a profile, oldest first.
   */
  loadChatHistory(profileId: string, limit: number = 20): ChatMessage[] {
    return this.db
      .prepare<[string, number], ChatMessageRow>(
        `SELECT * FROM (
           SELECT * FROM chat_messages WHERE profile_id = ? ORDER BY seq DESC LIMIT ?
         ) ORDER BY seq ASC`
      )
      .all(profileId, limit)
      .map(rowToChatMessage);
  }

  clearChatHistory(profileId: string): number {
    const result = this.db.prepare('DELETE FROM chat_messages WHERE profile_id = ?').run(profileId);
    logger.info('Chat history cleared', { profile_id: profileId, removed: result.changes });
    return result.changes;
  }

  countChatMessages(profileId: string): number {
    const row = this.db
      .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM chat_messages WHERE profile_id = ?')
      .get(profileId);
    return row?.count ?? 0;
  }

  close(): void {
    this.db.close();
    logger.info('Database connection closed');
  }
}

let storeInstance: CareStore | null = null;

/**
 * Store on the configured database path, opened on first use.
 */
export function getCareStore(): CareStore {
  if (!storeInstance) {
    storeInstance = new CareStore(openCareDatabase(config.paths.database));
  }
  return storeInstance;
}

export function closeCareStore(): void {
  if (storeInstance) {
    storeInstance.close();
    storeInstance = null;
  }
}
