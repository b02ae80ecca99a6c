/**
 * Demo care recipient for a fresh database.
 */

import { nowInZone } from '../utils/datetime.js';
import { createLogger } from '../utils/logger.js';
import type { CareStore } from './store.js';
import type { Profile } from './types.js';

const logger = createLogger('care:demo');

export function seedDemoProfile(store: CareStore, zone: string): Profile {
  const today = nowInZone(zone);

  const profile = store.createProfile({
    firstName: 'Rosa',
    lastName: 'Hernandez',
    dateOfBirth: today.minus({ years: 78 }).toISODate() ?? '1948-01-01',
    bloodType: 'A+',
    allergies: ['Penicilina', 'Sulfas'],
    medicalConditions: ['Hipertension', 'Diabetes tipo 2'],
    emergencyNotes: 'Alergica a la penicilina y a las sulfas.',
  });

  store.addMedication({
    profileId: profile.id,
    name: 'Losartan',
    dosage: '50',
    dosageUnit: 'mg',
    frequency: 'Una vez al dia',
    scheduledTimes: ['08:00'],
  });
  store.addMedication({
    profileId: profile.id,
    name: 'Metformina',
    dosage: '850',
    dosageUnit: 'mg',
    frequency: 'Dos veces al dia',
    scheduledTimes: ['08:00', '20:00'],
    instructions: 'Tomar con alimentos',
  });

  store.recordVital({ profileId: profile.id, type: 'blood_pressure', value: 128, secondaryValue: 82 });
  store.recordVital({ profileId: profile.id, type: 'heart_rate', value: 72 });
  store.recordVital({ profileId: profile.id, type: 'blood_glucose', value: 118 });

  store.addAppointment({
    profileId: profile.id,
    title: 'Revision cardiologica',
    doctorName: 'Dra. Salinas',
    specialty: 'Cardiologia',
    location: 'Clinica del Centro',
    appointmentDate: today.plus({ days: 3 }).set({ hour: 10, minute: 0, second: 0, millisecond: 0 }).toJSDate(),
  });

  store.addEmergencyContact({
    profileId: profile.id,
    name: 'Laura Hernandez',
    relationship: 'Hija',
    phoneNumber: '555 010 1234',
    isPrimary: true,
  });

  logger.info('demo_profile_seeded', { id: profile.id });
  return profile;
}

/**
 * Profile the terminal host talks about: the oldest one, or a seeded demo
 * profile on an empty database.
 */
export function ensureProfile(store: CareStore, options: { seedDemo: boolean; zone: string }): Profile {
  const [existing] = store.listProfiles();
  if (existing) {
    return existing;
  }
  if (!options.seedDemo) {
    throw new Error('No profile in the database and SEED_DEMO_PROFILE is false');
  }
  return seedDemoProfile(store, options.zone);
}
