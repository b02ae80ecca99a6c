/**
 * Builds the read-only ProfileSnapshot the assistant works with.
 */

import { ageFrom } from '../utils/datetime.js';
import type { ProfileSnapshot } from '../agent/router/types.js';
import type { CareStore } from './store.js';
import type { Profile } from './types.js';
import { formatDosage, nextScheduledDose } from './medication-schedule.js';
import { summarizeVital } from './vitals.js';

export function fullName(profile: Pick<Profile, 'firstName' | 'lastName'>): string {
  return `${profile.firstName} ${profile.lastName}`;
}

export function initials(profile: Pick<Profile, 'firstName' | 'lastName'>): string {
  return `${profile.firstName.charAt(0)}${profile.lastName.charAt(0)}`.toUpperCase();
}

/**
 * Null when the profile does not exist.
 */
export function buildProfileSnapshot(store: CareStore, profileId: string, zone: string): ProfileSnapshot | null {
  const profile = store.getProfile(profileId);
  if (!profile) {
    return null;
  }

  const snapshot: ProfileSnapshot = {
    firstName: profile.firstName,
    lastName: profile.lastName,
    age: ageFrom(profile.dateOfBirth, zone),
    medicalConditions: [...profile.medicalConditions],
    allergies: [...profile.allergies],
    activeMedications: store.listMedications(profileId, { activeOnly: true }).map((med) => ({
      name: med.name,
      dosage: formatDosage(med),
      nextDoseAt: nextScheduledDose(med, zone)?.toJSDate() ?? null,
    })),
    upcomingAppointments: store.listUpcomingAppointments(profileId).map((apt) => ({
      title: apt.title,
      doctorName: apt.doctorName,
      location: apt.location,
      date: apt.appointmentDate,
    })),
    latestVitals: store.latestVitals(profileId).map(summarizeVital),
    ...(profile.preferredAIMode && { preferredAIMode: profile.preferredAIMode }),
  };

  return Object.freeze(snapshot);
}
