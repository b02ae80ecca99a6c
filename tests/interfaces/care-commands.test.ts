import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  CareDataCommands,
  USAGE,
  normalizeName,
  parseReading,
  type CareReminders,
} from '../../src/interfaces/care-commands.js';
import { CareStore, openCareDatabase } from '../../src/care/store.js';
import { clearMockNow, setMockNow } from '../../src/utils/datetime.js';

// Tuesday
const NOW = new Date('2026-03-10T15:04:00Z');

function createReminders() {
  return {
    scheduleMedication: vi.fn<CareReminders['scheduleMedication']>(() => 1),
    scheduleAppointment: vi.fn<CareReminders['scheduleAppointment']>(() => true),
    scheduleRefillReminder: vi.fn<CareReminders['scheduleRefillReminder']>(() => true),
  };
}

describe('CareDataCommands', () => {
  let store: CareStore;
  let profileId: string;
  let reminders: ReturnType<typeof createReminders>;
  let commands: CareDataCommands;

  beforeEach(() => {
    setMockNow(NOW);
    store = new CareStore(openCareDatabase(':memory:'));
    profileId = store.createProfile({ firstName: 'Ana', lastName: 'Lopez', dateOfBirth: '1946-03-14' }).id;
    reminders = createReminders();
    commands = new CareDataCommands({ store, profileId, timezone: 'UTC', reminders });
  });

  afterEach(() => {
    store.close();
    clearMockNow();
  });

  function addLosartan(overrides: { scheduledTimes?: string[]; currentStock?: number } = {}) {
    return store.addMedication({
      profileId,
      name: 'Losartan',
      dosage: '50',
      dosageUnit: 'mg',
      frequency: 'Una vez al dia',
      scheduledTimes: ['14:00'],
      ...overrides,
    });
  }

  it('ignores commands it does not own', async () => {
    expect(await commands.handle('modo', 'cloud')).toBeNull();
  });

  describe('/medicamento', () => {
    it('adds a medication and schedules its reminders', async () => {
      expect(await commands.handle('medicamento', 'Losartan 50 mg 08:00')).toBe(
        'Medicamento agregado: Losartan 50 mg a las 08:00.'
      );

      const [saved] = store.listMedications(profileId);
      expect(saved).toMatchObject({ name: 'Losartan', dosage: '50', dosageUnit: 'mg', frequency: 'Una vez al dia' });
      expect(reminders.scheduleMedication).toHaveBeenCalledWith(saved);
    });

    it('reads multi-word names and several times', async () => {
      expect(await commands.handle('medicamento', 'Acido folico 5 MG 08:00,20:00')).toBe(
        'Medicamento agregado: Acido folico 5 mg a las 08:00, 20:00.'
      );
      expect(store.listMedications(profileId)[0]?.frequency).toBe('Dos veces al dia');
    });

    it('treats a medication without times as taken when needed', async () => {
      expect(await commands.handle('medicamento', 'Paracetamol 500 mg')).toBe(
        'Medicamento agregado: Paracetamol 500 mg sin horario fijo.'
      );
      expect(store.listMedications(profileId)[0]?.frequency).toBe('Segun sea necesario');
    });

    it('explains the usage for an unknown unit', async () => {
      expect(await commands.handle('medicamento', 'Losartan 50 litros 08:00')).toBe(
        `${USAGE.medicamento}\nUnidades: mg, ml, tableta, capsula, gotas, parche, inyeccion, unidades`
      );
      expect(store.listMedications(profileId)).toEqual([]);
      expect(reminders.scheduleMedication).not.toHaveBeenCalled();
    });
  });

  describe('/medicamentos', () => {
    it('says when there are none', async () => {
      expect(await commands.handle('medicamentos', '')).toBe('No hay medicamentos activos.');
    });

    it('lists stock and the doses of today', async () => {
      const losartan = addLosartan({ currentStock: 5 });
      const metformina = store.addMedication({
        profileId,
        name: 'Metformina',
        dosage: '850',
        dosageUnit: 'mg',
        frequency: 'Dos veces al dia',
        scheduledTimes: ['08:00', '20:00'],
      });
      store.recordPendingDose(metformina.id, new Date('2026-03-10T08:00:00Z'));
      store.takeDose({ medicationId: losartan.id, scheduledTime: new Date('2026-03-10T14:45:00Z') });

      expect(await commands.handle('medicamentos', '')).toBe(
        [
          '- Losartan 50 mg | 14:00 | quedan 4, recargar pronto',
          '- Metformina 850 mg | 08:00, 20:00 | quedan 30',
          'Hoy:',
          '  08:00 Metformina: atrasada',
          '  14:45 Losartan: tomada a tiempo',
        ].join('\n')
      );
    });
  });

  describe('/tomar', () => {
    it('books the dose against the closest slot', async () => {
      const med = addLosartan({ scheduledTimes: ['14:00', '20:00'] });

      expect(await commands.handle('tomar', 'losartan')).toBe('Dosis registrada: Losartan 50 mg (14:00). Quedan 29.');

      const [dose] = store.listDoses(med.id);
      expect(dose?.status).toBe('taken');
      expect(dose?.scheduledTime.toISOString()).toBe('2026-03-10T14:00:00.000Z');
      expect(reminders.scheduleRefillReminder).toHaveBeenCalledWith(expect.objectContaining({ currentStock: 29 }));
    });

    it('warns when stock runs low', async () => {
      addLosartan({ currentStock: 8 });
      expect(await commands.handle('tomar', 'Losartan')).toBe(
        'Dosis registrada: Losartan 50 mg (14:00). Quedan 7. Quedan pocas dosis, recuerda recargar.'
      );
    });

    it('does not take the same dose twice', async () => {
      addLosartan();
      await commands.handle('tomar', 'Losartan');

      expect(await commands.handle('tomar', 'Losartan')).toBe('Ya registraste la dosis de Losartan de las 14:00.');
      expect(store.listMedications(profileId)[0]?.currentStock).toBe(29);
    });

    it('matches by prefix without accents', async () => {
      store.addMedication({
        profileId,
        name: 'Ácido fólico',
        dosage: '5',
        dosageUnit: 'mg',
        frequency: 'Una vez al dia',
        scheduledTimes: ['15:00'],
      });
      expect(await commands.handle('tomar', 'acido')).toBe('Dosis registrada: Ácido fólico 5 mg (15:00). Quedan 29.');
    });

    it('uses the current minute for medications without a schedule', async () => {
      const med = addLosartan({ scheduledTimes: [] });
      expect(await commands.handle('tomar', 'Losartan')).toBe('Dosis registrada: Losartan 50 mg (15:04). Quedan 29.');
      expect(store.listDoses(med.id)[0]?.scheduledTime.toISOString()).toBe('2026-03-10T15:04:00.000Z');
    });

    it('reports unknown medications and missing names', async () => {
      expect(await commands.handle('tomar', 'aspirina')).toBe('No encontre el medicamento "aspirina".');
      expect(await commands.handle('tomar', '  ')).toBe(USAGE.tomar);
    });
  });

  describe('/omitir', () => {
    it('skips the dose with a reason', async () => {
      const med = addLosartan();

      expect(await commands.handle('omitir', 'Losartan | nauseas')).toBe('Dosis omitida: Losartan (14:00).');
      expect(store.listDoses(med.id)[0]).toMatchObject({ status: 'skipped', skippedReason: 'nauseas' });
      expect(store.listMedications(profileId)[0]?.currentStock).toBe(30);
    });

    it('leaves a taken dose alone', async () => {
      addLosartan();
      await commands.handle('tomar', 'Losartan');
      expect(await commands.handle('omitir', 'Losartan')).toBe('La dosis de Losartan de las 14:00 ya estaba tomada.');
    });
  });

  describe('/signo', () => {
    it('records blood pressure', async () => {
      expect(await commands.handle('signo', 'presion 120/80')).toBe(
        'Registrado: Presion Arterial 120/80 mmHg (normal).'
      );
      expect(store.latestVitals(profileId)[0]).toMatchObject({ value: 120, secondaryValue: 80 });
    });

    it('accepts a decimal comma', async () => {
      expect(await commands.handle('signo', 'Temperatura 36,8')).toBe('Registrado: Temperatura 36.8 °C (normal).');
    });

    it('reports the range of the type', async () => {
      expect(await commands.handle('signo', 'pulso 250')).toBe(
        'Valor fuera de rango para Ritmo Cardiaco (40 a 200 lpm).'
      );
      expect(await commands.handle('signo', 'presion 120/150')).toBe(
        'Valor fuera de rango para la diastolica (40 a 140 mmHg).'
      );
      expect(store.listVitals(profileId)).toEqual([]);
    });

    it('explains malformed readings', async () => {
      expect(await commands.handle('signo', 'presion 120')).toBe('Escribe la presion como 120/80.');
      expect(await commands.handle('signo', 'azucar 100')).toBe(USAGE.signo);
      expect(await commands.handle('signo', 'pulso rapido')).toBe(USAGE.signo);
    });
  });

  describe('/signos', () => {
    it('says when there are no readings', async () => {
      expect(await commands.handle('signos', '')).toBe('No hay lecturas registradas. Usa /signo <tipo> <valor>.');
    });

    it('lists the latest reading of each type', async () => {
      store.recordVital({ profileId, type: 'temperature', value: 36.8 });
      store.recordVital({ profileId, type: 'blood_pressure', value: 128, secondaryValue: 82 });

      expect(await commands.handle('signos', '')).toBe(
        '- Presion Arterial: 128/82 mmHg (alto)\n- Temperatura: 36.8 °C (normal)'
      );
    });
  });

  describe('/cita and /citas', () => {
    it('adds an appointment and schedules its reminder', async () => {
      expect(await commands.handle('cita', '2026-03-12 10:00 | Revision | Dr. Ruiz | Hospital Central')).toBe(
        'Cita agregada: Revision con Dr. Ruiz, En 2 dias.'
      );

      const [saved] = store.listUpcomingAppointments(profileId);
      expect(saved?.appointmentDate.toISOString()).toBe('2026-03-12T10:00:00.000Z');
      expect(reminders.scheduleAppointment).toHaveBeenCalledWith(saved);
      expect(await commands.handle('citas', '')).toBe('- Revision con Dr. Ruiz en Hospital Central, En 2 dias');
    });

    it('rejects past dates and malformed input', async () => {
      expect(await commands.handle('cita', '2026-03-10 10:00 | Revision | Dr. Ruiz | Hospital')).toBe(
        'Esa fecha ya paso.'
      );
      expect(await commands.handle('cita', '2026-13-01 10:00 | Revision | Dr. Ruiz | Hospital')).toBe(USAGE.cita);
      expect(await commands.handle('cita', 'manana | Revision')).toBe(USAGE.cita);
      expect(reminders.scheduleAppointment).not.toHaveBeenCalled();
    });

    it('says when there are no appointments', async () => {
      expect(await commands.handle('citas', '')).toBe('No tienes citas programadas.');
    });
  });

  describe('emergency contacts', () => {
    it('adds and lists contacts', async () => {
      expect(await commands.handle('contacto', 'Laura Hernandez | hija | 555 010 1234 | principal')).toBe(
        'Contacto agregado: Laura Hernandez (Hija), principal.'
      );
      expect(await commands.handle('contacto', 'Rosa Diaz | Vecino/a | 555 222 3333')).toBe(
        'Contacto agregado: Rosa Diaz (Vecino/a).'
      );

      expect(await commands.handle('contactos', '')).toBe(
        '- Laura Hernandez (Hija): 555 010 1234 [principal]\n- Rosa Diaz (Vecino/a): 555 222 3333'
      );
    });

    it('rejects unknown relationships and bad phone numbers', async () => {
      expect(await commands.handle('contacto', 'Rosa Diaz | vecina | 555 222 3333')).toBe(
        'Relacion no valida. Opciones: Esposo/a, Hijo, Hija, Hermano/a, Padre/Madre, Nieto/a, Amigo/a, Vecino/a, ' +
          'Cuidador, Medico, Enfermero/a, Otro.'
      );
      expect(await commands.handle('contacto', 'Laura | Hija | llamar')).toBe('No se pudo guardar, revisa: phoneNumber.');
      expect(await commands.handle('contacto', 'Laura')).toBe(USAGE.contacto);
      expect(await commands.handle('contactos', '')).toBe('No hay contactos de emergencia.');
    });

    it('shows the primary contact and the emergency notes', async () => {
      expect(await commands.handle('emergencia', '')).toBe(
        'No hay contacto principal. Agrega uno con /contacto <nombre> | <relacion> | <telefono> | principal.'
      );

      store.updateProfile(profileId, { emergencyNotes: 'Alergica a la penicilina' });
      store.addEmergencyContact({
        profileId,
        name: 'Laura Hernandez',
        relationship: 'Hija',
        phoneNumber: '555 010 1234',
        alternatePhone: '555 010 9999',
        isPrimary: true,
      });

      expect(await commands.handle('emergencia', '')).toBe(
        [
          'Contacto principal: Laura Hernandez (Hija), 555 010 1234',
          'Telefono alterno: 555 010 9999',
          'Notas: Alergica a la penicilina',
        ].join('\n')
      );
    });
  });

  it('works without a reminder scheduler', async () => {
    const standalone = new CareDataCommands({ store, profileId, timezone: 'UTC' });
    expect(await standalone.handle('medicamento', 'Losartan 50 mg 08:00')).toBe(
      'Medicamento agregado: Losartan 50 mg a las 08:00.'
    );
  });
});

describe('input helpers', () => {
  it('normalizes names', () => {
    expect(normalizeName('  Ácido Fólico ')).toBe('acido folico');
  });

  it('parses readings with a point or a comma', () => {
    expect(parseReading('36,8')).toBe(36.8);
    expect(parseReading('120')).toBe(120);
    expect(parseReading('12a')).toBeNull();
    expect(parseReading('')).toBeNull();
  });
});
