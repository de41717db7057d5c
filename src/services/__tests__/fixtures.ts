import fs from 'fs';
import os from 'os';
import path from 'path';
import { openPatientTable, type PatientStore } from '../../store/patientTable';
import type { PatientRecord } from '../../types';

export const ELENA: PatientRecord = {
  name: 'Elena',
  age: 71,
  occupation: 'Retired teacher',
  lifestyle: { sleepPattern: '5-6 hours per night', smokingHistory: 'Quit in 2001' },
  medicalHistory: ['hypertension', 'copd'],
  riskFactors: ['smoking_history', 'elderly', 'sedentary_work'],
  previousVisits: [],
  notes: 'Uses inhaler as needed.',
};

export const TOM: PatientRecord = {
  name: 'Tom',
  age: 29,
  occupation: 'Chef',
  lifestyle: { sleepPattern: '7-8 hours' },
  medicalHistory: [],
  riskFactors: [],
  previousVisits: [],
  notes: 'No chronic conditions.',
};

export function tempPatientFile(records: PatientRecord[] = [ELENA, TOM]): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'patients-'));
  const file = path.join(dir, 'patients.json');
  const patients = Object.fromEntries(records.map((r) => [r.name.toLowerCase(), structuredClone(r)]));
  fs.writeFileSync(file, JSON.stringify({ patients }, null, 2));
  return file;
}

export function tempPatientStore(records?: PatientRecord[]): { store: PatientStore; file: string } {
  const file = tempPatientFile(records);
  return { store: openPatientTable(file), file };
}
