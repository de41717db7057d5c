import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { config } from '../config.js';
import { logger } from '../logger.js';
import type { Lifestyle, PatientRecord, PatientUpdates, VisitNote } from '../types.js';

export type StoreWrite<T> =
  | { ok: true; value: T }
  | { ok: false; reason: 'not_found' | 'conflict' | 'persistence'; message: string };

export interface PatientStore {
  findPatient(name: string): PatientRecord | undefined;
  listPatientNames(): string[];
  createPatient(name: string, age: number, occupation: string, lifestyle?: Lifestyle): StoreWrite<PatientRecord>;
  appendVisit(name: string, note: VisitNote): StoreWrite<PatientRecord>;
  updatePatient(name: string, updates: PatientUpdates): StoreWrite<PatientRecord>;
}

const VisitNoteSchema = z.object({
  id: z.string(),
  date: z.string(),
  symptoms: z.array(z.string()).default([]),
  assessment: z.string().default(''),
  recommendations: z.string().default(''),
  visitType: z.literal('diagnostic_consultation').default('diagnostic_consultation'),
});

// Optional sections default to empty so older or hand-edited records load whole.
const PatientRecordSchema = z.object({
  name: z.string().min(1),
  age: z.number(),
  occupation: z.string(),
  lifestyle: z.record(z.unknown()).default({}),
  medicalHistory: z.array(z.string()).default([]),
  riskFactors: z.array(z.string()).default([]),
  previousVisits: z.array(VisitNoteSchema).default([]),
  notes: z.string().default(''),
});

const PatientFileSchema = z.object({
  patients: z.record(PatientRecordSchema).default({}),
});

interface PatientFile {
  patients: Record<string, PatientRecord>;
}

// Name and visit history are never replaced through an update.
const UPDATABLE_FIELDS = [
  'age',
  'occupation',
  'lifestyle',
  'medicalHistory',
  'riskFactors',
  'notes',
] as const satisfies readonly (keyof PatientUpdates)[];

function keyFor(name: string): string {
  return name.toLowerCase().trim();
}

function ensureDir(filePath: string) {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
}

function loadFromDisk(dbPath: string): Map<string, PatientRecord> {
  const patients = new Map<string, PatientRecord>();
  if (!fs.existsSync(dbPath)) {
    logger.warn({ dbPath }, 'patient file not found, starting empty');
    return patients;
  }
  const raw = fs.readFileSync(dbPath, 'utf8');
  if (!raw.trim()) return patients;
  // Throws on a malformed file so it is never overwritten with an empty table.
  const parsed = PatientFileSchema.parse(JSON.parse(raw));
  for (const [key, record] of Object.entries(parsed.patients)) {
    patients.set(key, record);
  }
  return patients;
}

/**
 * JSON-file patient table keyed by lowercased first name.
 * Every write rewrites the whole file; a failed write leaves the in-memory change in place.
 */
export function openPatientTable(dbPath: string): PatientStore {
  const patients = loadFromDisk(dbPath);

  function persist(): boolean {
    try {
      ensureDir(dbPath);
      const file: PatientFile = { patients: Object.fromEntries(patients) };
      fs.writeFileSync(dbPath, JSON.stringify(file, null, 2));
      return true;
    } catch (err) {
      logger.error({ err, dbPath }, 'failed to write patient file');
      return false;
    }
  }

  function saved(record: PatientRecord, failure: string): StoreWrite<PatientRecord> {
    return persist() ? { ok: true, value: record } : { ok: false, reason: 'persistence', message: failure };
  }

  return {
    findPatient(name) {
      const query = keyFor(name);
      if (!query) return undefined;
      const exact = patients.get(query);
      if (exact) return exact;
      for (const [key, record] of patients) {
        if (key.includes(query) || record.name.toLowerCase().includes(query)) return record;
      }
      return undefined;
    },

    listPatientNames() {
      return Array.from(patients.values(), (p) => p.name);
    },

    createPatient(name, age, occupation, lifestyle) {
      const key = keyFor(name);
      if (patients.has(key)) {
        return { ok: false, reason: 'conflict', message: `Patient '${name}' already exists in the system` };
      }
      const record: PatientRecord = {
        name: name.trim(),
        age,
        occupation,
        lifestyle: lifestyle ?? {},
        medicalHistory: [],
        riskFactors: [],
        previousVisits: [],
        notes: `New patient - ${name}, ${age}, ${occupation}`,
      };
      patients.set(key, record);
      return saved(record, `Created patient record for ${name} but failed to save to file`);
    },

    appendVisit(name, note) {
      const record = patients.get(keyFor(name));
      if (!record) {
        return { ok: false, reason: 'not_found', message: `Patient '${name}' not found in the system` };
      }
      record.previousVisits.push(note);
      return saved(record, `Saved visit for ${name} but failed to write to file`);
    },

    updatePatient(name, updates) {
      const record = patients.get(keyFor(name));
      if (!record) {
        return { ok: false, reason: 'not_found', message: `Patient '${name}' not found in the system` };
      }
      const next: PatientRecord = { ...record };
      for (const field of UPDATABLE_FIELDS) {
        if (updates[field] !== undefined) Object.assign(next, { [field]: updates[field] });
      }
      patients.set(keyFor(name), next);
      return saved(next, `Updated patient record for ${name} but failed to save to file`);
    },
  };
}

let shared: PatientStore | undefined;

export function getPatientStore(): PatientStore {
  if (!shared) shared = openPatientTable(config.patients.dbPath);
  return shared;
}
