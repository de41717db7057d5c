import { v4 as uuidv4 } from 'uuid';
import { getPatientStore, type PatientStore, type StoreWrite } from '../store/patientTable.js';
import {
  persistenceError,
  validationError,
  type Lifestyle,
  type PatientRecord,
  type Success,
  type ToolResult,
  type VisitNote,
} from '../types.js';

const FIRST_NAME_HINT = 'Please provide your first name. We only use first names in our system.';

const HIGH_RISK_FACTORS = new Set(['smoking_history', 'elderly', 'chronic_sleep_deprivation']);

const RISK_FACTOR_ADVICE: { factor: string; tier: 'high' | 'moderate'; advice: string }[] = [
  { factor: 'smoking_history', tier: 'high', advice: 'Continue smoking cessation support and monitoring' },
  { factor: 'elderly', tier: 'high', advice: 'Regular health screenings and fall prevention measures' },
  { factor: 'chronic_sleep_deprivation', tier: 'high', advice: 'Sleep hygiene counseling and stress management' },
  { factor: 'sedentary_work', tier: 'moderate', advice: 'Ergonomic assessment and regular movement breaks' },
  { factor: 'high_caffeine_intake', tier: 'moderate', advice: 'Gradual caffeine reduction and hydration counseling' },
];

function isBlank(value: string): boolean {
  return !value.trim();
}

/** Maps a failed store write onto the tool result taxonomy. */
function fromStoreFailure(write: Exclude<StoreWrite<PatientRecord>, { ok: true }>): ToolResult<never> {
  switch (write.reason) {
    case 'not_found':
      return { status: 'not_found', message: write.message };
    case 'conflict':
      return validationError(write.message);
    case 'persistence':
      return persistenceError(write.message);
  }
}

export function lookupPatientRecord(
  name: string | undefined,
  store: PatientStore = getPatientStore()
): ToolResult<
  { patientFound: true; record: PatientRecord; message: string },
  { availablePatients: string[]; suggestion: string }
> {
  if (!name || isBlank(name)) {
    return validationError('No patient name provided for lookup. Please provide your first name.');
  }
  const record = store.findPatient(name);
  if (!record) {
    return {
      status: 'not_found',
      message: `No record found for '${name}'.`,
      availablePatients: store.listPatientNames(),
      suggestion: FIRST_NAME_HINT,
    };
  }
  return { status: 'success', patientFound: true, record, message: `Found record for ${record.name}` };
}

export interface MedicalHistorySummary {
  patientName: string;
  age: number;
  occupation: string;
  medicalHistory: string[];
  riskFactors: string[];
  lifestyleFactors: Lifestyle;
  clinicalNotes: string;
  previousVisits: number;
}

export function getPatientMedicalHistory(
  name: string | undefined,
  store: PatientStore = getPatientStore()
): ToolResult<MedicalHistorySummary> {
  if (!name || isBlank(name)) return validationError('No patient name provided');
  const record = store.findPatient(name);
  if (!record) return { status: 'not_found', message: `No medical history found for '${name}'` };
  return {
    status: 'success',
    patientName: record.name,
    age: record.age,
    occupation: record.occupation,
    medicalHistory: record.medicalHistory,
    riskFactors: record.riskFactors,
    lifestyleFactors: record.lifestyle,
    clinicalNotes: record.notes,
    previousVisits: record.previousVisits.length,
  };
}

export interface RiskFactorReview {
  patientName: string;
  age: number;
  highRiskFactors: string[];
  moderateRiskFactors: string[];
  lifestyleRisks: string[];
  totalRiskFactors: number;
  recommendations: string[];
}

export function checkPatientRiskFactors(
  name: string | undefined,
  store: PatientStore = getPatientStore()
): ToolResult<RiskFactorReview> {
  const record = name ? store.findPatient(name) : undefined;
  if (!record) return { status: 'not_found', message: `No record found for '${name ?? ''}'` };

  const highRiskFactors = record.riskFactors.filter((f) => HIGH_RISK_FACTORS.has(f));
  const moderateRiskFactors = record.riskFactors.filter((f) => !HIGH_RISK_FACTORS.has(f));

  const lifestyleRisks: string[] = [];
  if ('sleepPattern' in record.lifestyle && String(record.lifestyle.sleepPattern).includes('5-6 hours')) {
    lifestyleRisks.push('chronic_sleep_deprivation');
  }
  if ('smokingHistory' in record.lifestyle) {
    lifestyleRisks.push('former_smoker_status');
  }

  const recommendations = RISK_FACTOR_ADVICE.filter(({ factor, tier }) =>
    (tier === 'high' ? highRiskFactors : moderateRiskFactors).includes(factor)
  ).map(({ advice }) => advice);

  return {
    status: 'success',
    patientName: record.name,
    age: record.age,
    highRiskFactors,
    moderateRiskFactors,
    lifestyleRisks,
    totalRiskFactors: record.riskFactors.length,
    recommendations,
  };
}

export function listAvailablePatients(
  store: PatientStore = getPatientStore()
): Success<{ totalPatients: number; availablePatients: string[]; message: string }> {
  const names = store.listPatientNames();
  return {
    status: 'success',
    totalPatients: names.length,
    availablePatients: names,
    message: `Found ${names.length} patients in the system. We only use first names: ${names.join(', ')}`,
  };
}

export function saveVisitSummary(
  name: string | undefined,
  symptoms: string[],
  assessment: string,
  recommendations: string,
  store: PatientStore = getPatientStore()
): ToolResult<{ message: string; visitSaved: true; visit: VisitNote }> {
  if (!name || isBlank(name)) return validationError('No patient name provided');

  const visit: VisitNote = {
    id: uuidv4(),
    date: new Date().toISOString(),
    symptoms,
    assessment,
    recommendations,
    visitType: 'diagnostic_consultation',
  };

  const write = store.appendVisit(name.trim(), visit);
  if (!write.ok) {
    if (write.reason === 'not_found') {
      return { status: 'not_found', message: `Could not save visit for '${name}' - patient not found` };
    }
    return fromStoreFailure(write);
  }
  return { status: 'success', message: `Visit summary saved for ${name}`, visitSaved: true, visit };
}

export function onboardNewPatient(
  name: string | undefined,
  age: number,
  occupation: string | undefined,
  lifestyle?: Lifestyle,
  store: PatientStore = getPatientStore()
): ToolResult<{ message: string; patient: PatientRecord; nextSteps: string }> {
  if (!name || isBlank(name)) return validationError('Patient name is required for onboarding');
  if (!Number.isFinite(age) || age < 0 || age > 120) return validationError('Age must be between 0 and 120');
  if (!occupation || isBlank(occupation)) return validationError('Occupation is required for onboarding');

  const write = store.createPatient(name.trim(), age, occupation.trim(), lifestyle);
  if (!write.ok) return fromStoreFailure(write);

  return {
    status: 'success',
    message: `Successfully onboarded ${name} to the system`,
    patient: write.value,
    nextSteps: 'You can now proceed with your medical consultation',
  };
}

export function updatePatientLifestyle(
  name: string | undefined,
  lifestyle: Lifestyle,
  store: PatientStore = getPatientStore()
): ToolResult<{ message: string; patient: PatientRecord }> {
  if (!name || isBlank(name)) return validationError('Patient name is required');

  const record = store.findPatient(name);
  if (!record) {
    return { status: 'not_found', message: `Patient '${name}' not found. Please onboard first.` };
  }

  const write = store.updatePatient(record.name, { lifestyle });
  if (!write.ok) return fromStoreFailure(write);
  return { status: 'success', message: `Successfully updated patient record for ${name}`, patient: write.value };
}

