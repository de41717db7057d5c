import fs from 'fs';
import os from 'os';
import path from 'path';
import { runTriage } from '../triageService';
import { openPatientTable } from '../../store/patientTable';
import { tempPatientStore } from './fixtures';

describe('triageService', () => {
  it('returns emergency advice when red flags are present', () => {
    const result = runTriage({ symptoms: ['severe_chest_pain', 'difficulty_breathing'], patient: { age: 45 } });
    if (result.status !== 'success') throw new Error(result.message);
    expect(result.risk.careLevel).toBe('emergency');
    expect(result.conditions.requiresImmediateAttention).toBe(true);
    expect(result.emergencyAdvice).toMatch(/911|emergency/);
    expect(result.recommendations.primaryRecommendations[0]).toBe('Seek immediate emergency medical attention');
    expect(result.recommendations.followUpTimeline).toBe('Immediate');
    expect(result.pattern).toBeUndefined();
  });

  it('uses the patient record when a name is given', () => {
    const { store } = tempPatientStore();
    const result = runTriage({ symptoms: ['cough'], patientName: 'elena' }, { store });
    if (result.status !== 'success') throw new Error(result.message);
    expect(result.patientName).toBe('Elena');
    expect(result.risk.riskFactors).toEqual([
      'Age group (elderly) increases risk',
      'Medical history: hypertension',
      'Medical history: copd',
    ]);
    // (3 + 3) * 1.5
    expect(result.risk.riskScore).toBe(9);
    expect(result.risk.careLevel).toBe('moderate');
    expect(result.recommendations.additionalRecommendations).toContain('For pneumonia: May require antibiotics');
    expect(result.emergencyAdvice).toBeUndefined();
  });

  it('includes a pattern analysis when details are supplied', () => {
    const result = runTriage({
      symptoms: ['chest_pain', 'shortness_of_breath'],
      patient: { age: 50 },
      symptomDetails: { chest_pain: { severity: '7' }, shortness_of_breath: { severity: '5' } },
    });
    if (result.status !== 'success') throw new Error(result.message);
    expect(result.pattern?.urgencyLevel).toBe('emergency');
    expect(result.pattern?.averageSeverity).toBe(6);
    expect(result.risk.riskScore).toBe(2);
    expect(result.risk.careLevel).toBe('routine');
  });

  it('passes through a not_found lookup', () => {
    const { store } = tempPatientStore();
    const result = runTriage({ symptoms: ['cough'], patientName: 'Zed' }, { store });
    expect(result.status).toBe('not_found');
  });

  it('requires patient details or a name', () => {
    const result = runTriage({ symptoms: ['cough'] });
    expect(result).toMatchObject({ status: 'error', kind: 'validation' });
  });

  it('returns the matcher error for an empty symptom list', () => {
    const result = runTriage({ symptoms: [], patient: { age: 30 } });
    expect(result).toEqual({ status: 'error', kind: 'validation', message: 'No symptoms provided for lookup' });
  });

  it('saves a visit note for a known patient', () => {
    const { store } = tempPatientStore();
    const result = runTriage({ symptoms: ['Cough'], patientName: 'Elena', saveVisit: true }, { store });
    if (result.status !== 'success') throw new Error(result.message);
    expect(result.savedVisit?.assessment).toBe(
      'Care level moderate (risk score 9). Possible conditions: common_cold, flu, bronchitis, pneumonia, covid.'
    );
    expect(result.savedVisit?.symptoms).toEqual(['cough']);
    expect(store.findPatient('elena')?.previousVisits).toHaveLength(1);
  });

  it('keeps the assessment when the visit note cannot be written', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'patients-'));
    const blocker = path.join(dir, 'blocker');
    fs.writeFileSync(blocker, '');
    const store = openPatientTable(path.join(blocker, 'patients.json'));
    store.createPatient('Ann', 40, 'Chef');

    const result = runTriage({ symptoms: ['severe_chest_pain'], patientName: 'Ann', saveVisit: true }, { store });
    if (result.status !== 'success') throw new Error(result.message);
    expect(result.risk.careLevel).toBe('emergency');
    expect(result.emergencyAdvice).toBeDefined();
    expect(result.savedVisit).toBeUndefined();
    expect(result.visitSaveError).toBe('Saved visit for Ann but failed to write to file');
  });

  it('refuses to save a visit without a patient name', () => {
    const result = runTriage({ symptoms: ['cough'], patient: { age: 30 }, saveVisit: true });
    expect(result).toMatchObject({ status: 'error', message: 'A known patient name is required to save a visit' });
  });
});
