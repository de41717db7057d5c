import { Router } from 'express';
import { auditPatientChange } from '../services/auditService.js';
import {
  checkPatientRiskFactors,
  getPatientMedicalHistory,
  listAvailablePatients,
  lookupPatientRecord,
  onboardNewPatient,
  saveVisitSummary,
  updatePatientLifestyle,
} from '../services/patientService.js';
import { parseBody, sendResult } from './respond.js';
import { LifestyleBody, OnboardBody, VisitBody } from './schemas.js';

const router = Router();

router.get('/api/patients', (_req, res) => {
  sendResult(res, listAvailablePatients());
});

router.post('/api/patients', (req, res) => {
  const { name, age, occupation, lifestyle } = parseBody(OnboardBody, req.body);
  const result = onboardNewPatient(name, age, occupation, lifestyle);
  if (result.status === 'success') auditPatientChange('patient_onboarded', result.patient.name);
  sendResult(res, result);
});

router.get('/api/patients/:name', (req, res) => {
  sendResult(res, lookupPatientRecord(req.params.name));
});

router.get('/api/patients/:name/history', (req, res) => {
  sendResult(res, getPatientMedicalHistory(req.params.name));
});

router.get('/api/patients/:name/risk-factors', (req, res) => {
  sendResult(res, checkPatientRiskFactors(req.params.name));
});

router.patch('/api/patients/:name/lifestyle', (req, res) => {
  const { lifestyle } = parseBody(LifestyleBody, req.body);
  const result = updatePatientLifestyle(req.params.name, lifestyle);
  if (result.status === 'success') auditPatientChange('lifestyle_updated', result.patient.name);
  sendResult(res, result);
});

/**
 * POST /api/patients/:name/visits
 * Appends a visit note; the name must match a record exactly (case-insensitive).
 */
router.post('/api/patients/:name/visits', (req, res) => {
  const { symptoms, assessment, recommendations } = parseBody(VisitBody, req.body);
  const result = saveVisitSummary(req.params.name, symptoms, assessment, recommendations);
  if (result.status === 'success') auditPatientChange('visit_saved', req.params.name);
  sendResult(res, result);
});

export default router;
