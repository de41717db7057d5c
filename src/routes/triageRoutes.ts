import { Router } from 'express';
import { auditCareDecision } from '../services/auditService.js';
import { getClarificationQuestions, matchConditions } from '../services/conditionService.js';
import { generateCareRecommendations } from '../services/recommendationService.js';
import { assessPatientRisk } from '../services/riskService.js';
import { analyzeSymptomPattern } from '../services/symptomPatternService.js';
import { runTriage } from '../services/triageService.js';
import { parseBody, sendResult } from './respond.js';
import {
  AssessRiskBody,
  MatchConditionsBody,
  PatternBody,
  RecommendationsBody,
  TriageBody,
} from './schemas.js';

const router = Router();

/**
 * POST /api/conditions/match
 * Candidate conditions and red flags for a symptom list.
 */
router.post('/api/conditions/match', (req, res) => {
  const { symptoms } = parseBody(MatchConditionsBody, req.body);
  sendResult(res, matchConditions(symptoms));
});

router.get('/api/symptoms/:symptom/questions', (req, res) => {
  sendResult(res, getClarificationQuestions(req.params.symptom));
});

router.post('/api/symptoms/pattern', (req, res) => {
  const { symptomDetails } = parseBody(PatternBody, req.body);
  sendResult(res, analyzeSymptomPattern(symptomDetails));
});

router.post('/api/risk/assess', (req, res) => {
  const { symptoms, patient, symptomDetails } = parseBody(AssessRiskBody, req.body);
  const result = assessPatientRisk(symptoms, patient, symptomDetails);
  if (result.status === 'success') auditCareDecision('risk_assessment', result);
  sendResult(res, result);
});

router.post('/api/recommendations', (req, res) => {
  const { risk, possibleConditions } = parseBody(RecommendationsBody, req.body);
  sendResult(res, generateCareRecommendations(risk, possibleConditions));
});

/**
 * POST /api/triage
 * Full pipeline; optionally records a visit note when `saveVisit` is set with a known `patientName`.
 */
router.post('/api/triage', (req, res) => {
  const input = parseBody(TriageBody, req.body);
  const result = runTriage(input);
  if (result.status === 'success') {
    auditCareDecision('triage', result.risk, result.patientName);
  }
  sendResult(res, result);
});

export default router;
