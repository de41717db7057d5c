import { getKnowledgeBase } from '../store/knowledgeBase.js';
import { getPatientStore, type PatientStore } from '../store/patientTable.js';
import {
  validationError,
  type ConditionMatch,
  type KnowledgeBase,
  type PatientInfo,
  type PatternAnalysis,
  type RecommendationSet,
  type RiskAssessment,
  type SymptomDetails,
  type ToolResult,
  type VisitNote,
} from '../types.js';
import { matchConditions } from './conditionService.js';
import { lookupPatientRecord, saveVisitSummary } from './patientService.js';
import { checkRedFlags } from './redFlagService.js';
import { assessPatientRisk } from './riskService.js';
import { generateCareRecommendations } from './recommendationService.js';
import { analyzeSymptomPattern } from './symptomPatternService.js';

export interface TriageInput {
  symptoms: string[];
  /** Demographics given inline; ignored when `patientName` resolves to a record. */
  patient?: PatientInfo;
  patientName?: string;
  symptomDetails?: SymptomDetails;
  /** Append a visit note to the named patient's record. */
  saveVisit?: boolean;
}

export interface TriageReport {
  patientName?: string;
  conditions: ConditionMatch;
  pattern?: PatternAnalysis;
  risk: RiskAssessment;
  recommendations: RecommendationSet;
  emergencyAdvice?: string;
  savedVisit?: VisitNote;
  /** Set when the assessment succeeded but the visit note could not be written. */
  visitSaveError?: string;
}

function describeAssessment(risk: RiskAssessment, conditions: ConditionMatch): string {
  const candidates = conditions.possibleConditions.length
    ? conditions.possibleConditions.join(', ')
    : 'none identified';
  return `Care level ${risk.careLevel} (risk score ${risk.riskScore}). Possible conditions: ${candidates}.`;
}

/**
 * Runs the rule pipeline in the order an interviewer would: patient lookup,
 * condition match, pattern analysis, risk score, recommendations, visit note.
 * The first assessment step that does not succeed is returned unchanged; a failed
 * visit save is reported in `visitSaveError` alongside the assessment.
 */
export function runTriage(
  input: TriageInput,
  deps: { kb?: KnowledgeBase; store?: PatientStore } = {}
): ToolResult<TriageReport> {
  const kb = deps.kb ?? getKnowledgeBase();

  let patient = input.patient;
  let patientName: string | undefined;
  if (input.patientName !== undefined) {
    const store = deps.store ?? getPatientStore();
    const lookup = lookupPatientRecord(input.patientName, store);
    if (lookup.status !== 'success') return lookup;
    patientName = lookup.record.name;
    patient = { age: lookup.record.age, medicalHistory: lookup.record.medicalHistory };
  }
  if (!patient) {
    return validationError('Patient age is required: provide patient details or a known patient name');
  }

  const conditions = matchConditions(input.symptoms, kb);
  if (conditions.status !== 'success') return conditions;

  let pattern: PatternAnalysis | undefined;
  if (input.symptomDetails && Object.keys(input.symptomDetails).length) {
    const analysis = analyzeSymptomPattern(input.symptomDetails);
    if (analysis.status !== 'success') return analysis;
    pattern = analysis;
  }

  const risk = assessPatientRisk(input.symptoms, patient, input.symptomDetails, kb);
  if (risk.status !== 'success') return risk;

  const recommendations = generateCareRecommendations(risk, conditions.possibleConditions, kb);
  const red = checkRedFlags(input.symptoms, kb);

  let savedVisit: VisitNote | undefined;
  let visitSaveError: string | undefined;
  if (input.saveVisit) {
    if (!patientName) return validationError('A known patient name is required to save a visit');
    const saved = saveVisitSummary(
      patientName,
      conditions.symptomsAnalyzed,
      describeAssessment(risk, conditions),
      recommendations.primaryRecommendations.join('; '),
      deps.store ?? getPatientStore()
    );
    if (saved.status === 'success') savedVisit = saved.visit;
    else visitSaveError = saved.message;
  }

  return {
    status: 'success',
    patientName,
    conditions,
    pattern,
    risk,
    recommendations,
    emergencyAdvice: red.emergencyMessage ?? undefined,
    savedVisit,
    visitSaveError,
  };
}
