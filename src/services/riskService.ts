import { findAgeBand, getKnowledgeBase } from '../store/knowledgeBase.js';
import {
  validationError,
  type CareLevel,
  type KnowledgeBase,
  type PatientInfo,
  type RiskAssessment,
  type SymptomDetails,
  type ToolResult,
} from '../types.js';
import { isRedFlagSymptom } from './redFlagService.js';
import { parseSeverity } from './symptomPatternService.js';

const RED_FLAG_POINTS = 10;
const HISTORY_POINTS = 3;
const HIGH_SEVERITY_POINTS = 5;
const MODERATE_SEVERITY_POINTS = 2;

export function careLevelForScore(riskScore: number, redFlagCount: number): CareLevel {
  if (redFlagCount > 0 || riskScore >= 20) return 'emergency';
  if (riskScore >= 10) return 'urgent';
  if (riskScore >= 5) return 'moderate';
  return 'routine';
}

/**
 * Scores symptoms against demographics and history.
 *
 * Points are added before the age multiplier is applied and the product is truncated.
 * `riskFactors` lists contributions in order: age, red flags, medical history, severity.
 */
export function assessPatientRisk(
  symptoms: string[],
  patient: PatientInfo,
  symptomDetails?: SymptomDetails,
  kb: KnowledgeBase = getKnowledgeBase()
): ToolResult<RiskAssessment> {
  if (!symptoms.length) {
    return validationError('No symptoms provided for risk assessment');
  }

  let score = 0;
  const riskFactors: string[] = [];

  const band = findAgeBand(kb, patient.age);
  const ageRiskMultiplier = band?.riskMultiplier ?? 1.0;
  if (band && band.riskMultiplier > 1.0) {
    riskFactors.push(`Age group (${band.name}) increases risk`);
  }

  let redFlagCount = 0;
  for (const symptom of symptoms) {
    if (isRedFlagSymptom(symptom, kb)) {
      redFlagCount++;
      score += RED_FLAG_POINTS;
      riskFactors.push(`Red flag symptom: ${symptom}`);
    }
  }

  for (const condition of patient.medicalHistory ?? []) {
    if (kb.highRiskConditions.has(condition.toLowerCase())) {
      score += HISTORY_POINTS;
      riskFactors.push(`Medical history: ${condition}`);
    }
  }

  const details: SymptomDetails = symptomDetails ?? {};
  for (const [symptom, detail] of Object.entries(details)) {
    const severity = parseSeverity(detail.severity);
    if (severity === undefined) continue;
    if (severity >= 8) {
      score += HIGH_SEVERITY_POINTS;
      riskFactors.push(`High severity ${symptom} (severity: ${severity})`);
    } else if (severity >= 6) {
      score += MODERATE_SEVERITY_POINTS;
      riskFactors.push(`Moderate severity ${symptom} (severity: ${severity})`);
    }
  }

  const riskScore = Math.trunc(score * ageRiskMultiplier);
  const careLevel = careLevelForScore(riskScore, redFlagCount);

  return {
    status: 'success',
    riskScore,
    careLevel,
    riskFactors,
    redFlagCount,
    ageRiskMultiplier,
    immediateAttentionRequired: careLevel === 'emergency',
  };
}
