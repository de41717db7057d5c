/**
 * Red-flag rules: symptoms whose presence alone means immediate attention,
 * whatever the risk score says.
 */
import { getKnowledgeBase } from '../store/knowledgeBase.js';
import type { KnowledgeBase } from '../types.js';

const EMERGENCY_MESSAGE =
  'Based on the reported symptoms, this may be a medical emergency. Please call 911 (or your local emergency number) now or go to the nearest emergency room.';

export interface RedFlagCheckResult {
  triggered: boolean;
  labels: string[];
  emergencyMessage: string | null;
}

export function toRedFlagToken(symptom: string): string {
  return symptom.toLowerCase().replace(/ /g, '_');
}

export function isRedFlagSymptom(symptom: string, kb: KnowledgeBase = getKnowledgeBase()): boolean {
  return kb.redFlagSymptoms.has(toRedFlagToken(symptom));
}

/** Labels keep input order; a repeated symptom is reported each time. */
export function checkRedFlags(symptoms: string[], kb: KnowledgeBase = getKnowledgeBase()): RedFlagCheckResult {
  const labels = symptoms.filter((s) => isRedFlagSymptom(s, kb));
  return {
    triggered: labels.length > 0,
    labels,
    emergencyMessage: labels.length > 0 ? EMERGENCY_MESSAGE : null,
  };
}
