import { conditionsForSymptoms, getKnowledgeBase } from '../store/knowledgeBase.js';
import {
  validationError,
  type ClarificationQuestions,
  type ConditionInfo,
  type ConditionMatch,
  type KnowledgeBase,
  type Success,
  type ToolResult,
} from '../types.js';
import { checkRedFlags } from './redFlagService.js';

function normalizeSymptom(symptom: string): string {
  return symptom.toLowerCase().trim();
}

/**
 * Candidate conditions for a symptom list, plus red flags.
 * Symptoms with no table entry are ignored; conditions without detail are left out of `conditionDetails`.
 */
export function matchConditions(
  symptoms: string[],
  kb: KnowledgeBase = getKnowledgeBase()
): ToolResult<ConditionMatch> {
  if (!symptoms.length) {
    return validationError('No symptoms provided for lookup');
  }

  const normalized = symptoms.map(normalizeSymptom);
  const possibleConditions = conditionsForSymptoms(kb, normalized);

  const conditionDetails: Record<string, ConditionInfo> = {};
  for (const condition of possibleConditions) {
    const info = kb.conditions.get(condition);
    if (info) conditionDetails[condition] = info;
  }

  const red = checkRedFlags(normalized, kb);

  return {
    status: 'success',
    symptomsAnalyzed: normalized,
    possibleConditions,
    conditionDetails,
    redFlagSymptoms: red.labels,
    requiresImmediateAttention: red.triggered,
  };
}

/** Unknown symptoms get the generic onset/severity/modifiers questions. */
export function getClarificationQuestions(
  symptom: string,
  kb: KnowledgeBase = getKnowledgeBase()
): Success<ClarificationQuestions> {
  const questions = kb.symptomQuestions.get(normalizeSymptom(symptom)) ?? kb.defaultQuestions;
  return {
    status: 'success',
    symptom,
    clarificationQuestions: [...questions],
  };
}
