import {
  validationError,
  type CareLevel,
  type PatternAnalysis,
  type SymptomDetails,
  type ToolResult,
} from '../types.js';

/**
 * Integer severity, or undefined when the value is missing or not a whole number.
 * Numbers are truncated ("7.5" as text is rejected, 7.5 as a number reads as 7).
 */
export function parseSeverity(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : undefined;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return /^[+-]?\d+$/.test(trimmed) ? parseInt(trimmed, 10) : undefined;
  }
  return undefined;
}

/**
 * One decimal place, with an exact tie between two tenths going to the even digit.
 * Only quarter values are exact binary ties, so everything else is left to `toFixed`.
 */
export function formatOneDecimal(value: number): string {
  if (Number.isInteger(value * 4) && !Number.isInteger(value * 2)) {
    const lower = Math.floor(value * 10);
    const tenths = lower % 2 === 0 ? lower : lower + 1;
    return (tenths / 10).toFixed(1);
  }
  return value.toFixed(1);
}

function baselineUrgency(averageSeverity: number): CareLevel {
  if (averageSeverity >= 8) return 'urgent';
  if (averageSeverity >= 6) return 'moderate';
  return 'routine';
}

export function analyzeSymptomPattern(details: SymptomDetails): ToolResult<PatternAnalysis> {
  const symptoms = Object.keys(details);
  if (!symptoms.length) {
    return validationError('No symptom details provided');
  }

  const severities: number[] = [];
  for (const detail of Object.values(details)) {
    const severity = parseSeverity(detail.severity);
    if (severity !== undefined) severities.push(severity);
  }

  const averageSeverity = severities.length
    ? severities.reduce((sum, s) => sum + s, 0) / severities.length
    : 0;

  let urgency = baselineUrgency(averageSeverity);
  const concerningCombinations: string[] = [];
  const present = new Set(symptoms);

  if (present.has('chest_pain') && present.has('shortness_of_breath')) {
    concerningCombinations.push('chest_pain_with_breathing_difficulty');
    urgency = 'emergency';
  }

  // Raises to urgent but never lowers an emergency set above.
  if (present.has('severe_headache') && present.has('fever')) {
    concerningCombinations.push('headache_with_fever');
    if (urgency !== 'emergency') urgency = 'urgent';
  }

  return {
    status: 'success',
    analyzedSymptoms: symptoms,
    averageSeverity,
    urgencyLevel: urgency,
    concerningCombinations,
    patternSummary: `Patient reports ${symptoms.length} symptoms with average severity ${formatOneDecimal(averageSeverity)}`,
  };
}
