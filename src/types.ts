/**
 * Triage data models and tool result types.
 * Symptoms are lowercase, underscore-separated tokens such as `chest_pain`.
 */

export const CARE_LEVELS = ['routine', 'moderate', 'urgent', 'emergency'] as const;

export type CareLevel = (typeof CARE_LEVELS)[number];

export interface ConditionInfo {
  description: string;
  careLevel: CareLevel;
  recommendations: string[];
}

export interface AgeBand {
  name: string;
  ageRange: [min: number, max: number];
  riskMultiplier: number;
}

/** Read-only after load; shared by every service call. */
export interface KnowledgeBase {
  symptomConditions: ReadonlyMap<string, readonly string[]>;
  redFlagSymptoms: ReadonlySet<string>;
  conditions: ReadonlyMap<string, ConditionInfo>;
  symptomQuestions: ReadonlyMap<string, readonly string[]>;
  defaultQuestions: readonly string[];
  ageBands: readonly AgeBand[];
  highRiskConditions: ReadonlySet<string>;
}

export interface SymptomDetail {
  severity?: string | number | null;
  duration?: string;
}

export type SymptomDetails = Record<string, SymptomDetail>;

export interface PatientInfo {
  age: number;
  medicalHistory?: string[];
}

// --- tool results ---

export type Success<T> = { status: 'success' } & T;

export type NotFound<E = object> = { status: 'not_found'; message: string } & E;

export interface ToolError {
  status: 'error';
  kind: 'validation' | 'persistence';
  message: string;
}

export type ToolResult<T, E = object> = Success<T> | NotFound<E> | ToolError;

export function validationError(message: string): ToolError {
  return { status: 'error', kind: 'validation', message };
}

export function persistenceError(message: string): ToolError {
  return { status: 'error', kind: 'persistence', message };
}

// --- core outputs ---

export interface ConditionMatch {
  symptomsAnalyzed: string[];
  possibleConditions: string[];
  conditionDetails: Record<string, ConditionInfo>;
  redFlagSymptoms: string[];
  requiresImmediateAttention: boolean;
}

export interface ClarificationQuestions {
  symptom: string;
  clarificationQuestions: string[];
}

export interface PatternAnalysis {
  analyzedSymptoms: string[];
  averageSeverity: number;
  urgencyLevel: CareLevel;
  concerningCombinations: string[];
  patternSummary: string;
}

export interface RiskAssessment {
  riskScore: number;
  careLevel: CareLevel;
  riskFactors: string[];
  redFlagCount: number;
  ageRiskMultiplier: number;
  immediateAttentionRequired: boolean;
}

export interface RecommendationSet {
  /** Echoes the input level, which may be outside `CARE_LEVELS`. */
  careLevel: string;
  immediateAttentionRequired: boolean;
  primaryRecommendations: string[];
  additionalRecommendations: string[];
  nextSteps: string[];
  followUpTimeline: string;
}

// --- patient records ---

export type Lifestyle = Record<string, unknown>;

export interface VisitNote {
  id: string;
  date: string;
  symptoms: string[];
  assessment: string;
  recommendations: string;
  visitType: 'diagnostic_consultation';
}

export interface PatientRecord {
  name: string;
  age: number;
  occupation: string;
  lifestyle: Lifestyle;
  medicalHistory: string[];
  riskFactors: string[];
  previousVisits: VisitNote[];
  notes: string;
}

export type PatientUpdates = Partial<Omit<PatientRecord, 'name' | 'previousVisits'>>;
