import { getKnowledgeBase } from '../store/knowledgeBase.js';
import type { CareLevel, KnowledgeBase, RecommendationSet, Success } from '../types.js';

type CarePlan = { recommendations: [string, string, string]; nextStep: string };

const CARE_PLANS: Record<CareLevel, CarePlan> = {
  emergency: {
    recommendations: [
      'Seek immediate emergency medical attention',
      'Call 911 or go to the nearest emergency room',
      'Do not delay seeking care',
    ],
    nextStep: 'Emergency care required immediately',
  },
  urgent: {
    recommendations: [
      'Seek medical attention within 24 hours',
      'Contact your primary care doctor or urgent care center',
      'Monitor symptoms closely',
    ],
    nextStep: 'Schedule urgent medical appointment',
  },
  moderate: {
    recommendations: [
      'Schedule appointment with primary care doctor within 2-3 days',
      'Monitor symptoms and seek care if they worsen',
      'Consider over-the-counter treatments for symptom relief',
    ],
    nextStep: 'Schedule medical appointment within few days',
  },
  routine: {
    recommendations: [
      'Consider scheduling routine appointment with primary care doctor',
      'Try conservative home treatments',
      'Monitor symptoms and seek care if they persist or worsen',
    ],
    nextStep: 'Consider routine medical follow-up',
  },
};

const PLANS_BY_LEVEL = new Map<string, CarePlan>(Object.entries(CARE_PLANS));

const GENERAL_RECOMMENDATIONS = [
  'Stay hydrated',
  'Get adequate rest',
  'Monitor symptoms for changes',
  'Keep a symptom diary',
  'Follow up if symptoms worsen or new symptoms develop',
];

const FOLLOW_UP_TIMELINES = new Map<string, string>([
  ['emergency', 'Immediate'],
  ['urgent', 'Within 24 hours'],
  ['moderate', 'Within 2-3 days'],
  ['routine', 'Within 1-2 weeks if symptoms persist'],
]);

export function getFollowUpTimeline(careLevel: string): string {
  return FOLLOW_UP_TIMELINES.get(careLevel) ?? 'As needed';
}

/** Accepts any level string; unknown levels get the routine block and an "As needed" timeline. */
export interface RecommendationInput {
  careLevel?: string;
  immediateAttentionRequired?: boolean;
}

/**
 * The care-level block always fills the three primary slots; condition-specific
 * and general advice go to `additionalRecommendations`.
 */
export function generateCareRecommendations(
  risk: RecommendationInput,
  possibleConditions: string[],
  kb: KnowledgeBase = getKnowledgeBase()
): Success<RecommendationSet> {
  const careLevel = risk.careLevel ?? 'routine';
  const immediateAttention = risk.immediateAttentionRequired ?? false;

  const plan = immediateAttention ? CARE_PLANS.emergency : (PLANS_BY_LEVEL.get(careLevel) ?? CARE_PLANS.routine);
  const recommendations: string[] = [...plan.recommendations];

  for (const condition of possibleConditions) {
    const info = kb.conditions.get(condition);
    if (!info) continue;
    recommendations.push(...info.recommendations.map((rec) => `For ${condition}: ${rec}`));
  }

  return {
    status: 'success',
    careLevel,
    immediateAttentionRequired: immediateAttention,
    primaryRecommendations: recommendations.slice(0, 3),
    additionalRecommendations: [...recommendations.slice(3), ...GENERAL_RECOMMENDATIONS],
    nextSteps: [plan.nextStep],
    followUpTimeline: getFollowUpTimeline(careLevel),
  };
}
