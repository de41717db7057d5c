import fs from 'fs';
import { z } from 'zod';
import { config } from '../config.js';
import { CARE_LEVELS, type AgeBand, type KnowledgeBase } from '../types.js';

const ConditionInfoSchema = z.object({
  description: z.string(),
  careLevel: z.enum(CARE_LEVELS),
  recommendations: z.array(z.string()),
});

const AgeBandSchema = z.object({
  name: z.string().min(1),
  ageRange: z.tuple([z.number(), z.number()]),
  riskMultiplier: z.number().positive(),
});

const KnowledgeBaseFileSchema = z.object({
  symptomConditions: z.record(z.array(z.string())),
  redFlagSymptoms: z.array(z.string()),
  conditions: z.record(ConditionInfoSchema),
  symptomQuestions: z.record(z.array(z.string())),
  defaultQuestions: z.array(z.string()).min(1),
  ageBands: z.array(AgeBandSchema),
  highRiskConditions: z.array(z.string()),
});

export function buildKnowledgeBase(input: unknown): KnowledgeBase {
  const file = KnowledgeBaseFileSchema.parse(input);
  return {
    symptomConditions: new Map(Object.entries(file.symptomConditions)),
    redFlagSymptoms: new Set(file.redFlagSymptoms),
    conditions: new Map(Object.entries(file.conditions)),
    symptomQuestions: new Map(Object.entries(file.symptomQuestions)),
    defaultQuestions: file.defaultQuestions,
    ageBands: file.ageBands,
    highRiskConditions: new Set(file.highRiskConditions),
  };
}

/** Throws on a missing or malformed file; callers load at startup. */
export function loadKnowledgeBase(filePath: string = config.knowledgeBase.path): KnowledgeBase {
  const raw = fs.readFileSync(filePath, 'utf8');
  return buildKnowledgeBase(JSON.parse(raw));
}

let shared: KnowledgeBase | undefined;

export function getKnowledgeBase(): KnowledgeBase {
  if (!shared) shared = loadKnowledgeBase();
  return shared;
}

/** Union of every symptom's candidate conditions, first-seen order. */
export function conditionsForSymptoms(kb: KnowledgeBase, symptoms: string[]): string[] {
  const possible = new Set<string>();
  for (const symptom of symptoms) {
    for (const condition of kb.symptomConditions.get(symptom) ?? []) {
      possible.add(condition);
    }
  }
  return Array.from(possible);
}

// Bands are checked in declaration order; first match wins.
export function findAgeBand(kb: KnowledgeBase, age: number): AgeBand | undefined {
  return kb.ageBands.find((band) => band.ageRange[0] <= age && age <= band.ageRange[1]);
}
