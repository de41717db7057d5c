import { z } from 'zod';

export const SymptomListSchema = z.array(z.string());

const SymptomDetailSchema = z.object({
  severity: z.union([z.string(), z.number()]).nullish(),
  duration: z.string().optional(),
});

export const SymptomDetailsSchema = z.record(SymptomDetailSchema);

// A missing age reads as 0, which falls in the pediatric band.
const PatientInfoSchema = z.object({
  age: z.number().default(0),
  medicalHistory: z.array(z.string()).optional(),
});

const LifestyleSchema = z.record(z.unknown());

export const MatchConditionsBody = z.object({
  symptoms: SymptomListSchema,
});

export const PatternBody = z.object({
  symptomDetails: SymptomDetailsSchema,
});

export const AssessRiskBody = z.object({
  symptoms: SymptomListSchema,
  patient: PatientInfoSchema,
  symptomDetails: SymptomDetailsSchema.optional(),
});

export const RecommendationsBody = z.object({
  risk: z.object({
    careLevel: z.string().optional(),
    immediateAttentionRequired: z.boolean().optional(),
  }),
  possibleConditions: z.array(z.string()).default([]),
});

export const TriageBody = z.object({
  symptoms: SymptomListSchema,
  patient: PatientInfoSchema.optional(),
  patientName: z.string().optional(),
  symptomDetails: SymptomDetailsSchema.optional(),
  saveVisit: z.boolean().optional(),
});

export const OnboardBody = z.object({
  name: z.string(),
  age: z.number(),
  occupation: z.string(),
  lifestyle: LifestyleSchema.optional(),
});

export const LifestyleBody = z.object({
  lifestyle: LifestyleSchema,
});

export const VisitBody = z.object({
  symptoms: z.array(z.string()).default([]),
  assessment: z.string(),
  recommendations: z.string(),
});
