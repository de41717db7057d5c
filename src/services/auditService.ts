import fs from 'fs';
import path from 'path';
import { config } from '../config.js';
import { logger } from '../logger.js';
import type { CareLevel } from '../types.js';

export interface AuditEntry {
  at: string;
  type: 'triage' | 'risk_assessment' | 'patient_onboarded' | 'lifestyle_updated' | 'visit_saved' | 'error';
  patient?: string;
  payload?: Record<string, unknown>;
}

function ensureLogDir(): string {
  const dir = path.dirname(config.audit.logPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  return config.audit.logPath;
}

/** Append-only JSON lines. A failed write is logged and otherwise ignored. */
export function logAudit(entry: Omit<AuditEntry, 'at'> & { at?: string }): void {
  const line = JSON.stringify({ ...entry, at: entry.at ?? new Date().toISOString() }) + '\n';
  try {
    fs.appendFileSync(ensureLogDir(), line);
  } catch (err) {
    logger.error({ err }, 'audit log write failed');
  }
}

export function auditCareDecision(
  type: 'triage' | 'risk_assessment',
  decision: { careLevel: CareLevel; riskScore: number; redFlagCount: number },
  patient?: string
): void {
  const { careLevel, riskScore, redFlagCount } = decision;
  logAudit({ type, patient, payload: { careLevel, riskScore, redFlagCount } });
}

export function auditPatientChange(type: 'patient_onboarded' | 'lifestyle_updated' | 'visit_saved', patient: string): void {
  logAudit({ type, patient });
}
