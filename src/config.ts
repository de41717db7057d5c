import dotenv from 'dotenv';
import path from 'path';

dotenv.config();

export const config = {
  port: parseInt(process.env.PORT ?? '4000', 10),
  nodeEnv: process.env.NODE_ENV ?? 'development',
  logLevel: process.env.LOG_LEVEL ?? 'info',
  knowledgeBase: {
    path: process.env.KNOWLEDGE_BASE_PATH ?? path.resolve(__dirname, '../data/knowledge-base.json'),
  },
  patients: {
    dbPath: process.env.PATIENT_DB_PATH ?? './data/patients.json',
  },
  audit: {
    logPath: process.env.AUDIT_LOG_PATH ?? './logs/audit.jsonl',
  },
};

export function isTest(): boolean {
  return config.nodeEnv === 'test';
}

export function isProduction(): boolean {
  return config.nodeEnv === 'production';
}
