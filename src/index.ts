import { createApp } from './app.js';
import { config } from './config.js';
import { logger } from './logger.js';
import { getKnowledgeBase } from './store/knowledgeBase.js';
import { getPatientStore } from './store/patientTable.js';

// Load static tables and patient records up front so a bad file stops startup.
const kb = getKnowledgeBase();
getPatientStore();

createApp().listen(config.port, () => {
  logger.info(
    { port: config.port, symptoms: kb.symptomConditions.size, conditions: kb.conditions.size },
    `Triage API listening on http://localhost:${config.port}`
  );
});
