import { env } from '../config/env';
import { AnthropicTextGenerator } from './anthropic';
import { createDatabase } from './db';
import { TicketClassifier } from '../services/classifierService';
import { TicketRouter } from '../services/routerService';
import { DrizzleTeamMappingStore } from '../services/teamMappingService';
import { DrizzleTicketLogStore } from '../services/ticketLogService';
import type { WorkflowDeps } from '../services/ticketWorkflow';

// Process-wide service instances, built once from the environment.

export const { pool, db } = createDatabase(env.DATABASE_URL);

export const classifier = new TicketClassifier(
  env.ANTHROPIC_API_KEY ? new AnthropicTextGenerator(env.ANTHROPIC_API_KEY, env.CLASSIFIER_MODEL) : null,
  { cacheSize: env.CLASSIFICATION_CACHE_SIZE }
);

export const ticketRouter = new TicketRouter({
  credentials: {
    jiraToken: env.JIRA_TOKEN,
    freshserviceToken: env.FRESHSERVICE_TOKEN,
  },
  jiraProjectKey: env.JIRA_PROJECT_KEY,
});

export const teamMappingStore = new DrizzleTeamMappingStore(db);
export const ticketLogStore = new DrizzleTicketLogStore(db);

export const workflowDeps: WorkflowDeps = {
  classifier,
  router: ticketRouter,
  mappings: teamMappingStore,
  logs: ticketLogStore,
};
