import 'dotenv/config';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { env } from './config/env';
import { classifier, db, pool, ticketRouter } from './lib/container';
import { initializeDatabase } from './db/init';

// Routes
import webhookRouter from './routes/webhook';

const app = express();

// ─── Middleware ────────────────────────────────────────────────────────────────

app.use(helmet());
app.use(cors({ origin: env.CORS_ORIGIN }));
app.use(express.json({ limit: '1mb' }));

app.use((req, res, next) => {
  const started = performance.now();
  res.on('finish', () => {
    const ms = Math.round(performance.now() - started);
    console.log(`[HTTP] ${req.method} ${req.originalUrl} → ${res.statusCode} (${ms}ms)`);
  });
  next();
});

// ─── Routes ───────────────────────────────────────────────────────────────────

app.use('/webhook', webhookRouter);

app.get('/', (_req, res) => {
  res.json({
    success: true,
    data: {
      service: 'ticket-triage',
      version: '1.0.0',
      endpoints: {
        createTicket: 'POST /webhook/ticket',
        ticketStatus: 'GET /webhook/ticket/:ticketId',
        health: 'GET /webhook/health',
        metrics: 'GET /webhook/metrics',
        testEndpoint: 'POST /webhook/test/endpoint',
      },
    },
  });
});

// Health check
app.get('/health', (_req, res) => {
  res.json({ status: 'ok', timestamp: new Date().toISOString() });
});

app.get('/config', (_req, res) => {
  res.json({
    success: true,
    data: {
      environment: env.NODE_ENV,
      classifierModel: env.CLASSIFIER_MODEL,
      aiEnabled: classifier.aiEnabled,
      classificationCacheSize: env.CLASSIFICATION_CACHE_SIZE,
      jiraProjectKey: env.JIRA_PROJECT_KEY,
      jiraAuthConfigured: Boolean(env.JIRA_TOKEN),
      freshserviceAuthConfigured: Boolean(env.FRESHSERVICE_TOKEN),
    },
  });
});

// ─── Error handler ────────────────────────────────────────────────────────────

app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
  console.error(err.stack);
  res.status(500).json({ success: false, error: 'Internal server error' });
});

// ─── Start ────────────────────────────────────────────────────────────────────

async function start(): Promise<void> {
  await initializeDatabase(db);

  const server = app.listen(env.PORT, () => {
    console.log(`🚀 Ticket triage API running on port ${env.PORT}`);
    console.log(`   Environment: ${env.NODE_ENV}`);
    console.log(`   Classifier: ${classifier.aiEnabled ? env.CLASSIFIER_MODEL : 'keyword fallback only'}`);
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down`);
    server.close(() => {
      ticketRouter.close();
      pool
        .end()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          console.error('[Database] Error closing pool:', err);
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

start().catch((err: unknown) => {
  console.error('❌ Failed to start API server:', err);
  process.exit(1);
});

export default app;
