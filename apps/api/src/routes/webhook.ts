import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { PRIORITIES, TicketValidationError, createIncomingTicket, createProcessedTicket } from '@ticket-triage/domain';
import {
  classifier,
  teamMappingStore,
  ticketLogStore,
  ticketRouter,
  workflowDeps,
} from '../lib/container';
import { newTicketId } from '../lib/ticketId';
import { processTicketWorkflow } from '../services/ticketWorkflow';

const router = Router();

const createTicketSchema = z.object({
  title: z.string().min(1).max(200),
  description: z.string().min(1).max(5000),
  email: z.string().email(),
  priority: z.enum(PRIORITIES).default('medium'),
  metadata: z.record(z.unknown()).default({}),
});

const testEndpointSchema = z.object({
  url: z.string().url(),
  method: z.string().min(1).default('GET'),
});

// POST /webhook/ticket
router.post('/ticket', (req: Request, res: Response): void => {
  const started = performance.now();

  const parsed = createTicketSchema.safeParse(req.body);
  if (!parsed.success) {
    res.status(400).json({ success: false, error: parsed.error.flatten() });
    return;
  }

  const ticketId = newTicketId();

  try {
    const ticket = createProcessedTicket(createIncomingTicket(parsed.data), ticketId);
    console.log(`[Webhook] ${ticketId} received: "${ticket.title}" from ${ticket.email} (${ticket.priority})`);

    // Processing continues after the response; the workflow never rejects
    processTicketWorkflow(ticket, workflowDeps).catch((err: unknown) => {
      console.error(`[Webhook] ${ticketId} background processing crashed:`, err);
    });

    res.status(202).json({
      success: true,
      data: {
        ticketId,
        status: ticket.status,
        message: 'Ticket received and queued for processing',
        processingTimeMs: Math.round(performance.now() - started),
      },
    });
  } catch (err) {
    if (err instanceof TicketValidationError) {
      res.status(400).json({ success: false, error: err.message });
      return;
    }
    throw err;
  }
});

// GET /webhook/ticket/:ticketId
router.get('/ticket/:ticketId', async (req: Request, res: Response): Promise<void> => {
  try {
    const record = await ticketLogStore.findByTicketId(req.params.ticketId);
    if (!record) {
      res.status(404).json({ success: false, error: 'Ticket not found' });
      return;
    }

    res.json({
      success: true,
      data: {
        ticketId: record.ticketId,
        title: record.title,
        status: record.status,
        department: record.department,
        assignedTo: record.assignedTo,
        confidenceScore: record.confidenceScore,
        externalTicketId: record.externalTicketId,
        routedToSystem: record.routedToSystem,
        errorMessage: record.errorMessage,
        createdAt: record.createdAt,
        updatedAt: record.updatedAt,
      },
    });
  } catch (err) {
    console.error(`[Webhook] Failed to load ticket ${req.params.ticketId}:`, err);
    res.status(500).json({ success: false, error: 'Error retrieving ticket status' });
  }
});

// GET /webhook/health
router.get('/health', async (_req: Request, res: Response): Promise<void> => {
  let database: 'healthy' | 'unhealthy' = 'healthy';
  try {
    await ticketLogStore.ping();
  } catch (err) {
    console.error('[Webhook] Database health check failed:', err);
    database = 'unhealthy';
  }

  const components = {
    database,
    classifier: classifier.aiEnabled ? 'healthy' : 'fallback-only',
    router: 'healthy',
  };
  const status = database === 'healthy' ? 'healthy' : 'degraded';

  res.status(status === 'healthy' ? 200 : 503).json({
    success: status === 'healthy',
    data: { status, timestamp: new Date().toISOString(), components },
  });
});

// GET /webhook/metrics
router.get('/metrics', async (_req: Request, res: Response): Promise<void> => {
  try {
    const [metrics, mappings] = await Promise.all([
      ticketLogStore.getMetrics(),
      teamMappingStore.findAllActive(),
    ]);
    res.json({
      success: true,
      data: {
        ...metrics,
        activeTeamMappings: mappings.length,
        classifier: classifier.getStats(),
        router: ticketRouter.getStats(),
      },
    });
  } catch (err) {
    console.error('[Webhook] Failed to load metrics:', err);
    res.status(500).json({ success: false, error: 'Failed to retrieve metrics' });
  }
});

// POST /webhook/test/endpoint
router.post('/test/endpoint', async (req: Request, res: Response): Promise<void> => {
  const parsed = testEndpointSchema.safeParse(req.body);
  if (!parsed.success) {
    res.status(400).json({ success: false, error: parsed.error.flatten() });
    return;
  }

  const result = await ticketRouter.testEndpoint(parsed.data.url, parsed.data.method);
  res.json({ success: true, data: { testResult: result, timestamp: new Date().toISOString() } });
});

export default router;
