import type { Router } from 'express';
import express from 'express';
import { z } from 'zod';
import type { IntentRegistryService } from '../../core/registry/IntentRegistryService.js';
import type { UpdateFailure } from '../../core/registry/HotReloadManager.js';
import { toIntentPayload } from '../../core/intents/IntentRecord.js';
import { createLogger, generateCorrelationId } from '../../utils/logger.js';
import { toDecisionPayload, toReportPayload } from './payloads.js';

const classifyBody = z.object({ utterance: z.string({ required_error: 'utterance is required' }) });

const cell = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const bulkBody = z.object({ rows: z.array(z.record(cell), { required_error: 'rows is required' }) });

const validateBody = z.object({
  records: z.array(z.unknown()).optional(),
  mode: z.enum(['replace', 'merge']).default('replace'),
});

/** 422 for rejected input, 503 when the store failed, 409 for stale or conflicting updates. */
function updateStatus(result: { success: boolean; failure?: UpdateFailure }): number {
  if (result.success) return 200;
  switch (result.failure) {
    case 'invalid':
      return 422;
    case 'store-error':
      return 503;
    default:
      return 409;
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
}

export function createIntentRouter(service: IntentRegistryService): Router {
  const logger = createLogger({ component: 'intentRouter' });
  const router = express.Router();

  router.post('/classify', (req, res) => {
    const body = classifyBody.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: describeIssues(body.error) });
      return;
    }
    const decision = service.classify(body.data.utterance);
    res.status(200).json(toDecisionPayload(decision));
  });

  router.get('/intents', (_req, res) => {
    const { version, intents } = service.listIntents();
    res.status(200).json({ version, count: intents.length, intents: intents.map(toIntentPayload) });
  });

  router.get('/intents/:intentId', (req, res) => {
    const record = service.getIntent(req.params.intentId);
    if (!record) {
      res.status(404).json({ error: `No intent with id ${req.params.intentId}` });
      return;
    }
    res.status(200).json(toIntentPayload(record));
  });

  router.post('/intents', (req, res) => {
    const requestLogger = logger.child({ correlationId: generateCorrelationId() });
    const result = service.applySingle(req.body);
    if (result.success) {
      requestLogger.info({ version: result.version }, 'Intent applied');
    }
    res.status(updateStatus(result)).json({
      success: result.success,
      version: result.version,
      report: toReportPayload(result.report),
    });
  });

  router.delete('/intents/:intentId', (req, res) => {
    const requestLogger = logger.child({ correlationId: generateCorrelationId() });
    const result = service.removeIntent(req.params.intentId);
    if (result.success) {
      requestLogger.info({ intentId: req.params.intentId, version: result.version }, 'Intent removed');
    }
    res.status(updateStatus(result)).json({
      success: result.success,
      version: result.version,
      report: toReportPayload(result.report),
    });
  });

  router.post('/intents/bulk', (req, res) => {
    const requestLogger = logger.child({ correlationId: generateCorrelationId() });
    const body = bulkBody.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: describeIssues(body.error) });
      return;
    }
    const report = service.stageBulk(body.data.rows);
    requestLogger.info({ rows: body.data.rows.length, valid: report.valid }, 'Bulk configuration uploaded');
    res.status(report.valid ? 200 : 422).json(toReportPayload(report));
  });

  router.post('/intents/reload', (_req, res) => {
    const requestLogger = logger.child({ correlationId: generateCorrelationId() });
    const result = service.activateStaged();
    requestLogger.info({ success: result.success, version: result.version }, 'Reload requested');
    res.status(updateStatus(result)).json({
      success: result.success,
      version: result.version,
      report: result.report ? toReportPayload(result.report) : null,
    });
  });

  router.post('/intents/validate', (req, res) => {
    const body = validateBody.safeParse(req.body ?? {});
    if (!body.success) {
      res.status(400).json({ error: describeIssues(body.error) });
      return;
    }
    const report = service.validateOnly(body.data.records, body.data.mode);
    res.status(200).json(toReportPayload(report));
  });

  router.get('/health', (_req, res) => {
    const health = service.health();
    res.status(health.status === 'ok' ? 200 : 503).json({ ...health, timestamp: new Date().toISOString() });
  });

  return router;
}
