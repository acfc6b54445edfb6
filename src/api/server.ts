/**
 * Express Review API
 *
 * HTTP layer over the ingestion and review services. Routes:
 * - POST /upload-csv — multipart field "file" (.csv); create a review session
 * - POST /review-contact — dispatch one contact to the requested targets
 * - GET /contacts/:sessionId — all contacts of a session
 * - GET /sessions/:sessionId/dispatch-log — recorded outcomes of a session
 * - GET /health, GET / — liveness
 *
 * Error mapping:
 * - IngestError → 400 (kind in body)
 * - SessionNotFoundError → 404, ContactIndexError → 400
 * - upload larger than MAX_UPLOAD_BYTES → 413
 * - anything else → 500 { error: 'Internal server error' }
 *
 * No contact PII is logged.
 */

import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { appConfig } from '../config.js';
import { createEnrollmentGateways } from '../enrollment/index.js';
import type { EnrollmentGateways, TargetService } from '../enrollment/index.js';
import { IngestError } from '../ingestion/errors.js';
import { ingestCsv } from '../ingestion/ingest.js';
import { reviewContact, toBooleanResults } from '../review/review.js';
import { ContactIndexError, SessionNotFoundError } from '../sessions/errors.js';
import { getContactStore } from '../sessions/store.js';
import { describeError, sanitizeForLog } from '../sanitize.js';
import type { ContactStore } from '../sessions/store.js';
import { createHealthHandler } from './health.js';
import { describeIssues, ReviewContactBodySchema } from './schemas.js';
import type {
  DispatchLogResponse,
  ErrorResponse,
  ReviewContactResponse,
  SessionContactsResponse,
  UploadCsvResponse,
} from './types.js';

export interface AppDependencies {
  /** Defaults to the process-wide registry */
  store?: ContactStore;
  /** Defaults to gateways built from environment credentials */
  gateways?: EnrollmentGateways;
}

/** Body parser errors carry an HTTP status (400 for malformed JSON, 413 for too large) */
function isBodyParserError(err: Error): err is Error & { status: number; type: string } {
  return 'status' in err && typeof err.status === 'number' && 'type' in err;
}

/**
 * Create the Express application with all routes configured.
 *
 * Exported as a factory so tests can inject an isolated store and fake
 * gateways per test case.
 */
export function createApp(deps: AppDependencies = {}) {
  const store = deps.store ?? getContactStore();
  const gateways = deps.gateways ?? createEnrollmentGateways();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: appConfig.server.maxUploadBytes, files: 1 },
  });

  const app = express();
  app.use(express.json());

  app.get('/', (_req: Request, res: Response) => {
    res.json({ message: 'CSV contact review service is running' });
  });

  app.get('/health', createHealthHandler(store));

  app.post('/upload-csv', upload.single('file'), async (req: Request, res: Response<UploadCsvResponse | ErrorResponse>) => {
    const file = req.file;
    if (!file) {
      res.status(400).json({ error: 'Missing file upload (multipart field "file")' });
      return;
    }

    if (!file.originalname.toLowerCase().endsWith('.csv')) {
      console.warn('[api] Rejected upload with non-CSV extension', { fileName: file.originalname });
      res.status(400).json({ error: 'File must be a CSV' });
      return;
    }

    try {
      const result = await ingestCsv(file.buffer, store);

      console.log('[api] CSV ingested', {
        sessionId: result.sessionId,
        totalContacts: result.totalContacts,
        rejectedRows: result.rejectedRows.length,
      });

      res.json({
        sessionId: result.sessionId,
        totalContacts: result.totalContacts,
        contacts: result.previewContacts,
        rejectedRows: result.rejectedRows,
      });
    } catch (error) {
      if (error instanceof IngestError) {
        console.warn('[api] CSV rejected', { kind: error.kind, message: error.message });
        res.status(400).json({
          error: error.message,
          kind: error.kind,
          ...(error.kind === 'missing-columns' ? { missingColumns: error.missingColumns } : {}),
          ...(error.kind === 'empty' ? { rejectedRows: error.rejectedRows } : {}),
        });
        return;
      }
      throw error;
    }
  });

  app.post('/review-contact', async (req: Request, res: Response<ReviewContactResponse | ErrorResponse>) => {
    const parsed = ReviewContactBodySchema.safeParse(req.body);
    if (!parsed.success) {
      console.warn('[api] Invalid review request', sanitizeForLog(req.body));
      res.status(400).json({ error: 'Invalid request body', issues: describeIssues(parsed.error) });
      return;
    }

    const { sessionId, contactIndex, addToMailingList, addToCrm } = parsed.data;
    const targets: TargetService[] = [];
    if (addToMailingList) targets.push('mailingList');
    if (addToCrm) targets.push('crm');

    try {
      const { contact, outcomes } = await reviewContact({ sessionId, contactIndex, targets }, store, gateways);
      res.json({
        contact,
        results: toBooleanResults(outcomes),
        outcomes,
        processed: true,
      });
    } catch (error) {
      if (error instanceof SessionNotFoundError) {
        res.status(404).json({ error: error.message });
        return;
      }
      if (error instanceof ContactIndexError) {
        res.status(400).json({
          error: 'Invalid contact index',
          contactIndex: error.contactIndex,
          totalContacts: error.totalContacts,
        });
        return;
      }
      throw error;
    }
  });

  app.get('/contacts/:sessionId', (req: Request<{ sessionId: string }>, res: Response<SessionContactsResponse | ErrorResponse>) => {
    const session = store.get(req.params.sessionId);
    if (!session) {
      res.status(404).json({ error: 'Review session not found' });
      return;
    }

    res.json({
      sessionId: session.sessionId,
      totalContacts: session.contacts.length,
      contacts: [...session.contacts],
    });
  });

  app.get(
    '/sessions/:sessionId/dispatch-log',
    (req: Request<{ sessionId: string }>, res: Response<DispatchLogResponse | ErrorResponse>) => {
      const entries = store.listDispatchLog(req.params.sessionId);
      if (!entries) {
        res.status(404).json({ error: 'Review session not found' });
        return;
      }

      res.json({ sessionId: req.params.sessionId, entries });
    },
  );

  // Global error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof multer.MulterError) {
      const status = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
      console.warn('[api] Upload rejected', { code: err.code, field: err.field });
      res.status(status).json({ error: err.code === 'LIMIT_FILE_SIZE' ? 'File too large' : err.message });
      return;
    }

    if (isBodyParserError(err) && err.status < 500) {
      res.status(err.status).json({ error: err.status === 400 ? 'Invalid JSON body' : err.message });
      return;
    }

    console.error('[api] Unhandled error:', describeError(err));
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
