import cors from 'cors';
import express, { type NextFunction, type Request, type Response } from 'express';
import multer from 'multer';
import { z, ZodError } from 'zod';
import { CandidateTransactionSchema, toCandidateTransactions } from './application/dto/CandidateTransactionDTO.js';
import type {
  AwaitingConfirmationAttempt,
  CheckingFuzzyAttempt,
  ImportAttempt,
} from './application/dto/ReconciliationDTO.js';
import type { UploadedFileDTO } from './application/dto/UploadedFileDTO.js';
import {
  AttemptNotFoundError,
  EmptyBatchError,
  InvalidTransitionError,
  UnsupportedFileError,
  formatError,
} from './application/errors/ReconciliationErrors.js';
import { resolveMimeType } from './infrastructure/adapters/extraction/PdfPageRenderer.js';
import type { AppContainer } from './infrastructure/bootstrap/AppContainer.js';

const ReviewBodySchema = z.object({
  issuer: z.string().optional(),
  transactions: z.array(CandidateTransactionSchema).optional(),
});

const PeriodQuerySchema = z.enum(['all', 'current_month', 'last_month', '3_months', '6_months']).default('all');

const statusFor = (error: unknown): number => {
  if (error instanceof AttemptNotFoundError) return 404;
  if (error instanceof InvalidTransitionError) return 409;
  if (error instanceof EmptyBatchError) return 422;
  if (error instanceof UnsupportedFileError) return 415;
  if (error instanceof multer.MulterError) return error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
  // express.json() reports a malformed body as a SyntaxError.
  if (error instanceof ZodError || error instanceof SyntaxError) return 400;
  return 500;
};

const sendError = (res: Response, error: unknown, fallback: string) => {
  const status = statusFor(error);
  if (status >= 500) {
    console.error(`${fallback}:`, error);
  }
  const message = error instanceof ZodError ? error.issues.map((issue) => issue.message).join('; ') : formatError(error);
  res.status(status).json({ error: message || fallback });
};

export interface ServerOptions {
  now?: () => number;
}

interface PendingImport {
  attempt: CheckingFuzzyAttempt | AwaitingConfirmationAttempt;
  touchedAt: number;
}

export const createServer = (container: AppContainer, options: ServerOptions = {}) => {
  const app = express();
  const now = options.now ?? (() => Date.now());
  const { pendingTtlMinutes } = container.config.imports;
  // Imports waiting for review or for a duplicate confirmation, by attempt id.
  const pendingAttempts = new Map<string, PendingImport>();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: 10 * 1024 * 1024, // 10MB max
    },
    fileFilter: (req, file, cb) => {
      if (resolveMimeType({ filename: file.originalname, mimeType: file.mimetype })) {
        cb(null, true);
      } else {
        cb(new UnsupportedFileError(file.originalname));
      }
    },
  });

  const sweepExpired = () => {
    const cutoff = now() - pendingTtlMinutes * 60_000;
    let expired = 0;
    for (const [id, entry] of pendingAttempts) {
      if (entry.touchedAt < cutoff) {
        pendingAttempts.delete(id);
        expired += 1;
      }
    }
    if (expired > 0) {
      console.log(`🧹 Dropped ${expired} pending imports idle for more than ${pendingTtlMinutes} minutes`);
    }
  };

  const takePending = (attemptId: string) => {
    const entry = pendingAttempts.get(attemptId);
    if (!entry) {
      throw new AttemptNotFoundError(attemptId);
    }
    return entry.attempt;
  };

  const track = (attempt: ImportAttempt) => {
    if (attempt.state === 'CHECKING_FUZZY' || attempt.state === 'AWAITING_CONFIRMATION') {
      pendingAttempts.set(attempt.id, { attempt, touchedAt: now() });
    } else {
      pendingAttempts.delete(attempt.id);
    }
    return attempt;
  };

  app.use(cors({ origin: '*', credentials: false }));
  app.use(express.json({ limit: '2mb' }));
  app.use('/api/imports', (req, res, next) => {
    sweepExpired();
    next();
  });

  app.get('/api/health', (req, res) => {
    res.json({
      name: 'Statement Reconciliation API',
      version: '0.1.0',
      storage: container.config.storage.driver,
      extractionConfigured: container.hasLiveExtraction(),
    });
  });

  app.post('/api/imports', upload.array('statements', 20), async (req, res) => {
    try {
      const uploaded = Array.isArray(req.files) ? req.files : [];
      if (uploaded.length === 0) {
        return res.status(400).json({ error: 'No statement files provided. Please upload at least one file.' });
      }

      const files: UploadedFileDTO[] = uploaded.map((file) => ({
        filename: file.originalname,
        mimeType: file.mimetype,
        content: file.buffer,
      }));
      const password = typeof req.body.password === 'string' ? req.body.password : undefined;

      const service = container.reconciliationService;
      const attempt = track(await service.stage(service.begin(files), { password }));

      console.log('📥 Import staged:', {
        attemptId: attempt.id,
        state: attempt.state,
        rejected: attempt.rejections.length,
        transactions: attempt.state === 'CHECKING_FUZZY' ? attempt.batch.transactions.length : 0,
      });

      res.json(attempt);
    } catch (error) {
      sendError(res, error, 'Unable to read the uploaded statements');
    }
  });

  app.post('/api/imports/:attemptId/reconcile', async (req, res) => {
    try {
      const attempt = takePending(req.params.attemptId);
      if (attempt.state !== 'CHECKING_FUZZY') {
        throw new InvalidTransitionError(attempt.id, attempt.state, 'be reviewed');
      }

      const body = ReviewBodySchema.parse(req.body ?? {});
      const next = await container.reconciliationService.reconcile(attempt, {
        issuer: body.issuer,
        transactions: body.transactions && toCandidateTransactions(body.transactions),
      });

      res.json(track(next));
    } catch (error) {
      sendError(res, error, 'Unable to check the import for duplicates');
    }
  });

  app.post('/api/imports/:attemptId/confirm', async (req, res) => {
    try {
      const attempt = takePending(req.params.attemptId);
      if (attempt.state !== 'AWAITING_CONFIRMATION') {
        throw new InvalidTransitionError(attempt.id, attempt.state, 'be confirmed');
      }

      res.json(track(await container.reconciliationService.confirm(attempt)));
    } catch (error) {
      sendError(res, error, 'Unable to save the import');
    }
  });

  app.post('/api/imports/:attemptId/cancel', (req, res) => {
    try {
      const attempt = takePending(req.params.attemptId);
      if (attempt.state !== 'AWAITING_CONFIRMATION') {
        throw new InvalidTransitionError(attempt.id, attempt.state, 'be cancelled');
      }

      res.json(track(container.reconciliationService.cancel(attempt)));
    } catch (error) {
      sendError(res, error, 'Unable to cancel the import');
    }
  });

  app.get('/api/statements', async (req, res) => {
    try {
      res.json({ statements: await container.storage.listStatements() });
    } catch (error) {
      sendError(res, error, 'Unable to load statements');
    }
  });

  app.delete('/api/statements/:statementId', async (req, res) => {
    try {
      const statementId = z.coerce.number().int().positive().parse(req.params.statementId);
      const deleted = await container.storage.deleteStatement(statementId);
      if (!deleted) {
        return res.status(404).json({ error: `Statement ${statementId} not found` });
      }
      res.json({ deleted: statementId });
    } catch (error) {
      sendError(res, error, 'Unable to delete the statement');
    }
  });

  app.get('/api/transactions', async (req, res) => {
    try {
      const period = PeriodQuerySchema.parse(req.query.period);
      res.json({ period, transactions: await container.storage.loadTransactions(period) });
    } catch (error) {
      sendError(res, error, 'Unable to load transactions');
    }
  });

  app.get('/api/issuers', async (req, res) => {
    try {
      res.json({ issuers: await container.storage.listIssuers() });
    } catch (error) {
      sendError(res, error, 'Unable to load issuers');
    }
  });

  app.use('/api', (req, res) => {
    res.status(404).json({ error: 'API endpoint not found' });
  });

  // Errors raised by middleware (upload limits, file filter, malformed JSON) end up here.
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    sendError(res, error, 'Request failed');
  });

  return app;
};
