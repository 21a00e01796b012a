import cors from 'cors';
import express, { type ErrorRequestHandler, type Express, type RequestHandler } from 'express';
import path from 'node:path';
import { LoginRequestSchema, RegisterRequestSchema } from '../../application/dto/AuthRequestDTO.js';
import { toStoredFinancialRecord } from '../../application/dto/FinancialRecordDTO.js';
import { QueryRequestSchema } from '../../application/dto/QueryRequestDTO.js';
import { isServiceError } from '../../application/errors/ServiceError.js';
import { AppContainer } from '../bootstrap/AppContainer.js';

const pages: Record<string, string> = {
  '/': 'login.html',
  '/register': 'register.html',
  '/chat_page': 'chat.html',
  '/insights': 'insights.html',
  '/portfolio': 'portfolio.html',
};

const statusOf = (error: unknown): number | undefined => {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
};

const isMalformedBody = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'type' in error && error.type === 'entity.parse.failed';

export const createApp = (container: AppContainer): Express => {
  const app = express();
  const httpLogger = container.logger.child({ module: 'http' });
  const frontendDir = container.config.frontend.dir;

  const logRequests: RequestHandler = (req, res, next) => {
    const startedAt = Date.now();
    res.on('finish', () => {
      httpLogger.debug(
        { method: req.method, path: req.path, status: res.statusCode, durationMs: Date.now() - startedAt },
        'request completed',
      );
    });
    next();
  };

  app.use(logRequests);
  app.use(cors({ origin: '*', credentials: false }));

  // API bodies are read as JSON whatever their Content-Type says.
  const jsonBody = express.json({ limit: '1mb', type: () => true });

  // ---------- Pages ----------
  for (const [route, file] of Object.entries(pages)) {
    app.get(route, (req, res, next) => {
      res.sendFile(path.join(frontendDir, file), (err) => {
        if (err) {
          next(err);
        }
      });
    });
  }

  app.use('/static', express.static(path.join(frontendDir, 'static')));

  // ---------- API ----------
  app.post('/login', jsonBody, async (req, res, next) => {
    try {
      const result = await container.authService.login(LoginRequestSchema.parse(req.body));
      res.json({ success: true, user: result.user, finance: toStoredFinancialRecord(result.finance) });
    } catch (error) {
      next(error);
    }
  });

  app.post('/register', jsonBody, async (req, res, next) => {
    try {
      await container.authService.register(RegisterRequestSchema.parse(req.body));
      res.json({ success: true, message: 'Registered successfully' });
    } catch (error) {
      if (isServiceError(error) && error.status === 409) {
        res.status(409).json({ success: false, message: error.message });
        return;
      }
      next(error);
    }
  });

  app.get('/mcp/:phone', async (req, res, next) => {
    try {
      const record = await container.financeService.getRecord(req.params.phone);
      res.json(toStoredFinancialRecord(record));
    } catch (error) {
      next(error);
    }
  });

  app.post('/update_finance/:phone', jsonBody, async (req, res, next) => {
    try {
      const record = await container.financeService.updateRecord(req.params.phone, req.body);
      res.json({ success: true, finance: toStoredFinancialRecord(record) });
    } catch (error) {
      next(error);
    }
  });

  app.post('/query', jsonBody, async (req, res, next) => {
    try {
      const { phone, message } = QueryRequestSchema.parse(req.body);
      const reply = await container.queryService.respond(phone, message);
      res.json({ reply });
    } catch (error) {
      next(error);
    }
  });

  app.get('/health', (req, res) => {
    res.json({ status: 'ok', time: container.clock.now().toISOString() });
  });

  app.use((req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  const handleErrors: ErrorRequestHandler = (error: unknown, req, res, _next) => {
    if (isServiceError(error)) {
      res.status(error.status).type('text/plain').send(error.message);
      return;
    }

    if (isMalformedBody(error)) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }

    const status = statusOf(error) ?? 500;
    if (status === 404) {
      res.status(404).json({ error: 'Not found' });
      return;
    }

    const message = error instanceof Error ? error.message : 'Unknown error';
    if (status >= 500) {
      httpLogger.error({ err: error, method: req.method, path: req.path }, 'request failed');
    }
    res.status(status).json({ error: message });
  };

  app.use(handleErrors);

  return app;
};
