import express, { Request, Response, NextFunction } from 'express';
import mongoose from 'mongoose';
import cors from 'cors';
import { config } from './core/config';
import { logger } from './core/logger';
import { ShipmentQnAError, ValidationError, errorMessage } from './core/errors';
import { runQuestion } from './graph/graph';
import { PipelineDeps, createDefaultDeps } from './graph/deps';
import './models';
import { maskSensitiveData, normalizeConsigneeCodes, secureLog } from './utils/security';

/** Header the authenticating gateway sets with the caller's consignee codes. */
export const SCOPE_HEADER = 'x-consignee-scope';

export function createApp(deps: PipelineDeps) {
  const app = express();
  app.use(cors({
    origin: '*',
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', SCOPE_HEADER],
  }));
  app.use(express.json({ limit: '1mb' }));

  app.use((req: Request, res: Response, next: NextFunction) => {
    logger.info('Request', secureLog({
      method: req.method,
      path: req.path,
      consignees: normalizeConsigneeCodes(req.headers[SCOPE_HEADER]),
    }));
    next();
  });

  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  app.post('/api/chat', async (req: Request, res: Response, next: NextFunction) => {
    const controller = new AbortController();
    const onClose = () => {
      if (!res.writableEnded) controller.abort();
    };
    res.on('close', onClose);

    try {
      const body: unknown = req.body;
      const question = typeof body === 'object' && body !== null && 'question' in body ? body.question : undefined;
      const conversationId =
        typeof body === 'object' && body !== null && 'conversationId' in body ? body.conversationId : undefined;

      if (typeof question !== 'string' || !question.trim()) {
        throw new ValidationError('question is required');
      }
      if (conversationId !== undefined && typeof conversationId !== 'string') {
        throw new ValidationError('conversationId must be a string');
      }

      const response = await runQuestion(
        {
          question,
          conversationId,
          principal: { consigneeIds: normalizeConsigneeCodes(req.headers[SCOPE_HEADER]) },
        },
        deps,
        { signal: controller.signal }
      );

      res.json(response);
    } catch (error) {
      next(error);
    } finally {
      res.off('close', onClose);
    }
  });

  app.use((error: Error, req: Request, res: Response, _next: NextFunction) => {
    logger.error('Request failed', secureLog({
      error: error.message,
      path: req.path,
    }));

    if (error instanceof ShipmentQnAError) {
      res.status(error.statusCode).json({
        success: false,
        message: error.message,
        error: { message: error.message, code: error.code },
      });
    } else {
      res.status(500).json({
        success: false,
        message: 'Internal server error',
        error: { message: 'Internal server error', code: 'INTERNAL_ERROR' },
      });
    }
  });

  return app;
}

async function connectDatabase() {
  await mongoose.connect(config.mongodb.uri, {
    dbName: config.mongodb.dbName,
  });
  logger.info('Connected to MongoDB', {
    dbName: config.mongodb.dbName,
    uri: maskSensitiveData(config.mongodb.uri),
  });
}

async function startServer() {
  await connectDatabase();
  const app = createApp(createDefaultDeps());

  app.listen(config.server.port, () => {
    logger.info('Shipment Q&A server started', {
      port: config.server.port,
      env: config.server.env,
      nodeVersion: process.version,
    });
  });
}

if (require.main === module) {
  startServer().catch((error: unknown) => {
    logger.fatal('Failed to start server', { error: maskSensitiveData(errorMessage(error)) });
    process.exit(1);
  });
}
