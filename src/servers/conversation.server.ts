/**
 * Conversation API Server (Port 3000)
 *
 * REST surface for the telephony pipeline, the analysis engine and the
 * follow-up delivery sweeper, plus the hot-lead and daily-statistics reports.
 */

import dotenv from 'dotenv';
dotenv.config();

import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { Logger } from 'pino';
import logger, { createChildLogger } from '../config/logger';
import { HTTP_STATUS, PORTS, SUCCESS_MESSAGES } from '../config/constants';
import { openDatabase } from '../database/connection';
import { ConversationServices, createServices } from '../services';
import { StoreErrorCode, isStoreError } from '../utils/errors.util';
import { maskPhoneNumber } from '../utils/phoneNumber.util';
import {
  parseAnalysisInput,
  parseConversationRef,
  parseFinalization,
  parseId,
  parseMessageInput,
  parseQueryInt,
  parseTranscript,
  requireBody,
} from './requestParsers';

const STATUS_BY_CODE: Record<StoreErrorCode, number> = {
  NOT_FOUND: HTTP_STATUS.NOT_FOUND,
  DUPLICATE_KEY: HTTP_STATUS.CONFLICT,
  INVALID_ARGUMENT: HTTP_STATUS.BAD_REQUEST,
  INVALID_STATE: HTTP_STATUS.CONFLICT,
  CONSTRAINT_VIOLATION: HTTP_STATUS.UNPROCESSABLE_ENTITY,
};

const getRequestLogger = (res: Response): Logger => res.locals.requestLogger ?? logger;

/**
 * Build the Express app over an existing set of services
 */
export const createConversationApp = (services: ConversationServices): Express => {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  /**
   * Request logging middleware
   */
  app.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = `req-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
    const requestLogger = createChildLogger({ requestId, server: 'conversation-api' });

    requestLogger.info({ method: req.method, path: req.path, query: req.query }, 'Incoming request');
    res.locals.requestLogger = requestLogger;

    next();
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.status(HTTP_STATUS.OK).json({ status: 'ok', service: 'conversation-api' });
  });

  // ============= CONVERSATIONS =============

  /**
   * POST /api/conversations
   *
   * With `messages`: saves a complete call in one transaction.
   * Without: registers a call that is still in progress.
   */
  app.post('/api/conversations', (req: Request, res: Response) => {
    const log = getRequestLogger(res);
    const body = requireBody(req.body);

    if (body.messages !== undefined) {
      const transcript = parseTranscript(body);
      const conversationId = services.archive.saveCompleteConversation(transcript);
      log.info({ conversationId, messages: transcript.messages.length }, SUCCESS_MESSAGES.CONVERSATION_SAVED);

      return res.status(HTTP_STATUS.CREATED).json({
        success: true,
        message: SUCCESS_MESSAGES.CONVERSATION_SAVED,
        conversation: services.conversations.getById(conversationId),
      });
    }

    const callSid = typeof body.callSid === 'string' ? body.callSid : '';
    const phoneNumber = typeof body.phoneNumber === 'string' ? body.phoneNumber : null;
    const startTime = typeof body.startTime === 'string' ? body.startTime : '';

    const conversationId = services.conversations.create(callSid, phoneNumber, startTime);
    log.info({ conversationId, phoneNumber: maskPhoneNumber(phoneNumber) }, SUCCESS_MESSAGES.CONVERSATION_CREATED);

    return res.status(HTTP_STATUS.CREATED).json({
      success: true,
      message: SUCCESS_MESSAGES.CONVERSATION_CREATED,
      conversation: services.conversations.getById(conversationId),
    });
  });

  app.get('/api/conversations', (req: Request, res: Response) => {
    const conversations = services.conversations.listRecent({
      limit: parseQueryInt(req.query.limit, 'limit'),
      offset: parseQueryInt(req.query.offset, 'offset'),
    });

    res.status(HTTP_STATUS.OK).json({ success: true, count: conversations.length, conversations });
  });

  app.get('/api/conversations/:ref', (req: Request, res: Response) => {
    const detail = services.archive.getConversationDetail(parseConversationRef(req.params.ref));
    res.status(HTTP_STATUS.OK).json({ success: true, ...detail });
  });

  app.get('/api/conversations/:ref/transcript', (req: Request, res: Response) => {
    const transcript = services.archive.renderTranscript(parseConversationRef(req.params.ref));
    res.status(HTTP_STATUS.OK).type('text/plain').send(transcript);
  });

  app.post('/api/conversations/:id/finalize', (req: Request, res: Response) => {
    const conversationId = parseId(req.params.id, 'conversationId');
    services.conversations.finalize(conversationId, parseFinalization(req.body));

    res.status(HTTP_STATUS.OK).json({
      success: true,
      message: SUCCESS_MESSAGES.CONVERSATION_FINALIZED,
      conversation: services.conversations.getById(conversationId),
    });
  });

  app.delete('/api/conversations/:id', (req: Request, res: Response) => {
    const conversationId = parseId(req.params.id, 'conversationId');
    services.conversations.delete(conversationId);
    getRequestLogger(res).info({ conversationId }, SUCCESS_MESSAGES.CONVERSATION_DELETED);

    res.status(HTTP_STATUS.NO_CONTENT).send();
  });

  // ============= MESSAGES =============

  app.post('/api/conversations/:id/messages', (req: Request, res: Response) => {
    const conversationId = parseId(req.params.id, 'conversationId');
    const messageId = services.messages.append(conversationId, parseMessageInput(req.body));

    res.status(HTTP_STATUS.CREATED).json({ success: true, message: SUCCESS_MESSAGES.MESSAGE_APPENDED, messageId });
  });

  app.get('/api/conversations/:id/messages', (req: Request, res: Response) => {
    const conversationId = parseId(req.params.id, 'conversationId');
    const messages = Array.from(services.messages.listByConversation(conversationId));

    res.status(HTTP_STATUS.OK).json({ success: true, count: messages.length, messages });
  });

  // ============= ANALYSIS =============

  app.put('/api/conversations/:id/analysis', (req: Request, res: Response) => {
    const conversationId = parseId(req.params.id, 'conversationId');
    const analysisId = services.analyses.upsert(conversationId, parseAnalysisInput(req.body));

    res.status(HTTP_STATUS.OK).json({
      success: true,
      message: SUCCESS_MESSAGES.ANALYSIS_SAVED,
      analysisId,
      analysis: services.analyses.get(conversationId),
    });
  });

  app.get('/api/conversations/:id/analysis', (req: Request, res: Response) => {
    const conversationId = parseId(req.params.id, 'conversationId');
    services.conversations.getById(conversationId);

    res.status(HTTP_STATUS.OK).json({ success: true, analysis: services.analyses.get(conversationId) });
  });

  // ============= FOLLOW-UP SCRIPTS =============

  app.post('/api/conversations/:id/scripts', (req: Request, res: Response) => {
    const conversationId = parseId(req.params.id, 'conversationId');
    const body = requireBody(req.body);
    const scriptContent = typeof body.scriptContent === 'string' ? body.scriptContent : '';
    const scriptId = services.scripts.create(conversationId, scriptContent);

    res.status(HTTP_STATUS.CREATED).json({
      success: true,
      message: SUCCESS_MESSAGES.SCRIPT_CREATED,
      script: services.scripts.getById(scriptId),
    });
  });

  app.get('/api/scripts/pending', (req: Request, res: Response) => {
    const scripts = services.scripts.listPending({
      limit: parseQueryInt(req.query.limit, 'limit'),
      offset: parseQueryInt(req.query.offset, 'offset'),
    });

    res.status(HTTP_STATUS.OK).json({ success: true, count: scripts.length, scripts });
  });

  app.post('/api/scripts/:id/sent', (req: Request, res: Response) => {
    const scriptId = parseId(req.params.id, 'scriptId');
    const body = req.body === undefined ? {} : requireBody(req.body);
    const sentAt = typeof body.sentAt === 'string' ? body.sentAt : new Date();
    const script = services.scripts.markSent(scriptId, sentAt);

    res.status(HTTP_STATUS.OK).json({ success: true, message: SUCCESS_MESSAGES.SCRIPT_SENT, script });
  });

  // ============= REPORTS =============

  app.get('/api/reports/hot-leads', (req: Request, res: Response) => {
    const leads = services.reporting.getHotLeads({
      limit: parseQueryInt(req.query.limit, 'limit'),
      offset: parseQueryInt(req.query.offset, 'offset'),
    });

    res.status(HTTP_STATUS.OK).json({ success: true, count: leads.length, leads });
  });

  app.get('/api/reports/daily-statistics', (req: Request, res: Response) => {
    const statistics = services.reporting.getDailyStatistics({
      days: parseQueryInt(req.query.days, 'days'),
      limit: parseQueryInt(req.query.limit, 'limit'),
      offset: parseQueryInt(req.query.offset, 'offset'),
    });

    res.status(HTTP_STATUS.OK).json({ success: true, count: statistics.length, statistics });
  });

  /**
   * Error handling middleware
   */
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const log = getRequestLogger(res);

    if (isStoreError(err)) {
      const status = STATUS_BY_CODE[err.code];
      log.warn({ code: err.code, status, context: err.context }, err.message);
      return res.status(status).json({ success: false, code: err.code, message: err.message });
    }

    if (err instanceof SyntaxError) {
      log.warn({ error: err.message }, 'Malformed JSON body');
      return res.status(HTTP_STATUS.BAD_REQUEST).json({ success: false, code: 'INVALID_ARGUMENT', message: err.message });
    }

    log.error({ error: err instanceof Error ? err.message : String(err) }, 'Unhandled error');
    return res.status(HTTP_STATUS.INTERNAL_SERVER_ERROR).json({ success: false, message: 'Internal server error' });
  });

  return app;
};

/**
 * Start the server
 */
const startServer = () => {
  const db = openDatabase();
  const app = createConversationApp(createServices(db));

  const server = app.listen(PORTS.CONVERSATION_API, () => {
    logger.info(
      { port: PORTS.CONVERSATION_API, service: 'conversation-api' },
      `Conversation API started on port ${PORTS.CONVERSATION_API}`
    );
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down conversation API');
    server.close(() => {
      db.close();
      logger.info('Database connection closed');
    });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
};

// Start the server if this file is run directly
if (require.main === module) {
  startServer();
}
