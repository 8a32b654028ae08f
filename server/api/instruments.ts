/**
 * Instrument API Routes
 * REST surface over the SessionManager; the WebSocket carries the same
 * operations plus live updates.
 */

import { Router, type Response } from 'express';
import type { SessionManager } from '../sessions/SessionManager.js';
import type { ApiError, ParameterInput } from '../devices/types.js';
import { InstrumentError, type InstrumentErrorCode } from '../devices/errors.js';

const STATUS_BY_CODE: Record<InstrumentErrorCode, number> = {
  TRANSPORT_TIMEOUT: 504,
  CONNECTION_REFUSED: 502,
  TRANSPORT_ERROR: 502,
  INVALID_OPTION: 400,
  MALFORMED_RESPONSE: 502,
  READ_BACK_MISMATCH: 409,
  UNKNOWN_PARAMETER: 404,
  READ_ONLY: 405,
  NOT_CONNECTED: 409,
};

function sendError(res: Response, err: Error): void {
  if (err instanceof InstrumentError) {
    const error: ApiError = { error: err.code, message: err.message };
    res.status(STATUS_BY_CODE[err.code]).json(error);
    return;
  }
  const error: ApiError = { error: 'INTERNAL_ERROR', message: err.message };
  res.status(500).json(error);
}

function notFound(res: Response, id: string): void {
  const error: ApiError = { error: 'NOT_FOUND', message: `Instrument not found: ${id}` };
  res.status(404).json(error);
}

function badRequest(res: Response, message: string): void {
  const error: ApiError = { error: 'BAD_REQUEST', message };
  res.status(400).json(error);
}

// ?channel=1 or ?channel=channel_1; absent means device-scoped
function channelOf(value: unknown): string | null {
  return typeof value === 'string' && value !== '' ? value : null;
}

function isParameterInput(value: unknown): value is ParameterInput {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

export function createInstrumentRoutes(sessionManager: SessionManager): Router {
  const router = Router();

  // GET /api/instruments - List configured instruments
  router.get('/', (_req, res) => {
    res.json({ instruments: sessionManager.getInstrumentSummaries() });
  });

  // GET /api/instruments/:id - Full session state
  router.get('/:id', (req, res) => {
    const session = sessionManager.getSession(req.params.id);
    if (!session) return notFound(res, req.params.id);
    res.json(session.getState());
  });

  // POST /api/instruments/:id/connect - Start (or restart) connecting
  router.post('/:id/connect', (req, res) => {
    const session = sessionManager.getSession(req.params.id);
    if (!session) return notFound(res, req.params.id);
    session.connect();
    res.status(202).json(session.getSummary());
  });

  // GET /api/instruments/:id/parameters/:key[?channel=1][&cached=1]
  router.get('/:id/parameters/:key', async (req, res) => {
    const session = sessionManager.getSession(req.params.id);
    if (!session) return notFound(res, req.params.id);
    const channel = channelOf(req.query.channel);

    if (req.query.cached === '1' || req.query.cached === 'true') {
      const cached = session.readCached(req.params.key, channel);
      if (!cached.ok) return sendError(res, cached.error);
      res.json(cached.value ?? { key: req.params.key, channel, raw: null, value: null, lastUpdated: null, pendingWrite: false });
      return;
    }

    const result = await session.getParameter(req.params.key, channel);
    if (!result.ok) return sendError(res, result.error);
    res.json({ key: req.params.key, channel, value: result.value });
  });

  // PUT /api/instruments/:id/parameters/:key { value, channel? }
  router.put('/:id/parameters/:key', async (req, res) => {
    const session = sessionManager.getSession(req.params.id);
    if (!session) return notFound(res, req.params.id);

    const body: unknown = req.body;
    if (typeof body !== 'object' || body === null || !('value' in body) || !isParameterInput(body.value)) {
      return badRequest(res, 'Body must be { "value": string | number | boolean, "channel"?: string }');
    }
    const channel = 'channel' in body ? channelOf(body.channel) : null;

    const result = await session.setParameter(req.params.key, channel, body.value);
    if (!result.ok) return sendError(res, result.error);
    res.json({ key: req.params.key, channel, value: result.value.value, mismatch: result.value.mismatch });
  });

  // POST /api/instruments/:id/catalog { path? } - Re-read the waveform catalog
  router.post('/:id/catalog', async (req, res) => {
    const session = sessionManager.getSession(req.params.id);
    if (!session) return notFound(res, req.params.id);

    const body: unknown = req.body;
    let path: string | undefined;
    if (typeof body === 'object' && body !== null && 'path' in body) {
      if (typeof body.path !== 'string') return badRequest(res, 'path must be a string');
      path = body.path;
    }

    const result = await session.refreshCatalog(path);
    if (!result.ok) return sendError(res, result.error);
    res.json({ options: result.value });
  });

  // PUT /api/instruments/:id/poll-interval { seconds }
  router.put('/:id/poll-interval', (req, res) => {
    const session = sessionManager.getSession(req.params.id);
    if (!session) return notFound(res, req.params.id);

    const body: unknown = req.body;
    if (typeof body !== 'object' || body === null || !('seconds' in body) || typeof body.seconds !== 'number') {
      return badRequest(res, 'Body must be { "seconds": number }');
    }
    res.json({ seconds: session.setMinPollInterval(body.seconds) });
  });

  return router;
}
