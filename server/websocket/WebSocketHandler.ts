/**
 * WebSocketHandler - Handles websocket connections and message routing
 *
 * - Manages client subscriptions (client -> Set<instrumentId>)
 * - Routes client messages to the SessionManager
 * - Session broadcasts reach subscribed clients through their callbacks
 * - Cleans up on client disconnect
 */

import type { WebSocket, WebSocketServer } from 'ws';
import type { SessionManager } from '../sessions/SessionManager.js';
import type { ClientMessage, ServerMessage, ParameterInput, Result } from '../../shared/types.js';
import { Ok, Err } from '../../shared/types.js';
import { InstrumentError } from '../devices/errors.js';

export interface WebSocketHandler {
  getClientCount(): number;
  broadcastInstrumentList(): void;
  close(): void;
}

interface ClientState {
  id: string;
  ws: WebSocket;
  subscriptions: Set<string>; // Set of instrumentIds
}

const WS_OPEN = 1;

let clientIdCounter = 0;

function generateClientId(): string {
  return `client-${++clientIdCounter}-${Date.now()}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isParameterInput(value: unknown): value is ParameterInput {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function optionalString(value: unknown): value is string | undefined {
  return value === undefined || typeof value === 'string';
}

/** Shape-check an incoming frame; the error string goes back to the client */
export function parseClientMessage(data: string): Result<ClientMessage, string> {
  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch {
    return Err('Failed to parse JSON message');
  }
  if (!isRecord(json)) {
    return Err('Message must be an object with a type');
  }
  const parsed = json;
  const { type, instrumentId } = parsed;
  if (typeof type !== 'string') {
    return Err('Message must be an object with a type');
  }

  if (type === 'getInstruments') return Ok<ClientMessage>({ type });

  if (typeof instrumentId !== 'string') {
    return Err(`${type}: instrumentId is required`);
  }

  switch (type) {
    case 'subscribe':
      return Ok<ClientMessage>({ type, instrumentId });
    case 'unsubscribe':
      return Ok<ClientMessage>({ type, instrumentId });
    case 'connect':
      return Ok<ClientMessage>({ type, instrumentId });

    case 'getParameter':
    case 'setParameter': {
      const { key, channel, value } = parsed;
      if (typeof key !== 'string') return Err(`${type}: key is required`);
      if (!optionalString(channel)) return Err(`${type}: channel must be a string`);
      if (type === 'getParameter') return Ok<ClientMessage>({ type, instrumentId, key, channel });
      if (!isParameterInput(value)) return Err('setParameter: value must be a string, number or boolean');
      return Ok<ClientMessage>({ type, instrumentId, key, channel, value });
    }

    case 'refreshCatalog': {
      const { path } = parsed;
      if (!optionalString(path)) return Err('refreshCatalog: path must be a string');
      return Ok<ClientMessage>({ type, instrumentId, path });
    }

    default:
      return Err(`Unknown message type: ${type}`);
  }
}

function errorCode(err: Error): string {
  return err instanceof InstrumentError ? err.code : 'INSTRUMENT_NOT_FOUND';
}

export function createWebSocketHandler(
  wss: WebSocketServer,
  sessionManager: SessionManager
): WebSocketHandler {
  const clients = new Map<WebSocket, ClientState>();

  // Send a message to a specific client
  function send(ws: WebSocket, message: ServerMessage): void {
    if (ws.readyState === WS_OPEN) {
      ws.send(JSON.stringify(message));
    }
  }

  function sendError(clientState: ClientState, instrumentId: string | undefined, err: Error): void {
    send(clientState.ws, {
      type: 'error',
      instrumentId,
      code: errorCode(err),
      message: err.message,
    });
  }

  // Handle incoming messages
  async function handleMessage(clientState: ClientState, data: string): Promise<void> {
    const parsed = parseClientMessage(data);
    if (!parsed.ok) {
      send(clientState.ws, { type: 'error', code: 'INVALID_MESSAGE', message: parsed.error });
      return;
    }
    const message = parsed.value;

    switch (message.type) {
      case 'getInstruments':
        send(clientState.ws, { type: 'instrumentList', instruments: sessionManager.getInstrumentSummaries() });
        break;

      case 'subscribe':
        handleSubscribe(clientState, message.instrumentId);
        break;

      case 'unsubscribe':
        sessionManager.unsubscribe(message.instrumentId, clientState.id);
        clientState.subscriptions.delete(message.instrumentId);
        send(clientState.ws, { type: 'unsubscribed', instrumentId: message.instrumentId });
        break;

      case 'connect': {
        const result = sessionManager.connect(message.instrumentId);
        if (!result.ok) sendError(clientState, message.instrumentId, result.error);
        break;
      }

      case 'setParameter': {
        const { instrumentId, key, value } = message;
        const channel = message.channel ?? null;
        const result = await sessionManager.setParameter(instrumentId, key, channel, value);
        if (!result.ok) {
          sendError(clientState, instrumentId, result.error);
          break;
        }
        send(clientState.ws, { type: 'parameterValue', instrumentId, key, channel, value: result.value.value });
        break;
      }

      case 'getParameter': {
        const { instrumentId, key } = message;
        const channel = message.channel ?? null;
        const result = await sessionManager.getParameter(instrumentId, key, channel);
        if (!result.ok) {
          sendError(clientState, instrumentId, result.error);
          break;
        }
        send(clientState.ws, { type: 'parameterValue', instrumentId, key, channel, value: result.value });
        break;
      }

      case 'refreshCatalog': {
        const { instrumentId } = message;
        const result = await sessionManager.refreshCatalog(instrumentId, message.path);
        if (!result.ok) {
          sendError(clientState, instrumentId, result.error);
          break;
        }
        // Subscribers already got the broadcast
        if (!clientState.subscriptions.has(instrumentId)) {
          send(clientState.ws, { type: 'catalog', instrumentId, options: result.value });
        }
        break;
      }
    }
  }

  function handleSubscribe(clientState: ClientState, instrumentId: string): void {
    const session = sessionManager.getSession(instrumentId);
    if (!session) {
      send(clientState.ws, {
        type: 'error',
        instrumentId,
        code: 'INSTRUMENT_NOT_FOUND',
        message: `Instrument not found: ${instrumentId}`,
      });
      return;
    }

    // Create callback for session updates
    const callback = (message: ServerMessage) => {
      send(clientState.ws, message);
    };

    sessionManager.subscribe(instrumentId, clientState.id, callback);
    clientState.subscriptions.add(instrumentId);
    send(clientState.ws, { type: 'subscribed', instrumentId, state: session.getState() });
  }

  // Handle client disconnect
  function handleDisconnect(ws: WebSocket): void {
    const clientState = clients.get(ws);
    if (clientState) {
      // Unsubscribe from all instruments
      sessionManager.unsubscribeAll(clientState.id);
      clients.delete(ws);
    }
  }

  // Set up connection handler
  wss.on('connection', (ws: WebSocket) => {
    const clientState: ClientState = {
      id: generateClientId(),
      ws,
      subscriptions: new Set(),
    };
    clients.set(ws, clientState);

    ws.on('message', (data) => {
      handleMessage(clientState, data.toString()).catch(err => {
        console.error('[WebSocket] message handling failed:', err);
      });
    });

    ws.on('close', () => {
      handleDisconnect(ws);
    });

    ws.on('error', (err) => {
      console.error('[WebSocket] client error:', err);
      handleDisconnect(ws);
    });
  });

  function getClientCount(): number {
    return clients.size;
  }

  function broadcastInstrumentList(): void {
    const message: ServerMessage = { type: 'instrumentList', instruments: sessionManager.getInstrumentSummaries() };
    const data = JSON.stringify(message);

    for (const clientState of clients.values()) {
      if (clientState.ws.readyState === WS_OPEN) {
        clientState.ws.send(data);
      }
    }
  }

  function close(): void {
    // Clean up all clients
    for (const [ws, clientState] of clients) {
      sessionManager.unsubscribeAll(clientState.id);
      clients.delete(ws);
    }
  }

  return {
    getClientCount,
    broadcastInstrumentList,
    close,
  };
}
