import express, { NextFunction, Request, Response } from 'express';
import http from 'http';
import { WebSocketServer, type RawData, type WebSocket } from 'ws';
import type { SessionManager } from './calls/sessionManager';
import { log } from './log';
import { metricsHandler, metricsMiddleware } from './metrics';
import { createCallsRouter, type RecordingLookup } from './routes/calls';
import { createHealthRouter } from './routes/health';
import { createLiveKitWebhookRouter, type WebhookVerifier } from './routes/livekitWebhook';
import { requestIdMiddleware, requestIdOf } from './routes/requestContext';

function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  log.error({ err, event: 'http_unhandled_error', requestId: requestIdOf(res) }, 'unhandled error');
  res.status(500).json({ error: 'internal_server_error' });
}

const BRIDGE_PATH = /^\/v1\/sessions\/([^/]+)\/bridge$/;

export function parseBridgeRequest(
  request: Pick<http.IncomingMessage, 'url' | 'headers'>,
): { callId: string; token: string | null } | null {
  if (!request.url) {
    return null;
  }

  const host = request.headers.host ?? 'localhost';
  const url = new URL(request.url, `http://${host}`);
  const match = BRIDGE_PATH.exec(url.pathname);
  if (!match) {
    return null;
  }

  return {
    callId: decodeURIComponent(match[1]),
    token: url.searchParams.get('token'),
  };
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

function bindBridgeSocket(ws: WebSocket, callId: string, sessionManager: SessionManager): void {
  const voice = sessionManager.attachBridge(callId, ws);
  if (!voice) {
    ws.close(1008, 'session_not_found');
    return;
  }

  ws.on('message', (data, isBinary) => {
    voice.handleMessage(toBuffer(data), isBinary);
  });

  ws.on('close', () => {
    voice.detach(ws);
  });

  ws.on('error', (error) => {
    log.error({ err: error, event: 'bridge_socket_error', call_id: callId }, 'bridge websocket error');
  });
}

function attachBridgeWebSocketServer(
  server: http.Server,
  sessionManager: SessionManager,
  bridgeToken: string,
): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true });

  server.on('upgrade', (request, socket, head) => {
    const parsed = parseBridgeRequest(request);
    if (!parsed) {
      socket.destroy();
      return;
    }

    if (!parsed.token || parsed.token !== bridgeToken) {
      log.warn({ event: 'bridge_auth_failed', call_id: parsed.callId }, 'bridge token rejected');
      socket.destroy();
      return;
    }

    wss.handleUpgrade(request, socket, head, (ws) => {
      bindBridgeSocket(ws, parsed.callId, sessionManager);
    });
  });

  return wss;
}

export interface ServerDeps {
  sessionManager: SessionManager;
  bridgeToken: string;
  webhookVerifier: WebhookVerifier | null;
  recordings?: RecordingLookup | null;
}

export function buildServer(deps: ServerDeps): { app: express.Express; server: http.Server; wss: WebSocketServer } {
  const app = express();
  const { sessionManager } = deps;

  app.disable('x-powered-by');
  app.use(requestIdMiddleware);
  app.use(metricsMiddleware);

  if (deps.webhookVerifier) {
    app.use('/v1/livekit/webhook', createLiveKitWebhookRouter(sessionManager, deps.webhookVerifier));
  } else {
    log.warn({ event: 'livekit_webhook_disabled' }, 'livekit webhook disabled - api credentials missing');
  }

  app.use(express.json());
  app.use('/health', createHealthRouter(sessionManager));
  app.get('/metrics', (req, res, next) => {
    metricsHandler(req, res).catch(next);
  });
  app.use('/v1/calls', createCallsRouter(sessionManager, deps.recordings ?? null));

  app.use(errorHandler);

  const server = http.createServer(app);
  const wss = attachBridgeWebSocketServer(server, sessionManager, deps.bridgeToken);

  return { app, server, wss };
}
