import { addWebSocketConnection, broadcastEvent, removeWebSocketConnection, wsConnections } from './broadcastEvent';
import { server as WebSocketServer, connection as WebSocketConnection, Message } from 'websocket';
import { z } from 'zod';
import * as http from 'http';
import logger from '../utils/logger';
import { MediaLibraryError, MediaLibraryErrorKind, errorMessage } from '../backend/models/errors';
import type { MusicController } from '../backend/music/musicController';
import { CommandError, CommandRequest } from './handlers/commandTypes';
import { CommandHandler, createRequestHandler } from './handlers/requesthandler';

const API_PREFIX = '/api/';
const MAX_BODY_BYTES = 1024 * 1024;

const STATUS_BY_KIND: Record<MediaLibraryErrorKind, number> = {
  not_found: 404,
  invariant_violation: 409,
  unsupported_feature: 501,
  provider_unavailable: 502,
};

const wsRequestSchema = z.object({
  command: z.string(),
  args: z.record(z.union([z.string(), z.number(), z.boolean()])).default({}),
  body: z.unknown().optional(),
});

/**
 * Maps an error raised while handling a command to an HTTP status.
 */
export function statusForError(error: unknown): number {
  if (error instanceof CommandError) return error.status;
  if (error instanceof z.ZodError) return 400;
  if (error instanceof MediaLibraryError) return STATUS_BY_KIND[error.kind];
  return 500;
}

/**
 * Sends an HTTP response with the specified status and data.
 */
const sendHttpResponse = (res: http.ServerResponse, statusCode: number, data: unknown) => {
  res.writeHead(statusCode, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(data));
};

const readBody = (req: http.IncomingMessage): Promise<unknown> =>
  new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new CommandError(413, 'Request body too large'));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => {
      const text = Buffer.concat(chunks).toString('utf8').trim();
      if (!text) {
        resolve(undefined);
        return;
      }
      try {
        resolve(JSON.parse(text));
      } catch {
        reject(new CommandError(400, 'Request body is not valid JSON'));
      }
    });
    req.on('error', reject);
  });

/**
 * Runs one command and turns failures into an error payload with a status.
 */
const runCommand = async (
  handler: CommandHandler,
  request: CommandRequest,
  name: string,
): Promise<{ status: number; body: unknown }> => {
  try {
    return { status: 200, body: await handler(request) };
  } catch (error) {
    const status = statusForError(error);
    if (status >= 500) {
      logger.error(`[${name}] ${request.command} failed: ${errorMessage(error)}`);
    } else {
      logger.debug(`[${name}] ${request.command} rejected (${status}): ${errorMessage(error)}`);
    }
    const kind = error instanceof MediaLibraryError ? error.kind : undefined;
    return { status, body: { command: request.command, error: errorMessage(error), kind } };
  }
};

/**
 * Handles incoming HTTP requests: `GET /api/<command>?args` or `POST /api/<command>` with a JSON body.
 */
const handleHttpRequest = async (
  req: http.IncomingMessage,
  res: http.ServerResponse,
  handler: CommandHandler,
  name: string,
) => {
  const url = new URL(req.url || '/', 'http://localhost');
  if (!url.pathname.startsWith(API_PREFIX)) {
    sendHttpResponse(res, 404, { error: 'Not Found' });
    return;
  }
  let body: unknown;
  if (req.method === 'POST' || req.method === 'PUT') {
    try {
      body = await readBody(req);
    } catch (error) {
      sendHttpResponse(res, statusForError(error), { error: errorMessage(error) });
      return;
    }
  }
  const command = decodeURIComponent(url.pathname.slice(API_PREFIX.length));
  logger.debug(`[${name}] ${req.method} ${command}`);
  const result = await runCommand(handler, { command, params: url.searchParams, body }, name);
  sendHttpResponse(res, result.status, result.body);
};

/**
 * Starts the HTTP and WebSocket servers and forwards every library event to websocket clients.
 */
export const startWebServer = (
  port: number,
  music: MusicController,
  name = 'Api',
): { server: http.Server; shutdown: () => Promise<void> } => {
  const handler = createRequestHandler(music);
  const httpServer = http.createServer((req, res) => {
    handleHttpRequest(req, res, handler, name).catch((error: unknown) => {
      logger.error(`[${name}] Unexpected error processing ${req.url}: ${errorMessage(error)}`);
      if (!res.headersSent) sendHttpResponse(res, 500, { error: 'Internal Server Error' });
    });
  });
  const wsServer = new WebSocketServer({ httpServer, autoAcceptConnections: true });
  wsServer.on('connect', (connection: WebSocketConnection) => handleWebSocketConnect(connection, handler, name));

  const unsubscribe = music.events.subscribe(broadcastEvent);

  httpServer.listen(port, () => logger.info(`[${name}] HTTP and WebSocket server is listening on port ${port}`));

  return {
    server: httpServer,
    shutdown: () => {
      unsubscribe();
      wsServer.shutDown();
      return shutdownServer(httpServer, name);
    },
  };
};

const handleWebSocketConnect = (connection: WebSocketConnection, handler: CommandHandler, name: string) => {
  addWebSocketConnection(connection);
  logger.info(`[${name}] WebSocket connection accepted from ${connection.remoteAddress}. Current connections: ${wsConnections.size}`);

  connection.on('message', (message) => {
    void handleWebSocketRequest(message, handler, name, connection);
  });

  connection.on('close', (reasonCode, description) => {
    logger.info(`[${name}] WebSocket connection closed. Reason: ${reasonCode} - ${description}`);
    removeWebSocketConnection(connection);
    logger.info(`[${name}] Current connections: ${wsConnections.size}`);
  });

  connection.on('error', (error) => logger.error(`[${name}] WebSocket error: ${error.message}`));
};

/**
 * Websocket clients send `{ command, args, body }` and get the same envelope as HTTP callers.
 */
const handleWebSocketRequest = async (
  message: Message,
  handler: CommandHandler,
  name: string,
  connection: WebSocketConnection,
) => {
  if (message.type !== 'utf8') {
    logger.error(`[${name}] Unknown message type: ${message.type}`);
    return;
  }
  let parsed: z.infer<typeof wsRequestSchema>;
  try {
    parsed = wsRequestSchema.parse(JSON.parse(message.utf8Data));
  } catch (error) {
    connection.sendUTF(JSON.stringify({ error: `Invalid request: ${errorMessage(error)}` }));
    return;
  }
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(parsed.args)) params.set(key, String(value));
  const result = await runCommand(handler, { command: parsed.command, params, body: parsed.body }, name);
  connection.sendUTF(JSON.stringify(result.body));
};

/**
 * Gracefully shuts down the server.
 */
const shutdownServer = (httpServer: http.Server, name: string): Promise<void> => {
  logger.info(`[${name}] Shutting down server...`);
  wsConnections.forEach((conn: WebSocketConnection) => conn.close(1000, 'Server shutting down'));

  return new Promise((resolve) => {
    httpServer.close((err) => {
      if (err) {
        logger.error(`[${name}] Error shutting down server: ${err}`);
      } else {
        logger.info(`[${name}] Server shut down successfully.`);
      }
      resolve();
    });
  });
};
