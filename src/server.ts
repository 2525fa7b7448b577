/**
 * Chat Proxy HTTP Server
 *
 * Exposes `POST /chat` on a plain node:http server, plus `GET /health`.
 * CORS is granted to the single configured front-end origin, with
 * credentials.
 *
 * @packageDocumentation
 */

import * as http from 'node:http';
import { nanoid } from 'nanoid';
import { z } from 'zod';
import { hasApiKey, type Config } from './config.js';
import { toErrorBody } from './errors.js';
import type { ChatProxyHandler } from './handler.js';
import { handleHealthRequest } from './health.js';
import { type Logger, defaultLogger } from './logger.js';

export interface ChatServerOptions {
  handler: ChatProxyHandler;
  config: Config;
  logger?: Logger;
}

const MAX_BODY_SIZE = 1024 * 1024; // 1MB max request body

/** Methods granted to the allowed origin on preflight. */
const ALLOWED_METHODS = 'DELETE, GET, HEAD, OPTIONS, PATCH, POST, PUT';

const ChatRequestSchema = z.object({
  message: z.string(),
});

export type ChatRequest = z.infer<typeof ChatRequestSchema>;

class BodyTooLargeError extends Error {
  constructor() {
    super(`Request body too large (max ${MAX_BODY_SIZE} bytes)`);
  }
}

/**
 * Read the whole body. Past MAX_BODY_SIZE the rest is drained and dropped,
 * and the promise rejects with BodyTooLargeError once the request ends.
 */
function readRequestBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_SIZE) {
        chunks.length = 0;
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => {
      if (size > MAX_BODY_SIZE) {
        reject(new BodyTooLargeError());
        return;
      }
      resolve(Buffer.concat(chunks).toString('utf-8'));
    });
    req.on('error', reject);
  });
}

function sendJson(res: http.ServerResponse, status: number, payload: unknown): void {
  const body = JSON.stringify(payload);
  res.writeHead(status, { 'Content-Type': 'application/json', 'Content-Length': Buffer.byteLength(body) });
  res.end(body);
}

function sendDetail(res: http.ServerResponse, status: number, detail: string): void {
  sendJson(res, status, { detail });
}

/**
 * Set CORS response headers. Returns true when the request origin is allowed.
 */
function applyCors(req: http.IncomingMessage, res: http.ServerResponse, allowedOrigin: string): boolean {
  res.setHeader('Vary', 'Origin');
  if (req.headers.origin !== allowedOrigin) return false;
  res.setHeader('Access-Control-Allow-Origin', allowedOrigin);
  res.setHeader('Access-Control-Allow-Credentials', 'true');
  return true;
}

function handlePreflight(req: http.IncomingMessage, res: http.ServerResponse, originAllowed: boolean): void {
  if (!originAllowed) {
    sendDetail(res, 400, 'Disallowed CORS origin');
    return;
  }
  res.setHeader('Access-Control-Allow-Methods', ALLOWED_METHODS);
  const requestedHeaders = req.headers['access-control-request-headers'];
  if (requestedHeaders) {
    res.setHeader('Access-Control-Allow-Headers', requestedHeaders);
  }
  res.setHeader('Access-Control-Max-Age', '600');
  res.writeHead(204);
  res.end();
}

export function formatValidationIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'body'}: ${issue.message}`)
    .join('; ');
}

/**
 * Build the proxy server. Call {@link startServer} to listen.
 */
export function createChatServer(opts: ChatServerOptions): http.Server {
  const { handler, config } = opts;
  const logger = opts.logger ?? defaultLogger;

  const handleChat = async (req: http.IncomingMessage, res: http.ServerResponse, requestId: string) => {
    let raw: string;
    try {
      raw = await readRequestBody(req);
    } catch (err) {
      if (err instanceof BodyTooLargeError) {
        sendDetail(res, 413, err.message);
        return;
      }
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      sendDetail(res, 400, 'Invalid JSON body');
      return;
    }

    const parsed = ChatRequestSchema.safeParse(json);
    if (!parsed.success) {
      sendDetail(res, 422, formatValidationIssues(parsed.error));
      return;
    }

    const start = Date.now();
    const result = await handler.handle(parsed.data.message);
    const latencyMs = Date.now() - start;

    if (result.ok) {
      logger.debug(`[${requestId}] reply in ${latencyMs}ms (${result.reply.length} chars)`);
      sendJson(res, 200, { reply: result.reply });
      return;
    }
    logger.debug(`[${requestId}] ${result.error.kind} -> ${result.error.status} in ${latencyMs}ms`);
    sendJson(res, result.error.status, toErrorBody(result.error));
  };

  const handleRequest = async (req: http.IncomingMessage, res: http.ServerResponse) => {
    const requestId = nanoid(12);
    res.setHeader('X-Request-Id', requestId);

    const originAllowed = applyCors(req, res, config.corsOrigin);

    // Plain OPTIONS without a requested method is routed like any other request
    if (req.method === 'OPTIONS' && req.headers['access-control-request-method'] !== undefined) {
      handlePreflight(req, res, originAllowed);
      return;
    }

    const pathname = (req.url ?? '').split('?')[0] ?? '';
    logger.debug(`[${requestId}] ${req.method ?? '?'} ${pathname}`);

    if (pathname === '/health' || pathname === '/healthz') {
      if (req.method !== 'GET') {
        sendDetail(res, 405, 'Method Not Allowed');
        return;
      }
      handleHealthRequest(res, { model: config.model, apiKeyConfigured: hasApiKey(config) });
      return;
    }

    if (pathname === '/chat') {
      if (req.method !== 'POST') {
        res.setHeader('Allow', 'POST');
        sendDetail(res, 405, 'Method Not Allowed');
        return;
      }
      await handleChat(req, res, requestId);
      return;
    }

    sendDetail(res, 404, 'Not Found');
  };

  return http.createServer((req, res) => {
    handleRequest(req, res).catch((err: unknown) => {
      logger.error(`Unhandled error: ${err instanceof Error ? err.message : String(err)}`);
      if (res.headersSent) {
        res.end();
        return;
      }
      sendDetail(res, 500, 'Internal server error');
    });
  });
}

/**
 * Start listening. Resolves with the bound port (useful with port 0).
 */
export function startServer(server: http.Server, port: number, host: string): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      const addr = server.address();
      resolve(typeof addr === 'object' && addr !== null ? addr.port : port);
    });
  });
}

/**
 * Stop the server
 */
export function stopServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!server.listening) {
      resolve();
      return;
    }
    server.close((err) => (err ? reject(err) : resolve()));
    server.closeAllConnections();
  });
}
