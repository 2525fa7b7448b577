import * as http from 'node:http';
import { loadConfig, withOverrides, type Config } from '../src/config.js';
import type { GenerateContentRequest, GenerativeClient, UpstreamResponse } from '../src/gemini.js';
import type { Logger } from '../src/logger.js';
import { vi } from 'vitest';

export const TEST_API_KEY = 'test-secret-key';

export function testConfig(overrides: Partial<Config> = {}): Config {
  return withOverrides(loadConfig({ GOOGLE_API_KEY: TEST_API_KEY }), overrides);
}

export function noKeyConfig(): Config {
  return loadConfig({});
}

export function jsonResponse(payload: unknown, status = 200, statusText = 'OK'): UpstreamResponse {
  return { ok: status >= 200 && status < 300, status, statusText, bodyText: JSON.stringify(payload) };
}

export function textResponse(bodyText: string, status: number, statusText: string): UpstreamResponse {
  return { ok: status >= 200 && status < 300, status, statusText, bodyText };
}

export interface StubClient extends GenerativeClient {
  calls: GenerateContentRequest[];
}

/** Deterministic upstream stand-in that counts calls. */
export function stubClient(
  respond: (body: GenerateContentRequest) => UpstreamResponse | Promise<UpstreamResponse>
): StubClient {
  const calls: GenerateContentRequest[] = [];
  return {
    calls,
    async generateContent(body) {
      calls.push(body);
      return respond(body);
    },
  };
}

export function textEnvelope(text: string, finishReason = 'STOP'): unknown {
  return {
    candidates: [
      {
        content: { role: 'model', parts: [{ text }] },
        finishReason,
      },
    ],
  };
}

export function spyLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() } satisfies Logger;
}

export interface TestServer {
  server: http.Server;
  port: number;
  url: string;
}

// Helper: create a simple HTTP server on a free port
export function createMockServer(handler: http.RequestListener): Promise<TestServer> {
  return new Promise((resolve) => {
    const server = http.createServer(handler);
    server.listen(0, '127.0.0.1', () => {
      const addr = server.address();
      const port = typeof addr === 'object' && addr !== null ? addr.port : 0;
      resolve({ server, port, url: `http://127.0.0.1:${port}` });
    });
  });
}

export function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve) => {
    server.close(() => resolve());
    server.closeAllConnections();
  });
}

export interface RawResponse {
  status: number;
  headers: http.IncomingHttpHeaders;
  body: string;
}

export function httpRequest(
  port: number,
  opts: { method: string; path: string; headers?: Record<string, string>; body?: string }
): Promise<RawResponse> {
  return new Promise((resolve, reject) => {
    const req = http.request(
      { host: '127.0.0.1', port, method: opts.method, path: opts.path, headers: opts.headers },
      (res) => {
        let data = '';
        res.on('data', (c) => (data += c));
        res.on('end', () => resolve({ status: res.statusCode ?? 0, headers: res.headers, body: data }));
      }
    );
    req.on('error', reject);
    if (opts.body !== undefined) req.write(opts.body);
    req.end();
  });
}
