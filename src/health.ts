/**
 * Health endpoint handler.
 * @packageDocumentation
 */

import * as http from 'node:http';

const startTime = Date.now();

export interface HealthInfo {
  model: string;
  apiKeyConfigured: boolean;
}

/**
 * Handle GET /health on the proxy server.
 * Returns { ok: true, uptime: <seconds>, model, apiKeyConfigured }.
 */
export function handleHealthRequest(res: http.ServerResponse, info: HealthInfo): void {
  const body = JSON.stringify({
    ok: true,
    uptime: Math.floor((Date.now() - startTime) / 1000),
    model: info.model,
    apiKeyConfigured: info.apiKeyConfigured,
  });
  res.writeHead(200, { 'Content-Type': 'application/json', 'Content-Length': Buffer.byteLength(body) });
  res.end(body);
}
