/**
 * Chat proxy handler.
 *
 * Turns one chat message into one `generateContent` call and the upstream
 * envelope back into a plain reply. Expected outcomes (text, function call,
 * safety block, empty candidate) come back as `{ ok: true }`; genuine
 * failures come back as `{ ok: false }` carrying a {@link ChatProxyError}.
 *
 * The handler holds no per-request state, so concurrent calls are
 * independent.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { hasApiKey, type Config } from './config.js';
import { decodeEnvelope, type UpstreamResult } from './envelope.js';
import {
  ChatProxyError,
  ConfigurationError,
  InternalError,
  UpstreamRejectionError,
  UpstreamShapeError,
  UpstreamTransportError,
} from './errors.js';
import {
  FetchGenerativeClient,
  buildGenerateRequest,
  type GenerativeClient,
  type UpstreamResponse,
} from './gemini.js';
import { type Logger, defaultLogger } from './logger.js';

export const NO_TEXT_REPLY = 'No text content found in the response.';
export const SAFETY_BLOCKED_REPLY = 'Response blocked due to safety settings.';

export type ChatResult =
  | { ok: true; reply: string }
  | { ok: false; error: ChatProxyError };

export interface ChatProxyHandlerOptions {
  config: Config;
  /** Upstream client. Built from `config` when omitted. */
  client?: GenerativeClient;
  logger?: Logger;
}

const UpstreamErrorBodySchema = z.object({
  error: z.object({ message: z.string() }),
});

export class ChatProxyHandler {
  private readonly config: Config;
  private readonly client: GenerativeClient | null;
  private readonly logger: Logger;

  constructor(opts: ChatProxyHandlerOptions) {
    this.config = opts.config;
    this.logger = opts.logger ?? defaultLogger;

    if (opts.client) {
      this.client = opts.client;
    } else if (opts.config.apiKey !== undefined) {
      this.client = new FetchGenerativeClient({
        baseUrl: opts.config.baseUrl,
        model: opts.config.model,
        apiKey: opts.config.apiKey,
        timeoutMs: opts.config.upstreamTimeoutMs,
      });
    } else {
      this.client = null;
    }
  }

  async handle(message: string): Promise<ChatResult> {
    if (!hasApiKey(this.config) || !this.client) {
      return this.fail(new ConfigurationError());
    }

    let response: UpstreamResponse;
    try {
      response = await this.client.generateContent(buildGenerateRequest(message));
    } catch (err) {
      return this.fail(new InternalError(err));
    }

    if (!response.ok) {
      return this.fail(
        new UpstreamTransportError(response.status, response.statusText, extractUpstreamMessage(response.bodyText))
      );
    }

    let payload: unknown;
    try {
      payload = JSON.parse(response.bodyText);
    } catch {
      this.logger.warn('Upstream returned a non-JSON body');
      return this.fail(new UpstreamShapeError('Upstream returned a non-JSON body', response.bodyText));
    }

    try {
      return this.toResult(decodeEnvelope(payload));
    } catch (err) {
      return this.fail(new InternalError(err));
    }
  }

  private toResult(result: UpstreamResult): ChatResult {
    switch (result.kind) {
      case 'text':
        if (result.safetyRatings) {
          this.logger.warn('Response finished due to safety reasons after partial text.');
          this.logger.warn(`Safety Ratings: ${JSON.stringify(result.safetyRatings)}`);
        }
        return { ok: true, reply: result.text.trim() };
      case 'function_call':
        this.logger.warn('Warning: Received a function call, not text.');
        return { ok: true, reply: `Received a function call: ${JSON.stringify(result.functionCall)}` };
      case 'safety_blocked':
        this.logger.warn('Warning: Response blocked due to safety reasons.');
        this.logger.warn(`Safety Ratings: ${JSON.stringify(result.safetyRatings)}`);
        return { ok: true, reply: SAFETY_BLOCKED_REPLY };
      case 'empty':
        this.logger.warn(`Candidate carried no text (finishReason=${result.finishReason})`);
        return { ok: true, reply: NO_TEXT_REPLY };
      case 'prompt_blocked':
        return this.fail(new UpstreamRejectionError(result.blockReason, result.safetyRatings));
      case 'malformed':
        this.logger.warn(result.reason);
        return this.fail(new UpstreamShapeError(result.reason, result.payload));
    }
  }

  private fail(error: ChatProxyError): ChatResult {
    this.logger.error(`Gemini API error: ${error.detail}`);
    return { ok: false, error };
  }
}

/**
 * Pull the most useful message out of an upstream error body
 */
export function extractUpstreamMessage(bodyText: string): string {
  let body: unknown;
  try {
    body = JSON.parse(bodyText);
  } catch {
    return bodyText;
  }
  const parsed = UpstreamErrorBodySchema.safeParse(body);
  return parsed.success ? parsed.data.error.message : JSON.stringify(body);
}
