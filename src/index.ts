/**
 * gemini-chat-proxy
 *
 * Single-endpoint backend that forwards a chat message to the Gemini
 * `generateContent` API and relays the generated text back.
 *
 * @example
 * ```typescript
 * import { ChatProxyHandler, createChatServer, loadConfig, startServer } from 'gemini-chat-proxy';
 *
 * const config = loadConfig();
 * const handler = new ChatProxyHandler({ config });
 * await startServer(createChatServer({ handler, config }), config.port, config.host);
 * ```
 *
 * @packageDocumentation
 */

// Handler
export { ChatProxyHandler, NO_TEXT_REPLY, SAFETY_BLOCKED_REPLY, extractUpstreamMessage } from './handler.js';
export type { ChatProxyHandlerOptions, ChatResult } from './handler.js';

// Upstream
export { FetchGenerativeClient, buildGenerateRequest, buildGenerateUrl } from './gemini.js';
export type {
  GenerativeClient,
  GenerateContentRequest,
  GenerationConfig,
  UpstreamResponse,
  FetchClientOptions,
} from './gemini.js';
export { decodeEnvelope, SAFETY_FINISH_REASON } from './envelope.js';
export type {
  UpstreamResult,
  TextReply,
  FunctionCallReply,
  SafetyBlockedReply,
  EmptyReply,
  PromptBlocked,
  MalformedShape,
} from './envelope.js';

// Errors
export {
  ChatProxyError,
  ConfigurationError,
  UpstreamTransportError,
  UpstreamRejectionError,
  UpstreamShapeError,
  InternalError,
  toErrorBody,
} from './errors.js';
export type { ChatErrorKind, ErrorBody } from './errors.js';

// Configuration
export { loadConfig, withOverrides, hasApiKey, apiKeyPrefix, describeApiKey, ConfigError } from './config.js';
export type { Config } from './config.js';

// Server
export { createChatServer, startServer, stopServer } from './server.js';
export type { ChatServerOptions, ChatRequest } from './server.js';
export { handleHealthRequest } from './health.js';

export { defaultLogger, createLogger } from './logger.js';
export type { Logger } from './logger.js';
