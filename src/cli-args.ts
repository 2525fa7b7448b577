/**
 * Command line parsing for the chat proxy CLI.
 * @packageDocumentation
 */

export interface CliOptions {
  port?: number;
  host?: string;
  verbose: boolean;
  requireKey: boolean;
}

export type CliCommand =
  | { type: 'help' }
  | { type: 'version' }
  | { type: 'start'; options: CliOptions }
  | { type: 'error'; message: string };

export function parseCliArgs(args: string[]): CliCommand {
  if (args.includes('-h') || args.includes('--help')) return { type: 'help' };
  if (args.includes('--version')) return { type: 'version' };

  const options: CliOptions = { verbose: false, requireKey: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    if (arg === '--port') {
      if (next === undefined) return { type: 'error', message: '--port needs a value' };
      const port = Number(next);
      if (!Number.isInteger(port) || port < 0 || port > 65535) {
        return { type: 'error', message: `Invalid port number: ${next}` };
      }
      options.port = port;
      i++;
    } else if (arg === '--host') {
      if (next === undefined) return { type: 'error', message: '--host needs a value' };
      options.host = next;
      i++;
    } else if (arg === '-v' || arg === '--verbose') {
      options.verbose = true;
    } else if (arg === '--require-key') {
      options.requireKey = true;
    } else {
      return { type: 'error', message: `Unknown option: ${arg ?? ''}` };
    }
  }

  return { type: 'start', options };
}

export const HELP_TEXT = `
Chat Proxy

Forwards chat messages from a web front end to the Gemini API.

Usage:
  chat-proxy [options]

Options:
  --port <number>    Port to listen on (default: $PORT or 8000)
  --host <string>    Host to bind to (default: $HOST or 0.0.0.0)
  --require-key      Exit at startup when GOOGLE_API_KEY is missing
  -v, --verbose      Enable verbose logging
  -h, --help         Show this help message
  --version          Show version

Environment Variables:
  GOOGLE_API_KEY       Google Generative Language API key
  GEMINI_MODEL         Model name (default: gemini-1.5-flash-latest)
  GEMINI_BASE_URL      API base URL
  CORS_ORIGIN          Front-end origin allowed by CORS (default: http://localhost:3000)
  UPSTREAM_TIMEOUT_MS  Upstream request timeout (default: 30000)
`;
