#!/usr/bin/env node
/**
 * Chat Proxy CLI
 *
 * Loads `.env`, reads configuration from the environment and starts the
 * proxy server. Run with `--help` for options.
 *
 * @packageDocumentation
 */

import dotenv from 'dotenv';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { ConfigError, type Config, describeApiKey, hasApiKey, loadConfig, withOverrides } from './config.js';
import { HELP_TEXT, parseCliArgs } from './cli-args.js';
import { ChatProxyHandler } from './handler.js';
import { createLogger } from './logger.js';
import { createChatServer, startServer, stopServer } from './server.js';

function readVersion(): string {
  try {
    const pkgPath = fileURLToPath(new URL('../package.json', import.meta.url));
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (err) {
    console.error(`Could not read package version: ${err instanceof Error ? err.message : String(err)}`);
  }
  return '0.0.0';
}

async function main(): Promise<void> {
  const command = parseCliArgs(process.argv.slice(2));

  if (command.type === 'help') {
    console.log(HELP_TEXT);
    return;
  }
  if (command.type === 'version') {
    console.log(readVersion());
    return;
  }
  if (command.type === 'error') {
    console.error(`Error: ${command.message}`);
    process.exitCode = 1;
    return;
  }

  const { options } = command;
  const logger = createLogger(options.verbose);

  dotenv.config();

  let config: Config;
  try {
    config = withOverrides(loadConfig(), { port: options.port, host: options.host });
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error(err.message);
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  describeApiKey(config, logger);
  if (options.requireKey && !hasApiKey(config)) {
    logger.error('Refusing to start without GOOGLE_API_KEY (--require-key)');
    process.exitCode = 1;
    return;
  }

  const handler = new ChatProxyHandler({ config, logger });
  const server = createChatServer({ handler, config, logger });
  const port = await startServer(server, config.port, config.host);
  logger.info(`Chat proxy listening on http://${config.host}:${port} (model: ${config.model})`);
  logger.info(`CORS origin: ${config.corsOrigin}`);

  const shutdown = () => {
    logger.info('Chat proxy shutting down...');
    stopServer(server).then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error(`Error during shutdown: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      }
    );
    // Force exit after 5s
    setTimeout(() => process.exit(1), 5000).unref();
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err: unknown) => {
  console.error('Failed to start proxy:', err);
  process.exit(1);
});
