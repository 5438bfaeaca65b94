#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig } from './config.js';
import { PreferenceRepository } from './db/preferences.js';
import { Schema } from './db/schema.js';
import { createLogger } from './logger.js';
import { MessageHandler } from './messages/handler.js';
import { ChatPlatformClient } from './platform/client.js';
import { createTranslator } from './providers/factory.js';
import { createServer } from './web/server.js';

function start(): void {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });

  // Built once; a bad provider config stops the process here.
  const translator = createTranslator(config.provider);

  const schema = new Schema(config.databasePath);
  const preferences = new PreferenceRepository(schema.getDatabase());
  const chat = new ChatPlatformClient(config.chatServer);

  const handler = new MessageHandler({
    users: chat,
    preferences,
    poster: chat,
    resolveTranslator: () => translator,
    bot: config.bot,
    logger,
  });

  const app = createServer({
    apiToken: config.apiToken,
    preferences,
    posts: chat,
    handler,
    resolveTranslator: () => translator,
    logger,
  });

  const server = app.listen(config.port, () => {
    logger.info(
      { port: config.port, provider: translator.kind, env: config.env },
      'Auto-translate service listening'
    );
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, 'Shutting down');
    server.close(() => {
      schema.close();
      process.exit(0);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

try {
  start();
} catch (error) {
  createLogger().fatal({ err: error }, 'Failed to start auto-translate service');
  process.exitCode = 1;
}
