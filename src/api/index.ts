import dotenv from 'dotenv';
import { Logger } from '../utils/logger.js';
import { AppEnvSchema, describeIssue } from '../utils/validation.js';
import { createAssistantApp } from './app.js';
import { ConfigManager, defaultConfigDir } from './config-manager.js';

dotenv.config();

async function main(): Promise<void> {
  const parsed = AppEnvSchema.safeParse(process.env);
  if (!parsed.success) {
    console.error(`Invalid environment: ${describeIssue(parsed.error).message}`);
    process.exit(1);
  }

  const env = parsed.data;
  const logger = new Logger(env.LOG_LEVEL);
  const settings = new ConfigManager(env.CONFIG_DIR ?? defaultConfigDir(), logger.child('config'));
  const secret = env.ASSISTANT_SECRET ?? settings.getOrCreateSecret();

  const { server } = await createAssistantApp({ env, settings, secret, logger });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    await server.stop();
    process.exit(0);
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch(error => {
        logger.error('Shutdown failed', error);
        process.exit(1);
      });
    });
  }

  await server.start();
}

main().catch(error => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
