import 'dotenv/config';
import { mkdir } from 'node:fs/promises';
import * as path from 'node:path';
import { loadConfig } from './config.js';
import { createApp } from './app.js';
import { Logger } from './logger.js';
import { buildServices } from './services.js';

const config = loadConfig();
const logDir = path.join(config.sandboxRoot, 'logs');
await mkdir(logDir, { recursive: true });

const logger = Logger.create('task-runner', logDir);
const app = createApp(config, buildServices(config, logger));

app.listen(config.port, config.bind, () => {
  logger.info(`task-runner listening on ${config.bind}:${config.port}`, {
    sandbox_root: config.sandboxRoot,
  });
});
