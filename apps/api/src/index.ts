import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// Load root .env if present
dotenv.config({ path: path.join(__dirname, '../../../.env') });
// Fallback to local .env
dotenv.config();

const { loadConfig } = await import('./config');
const { logger } = await import('./logger');
const { createApp } = await import('./app');

const config = loadConfig();
const app = createApp({ config });

app.listen(config.port, () => {
  logger.info({ port: config.port, dataDir: config.dataDir }, 'tablecast API listening');
});
