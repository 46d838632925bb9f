import dotenv from 'dotenv';
import { dirname, join } from 'path';
import { mkdirSync, existsSync } from 'fs';

import { loadConfig, PROJECT_ROOT } from './config.js';
import { createStorageService } from './services/storageService.js';
import { createClassifierService } from './services/classifierService.js';
import { createApp } from './app.js';

// Load .env from project root; production gets its env from the host
if (process.env.NODE_ENV !== 'production') {
  dotenv.config({ path: join(PROJECT_ROOT, '.env') });
}

const config = loadConfig();

// Ensure data directory exists
const dataDir = dirname(config.databasePath);
if (!existsSync(dataDir)) {
  mkdirSync(dataDir, { recursive: true });
}

// Initialize storage
const storage = createStorageService(config.databasePath);

// Classification is optional; without a key every classify call returns nulls
const classifier = createClassifierService(config.classifier);
if (!classifier.isConfigured()) {
  console.log('[classifier] ANTHROPIC_API_KEY not set, suggestions disabled');
}

const app = createApp({
  storage,
  classifier,
  clientDistPath: config.isProduction ? join(PROJECT_ROOT, 'apps/client/dist') : undefined,
});

// Start server
const server = app.listen(config.port, '0.0.0.0', () => {
  console.log(`[server] Running on http://localhost:${config.port}`);
});

// Graceful shutdown
function shutdown() {
  console.log('\n[server] Shutting down...');
  server.close();
  storage.close();
  process.exit(0);
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
