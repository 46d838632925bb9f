import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { existsSync, mkdirSync, readFileSync } from 'fs';
import dotenv from 'dotenv';
import { loadConfig, PROJECT_ROOT } from '../config.js';
import { createStorageService } from '../services/storageService.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Load .env from project root
dotenv.config({ path: join(PROJECT_ROOT, '.env') });

const { databasePath } = loadConfig();
const sampleTickets: unknown = JSON.parse(readFileSync(join(__dirname, 'seed-tickets.json'), 'utf-8'));

if (!Array.isArray(sampleTickets)) {
  throw new Error('seed-tickets.json must contain an array');
}

console.log(`Using database: ${databasePath}`);
console.log(`Seeding ${sampleTickets.length} sample tickets...`);

if (!existsSync(dirname(databasePath))) {
  mkdirSync(dirname(databasePath), { recursive: true });
}

const storage = createStorageService(databasePath);
const tickets = sampleTickets.map((input) => storage.createTicket(input));

console.log(`Successfully seeded ${tickets.length} tickets:`);
tickets.forEach((ticket) => {
  console.log(`  - #${ticket.id} ${ticket.title} (${ticket.category}/${ticket.priority})`);
});

storage.close();
