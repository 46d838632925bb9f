export * from './errors.js';
export * from './types/ticket.js';
export * from './types/api.js';
export * from './schemas/ticket.js';
