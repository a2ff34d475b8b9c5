// Shared types, message contracts, and Zod schemas
export * from './schemas';
export * from './messages';
export * from './dispatch';
export * from './errors';
