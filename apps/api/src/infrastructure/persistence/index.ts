/**
 * Persistence Infrastructure
 *
 * Drizzle schema and repositories of the BioTap service.
 */

export * from './schema/index.js';
export * from './repositories/index.js';
