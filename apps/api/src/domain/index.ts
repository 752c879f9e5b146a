/**
 * Domain Layer
 *
 * Entities and domain events of the BioTap service.
 */

export * from './user/index.js';
export * from './link/index.js';
export * from './click-event/index.js';
export * from './password-reset/index.js';
export * from './email-log/index.js';
