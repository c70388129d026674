/**
 * @snapdelta/core
 *
 * Canonical entity model, dataset schemas and collaborator interfaces
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Errors
export * from './errors/index.js';

// Validation schemas
export * from './validation/index.js';

// Utilities
export * from './utils/index.js';
