/**
 * Webmention core - protocol logic independent of the host framework
 * and of the storage backend
 */

// Domain models
export * from './domain/models';
export * from './domain/enums';

// Errors
export * from './errors';

// Interfaces and contracts
export * from './interfaces';

// Mention lifecycle
export * from './state-machine';

// Content parsing and endpoint discovery
export * from './parser';
export * from './discovery';

// Callback dispatch
export * from './events';

// Incoming and outgoing processing
export * from './processors';

// Handler facade
export * from './services';
