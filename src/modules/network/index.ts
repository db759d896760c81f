/**
 * Network Module Index
 * =====================
 *
 * Proxy control, HTTP transport and request scheduling.
 */

export * from './network.config.types.js';
export * from './network.config.service.js';
export * from './httpClient.factory.js';
export * from './rateLimiter.js';
