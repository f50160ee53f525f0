/**
 * Fedora Module
 *
 * Fedora 3 REST repository client.
 *
 * @module services/fedora
 */

export * from './fedora-client.js';
export * from './responses.js';
