export * from './config-service.js';
