/**
 * API Controllers exports
 */
export * from './healthController.js';
export * from './webhookController.js';
