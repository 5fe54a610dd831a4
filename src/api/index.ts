/**
 * API module exports
 */
export { createWebhookRouter, createStatusRouter } from './routes/index.js';
export { errorHandler, notFoundHandler, ApiError, asyncHandler } from './middleware/index.js';
export { WEBHOOK_MEDIA_TYPE, type StatusOptions } from './controllers/index.js';
