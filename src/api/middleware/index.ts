/**
 * API Middleware exports
 */
export {
  ApiError,
  errorHandler,
  notFoundHandler,
  asyncHandler,
} from './errorHandler.js';
