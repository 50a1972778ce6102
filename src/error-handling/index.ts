/**
 * Error handling exports
 */

export * from './error-types';
export { ErrorHandler, ErrorContext } from './error-handler';
