/**
 * Process-wide sink for errors that must not fail the current request,
 * such as a host allocation that did not succeed during route creation.
 */

import { getComponentLogger } from '../logging/index.js';

export type ErrorHandler = (error: Error) => void;

const logger = getComponentLogger('error-handler');

export const logErrorHandler: ErrorHandler = (error) => {
  logger.error('Unhandled error', error, { code: 'code' in error ? error.code : undefined });
};

let handlers: readonly ErrorHandler[] = [logErrorHandler];

/**
 * Report a non-fatal error to every registered handler. Never throws: a
 * handler that fails is logged and the rest still run.
 */
export function handleError(error: Error): void {
  for (const handler of handlers) {
    try {
      handler(error);
    } catch (handlerError) {
      logger.warn('Error handler failed', {
        error: handlerError instanceof Error ? handlerError.message : String(handlerError),
      });
    }
  }
}

/**
 * Replace the registered handlers. Returns a function restoring the
 * previous ones.
 */
export function setErrorHandlers(next: readonly ErrorHandler[]): () => void {
  const previous = handlers;
  handlers = [...next];
  return () => {
    handlers = previous;
  };
}

export function getErrorHandlers(): readonly ErrorHandler[] {
  return handlers;
}
