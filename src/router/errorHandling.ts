import { AppError, StorageError } from '../core/errors';
import { type Logger, SilentLogger } from '../core/types/Logger';
import { describePkg } from '../protocol/constants';
import { ResponseModel } from '../protocol/ResponseModel';
import type { PackageHandler } from './PackageRouter';

export interface ErrorHandlingOptions {
  logger?: Logger;
}

/**
 * Wrap a handler so expected application errors become error responses.
 *
 * - StorageError: ERROR with a generic message, details stay in the log
 * - other AppError: the error's rspCode with `{ code, msg, details }` as data
 *
 * Anything else is rethrown for the router to deal with.
 */
export const withErrorHandling = <TContext>(
  handler: PackageHandler<TContext>,
  options: ErrorHandlingOptions = {}
): PackageHandler<TContext> => {
  const logger = options.logger ?? new SilentLogger();

  return async (request, context) => {
    try {
      return await handler(request, context);
    } catch (error) {
      if (error instanceof StorageError) {
        logger.error(`Storage error in ${describePkg(request.pkgId)}`, error, {
          reqId: request.reqId,
          details: error.details,
        });
        return ResponseModel.err(request.pkgId, request.reqId, {
          msg: 'Database error occurred',
        });
      }

      if (error instanceof AppError) {
        logger.warn(`${error.name} in ${describePkg(request.pkgId)}: ${error.message}`, {
          reqId: request.reqId,
        });
        const data: Record<string, unknown> = { code: error.code, msg: error.message };
        if (error.details) {
          data.details = error.details;
        }
        return ResponseModel.err(request.pkgId, request.reqId, {
          data,
          statusCode: error.rspCode,
        });
      }

      throw error;
    }
  };
};
