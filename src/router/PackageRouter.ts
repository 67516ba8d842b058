import { TIME } from '../core/constants';
import { RegistrationError, TimeoutError } from '../core/errors';
import { type Logger, SilentLogger, toError } from '../core/types/Logger';
import { describePkg, RSPCode } from '../protocol/constants';
import type { RequestModel } from '../protocol/RequestModel';
import { ResponseModel } from '../protocol/ResponseModel';
import { hasPermission, type RoleBearer } from './permissions';
import type { JsonSchema, ValidatorCallback } from './validation';

/**
 * Package handler. `context` carries whatever collaborators the transport
 * injects (repositories, sessions); the router only passes it through.
 */
export type PackageHandler<TContext = void> = (
  request: RequestModel,
  context: TContext
) => Promise<ResponseModel> | ResponseModel;

export interface RegisterOptions {
  jsonSchema?: JsonSchema;
  validatorCallback?: ValidatorCallback;
  /** Every listed role is required; omit for a public package */
  roles?: Iterable<string>;
}

interface RegistryEntry<TContext> {
  handler: PackageHandler<TContext>;
  jsonSchema?: JsonSchema;
  validatorCallback?: ValidatorCallback;
  roles: ReadonlySet<string>;
}

/**
 * Package router configuration
 */
export interface PackageRouterConfig {
  logger?: Logger;
  /** Per-request handler deadline; 0 or undefined disables it */
  handlerTimeoutMs?: number;
}

/**
 * PackageRouter maps package ids to handlers and runs the dispatch pipeline
 *
 * Each request goes through lookup, permission check, schema validation and
 * handler invocation, in that order. Every outcome is a response; only
 * registration mistakes throw.
 *
 * Handlers are registered once at startup. The registry is not modified
 * afterwards, so a single router can serve any number of connections.
 *
 * @example
 * ```typescript
 * const router = new PackageRouter<{ authors: AuthorRepository }>({ logger });
 *
 * router.register(
 *   PkgID.GET_AUTHORS,
 *   async (request, { authors }) =>
 *     ResponseModel.ok(request.pkgId, request.reqId, { data: await authors.getAll({}) }),
 *   { jsonSchema: getAuthorsSchema, validatorCallback: validator, roles: ['get-authors'] }
 * );
 *
 * const response = await router.handleRequest(user, request, { authors });
 * ```
 */
export class PackageRouter<TContext = void> {
  private readonly registry = new Map<number, RegistryEntry<TContext>>();
  private readonly logger: Logger;
  private readonly handlerTimeoutMs: number;

  constructor(config: PackageRouterConfig = {}) {
    this.logger = config.logger ?? new SilentLogger();
    this.handlerTimeoutMs = config.handlerTimeoutMs ?? TIME.DEFAULT_HANDLER_TIMEOUT_MS;
  }

  /**
   * Register the handler for a package id
   *
   * @throws {RegistrationError} when the id already has a handler
   */
  register(
    pkgId: number,
    handler: PackageHandler<TContext>,
    options: RegisterOptions = {}
  ): this {
    if (typeof handler !== 'function') {
      throw RegistrationError.invalidHandler(`Handler for ${describePkg(pkgId)} must be a function`);
    }

    if (this.registry.has(pkgId)) {
      throw RegistrationError.duplicateHandler(
        `Handler already registered for ${describePkg(pkgId)}`,
        { pkgId }
      );
    }

    this.registry.set(pkgId, {
      handler,
      jsonSchema: options.jsonSchema,
      validatorCallback: options.validatorCallback,
      roles: new Set(options.roles ?? []),
    });

    this.logger.debug(`Handler registered for ${describePkg(pkgId)}`, {
      roles: [...(options.roles ?? [])],
      validated: Boolean(options.jsonSchema && options.validatorCallback),
    });
    return this;
  }

  hasHandler(pkgId: number): boolean {
    return this.registry.has(pkgId);
  }

  /**
   * Roles required for a package; empty for public packages and unknown ids
   */
  getPermissions(pkgId: number): string[] {
    return [...(this.registry.get(pkgId)?.roles ?? [])];
  }

  getHandlerCount(): number {
    return this.registry.size;
  }

  getRegisteredIds(): number[] {
    return [...this.registry.keys()];
  }

  /**
   * Dispatch one request. Never rejects.
   */
  async handleRequest(
    user: RoleBearer,
    request: RequestModel,
    context: TContext
  ): Promise<ResponseModel> {
    const { pkgId, reqId } = request;
    const entry = this.registry.get(pkgId);

    if (!entry) {
      this.logger.warn(`No handler found for ${describePkg(pkgId)}`, { reqId });
      return ResponseModel.err(pkgId, reqId, { msg: `No handler found for pkg_id ${pkgId}` });
    }

    if (!hasPermission(entry.roles, user.roles)) {
      this.logger.info(`Permission denied for ${describePkg(pkgId)}`, {
        reqId,
        username: user.username,
        required: [...entry.roles],
      });
      return ResponseModel.err(pkgId, reqId, {
        msg: `No permission for pkg_id ${pkgId}`,
        statusCode: RSPCode.PERMISSION_DENIED,
      });
    }

    try {
      if (entry.jsonSchema && entry.validatorCallback) {
        const failure = entry.validatorCallback(request, entry.jsonSchema);
        if (failure) {
          return failure;
        }
      }

      const response = await this.invoke(entry, request, context);
      this.logger.debug(`Handled ${describePkg(pkgId)}`, {
        reqId,
        statusCode: response.statusCode,
      });
      return response;
    } catch (error) {
      if (error instanceof TimeoutError) {
        this.logger.warn(error.message, { reqId, timeoutMs: this.handlerTimeoutMs });
        return ResponseModel.err(pkgId, reqId, { msg: 'Request timed out' });
      }

      this.logger.error(`Unhandled error in handler for ${describePkg(pkgId)}`, toError(error), {
        reqId,
      });
      return ResponseModel.err(pkgId, reqId, { msg: 'Internal server error' });
    }
  }

  private invoke(
    entry: RegistryEntry<TContext>,
    request: RequestModel,
    context: TContext
  ): Promise<ResponseModel> {
    const pending = Promise.resolve().then(() => entry.handler(request, context));
    if (this.handlerTimeoutMs <= 0) {
      return pending;
    }

    return new Promise<ResponseModel>((resolve, reject) => {
      let expired = false;
      const timer = setTimeout(() => {
        expired = true;
        reject(
          new TimeoutError(`Handler for ${describePkg(request.pkgId)} timed out`, {
            timeoutMs: this.handlerTimeoutMs,
          })
        );
      }, this.handlerTimeoutMs);

      pending.then(
        (response) => {
          clearTimeout(timer);
          resolve(response);
        },
        (error: unknown) => {
          clearTimeout(timer);
          if (expired) {
            this.logger.warn(`Handler for ${describePkg(request.pkgId)} failed after timing out`, {
              reqId: request.reqId,
              error: toError(error).message,
            });
          }
          reject(error);
        }
      );
    });
  }
}
