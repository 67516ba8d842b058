import { type AuthorContext, InMemoryAuthorRepository, registerAuthorHandlers } from './authors';
import type { AuthorRepository } from './authors/types';
import { type AppConfig, loadTokens } from './config/Config';
import { ConsoleLogger, type Logger } from './core/types/Logger';
import { PackageRouter } from './router/PackageRouter';
import { type Authenticator, createStaticTokenAuthenticator } from './server/auth';
import { PackageServer } from './server/PackageServer';

export interface BootstrapOverrides {
  logger?: Logger;
  authenticator?: Authenticator;
  repository?: AuthorRepository;
}

export interface Application {
  config: AppConfig;
  logger: Logger;
  router: PackageRouter<AuthorContext>;
  repository: AuthorRepository;
  server: PackageServer<AuthorContext>;
}

/**
 * Wire logger, router, author handlers and server from a loaded config.
 * Nothing listens until `server.start()`.
 */
export const bootstrap = async (
  config: AppConfig,
  overrides: BootstrapOverrides = {}
): Promise<Application> => {
  const logger = overrides.logger ?? new ConsoleLogger({ minLevel: config.LOG_LEVEL });
  const repository = overrides.repository ?? new InMemoryAuthorRepository();

  const router = registerAuthorHandlers(
    new PackageRouter<AuthorContext>({ logger, handlerTimeoutMs: config.HANDLER_TIMEOUT_MS }),
    { logger }
  );

  let authenticator = overrides.authenticator;
  if (!authenticator) {
    const tokens = config.AUTH_TOKENS_FILE ? await loadTokens(config.AUTH_TOKENS_FILE) : {};
    if (Object.keys(tokens).length === 0) {
      logger.warn('No auth tokens configured; every connection will be rejected');
    }
    authenticator = createStaticTokenAuthenticator(tokens, { logger });
  }

  const server = new PackageServer<AuthorContext>(
    {
      port: config.PORT,
      host: config.HOST,
      path: config.WS_PATH,
      maxFrameBytes: config.MAX_FRAME_BYTES,
      caseInsensitiveFormat: config.FORMAT_CASE_INSENSITIVE,
    },
    { router, authenticator, context: { authors: repository }, logger }
  );

  return { config, logger, router, repository, server };
};
