import { z } from 'zod';
import { type Logger, SilentLogger } from '../core/types/Logger';
import { PkgID } from '../protocol/constants';
import { ResponseModel } from '../protocol/ResponseModel';
import { withErrorHandling } from '../router/errorHandling';
import type { PackageRouter } from '../router/PackageRouter';
import { createSchemaValidator, type JsonSchema, type ValidatorCallback } from '../router/validation';
import {
  CreateAuthorCommand,
  CreateAuthorInputSchema,
  GetAuthorsCommand,
  GetAuthorsInputSchema,
  parseInput,
} from './commands';
import type { Author, AuthorRepository } from './types';

export interface AuthorContext {
  authors: AuthorRepository;
}

export const AUTHOR_ROLES = {
  READ: 'get-authors',
  CREATE: 'create-author',
} as const;

const DEFAULT_PAGE = 1;
const DEFAULT_PER_PAGE = 20;

export const getAuthorsSchema: JsonSchema = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  type: 'object',
  properties: {
    id: { type: 'integer' },
    name: { type: 'string' },
    search_term: { type: 'string' },
  },
  additionalProperties: false,
};

export const getPaginatedAuthorsSchema: JsonSchema = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  type: 'object',
  properties: {
    filters: {
      type: 'object',
      properties: {
        id: { type: 'integer' },
        name: { type: 'string' },
      },
      additionalProperties: false,
    },
    page: { type: 'integer', minimum: 1 },
    per_page: { type: 'integer', minimum: 1 },
  },
  additionalProperties: false,
};

export const createAuthorSchema: JsonSchema = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  type: 'object',
  properties: {
    name: { type: 'string', minLength: 1 },
  },
  required: ['name'],
  additionalProperties: false,
};

const PaginatedInputSchema = z.object({
  page: z.number().int().min(1).default(DEFAULT_PAGE),
  per_page: z.number().int().min(1).default(DEFAULT_PER_PAGE),
  filters: z
    .object({
      id: z.number().int().optional(),
      name: z.string().optional(),
    })
    .optional(),
});

const toData = (author: Author): Record<string, unknown> => ({ id: author.id, name: author.name });

export interface AuthorHandlerOptions {
  logger?: Logger;
  /** Defaults to a schema validator logging through `logger` */
  validatorCallback?: ValidatorCallback;
}

/**
 * Register the author packages on a router
 */
export const registerAuthorHandlers = (
  router: PackageRouter<AuthorContext>,
  options: AuthorHandlerOptions = {}
): PackageRouter<AuthorContext> => {
  const logger = options.logger ?? new SilentLogger();
  const validatorCallback = options.validatorCallback ?? createSchemaValidator({ logger });

  router.register(
    PkgID.GET_AUTHORS,
    withErrorHandling<AuthorContext>(
      async (request, { authors }) => {
        const input = parseInput(GetAuthorsInputSchema, request.data);
        const result = await new GetAuthorsCommand(authors).execute(input);
        return ResponseModel.ok(request.pkgId, request.reqId, { data: result.map(toData) });
      },
      { logger }
    ),
    { jsonSchema: getAuthorsSchema, validatorCallback, roles: [AUTHOR_ROLES.READ] }
  );

  router.register(
    PkgID.GET_PAGINATED_AUTHORS,
    withErrorHandling<AuthorContext>(
      async (request, { authors }) => {
        const input = parseInput(PaginatedInputSchema, request.data);
        const { items, meta } = await authors.paginate({
          page: input.page,
          perPage: input.per_page,
          filters: input.filters,
        });
        return ResponseModel.ok(request.pkgId, request.reqId, { data: items.map(toData), meta });
      },
      { logger }
    ),
    { jsonSchema: getPaginatedAuthorsSchema, validatorCallback, roles: [AUTHOR_ROLES.READ] }
  );

  router.register(
    PkgID.CREATE_AUTHOR,
    withErrorHandling<AuthorContext>(
      async (request, { authors }) => {
        const input = parseInput(CreateAuthorInputSchema, request.data);
        const author = await new CreateAuthorCommand(authors).execute(input);
        logger.info('Author created', { reqId: request.reqId, authorId: author.id });
        return ResponseModel.ok(request.pkgId, request.reqId, { data: toData(author) });
      },
      { logger }
    ),
    { jsonSchema: createAuthorSchema, validatorCallback, roles: [AUTHOR_ROLES.CREATE] }
  );

  return router;
};
