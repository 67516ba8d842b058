export type { Author, AuthorFilters, AuthorRepository, Page, PaginateOptions } from './types';
export { InMemoryAuthorRepository } from './InMemoryAuthorRepository';
export {
  GetAuthorsCommand,
  CreateAuthorCommand,
  GetAuthorsInputSchema,
  CreateAuthorInputSchema,
  parseInput,
} from './commands';
export type { GetAuthorsInput, CreateAuthorInput } from './commands';
export {
  registerAuthorHandlers,
  getAuthorsSchema,
  getPaginatedAuthorsSchema,
  createAuthorSchema,
  AUTHOR_ROLES,
} from './handlers';
export type { AuthorContext, AuthorHandlerOptions } from './handlers';
