import { z } from 'zod';
import { ConflictError, ValidationError } from '../core/errors';
import { formatIssues } from '../formats/JsonFormatStrategy';
import type { Author, AuthorRepository } from './types';

export const GetAuthorsInputSchema = z.object({
  id: z.number().int().optional(),
  name: z.string().optional(),
  search_term: z.string().optional(),
});

export const CreateAuthorInputSchema = z.object({
  name: z.string().min(1),
});

export type GetAuthorsInput = z.infer<typeof GetAuthorsInputSchema>;
export type CreateAuthorInput = z.infer<typeof CreateAuthorInputSchema>;

/**
 * Parse handler input against a command's schema
 *
 * @throws {ValidationError} VALIDATION_ERROR:INVALID_INPUT
 */
export const parseInput = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T => {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw ValidationError.invalidInput('Invalid command input', {
      issues: formatIssues(result.error),
    });
  }
  return result.data;
};

/**
 * Authors by exact id/name, or by case-insensitive name search. A non-empty
 * search term wins over the exact filters.
 */
export class GetAuthorsCommand {
  constructor(private readonly repository: AuthorRepository) {}

  async execute(input: GetAuthorsInput): Promise<Author[]> {
    if (input.search_term) {
      return this.repository.searchByName(input.search_term);
    }
    return this.repository.getAll({ id: input.id, name: input.name });
  }
}

export class CreateAuthorCommand {
  constructor(private readonly repository: AuthorRepository) {}

  /**
   * @throws {ConflictError} when an author with the same name exists
   */
  async execute(input: CreateAuthorInput): Promise<Author> {
    const existing = await this.repository.getByName(input.name);
    if (existing) {
      throw new ConflictError(`Author with name '${input.name}' already exists`, {
        name: input.name,
      });
    }
    return this.repository.create(input.name);
  }
}
