import type { MetadataModel } from '../protocol/ResponseModel';

export interface Author {
  id: number;
  name: string;
}

/**
 * Exact-match filters; every given field must match
 */
export interface AuthorFilters {
  id?: number;
  name?: string;
}

export interface PaginateOptions {
  page: number;
  perPage: number;
  /** `name` matches as a case-insensitive substring, `id` exactly */
  filters?: AuthorFilters;
}

export interface Page<T> {
  items: T[];
  meta: MetadataModel;
}

/**
 * Storage for authors. Implementations report backend failures as StorageError.
 */
export interface AuthorRepository {
  getAll(filters: AuthorFilters): Promise<Author[]>;
  /** Case-insensitive substring search on the name */
  searchByName(term: string): Promise<Author[]>;
  getByName(name: string): Promise<Author | null>;
  create(name: string): Promise<Author>;
  paginate(options: PaginateOptions): Promise<Page<Author>>;
}
