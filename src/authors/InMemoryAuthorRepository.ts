import type { Author, AuthorFilters, AuthorRepository, Page, PaginateOptions } from './types';

const containsIgnoreCase = (value: string, term: string): boolean =>
  value.toLowerCase().includes(term.toLowerCase());

/**
 * Process-local author store, ids assigned from 1 upwards
 */
export class InMemoryAuthorRepository implements AuthorRepository {
  private readonly authors = new Map<number, Author>();
  private nextId = 1;

  constructor(seed: readonly string[] = []) {
    for (const name of seed) {
      this.insert(name);
    }
  }

  async getAll(filters: AuthorFilters = {}): Promise<Author[]> {
    return this.list().filter(
      (author) =>
        (filters.id === undefined || author.id === filters.id) &&
        (filters.name === undefined || author.name === filters.name)
    );
  }

  async searchByName(term: string): Promise<Author[]> {
    return this.list().filter((author) => containsIgnoreCase(author.name, term));
  }

  async getByName(name: string): Promise<Author | null> {
    return this.list().find((author) => author.name === name) ?? null;
  }

  async create(name: string): Promise<Author> {
    return this.insert(name);
  }

  async paginate({ page, perPage, filters = {} }: PaginateOptions): Promise<Page<Author>> {
    const matching = this.list().filter(
      (author) =>
        (filters.id === undefined || author.id === filters.id) &&
        (filters.name === undefined || containsIgnoreCase(author.name, filters.name))
    );

    const offset = (page - 1) * perPage;
    return {
      items: matching.slice(offset, offset + perPage),
      meta: {
        page,
        perPage,
        total: matching.length,
        pages: Math.ceil(matching.length / perPage),
      },
    };
  }

  private list(): Author[] {
    return [...this.authors.values()].map((author) => ({ ...author }));
  }

  private insert(name: string): Author {
    const author = { id: this.nextId++, name };
    this.authors.set(author.id, author);
    return { ...author };
  }
}
