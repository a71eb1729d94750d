import { CatalogSettings } from '../../lib/config';
import { NO_FILTER, WhereClause, andClauses, escapeLike } from '../../lib/database';
import { NotFoundError, ValidationError } from '../../lib/errors';
import { DecoratedAsset, MediaAsset, MediaTable, SEARCH_ALL_FIELDS, SearchField } from '../../lib/media-types';
import { AssetDecorator } from './asset-decorator';
import { MetadataStore } from './metadata-store';

export type SearchMode = 'all-rows' | 'exact' | 'captions' | 'field' | 'search-all';

export interface SearchFilters {
  table: MediaTable;
  query?: string;
  /** Target of the free-text query. Without it the query runs in search-all mode. */
  field?: SearchField;
  fileType?: string;
  genre?: string;
  page: number;
  /** `table` or `grid`; anything else gets the fallback page size. */
  view?: string;
}

export interface SearchPage {
  items: DecoratedAsset[];
  page: number;
  pageSize: number;
  totalPages: number;
  totalCount: number;
  mode: SearchMode;
  filters: {
    table: MediaTable;
    query: string;
    field: SearchField | null;
    fileType: string | null;
    genre: string | null;
    view: string;
  };
}

/**
 * Builds and runs paginated catalog searches.
 *
 * Captions are matched whole-word per sentence, which LIKE cannot express, so
 * that mode filters in memory and paginates the filtered list. Every other mode
 * runs a SELECT and a COUNT sharing one WHERE clause.
 */
export class QueryBuilder {
  constructor(
    private readonly store: MetadataStore,
    private readonly decorator: AssetDecorator,
    private readonly pageSizes: CatalogSettings['pageSizes']
  ) {}

  pageSizeFor(view: string | undefined): number {
    if (view === 'table') return this.pageSizes.table;
    if (view === 'grid') return this.pageSizes.grid;
    return this.pageSizes.fallback;
  }

  search(filters: SearchFilters): SearchPage {
    if (!Number.isInteger(filters.page)) {
      throw new ValidationError(`Invalid page number: ${filters.page}`, 'page');
    }

    const pageSize = this.pageSizeFor(filters.view);
    const mode = searchMode(filters);
    const exact = exactFilterClause(filters);

    let rows: MediaAsset[];
    let totalCount: number;
    let totalPages: number;

    if (mode === 'captions') {
      const term = normalizedQuery(filters);
      const matched = this.store.select(filters.table, exact).filter(row => captionMatches(row.captions, term));
      totalCount = matched.length;
      totalPages = Math.ceil(totalCount / pageSize);
      assertPageInRange(filters.page, totalPages);
      const offset = (filters.page - 1) * pageSize;
      rows = matched.slice(offset, offset + pageSize);
    } else {
      const where = andClauses([textClause(mode, filters), exact]);
      totalCount = this.store.count(filters.table, where);
      totalPages = Math.ceil(totalCount / pageSize);
      assertPageInRange(filters.page, totalPages);
      rows = totalCount === 0 ? [] : this.store.select(filters.table, where, { limit: pageSize, offset: (filters.page - 1) * pageSize });
    }

    return {
      items: this.decorator.decorateAll(rows),
      page: filters.page,
      pageSize,
      totalPages,
      totalCount,
      mode,
      filters: {
        table: filters.table,
        query: normalizedQuery(filters),
        field: filters.field ?? null,
        fileType: filters.fileType || null,
        genre: filters.genre || null,
        view: filters.view ?? 'grid',
      },
    };
  }
}

export function searchMode(filters: SearchFilters): SearchMode {
  const query = normalizedQuery(filters);
  if (query) {
    if (filters.field === 'captions') return 'captions';
    return filters.field ? 'field' : 'search-all';
  }
  return filters.fileType || filters.genre ? 'exact' : 'all-rows';
}

export function exactFilterClause(filters: Pick<SearchFilters, 'fileType' | 'genre'>): WhereClause {
  const clauses: WhereClause[] = [];
  if (filters.fileType) clauses.push({ sql: 'file_type = ?', params: [filters.fileType] });
  if (filters.genre) clauses.push({ sql: 'genre = ?', params: [filters.genre] });
  return andClauses(clauses);
}

function textClause(mode: SearchMode, filters: SearchFilters): WhereClause {
  const pattern = `%${escapeLike(normalizedQuery(filters))}%`;
  if (mode === 'field' && filters.field) {
    return { sql: `${filters.field} LIKE ? ESCAPE '\\'`, params: [pattern] };
  }
  if (mode === 'search-all') {
    return {
      sql: SEARCH_ALL_FIELDS.map(field => `${field} LIKE ? ESCAPE '\\'`).join(' OR '),
      params: SEARCH_ALL_FIELDS.map(() => pattern),
    };
  }
  return NO_FILTER;
}

function normalizedQuery(filters: Pick<SearchFilters, 'query'>): string {
  return (filters.query ?? '').trim();
}

function assertPageInRange(page: number, totalPages: number): void {
  if (totalPages > 0 && (page < 1 || page > totalPages)) {
    throw new NotFoundError(`Page ${page} is out of range (1-${totalPages})`, 'page');
  }
}

/**
 * Whole-word, case-insensitive match of `term` against each period-delimited sentence.
 */
export function captionMatches(captions: string, term: string): boolean {
  const needle = term.trim();
  if (!needle) return false;
  const pattern = new RegExp(`(?<!\\w)${escapeRegExp(needle)}(?!\\w)`, 'i');
  return captions
    .split('.')
    .map(sentence => sentence.trim())
    .filter(sentence => sentence.length > 0)
    .some(sentence => pattern.test(sentence));
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
