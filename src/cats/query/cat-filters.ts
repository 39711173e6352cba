import { AdoptionState } from '../adoption/adoption';

export const SORT_KEYS = ['id', 'name', 'age', 'weight', 'created_at'] as const;
export type SortKey = (typeof SORT_KEYS)[number];

export interface CatOrdering {
  key: SortKey;
  direction: 'ASC' | 'DESC';
}

export interface CatPage {
  number: number;
  size: number;
}

/**
 * A listing request after parsing. Every criterion is optional and they
 * combine with AND; an empty object apart from `ordering` lists every cat.
 */
export interface CatFilters {
  status?: AdoptionState;
  /** Search-style availability flag; true is `available`, false `adopted`. */
  available?: boolean;
  breed?: string;
  neutered?: boolean;
  minAge?: number;
  maxAge?: number;
  /** Each term must match name, breed, color or description. */
  search?: string[];
  name?: string;
  color?: string;
  ordering: CatOrdering;
  page?: CatPage;
}

/** Raw query string values as Express parses them. */
export type CatQueryParams = Record<string, unknown>;

export interface PagingDefaults {
  pageSize: number;
  maxPageSize: number;
}

export const DEFAULT_ORDERING: CatOrdering = { key: 'id', direction: 'ASC' };

const TRUTHY = ['true', '1', 'yes'];

function first(query: CatQueryParams, key: string): string | undefined {
  const value = query[key];
  const candidate = Array.isArray(value) ? value[0] : value;
  return typeof candidate === 'string' ? candidate : undefined;
}

function nonEmpty(query: CatQueryParams, key: string): string | undefined {
  const value = first(query, key)?.trim();
  return value ? value : undefined;
}

function integer(query: CatQueryParams, key: string): number | undefined {
  const value = first(query, key)?.trim();
  return value !== undefined && /^-?\d+$/.test(value) ? Number(value) : undefined;
}

export function isTruthy(value: string): boolean {
  return TRUTHY.includes(value.trim().toLowerCase());
}

export function parseOrdering(value: string | undefined): CatOrdering {
  if (!value) {
    return DEFAULT_ORDERING;
  }
  const descending = value.startsWith('-');
  const key = SORT_KEYS.find((sortKey) => sortKey === value.slice(descending ? 1 : 0));
  return key ? { key, direction: descending ? 'DESC' : 'ASC' } : DEFAULT_ORDERING;
}

export function parseSearchTerms(value: string | undefined): string[] | undefined {
  const terms = (value ?? '').split(/[\s,]+/).filter((term) => term.length > 0);
  return terms.length > 0 ? terms : undefined;
}

/**
 * Reads listing parameters leniently: unknown values and numbers that do not
 * parse are dropped rather than rejected.
 */
export function parseCatFilters(
  query: CatQueryParams,
  defaults: PagingDefaults,
): CatFilters {
  const filters: CatFilters = {
    ordering: parseOrdering(first(query, 'ordering')?.trim()),
  };

  const status = first(query, 'status');
  if (status === 'available' || status === 'adopted') {
    filters.status = status;
  }
  const available = first(query, 'available');
  if (available !== undefined) {
    filters.available = isTruthy(available);
  }

  const neutered = first(query, 'neutered');
  if (neutered !== undefined) {
    filters.neutered = isTruthy(neutered);
  }

  filters.breed = nonEmpty(query, 'breed');
  filters.name = nonEmpty(query, 'name');
  filters.color = nonEmpty(query, 'color');
  filters.minAge = integer(query, 'min_age');
  filters.maxAge = integer(query, 'max_age');
  filters.search = parseSearchTerms(first(query, 'search'));

  const page = integer(query, 'page');
  if (page !== undefined && page > 0) {
    const size = integer(query, 'page_size');
    filters.page = {
      number: page,
      size:
        size !== undefined && size > 0
          ? Math.min(size, defaults.maxPageSize)
          : defaults.pageSize,
    };
  }

  return filters;
}
