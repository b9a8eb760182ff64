import { ValidationError } from '../shared/errors.js';

/**
 * Fields that may be named in a search request, with the kind of value each
 * one holds. Field names are spliced into SQL text, so nothing outside this
 * table may ever reach a query.
 */
export const SEARCH_FIELDS = {
  owner: 'text',
  name: 'text',
  full_name: 'text',
  description: 'text',
  url: 'text',
  homepage_url: 'text',
  stars: 'integer',
  language: 'text',
  topics: 'list',
  readme_excerpt: 'text',
  ai_summary: 'text',
  ai_categories: 'list',
  fetched_at: 'text',
  enriched_at: 'text',
  score: 'float',
} as const;

export type SearchField = keyof typeof SEARCH_FIELDS;
export type FieldKind = (typeof SEARCH_FIELDS)[SearchField];

export type FieldValue =
  | { kind: 'text'; value: string }
  | { kind: 'integer'; value: number }
  | { kind: 'float'; value: number }
  | { kind: 'list'; value: string[] }
  | { kind: 'absent' };

/** Search result row, keyed in the order the fields were requested. */
export type SearchRow = Map<SearchField, FieldValue>;

export type SortDirection = 'asc' | 'desc';

export interface SortSpec {
  field: SearchField;
  direction: SortDirection;
}

export interface SearchOptions {
  limit: number;
  fields: SearchField[];
  sort?: SortSpec[];
}

export const DEFAULT_SEARCH_FIELDS: SearchField[] = [
  'full_name',
  'description',
  'ai_summary',
  'ai_categories',
  'stars',
  'url',
  'score',
];

export const DEFAULT_SORT: SortSpec[] = [{ field: 'score', direction: 'desc' }];

export function isSearchField(name: string): name is SearchField {
  return Object.prototype.hasOwnProperty.call(SEARCH_FIELDS, name);
}

/**
 * Check every field named by a search request against the allow-list.
 * Takes plain strings so callers holding unchecked input get the same check.
 */
export function validateSearchRequest(request: {
  fields: readonly string[];
  sort?: ReadonlyArray<{ field: string; direction: string }>;
}): void {
  for (const field of request.fields) {
    if (!isSearchField(field)) {
      throw new ValidationError(`Unknown field "${field}"`, { field });
    }
  }
  for (const spec of request.sort ?? []) {
    if (!isSearchField(spec.field)) {
      throw new ValidationError(`Unknown sort field "${spec.field}"`, { field: spec.field });
    }
    if (spec.direction !== 'asc' && spec.direction !== 'desc') {
      throw new ValidationError(`Invalid sort direction "${spec.direction}" (use asc or desc)`, {
        direction: spec.direction,
      });
    }
  }
}

export function validateLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError(`Invalid result limit: ${limit}`, { limit });
  }
}

/**
 * Parse a result count such as "10". The whole string must be a positive integer.
 */
export function parseLimit(raw: string): number {
  const trimmed = raw.trim();
  const limit = trimmed === '' ? NaN : Number(trimmed);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError(`Invalid result limit "${raw}" (use a positive integer)`, { limit: raw });
  }
  return limit;
}

/**
 * Parse a comma-separated field list such as "full_name,stars,score".
 */
export function parseFields(raw: string): SearchField[] {
  const fields: SearchField[] = [];
  for (const part of raw.split(',')) {
    const field = part.trim();
    if (!field) continue;
    if (!isSearchField(field)) {
      throw new ValidationError(`Unknown field "${field}"`, { field });
    }
    fields.push(field);
  }
  if (fields.length === 0) {
    throw new ValidationError('No fields specified');
  }
  return fields;
}

/**
 * Parse a comma-separated sort list such as "stars desc, full_name".
 * Direction defaults to ascending.
 */
export function parseSort(raw: string): SortSpec[] {
  const specs: SortSpec[] = [];
  for (const part of raw.split(',')) {
    const tokens = part.trim().split(/\s+/).filter(Boolean);
    const [field, dir] = tokens;
    if (field === undefined) continue;
    if (!isSearchField(field)) {
      throw new ValidationError(`Unknown sort field "${field}"`, { field });
    }
    let direction: SortDirection = 'asc';
    if (dir !== undefined) {
      const lowered = dir.toLowerCase();
      if (lowered !== 'asc' && lowered !== 'desc') {
        throw new ValidationError(`Invalid sort direction "${dir}" (use asc or desc)`, { direction: dir });
      }
      direction = lowered;
    }
    if (tokens.length > 2) {
      throw new ValidationError(`Invalid sort clause "${part.trim()}"`);
    }
    specs.push({ field, direction });
  }
  return specs;
}

/**
 * Flatten a tagged search row into a plain object for JSON output.
 */
export function toPlainRow(row: SearchRow): Record<string, string | number | string[] | null> {
  const out: Record<string, string | number | string[] | null> = {};
  for (const [field, value] of row) {
    out[field] = value.kind === 'absent' ? null : value.value;
  }
  return out;
}
