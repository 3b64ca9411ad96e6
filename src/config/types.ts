/**
 * Path pattern for exclusion rules.
 * - String without `*`: exact match
 * - String with `*`: one path segment; `**`: any number of segments
 * - RegExp: tested against the request path
 */
export type PathPattern = string | RegExp;

/** Storage backend kinds that can be built from a location string. */
export type StorageKind = 'memory' | 'sqlite' | 'postgresql';

/**
 * Read-only view over the rules the filter functions evaluate.
 * Every predicate in `filters.ts` is pure given one of these.
 */
export interface FilterSnapshot {
  readonly maxBodySize: number;
  readonly excludedPaths: ReadonlySet<PathPattern>;
  readonly excludedContentTypes: ReadonlySet<string>;
  readonly sensitiveHeaders: ReadonlySet<string>;
  readonly sensitiveBodyKeys: ReadonlySet<string>;
  readonly excludedControllers: ReadonlySet<string>;
  readonly excludedActions: ReadonlyMap<string, ReadonlySet<string>>;
}

/** JSON value as produced by `JSON.parse`. */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * Result of attempting to parse a body as structured data.
 * Parse failure is a visible branch, not an exception.
 */
export type ParseResult<T = JsonValue> =
  | { kind: 'parsed'; value: T }
  | { kind: 'unparsed'; raw: string };
