/**
 * Filtering and redaction rules.
 *
 * Everything here is a pure function over a {@link FilterSnapshot}: the same
 * snapshot and input always give the same answer, and nothing is mutated.
 */

import { FILTERED_VALUE, MAX_REDACTION_DEPTH } from './defaults.js';
import type { FilterSnapshot, JsonValue, ParseResult, PathPattern } from './types.js';

// ============================================================================
// Path matching
// ============================================================================

const globCache = new Map<string, RegExp>();

function escapeRegExp(value: string): string {
  return value.replace(/[.+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compiles a glob path pattern. `**` spans segments, `*` stays inside one.
 */
function globToRegExp(pattern: string): RegExp {
  const cached = globCache.get(pattern);
  if (cached) return cached;

  const source = pattern
    .split('**')
    .map((part) => escapeRegExp(part).replace(/\*/g, '[^/]*'))
    .join('.*');
  const compiled = new RegExp(`^${source}$`);
  globCache.set(pattern, compiled);
  return compiled;
}

/**
 * Tests a request path against a single pattern.
 *
 * @example
 * ```ts
 * matchPath('/api/users', '/api/*');       // true
 * matchPath('/api/v1/users', '/api/**');   // true
 * matchPath('/assets/app.css', /\.css$/);  // true
 * ```
 */
export function matchPath(path: string, pattern: PathPattern): boolean {
  if (pattern instanceof RegExp) {
    // Stateful (g/y) patterns would otherwise alternate results between calls
    pattern.lastIndex = 0;
    return pattern.test(path);
  }
  if (!pattern.includes('*')) {
    return path === pattern;
  }
  return globToRegExp(pattern).test(path);
}

/**
 * False when the path is absent or matches any excluded pattern.
 */
export function shouldLogPath(snapshot: FilterSnapshot, path: string | null | undefined): boolean {
  if (!path) return false;

  for (const pattern of snapshot.excludedPaths) {
    if (matchPath(path, pattern)) return false;
  }
  return true;
}

// ============================================================================
// Content types and handlers
// ============================================================================

/**
 * Base media type of a Content-Type value, lower-cased and without parameters.
 */
export function baseContentType(contentType: string | null | undefined): string | undefined {
  if (!contentType) return undefined;
  const main = contentType.split(';')[0]?.trim().toLowerCase();
  return main || undefined;
}

/**
 * True for an absent or unknown content type; false only for excluded base types.
 */
export function shouldLogContentType(snapshot: FilterSnapshot, contentType: string | null | undefined): boolean {
  const main = baseContentType(contentType);
  if (!main) return true;
  return !snapshot.excludedContentTypes.has(main);
}

export function enabledForController(
  snapshot: FilterSnapshot,
  controllerName: string,
  actionName?: string | null
): boolean {
  if (snapshot.excludedControllers.has(controllerName)) return false;

  if (actionName && snapshot.excludedActions.get(controllerName)?.has(actionName)) {
    return false;
  }
  return true;
}

// ============================================================================
// Redaction
// ============================================================================

function matchesFragment(name: string, fragments: ReadonlySet<string>): boolean {
  const lower = name.toLowerCase();
  for (const fragment of fragments) {
    if (lower.includes(fragment)) return true;
  }
  return false;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Replaces the value of every header whose name contains a sensitive fragment.
 * Anything other than a plain object yields an empty map.
 */
export function filterHeaders(snapshot: FilterSnapshot, headers: unknown): Record<string, string> {
  if (!isPlainObject(headers)) return {};

  const filtered: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    filtered[name] = matchesFragment(name, snapshot.sensitiveHeaders) ? FILTERED_VALUE : String(value);
  }
  return filtered;
}

function redact(
  value: unknown,
  fragments: ReadonlySet<string>,
  depth: number,
  ancestors: WeakSet<object>
): unknown {
  if (value === null || typeof value !== 'object') return value;
  if (depth >= MAX_REDACTION_DEPTH || ancestors.has(value)) return FILTERED_VALUE;

  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item) => redact(item, fragments, depth + 1, ancestors));
    }
    if (!isPlainObject(value)) {
      return value;
    }

    const result: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      result[key] = matchesFragment(key, fragments)
        ? FILTERED_VALUE
        : redact(child, fragments, depth + 1, ancestors);
    }
    return result;
  } finally {
    ancestors.delete(value);
  }
}

/**
 * Recursively redacts every key containing a sensitive body-key fragment.
 * Arrays are walked element-wise; cycles and values nested deeper than
 * {@link MAX_REDACTION_DEPTH} become the redaction marker.
 *
 * @example
 * ```ts
 * filterSensitiveData(config, { user: { name: 'Ann', password: 'pw' } });
 * // => { user: { name: 'Ann', password: '[FILTERED]' } }
 * ```
 */
export function filterSensitiveData(snapshot: FilterSnapshot, data: unknown): unknown {
  return redact(data, snapshot.sensitiveBodyKeys, 0, new WeakSet());
}

/**
 * Parses a string as JSON without throwing.
 */
export function parseJson(raw: string): ParseResult {
  try {
    const value: JsonValue = JSON.parse(raw);
    return { kind: 'parsed', value };
  } catch {
    return { kind: 'unparsed', raw };
  }
}

/**
 * Redacts a raw body for text storage.
 *
 * Bodies over `maxBodySize` pass through untouched: the caller decides
 * whether to keep those at all. JSON bodies are redacted and re-serialised;
 * anything else is returned unchanged.
 */
export function filterBody(snapshot: FilterSnapshot, body: unknown): unknown {
  if (typeof body !== 'string' || body.length === 0) return body;
  if (Buffer.byteLength(body, 'utf8') > snapshot.maxBodySize) return body;

  const parsed = parseJson(body);
  if (parsed.kind === 'unparsed') return parsed.raw;

  return JSON.stringify(filterSensitiveData(snapshot, parsed.value));
}

/**
 * Byte length of a body as it would be stored.
 */
export function bodyByteSize(body: unknown): number {
  if (body === undefined || body === null) return 0;
  if (typeof body === 'string') return Buffer.byteLength(body, 'utf8');
  return Buffer.byteLength(JSON.stringify(body) ?? '', 'utf8');
}
