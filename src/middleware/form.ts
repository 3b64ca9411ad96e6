type FormNode = Record<string, unknown> | unknown[];

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

const UNSAFE_SEGMENTS: ReadonlySet<string> = new Set(['__proto__', 'constructor', 'prototype']);

/**
 * Splits `user[address][city]` into `['user', 'address', 'city']`
 * and `tags[]` into `['tags', '']`.
 */
export function splitFormKey(key: string): string[] {
  const match = /^([^[\]]+)((?:\[[^\]]*\])*)$/.exec(key);
  if (!match?.[1]) return [key];

  const segments = [match[1]];
  for (const bracket of (match[2] ?? '').matchAll(/\[([^\]]*)\]/g)) {
    segments.push(bracket[1] ?? '');
  }
  return segments;
}

function assign(root: Record<string, unknown>, segments: string[], value: string): void {
  let cursor: FormNode = root;

  for (let i = 0; i < segments.length; i++) {
    const key = segments[i] ?? '';
    const last = i === segments.length - 1;

    if (Array.isArray(cursor)) {
      if (last) {
        cursor.push(value);
        return;
      }
      const child: Record<string, unknown> = {};
      cursor.push(child);
      cursor = child;
      continue;
    }

    if (last) {
      cursor[key] = value;
      return;
    }

    const existing: unknown = Object.hasOwn(cursor, key) ? cursor[key] : undefined;
    if (segments[i + 1] === '') {
      if (Array.isArray(existing)) {
        cursor = existing;
      } else {
        const list: unknown[] = [];
        cursor[key] = list;
        cursor = list;
      }
    } else if (isRecord(existing)) {
      cursor = existing;
    } else {
      const child: Record<string, unknown> = {};
      cursor[key] = child;
      cursor = child;
    }
  }
}

/**
 * Parses a urlencoded body into nested objects and arrays.
 * Pairs whose key has a `__proto__`, `constructor` or `prototype` segment are dropped.
 *
 * @example
 * ```ts
 * parseNestedQuery('user[name]=Ann&tags[]=a&tags[]=b');
 * // => { user: { name: 'Ann' }, tags: ['a', 'b'] }
 * ```
 */
export function parseNestedQuery(body: string): Record<string, unknown> {
  const root: Record<string, unknown> = {};
  for (const [key, value] of new URLSearchParams(body)) {
    const segments = splitFormKey(key);
    if (segments.some((segment) => UNSAFE_SEGMENTS.has(segment))) continue;
    assign(root, segments, value);
  }
  return root;
}
