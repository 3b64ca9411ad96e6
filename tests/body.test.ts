import { describe, it, expect } from 'vitest';
import {
  captureRequestBody,
  captureResponseBody,
  parseBody,
  readLimited,
  responseBodyCapturable,
} from '../src/middleware/body.js';
import { parseNestedQuery, splitFormKey } from '../src/middleware/form.js';

function postRequest(body: string, contentType: string): Request {
  return new Request('http://localhost/items', {
    method: 'POST',
    body,
    headers: { 'content-type': contentType },
  });
}

// ============================================================================
// Stream Reading Tests
// ============================================================================

describe('readLimited', () => {
  it('should read a stream within the limit', async () => {
    expect(await readLimited(new Response('hello').body, 10)).toEqual({ kind: 'read', text: 'hello' });
  });

  it('should report oversized streams', async () => {
    expect(await readLimited(new Response('hello').body, 3)).toEqual({ kind: 'oversized' });
  });

  it('should report absent and empty streams', async () => {
    expect(await readLimited(null, 10)).toEqual({ kind: 'absent' });
    expect(await readLimited(new Response('').body, 10)).toEqual({ kind: 'absent' });
  });

  it('should decode multi-byte text', async () => {
    expect(await readLimited(new Response('grüße').body, 20)).toEqual({ kind: 'read', text: 'grüße' });
  });
});

// ============================================================================
// Body Parsing Tests
// ============================================================================

describe('parseBody', () => {
  it('should parse JSON bodies', () => {
    expect(parseBody('{"name":"Ann"}', 'application/json; charset=utf-8')).toEqual({
      kind: 'parsed',
      value: { name: 'Ann' },
    });
  });

  it('should keep malformed JSON as raw text', () => {
    expect(parseBody('{"name":', 'application/json')).toEqual({ kind: 'unparsed', raw: '{"name":' });
  });

  it('should parse urlencoded forms into nested values', () => {
    expect(parseBody('user[name]=Ann&tags[]=a&tags[]=b', 'application/x-www-form-urlencoded')).toEqual({
      kind: 'parsed',
      value: { user: { name: 'Ann' }, tags: ['a', 'b'] },
    });
  });

  it('should leave other content types raw', () => {
    expect(parseBody('hello', 'text/plain')).toEqual({ kind: 'unparsed', raw: 'hello' });
    expect(parseBody('hello', null)).toEqual({ kind: 'unparsed', raw: 'hello' });
  });
});

describe('form keys', () => {
  it('should split bracketed keys', () => {
    expect(splitFormKey('user[address][city]')).toEqual(['user', 'address', 'city']);
    expect(splitFormKey('tags[]')).toEqual(['tags', '']);
    expect(splitFormKey('plain')).toEqual(['plain']);
    expect(splitFormKey('a]b')).toEqual(['a]b']);
  });

  it('should build arrays of objects', () => {
    expect(parseNestedQuery('items[][sku]=A1&items[][sku]=B2')).toEqual({
      items: [{ sku: 'A1' }, { sku: 'B2' }],
    });
  });

  it('should let later plain keys win', () => {
    expect(parseNestedQuery('page=1&page=2')).toEqual({ page: '2' });
  });

  it('should drop keys that reach object prototypes', () => {
    const parsed = parseNestedQuery(
      '__proto__[isAdmin]=yes&constructor[prototype][isAdmin]=yes&user[__proto__][role]=root&name=Ann'
    );

    expect(parsed).toEqual({ name: 'Ann' });
    expect(Object.hasOwn(Object.prototype, 'isAdmin')).toBe(false);
    expect(Object.hasOwn(Object.prototype, 'role')).toBe(false);
    expect(Reflect.get({}, 'isAdmin')).toBeUndefined();
  });
});

// ============================================================================
// Capture Tests
// ============================================================================

describe('captureRequestBody', () => {
  it('should skip GET requests', async () => {
    expect(await captureRequestBody(new Request('http://localhost/items'), 100)).toBeNull();
  });

  it('should return parsed JSON', async () => {
    expect(await captureRequestBody(postRequest('{"name":"Ann"}', 'application/json'), 100)).toEqual({ name: 'Ann' });
  });

  it('should return raw text for other types', async () => {
    expect(await captureRequestBody(postRequest('abc', 'text/plain'), 100)).toBe('abc');
  });

  it('should drop bodies over the size cap', async () => {
    expect(await captureRequestBody(postRequest('x'.repeat(50), 'text/plain'), 10)).toBeNull();
  });

  it('should leave the original body readable', async () => {
    const request = postRequest('{"name":"Ann"}', 'application/json');

    await captureRequestBody(request, 100);

    expect(await request.text()).toBe('{"name":"Ann"}');
  });
});

describe('captureResponseBody', () => {
  it('should read response text from a clone', async () => {
    const response = new Response('{"ok":true}');

    expect(await captureResponseBody(response, 100)).toBe('{"ok":true}');
    expect(await response.text()).toBe('{"ok":true}');
  });

  it('should return null over the cap or without a body', async () => {
    expect(await captureResponseBody(new Response('x'.repeat(50)), 10)).toBeNull();
    expect(await captureResponseBody(new Response(null), 10)).toBeNull();
  });
});

describe('responseBodyCapturable', () => {
  it('should skip no-content, redirects and event streams', () => {
    expect(responseBodyCapturable(204, null)).toBe(false);
    expect(responseBodyCapturable(302, 'text/plain')).toBe(false);
    expect(responseBodyCapturable(200, 'text/event-stream; charset=utf-8')).toBe(false);
  });

  it('should capture ordinary responses', () => {
    expect(responseBodyCapturable(200, 'application/json')).toBe(true);
    expect(responseBodyCapturable(404, null)).toBe(true);
  });
});
