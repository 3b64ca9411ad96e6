import type { PathPattern } from './types.js';

/** Default maximum captured body size in bytes (10KB). */
export const DEFAULT_MAX_BODY_SIZE = 10_000;

/** Placeholder written in place of every sensitive header or body value. */
export const FILTERED_VALUE = '[FILTERED]';

/** Nesting depth past which body values are replaced by {@link FILTERED_VALUE}. */
export const MAX_REDACTION_DEPTH = 32;

export const DEFAULT_EXCLUDED_PATHS: readonly PathPattern[] = [
  /^\/assets\//,
  /^\/packs\//,
  /^\/health$/,
  /^\/ping$/,
  /^\/favicon\.ico$/,
  /^\/robots\.txt$/,
  /^\/sitemap\.xml$/,
  /\.css$/,
  /\.js$/,
  /\.map$/,
  /\.ico$/,
  /\.png$/,
  /\.jpg$/,
  /\.jpeg$/,
  /\.gif$/,
  /\.svg$/,
  /\.woff$/,
  /\.woff2$/,
  /\.ttf$/,
  /\.eot$/,
];

export const DEFAULT_EXCLUDED_CONTENT_TYPES: readonly string[] = [
  'text/html',
  'text/css',
  'text/javascript',
  'application/javascript',
  'application/x-javascript',
  'image/png',
  'image/jpeg',
  'image/gif',
  'image/svg+xml',
  'image/webp',
  'image/x-icon',
  'video/mp4',
  'video/webm',
  'audio/mpeg',
  'audio/wav',
  'font/woff',
  'font/woff2',
  'application/font-woff',
  'application/font-woff2',
];

export const DEFAULT_SENSITIVE_HEADERS: readonly string[] = [
  'authorization',
  'cookie',
  'set-cookie',
  'x-api-key',
  'x-auth-token',
  'x-access-token',
  'bearer',
  'x-csrf-token',
  'x-session-id',
];

export const DEFAULT_SENSITIVE_BODY_KEYS: readonly string[] = [
  'password',
  'secret',
  'token',
  'key',
  'auth',
  'credential',
  'private',
  'ssn',
  'social_security_number',
  'credit_card',
  'card_number',
  'cvv',
  'pin',
];

/** Framework-internal handler groups that are never logged. */
export const DEFAULT_EXCLUDED_CONTROLLERS: readonly string[] = [
  'health',
  'internal/info',
  'internal/websocket',
];
