/**
 * @buildmeta/server-hono - Shared-secret Basic authentication
 *
 * Each endpoint group (user, ci) is guarded by one configured credential.
 * The decoded `Authorization: Basic` value must equal it exactly; an empty
 * credential leaves the group open.
 */

import { logMetadataEvent } from '@buildmeta/core';
import type { Context, MiddlewareHandler } from 'hono';

export type AuthGroup = 'user' | 'ci';

export interface SharedSecretAuthOptions {
  group: AuthGroup;
  /** Compared with the whole decoded credential, or `''` to disable */
  credential: string;
  realm?: string;
}

const BASIC_PREFIX = /^Basic\s+/i;

/**
 * Decoded credential of an `Authorization: Basic` header, or null when the
 * header is missing, uses another scheme or is not valid base64.
 */
export function readBasicCredential(header: string | undefined): string | null {
  if (!header || !BASIC_PREFIX.test(header)) return null;
  const encoded = header.replace(BASIC_PREFIX, '').trim();
  let binary: string;
  try {
    binary = atob(encoded);
  } catch {
    return null;
  }
  const bytes = Uint8Array.from(binary, (ch) => ch.charCodeAt(0));
  return new TextDecoder().decode(bytes);
}

export function createSharedSecretAuth(
  options: SharedSecretAuthOptions
): MiddlewareHandler {
  if (options.credential === '') {
    return async (_c, next) => {
      await next();
    };
  }

  const challenge = `Basic realm="${options.realm ?? 'buildmeta'}"`;

  const deny = (c: Context) => {
    logMetadataEvent({
      event: 'metadata.auth.denied',
      level: 'warn',
      group: options.group,
      method: c.req.method,
      path: c.req.path,
    });
    return c.text('Unauthorized', 401, { 'WWW-Authenticate': challenge });
  };

  return async (c, next) => {
    const credential = readBasicCredential(c.req.header('authorization'));
    if (credential !== options.credential) {
      return deny(c);
    }
    await next();
  };
}
