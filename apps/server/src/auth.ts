// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { createHash, timingSafeEqual } from 'node:crypto';
import type { IncomingMessage } from 'node:http';
import { AuthenticationError } from '@coach/shared';

function tokenHash(token: string): string {
  return createHash('sha256').update(token).digest('hex');
}

/**
 * Constant-time comparison of two secrets. Both sides are hashed first so
 * the buffers always have equal length.
 */
export function secretsEqual(expected: string, provided: string): boolean {
  const a = createHash('sha256').update(expected).digest();
  const b = createHash('sha256').update(provided).digest();
  return timingSafeEqual(a, b) && expected.length === provided.length;
}

export function extractBearerToken(request: IncomingMessage): string | null {
  const authorization = request.headers.authorization;
  if (authorization && authorization.startsWith('Bearer ')) {
    const bearer = authorization.slice('Bearer '.length).trim();
    if (bearer) return bearer;
  }
  return null;
}

/**
 * Resolves bearer tokens to user ids. Only token hashes are held in memory.
 */
export class TokenAuthenticator {
  private uidByHash = new Map<string, string>();

  constructor(tokens: Map<string, string>) {
    for (const [token, uid] of tokens) {
      this.uidByHash.set(tokenHash(token), uid);
    }
  }

  authenticate(request: IncomingMessage): string {
    const token = extractBearerToken(request);
    if (!token) {
      throw AuthenticationError.notAuthenticated();
    }

    const uid = this.uidByHash.get(tokenHash(token));
    if (!uid) {
      throw AuthenticationError.invalidToken();
    }
    return uid;
  }
}
