import { IncomingMessage } from 'node:http';
import { Socket } from 'node:net';
import { describe, expect, it } from 'vitest';
import { AuthenticationError } from '@coach/shared';
import { TokenAuthenticator, secretsEqual } from './auth.js';

function requestWith(authorization?: string): IncomingMessage {
  const request = new IncomingMessage(new Socket());
  if (authorization) {
    request.headers.authorization = authorization;
  }
  return request;
}

describe('TokenAuthenticator', () => {
  const auth = new TokenAuthenticator(new Map([['test-secret', 'user_a']]));

  it('resolves a known bearer token to its uid', () => {
    expect(auth.authenticate(requestWith('Bearer test-secret'))).toBe('user_a');
  });

  it('rejects missing and unknown tokens', () => {
    expect(() => auth.authenticate(requestWith())).toThrow(AuthenticationError);
    expect(() => auth.authenticate(requestWith('Bearer nope'))).toThrow('Invalid bearer token.');
    expect(() => auth.authenticate(requestWith('Basic test-secret'))).toThrow('Not authenticated. Provide a bearer token.');
  });
});

describe('secretsEqual', () => {
  it('compares exactly', () => {
    expect(secretsEqual('abc', 'abc')).toBe(true);
    expect(secretsEqual('abc', 'abd')).toBe(false);
    expect(secretsEqual('abc', 'abcd')).toBe(false);
  });
});
