import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  MalformedLinkError,
  TransportError,
  UnexpectedResponseError,
} from '../src/errors.js';

describe('TransportError', () => {
  it('carries the url, status, attempts and cause', () => {
    const cause = new TypeError('fetch failed');
    const err = new TransportError('GET failed', 'https://example.test/x', 3, { status: 503, cause });
    expect(err.name).toBe('TransportError');
    expect(err.message).toBe('GET failed');
    expect(err.url).toBe('https://example.test/x');
    expect(err.attempts).toBe(3);
    expect(err.status).toBe(503);
    expect(err.cause).toBe(cause);
    expect(err instanceof Error).toBe(true);
  });

  it('leaves status and cause undefined when not given', () => {
    const err = new TransportError('no auth', 'https://example.test/x', 0);
    expect(err.status).toBeUndefined();
    expect(err.cause).toBeUndefined();
  });
});

describe('ConfigurationError', () => {
  it('instantiates with correct name, message, and details', () => {
    const err = new ConfigurationError('bad config', { field: 'project' });
    expect(err.name).toBe('ConfigurationError');
    expect(err.message).toBe('bad config');
    expect(err.details).toEqual({ field: 'project' });
  });
});

describe('MalformedLinkError', () => {
  it('keeps the offending relation url', () => {
    const err = new MalformedLinkError('too short', 'vstfs:///Git/PullRequestId/1');
    expect(err.name).toBe('MalformedLinkError');
    expect(err.relationUrl).toBe('vstfs:///Git/PullRequestId/1');
  });
});

describe('UnexpectedResponseError', () => {
  it('keeps the url that returned the response', () => {
    const err = new UnexpectedResponseError('not json', 'https://example.test/y');
    expect(err.name).toBe('UnexpectedResponseError');
    expect(err.url).toBe('https://example.test/y');
  });
});
