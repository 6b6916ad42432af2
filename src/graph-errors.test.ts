import { describe, it, expect } from 'vitest';
import { GraphError } from '@microsoft/microsoft-graph-client';
import { DirectoryResponseError } from './errors';
import { describeDirectoryError, isSuccessStatus } from './graph-errors';

describe('describeDirectoryError', () => {
  it('uses the status and code carried by a GraphError', () => {
    const err = new GraphError(429, 'Too many requests');
    err.code = 'TooManyRequests';

    expect(describeDirectoryError(err)).toEqual({
      status: 429,
      code: 'TooManyRequests',
      detail: 'Too many requests',
    });
  });

  it('classifies a GraphError without a status by its message', () => {
    const err = new GraphError(-1, 'Insufficient privileges to complete the operation.');
    expect(describeDirectoryError(err).status).toBe(403);
  });

  it('reports malformed payloads as a bad gateway', () => {
    const err = new DirectoryResponseError('Unexpected $batch response payload', '/$batch');
    expect(describeDirectoryError(err)).toEqual({
      status: 502,
      code: 'invalidResponse',
      detail: 'Unexpected $batch response payload',
    });
  });

  it.each([
    ['Request was throttled', 429],
    ["Resource 'g-1' does not exist", 404],
    ['socket timed out', 504],
    ['boom', 500],
  ])('classifies plain error "%s" as %i', (message, status) => {
    expect(describeDirectoryError(new Error(message))).toEqual({ status, code: null, detail: message });
  });

  it('stringifies non-errors', () => {
    expect(describeDirectoryError('offline')).toEqual({ status: 500, code: null, detail: 'offline' });
  });
});

describe('isSuccessStatus', () => {
  it('accepts 2xx only', () => {
    expect(isSuccessStatus(204)).toBe(true);
    expect(isSuccessStatus(200)).toBe(true);
    expect(isSuccessStatus(404)).toBe(false);
    expect(isSuccessStatus(199)).toBe(false);
  });
});
