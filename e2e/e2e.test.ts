import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { z } from 'zod';
import { RequestClient } from '../src/core/client.js';
import { getDecodingError } from '../src/error/decodingError.js';
import { getResponseError } from '../src/error/responseError.js';
import { getTransportError } from '../src/error/transportError.js';
import { setBaseURL } from '../src/index.js';
import { createApp, type StoredUser } from './app.js';

const userSchema = z.object({ id: z.number(), name: z.string() });

describe('RequestClient against an in-process API', () => {
  beforeEach(() => {
    const app = createApp();
    vi.stubGlobal('fetch', (input: RequestInfo | URL, init?: RequestInit) => app.request(input, init));
    setBaseURL('https://example.com/api/');
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    setBaseURL('');
  });

  test('creates, reads, renames and deletes a user', async () => {
    const client = new RequestClient();

    const [errCreate, created] = await client.makeRequest('post', 'users', { name: 'Jane Roe' }, { schema: userSchema });
    expect(errCreate).toBeNull();
    expect(created).toEqual({ id: 2, name: 'Jane Roe' });

    const [errRead, read] = await client.makeRequest<StoredUser>('get', 'users/2');
    expect(errRead).toBeNull();
    expect(read).toEqual({ id: 2, name: 'Jane Roe' });

    const [errRename, renamed] = await client.makeRequest<StoredUser>('put', 'users/2', { name: 'Jane Doe' });
    expect(errRename).toBeNull();
    expect(renamed).toEqual({ id: 2, name: 'Jane Doe' });

    const [errDelete, deleted] = await client.makeRequest<StoredUser>('delete', 'users/2');
    expect(errDelete).toBeNull();
    expect(deleted).toEqual({ id: 2, name: 'Jane Doe' });

    const [errGone] = await client.makeRequest('get', 'users/2');
    expect(getResponseError(errGone)?.status).toBe(404);
  });

  test('deprecated verb methods reach the same routes', async () => {
    const client = new RequestClient();

    const [, created] = await client.post<StoredUser>('users', { name: 'Jane Roe' });
    const [, read] = await client.get<StoredUser>('users/2');
    const [, renamed] = await client.put<StoredUser>('users/2', { name: 'Jane Doe' });

    expect(created).toEqual({ id: 2, name: 'Jane Roe' });
    expect(read).toEqual({ id: 2, name: 'Jane Roe' });
    expect(renamed).toEqual({ id: 2, name: 'Jane Doe' });
  });

  test('sends the default content type with injected headers layered on top', async () => {
    const client = new RequestClient().insertHeader({ Authorization: 'Bearer test-token' });

    const [err, seen] = await client.makeRequest<Record<string, string>>('get', 'headers');

    expect(err).toBeNull();
    expect(seen?.['content-type']).toBe('application/json');
    expect(seen?.authorization).toBe('Bearer test-token');
  });

  test('reports server-side validation failures with their status', async () => {
    const [err] = await new RequestClient().makeRequest('post', 'users', { name: '' });

    expect(getResponseError(err)?.status).toBe(400);
  });

  test('reports server errors with their status', async () => {
    const [err, data] = await new RequestClient().makeRequest('get', 'fail');

    expect(data).toBeNull();
    expect(getResponseError(err)?.status).toBe(500);
  });

  test('does not follow redirects itself', async () => {
    const [err] = await new RequestClient().makeRequest('get', 'old-users');

    expect(getResponseError(err)?.status).toBe(302);
  });

  test('fails to decode a plain text body', async () => {
    const [err] = await new RequestClient().makeRequest('get', 'health');

    expect(getDecodingError(err)?.cause).toBeInstanceOf(SyntaxError);
  });

  test('fails to decode the empty body of a 204', async () => {
    const [err] = await new RequestClient().makeRequest('delete', 'users/1/avatar');

    expect(getDecodingError(err)?.message).toBe('error parsing json response body in getResponseData');
  });

  test('reports transport failures', async () => {
    vi.stubGlobal('fetch', () => Promise.reject(new TypeError('fetch failed')));

    const [err] = await new RequestClient().makeRequest('get', 'users/1');

    expect(getTransportError(err)?.url).toBe('https://example.com/api/users/1');
    expect(String(getTransportError(err)?.cause)).toBe('Error: error wrapping GET request in fetchClient');
  });
});
