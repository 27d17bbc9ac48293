import { describe, it, expect } from 'vitest';
import { lookupPath, toJSON } from '@core/types/value';
import { mockFetch } from '@tests/utils/mock-fetch';
import { HttpStepClient, HttpStatusError, HttpAbortError, parseBody } from './HttpStepClient';

const request = { method: 'GET', url: 'http://api.test/items', headers: {} };

describe('HttpStepClient', () => {
  it('shapes the response as body, status and headers', async () => {
    const { fetch } = mockFetch([{ body: { items: [1, 2] }, status: 201, headers: { 'X-Request-Id': 'r-1' } }]);
    const result = await new HttpStepClient({ fetch }).send(request);

    expect(toJSON(lookupPath(result, ['body']).value)).toEqual({ items: [1, 2] });
    expect(toJSON(lookupPath(result, ['status']).value)).toBe(201);
    expect(toJSON(lookupPath(result, ['headers', 'x-request-id']).value)).toBe('r-1');
    expect(result.kind === 'map' && Array.from(result.entries.keys())).toEqual(['body', 'status', 'headers']);
  });

  it('sends method, url, headers and body as given', async () => {
    const { fetch, calls } = mockFetch([{ body: '' , status: 204 }]);
    await new HttpStepClient({ fetch }).send({
      method: 'POST',
      url: 'http://api.test/items',
      headers: { 'X-Token': 'test-token' },
      body: '{"a":1}'
    });
    expect(calls).toEqual([
      { method: 'POST', url: 'http://api.test/items', headers: { 'x-token': 'test-token' }, body: '{"a":1}' }
    ]);
  });

  it('fails on non-2xx with the response text', async () => {
    const { fetch } = mockFetch([{ status: 404, body: 'no such item' }]);
    const sending = new HttpStepClient({ fetch }).send(request);
    await expect(sending).rejects.toThrow(HttpStatusError);
    await expect(sending).rejects.toMatchObject({ status: 404, message: 'HTTP 404: no such item' });
  });

  it('passes transport errors through', async () => {
    const { fetch } = mockFetch([{ error: new Error('connect ECONNREFUSED') }]);
    await expect(new HttpStepClient({ fetch }).send(request)).rejects.toThrow('connect ECONNREFUSED');
  });

  it('times out hanging requests', async () => {
    const { fetch } = mockFetch([{ hang: true }]);
    const sending = new HttpStepClient({ fetch, timeoutMs: 20 }).send(request);
    await expect(sending).rejects.toThrow(HttpAbortError);
    await expect(sending).rejects.toThrow('request timed out after 20ms');
  });

  it('aborts when the caller cancels', async () => {
    const { fetch } = mockFetch([{ hang: true }]);
    const controller = new AbortController();
    const sending = new HttpStepClient({ fetch }).send(request, controller.signal);
    controller.abort();
    await expect(sending).rejects.toThrow('request aborted');
  });

  it('does not send when already cancelled', async () => {
    const { fetch } = mockFetch([{ body: 'unused' }]);
    await expect(new HttpStepClient({ fetch }).send(request, AbortSignal.abort())).rejects.toThrow('request aborted');
  });
});

describe('parseBody', () => {
  it('decodes JSON, keeps other text and maps empty payloads to null', () => {
    expect(toJSON(parseBody('{"a":[1]}'))).toEqual({ a: [1] });
    expect(toJSON(parseBody('plain text'))).toBe('plain text');
    expect(toJSON(parseBody(''))).toBeNull();
    expect(toJSON(parseBody('42'))).toBe(42);
  });
});
