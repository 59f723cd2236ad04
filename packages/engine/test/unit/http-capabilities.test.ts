/**
 * HTTP Capability Tests
 *
 * Proves:
 * - Each capability posts to its endpoint with the expected body
 * - Status codes and bodies surface as taxonomy errors the classifier routes
 */

import { describe, it, expect, vi } from 'vitest';
import { HttpCapabilities, parseRetryAfter } from '../../src/capabilities/http-capabilities.js';
import type { FetchFn } from '../../src/capabilities/http-capabilities.js';
import {
  HttpStatusError,
  ResourceExhaustionError,
  TransientExternalError,
  ValidationError,
} from '../../src/errors/taxonomy.js';
import { classifyError } from '../../src/errors/classifier.js';
import { makeBatch, makeUnit } from './mocks.js';

interface Recorded {
  url: string;
  body: unknown;
  headers: Headers;
  signal: AbortSignal | null | undefined;
}

function fakeFetch(respond: (url: string) => Response): { fetch: FetchFn; requests: Recorded[] } {
  const requests: Recorded[] = [];
  const fetch: FetchFn = async (input, init) => {
    const url = String(input);
    requests.push({
      url,
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
      headers: new Headers(init?.headers),
      signal: init?.signal,
    });
    return respond(url);
  };
  return { fetch, requests };
}

function json(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  });
}

describe('HttpCapabilities', () => {
  describe('requests', () => {
    it('should post combined text and media refs to /analyze', async () => {
      const { fetch, requests } = fakeFetch(() => json({ topic: 'trip', summary: 'A trip', tags: ['travel'] }));
      const caps = new HttpCapabilities({
        baseUrl: 'http://collab.test/',
        headers: { 'x-api-key': 'test-secret' },
        fetch,
      });
      const image = makeUnit('u1', 'image');
      const batch = makeBatch('u1', [makeUnit('u1', 'text', 'day one'), image, makeUnit('u1', 'text', 'day two')]);

      const seed = await caps.analyze(batch);

      expect(seed).toEqual({ topic: 'trip', summary: 'A trip', tags: ['travel'] });
      expect(requests[0]?.url).toBe('http://collab.test/analyze');
      expect(requests[0]?.body).toEqual({
        userId: 'u1',
        text: 'day one\n\nday two',
        media: [{ unitId: image.id, kind: 'image' }],
      });
      expect(requests[0]?.headers.get('x-api-key')).toBe('test-secret');
      expect(requests[0]?.headers.get('content-type')).toBe('application/json');
    });

    it('should default missing tags to an empty list', async () => {
      const { fetch } = fakeFetch(() => json({ topic: 't', summary: 's' }));
      const caps = new HttpCapabilities({ baseUrl: 'http://collab.test', fetch });

      const seed = await caps.analyze(makeBatch('u1', [makeUnit('u1')]));

      expect(seed.tags).toEqual([]);
    });

    it('should post seed and text to /draft', async () => {
      const { fetch, requests } = fakeFetch(() => json({ title: 'Trip', body: 'We went.' }));
      const caps = new HttpCapabilities({ baseUrl: 'http://collab.test', fetch });
      const seed = { topic: 'trip', summary: 'A trip', tags: [] };

      const draft = await caps.generateDraft(seed, makeBatch('u1', [makeUnit('u1', 'text', 'notes')]));

      expect(draft).toEqual({ title: 'Trip', body: 'We went.' });
      expect(requests[0]?.url).toBe('http://collab.test/draft');
      expect(requests[0]?.body).toEqual({ userId: 'u1', seed, text: 'notes' });
    });

    it('should split media results into hosted and failures', async () => {
      const ok = makeUnit('u1', 'image', { ref: 'a' });
      const bad = makeUnit('u1', 'video', { ref: 'b' });
      const flaky = makeUnit('u1', 'image', { ref: 'c' });
      const { fetch, requests } = fakeFetch(() =>
        json({
          hosted: [{ unitId: ok.id, url: 'https://cdn.test/a' }],
          failures: [
            { unitId: bad.id, message: 'unsupported codec', status: 415 },
            { unitId: flaky.id },
          ],
        })
      );
      const caps = new HttpCapabilities({ baseUrl: 'http://collab.test', fetch });

      const report = await caps.uploadMedia([ok, bad, flaky]);

      expect(requests[0]?.body).toEqual({
        units: [
          { unitId: ok.id, kind: 'image', payload: { ref: 'a' } },
          { unitId: bad.id, kind: 'video', payload: { ref: 'b' } },
          { unitId: flaky.id, kind: 'image', payload: { ref: 'c' } },
        ],
      });
      expect(report.hosted).toEqual([{ unitId: ok.id, url: 'https://cdn.test/a', kind: 'image' }]);
      expect(report.failures.map((f) => f.unitId)).toEqual([bad.id, flaky.id]);
      expect(report.failures[0]?.error).toBeInstanceOf(HttpStatusError);
      expect(classifyError(report.failures[0]?.error).category).toBe('VALIDATION');
      expect(report.failures[1]?.error).toBeInstanceOf(TransientExternalError);
    });

    it('should reject hosted entries for units it did not send', async () => {
      const { fetch } = fakeFetch(() => json({ hosted: [{ unitId: 'stranger', url: 'https://cdn.test/x' }] }));
      const caps = new HttpCapabilities({ baseUrl: 'http://collab.test', fetch });

      await expect(caps.uploadMedia([makeUnit('u1', 'image')])).rejects.toThrow(ValidationError);
    });

    it('should return the published locator', async () => {
      const { fetch, requests } = fakeFetch(() => json({ url: 'https://blog.test/p/9', postId: '9' }));
      const caps = new HttpCapabilities({ baseUrl: 'http://collab.test', fetch });
      const request = { title: 'T', body: 'B', tags: ['x'], media: [] };

      const locator = await caps.publish(request);

      expect(locator).toEqual({ url: 'https://blog.test/p/9', postId: '9' });
      expect(requests[0]?.body).toEqual(request);
    });

    it('should accept an empty notify response', async () => {
      const { fetch, requests } = fakeFetch(() => new Response(null, { status: 204 }));
      const caps = new HttpCapabilities({ baseUrl: 'http://collab.test', fetch });

      await caps.notify({
        status: 'FAILED',
        workflowId: 'wf-1',
        userId: 'u1',
        failedStep: 'ANALYZE',
        summary: 's',
        attempts: 1,
        message: 'm',
      });

      expect(requests[0]?.url).toBe('http://collab.test/notify');
    });

    it('should hand the step signal to fetch', async () => {
      const { fetch, requests } = fakeFetch(() => json({ url: 'https://blog.test/p/3', postId: '3' }));
      const caps = new HttpCapabilities({ baseUrl: 'http://collab.test', fetch });
      const controller = new AbortController();

      await caps.publish({ title: 'T', body: 'B', tags: [], media: [] }, controller.signal);

      expect(requests[0]?.signal).toBe(controller.signal);
    });

    it('should use the global fetch when none is given', async () => {
      const stub = vi.fn(async () => json({ url: 'https://blog.test/p/1', postId: '1' }));
      vi.stubGlobal('fetch', stub);
      try {
        const caps = new HttpCapabilities({ baseUrl: 'http://collab.test' });

        await caps.publish({ title: 'T', body: 'B', tags: [], media: [] });

        expect(stub).toHaveBeenCalledTimes(1);
      } finally {
        vi.unstubAllGlobals();
      }
    });
  });

  describe('failures', () => {
    it('should turn 429 into resource exhaustion with retry-after', async () => {
      const { fetch } = fakeFetch(() => json({ error: 'slow down' }, 429, { 'retry-after': '12' }));
      const caps = new HttpCapabilities({ baseUrl: 'http://collab.test', fetch });

      const error = await caps.publish({ title: 'T', body: 'B', tags: [], media: [] }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ResourceExhaustionError);
      if (error instanceof ResourceExhaustionError) {
        expect(error.retryAfterMs).toBe(12000);
      }
    });

    it('should raise HttpStatusError for other non-2xx responses', async () => {
      const { fetch } = fakeFetch(() => json({ error: 'nope' }, 503));
      const caps = new HttpCapabilities({ baseUrl: 'http://collab.test', fetch });

      const error = await caps.analyze(makeBatch('u1', [makeUnit('u1')])).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(HttpStatusError);
      expect(classifyError(error)).toMatchObject({ category: 'TRANSIENT', code: 'HTTP_503' });
    });

    it('should raise ValidationError for a body that is not JSON', async () => {
      const { fetch } = fakeFetch(() => new Response('<html>oops</html>', { status: 200 }));
      const caps = new HttpCapabilities({ baseUrl: 'http://collab.test', fetch });

      await expect(caps.analyze(makeBatch('u1', [makeUnit('u1')]))).rejects.toThrow(
        'response from http://collab.test/analyze is not JSON'
      );
    });

    it('should raise ValidationError for a missing field', async () => {
      const { fetch } = fakeFetch(() => json({ title: 'only a title' }));
      const caps = new HttpCapabilities({ baseUrl: 'http://collab.test', fetch });

      const error = await caps
        .generateDraft({ topic: 't', summary: 's', tags: [] }, makeBatch('u1', [makeUnit('u1')]))
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.field).toBe('body');
      }
    });
  });
});

describe('parseRetryAfter', () => {
  it('should read delay-seconds', () => {
    expect(parseRetryAfter('3')).toBe(3000);
    expect(parseRetryAfter('0.5')).toBe(500);
  });

  it('should read an HTTP date relative to now', () => {
    const now = Date.parse('2024-01-01T00:00:00Z');

    expect(parseRetryAfter('Mon, 01 Jan 2024 00:00:30 GMT', now)).toBe(30000);
    expect(parseRetryAfter('Sun, 31 Dec 2023 23:59:00 GMT', now)).toBe(0);
  });

  it('should ignore missing or garbage values', () => {
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter('')).toBeUndefined();
    expect(parseRetryAfter('later')).toBeUndefined();
  });
});
