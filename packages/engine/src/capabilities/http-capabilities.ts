/**
 * HTTP Capabilities
 *
 * Binds all five pipeline capabilities to a collaborator service speaking
 * JSON over HTTP:
 *
 *   POST <base>/analyze  { userId, text, media }        → { topic, summary, tags }
 *   POST <base>/draft    { userId, seed, text }         → { title, body }
 *   POST <base>/media    { units }                      → { hosted, failures }
 *   POST <base>/publish  { title, body, tags, media }   → { url, postId }
 *   POST <base>/notify   outcome                        → any 2xx
 *
 * Transport failures surface as the taxonomy's errors so the classifier can
 * route them; this module never decides about retries.
 */

import {
  HttpStatusError,
  ResourceExhaustionError,
  TransientExternalError,
  ValidationError,
} from '../errors/taxonomy.js';
import { combineText } from '../units/inbound.js';
import type { InboundUnit, UserBatch } from '../units/types.js';
import type {
  Draft,
  DraftSeed,
  HostedMedia,
  PublishedLocator,
  WorkflowOutcome,
} from '../workflows/types.js';
import type {
  ContentAnalyzer,
  DraftGenerator,
  MediaUploadFailure,
  MediaUploadReport,
  MediaUploader,
  Notifier,
  PublishRequest,
  Publisher,
} from './types.js';

export type FetchFn = typeof fetch;

export interface HttpCapabilitiesOptions {
  baseUrl: string;
  /** Extra headers sent on every request, e.g. an API key. */
  headers?: Record<string, string>;
  fetch?: FetchFn;
}

export class HttpCapabilities
  implements ContentAnalyzer, DraftGenerator, MediaUploader, Publisher, Notifier
{
  private baseUrl: string;
  private headers: Record<string, string>;
  private fetchImpl?: FetchFn;

  constructor(options: HttpCapabilitiesOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.headers = options.headers ?? {};
    this.fetchImpl = options.fetch;
  }

  async analyze(batch: UserBatch, signal?: AbortSignal): Promise<DraftSeed> {
    const body = await this.post('/analyze', {
      userId: batch.userId,
      text: combineText(batch),
      media: batch.units
        .filter((unit) => unit.kind !== 'text')
        .map((unit) => ({ unitId: unit.id, kind: unit.kind })),
    }, signal);

    return {
      topic: requireString(body, 'topic'),
      summary: requireString(body, 'summary'),
      tags: stringArray(body, 'tags'),
    };
  }

  async generateDraft(seed: DraftSeed, batch: UserBatch, signal?: AbortSignal): Promise<Draft> {
    const body = await this.post('/draft', {
      userId: batch.userId,
      seed,
      text: combineText(batch),
    }, signal);

    return {
      title: requireString(body, 'title'),
      body: requireString(body, 'body'),
    };
  }

  async uploadMedia(units: readonly InboundUnit[], signal?: AbortSignal): Promise<MediaUploadReport> {
    const url = `${this.baseUrl}/media`;
    const body = await this.post('/media', {
      units: units.map((unit) => ({ unitId: unit.id, kind: unit.kind, payload: unit.payload })),
    }, signal);

    const byId = new Map(units.map((unit) => [unit.id, unit]));
    const hosted: HostedMedia[] = [];
    for (const entry of recordArray(body, 'hosted')) {
      const unit = byId.get(requireString(entry, 'unitId'));
      if (!unit) {
        throw new ValidationError('media response names an unknown unit', 'hosted');
      }
      hosted.push({ unitId: unit.id, url: requireString(entry, 'url'), kind: unit.kind });
    }

    const failures: MediaUploadFailure[] = recordArray(body, 'failures').map((entry) => {
      const unitId = requireString(entry, 'unitId');
      const message = typeof entry.message === 'string' ? entry.message : `upload of ${unitId} failed`;
      const error = typeof entry.status === 'number'
        ? new HttpStatusError(entry.status, url, message)
        : new TransientExternalError(message, 'MEDIA_UPLOAD_FAILED');
      return { unitId, error };
    });

    return { hosted, failures };
  }

  async publish(request: PublishRequest, signal?: AbortSignal): Promise<PublishedLocator> {
    const body = await this.post('/publish', request, signal);
    return {
      url: requireString(body, 'url'),
      postId: requireString(body, 'postId'),
    };
  }

  async notify(outcome: WorkflowOutcome, signal?: AbortSignal): Promise<void> {
    await this.post('/notify', outcome, signal);
  }

  // ===========================================================================
  // PRIVATE: Transport
  // ===========================================================================

  private async post(
    path: string,
    payload: unknown,
    signal?: AbortSignal
  ): Promise<Record<string, unknown>> {
    const url = `${this.baseUrl}${path}`;
    const fetchFn = this.fetchImpl ?? fetch;

    const response = await fetchFn(url, {
      method: 'POST',
      headers: { 'content-type': 'application/json', ...this.headers },
      body: JSON.stringify(payload),
      signal,
    });

    if (response.status === 429) {
      throw new ResourceExhaustionError(
        `rate limited by ${url}`,
        parseRetryAfter(response.headers.get('retry-after'))
      );
    }
    if (!response.ok) {
      throw new HttpStatusError(response.status, url);
    }

    const text = await response.text();
    if (text.trim() === '') return {};

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      throw new ValidationError(`response from ${url} is not JSON`);
    }
    if (!isRecord(parsed)) {
      throw new ValidationError(`response from ${url} is not a JSON object`);
    }
    return parsed;
  }
}

// =============================================================================
// RESPONSE DECODING
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(body: Record<string, unknown>, field: string): string {
  const value = body[field];
  if (typeof value !== 'string') {
    throw new ValidationError(`response field ${field} must be a string`, field);
  }
  return value;
}

function stringArray(body: Record<string, unknown>, field: string): string[] {
  const value = body[field];
  if (value === undefined) return [];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ValidationError(`response field ${field} must be a list of strings`, field);
  }
  return value;
}

function recordArray(body: Record<string, unknown>, field: string): Record<string, unknown>[] {
  const value = body[field];
  if (value === undefined) return [];
  if (!Array.isArray(value) || !value.every(isRecord)) {
    throw new ValidationError(`response field ${field} must be a list of objects`, field);
  }
  return value;
}

/**
 * Retry-After is either delay-seconds or an HTTP date.
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (header === null || header.trim() === '') return undefined;

  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.round(seconds * 1000);
  }

  const date = Date.parse(header);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}
