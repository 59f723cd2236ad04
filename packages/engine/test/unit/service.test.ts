/**
 * Service Lifecycle Tests
 *
 * Proves:
 * - Units posted over HTTP flush into workflows and reach the notifier
 * - Batches of one user run one after another
 * - Stopping flushes pending units and waits for their workflows
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { RelayPostService } from '../../src/app.js';
import { InMemoryWorkflowArchive } from '../../src/archive/archive.js';
import type { ServiceConfig } from '../../src/config/pipeline-config.js';
import { MockCapabilities, captureLogs, engineConfig } from './mocks.js';

function serviceConfig(debounceWindowSeconds: number): ServiceConfig {
  return {
    port: 0,
    host: '127.0.0.1',
    capabilityBaseUrl: 'http://collab.test',
    logLevel: 'info',
    consoleMetrics: false,
    pipeline: { debounceWindowSeconds, ...engineConfig() },
  };
}

describe('RelayPostService', () => {
  let service: RelayPostService | undefined;

  afterEach(async () => {
    await service?.stop();
    service = undefined;
  });

  async function startService(debounceWindowSeconds: number, mock: MockCapabilities, archive: InMemoryWorkflowArchive) {
    const logs = captureLogs();
    service = new RelayPostService(serviceConfig(debounceWindowSeconds), {
      capabilities: mock.asCapabilities(),
      archive,
      logSink: logs.sink,
    });
    await service.start();
    return { baseUrl: `http://127.0.0.1:${service.port() ?? 0}`, logs };
  }

  function post(baseUrl: string, userId: string, payload: string): Promise<Response> {
    return fetch(`${baseUrl}/units`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ userId, kind: 'text', payload, timestamp: Date.now() }),
    });
  }

  it('should publish a debounced batch and notify the user', async () => {
    const mock = new MockCapabilities();
    const archive = new InMemoryWorkflowArchive();
    const { baseUrl } = await startService(0.2, mock, archive);

    await post(baseUrl, 'u1', 'first');
    await post(baseUrl, 'u1', 'second');

    await vi.waitFor(() => {
      expect(archive.count()).toBe(1);
    });
    expect(mock.notified).toHaveLength(1);
    expect(mock.callCount('analyze')).toBe(1);

    const [stored] = await archive.findByUser('u1');
    expect(stored?.sourceBatch.units.map((u) => u.payload)).toEqual(['first', 'second']);

    const response = await fetch(`${baseUrl}/workflows/${stored?.workflowId ?? ''}`);
    expect(await response.json()).toMatchObject({ status: 'SUCCEEDED', units: 2 });
  });

  it('should flush pending units and drain workflows on stop', async () => {
    const mock = new MockCapabilities();
    const archive = new InMemoryWorkflowArchive();
    const { baseUrl, logs } = await startService(60, mock, archive);

    await post(baseUrl, 'u1', 'before shutdown');
    await post(baseUrl, 'u2', 'me too');
    expect(mock.notified).toHaveLength(0);

    await service?.stop();

    expect(mock.notified).toHaveLength(2);
    expect(archive.count()).toBe(2);
    expect(logs.entries.find((e) => e.message === 'Draining workflows')).toMatchObject({ flushed: 2 });
  });

  it('should not start a second workflow for a user while one is running', async () => {
    let running = 0;
    let maxRunning = 0;
    const mock = new MockCapabilities();
    const archive = new InMemoryWorkflowArchive();
    const logs = captureLogs();
    service = new RelayPostService(serviceConfig(0.02), {
      capabilities: {
        ...mock.asCapabilities(),
        analyzer: {
          analyze: async () => {
            running++;
            maxRunning = Math.max(maxRunning, running);
            await new Promise((r) => setTimeout(r, 60));
            running--;
            return { topic: 't', summary: 's', tags: [] };
          },
        },
      },
      archive,
      logSink: logs.sink,
    });
    await service.start();
    const baseUrl = `http://127.0.0.1:${service.port() ?? 0}`;

    await post(baseUrl, 'u1', 'batch one');
    await new Promise((r) => setTimeout(r, 40));
    await post(baseUrl, 'u1', 'batch two');

    await vi.waitFor(() => {
      expect(mock.notified).toHaveLength(2);
    });
    expect(maxRunning).toBe(1);
  });
});
