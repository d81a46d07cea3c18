import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi } from 'vitest';
import type { BaseLogger } from 'pino';
import { MemoryEventStore } from '../src/infrastructure/store/index.js';
import { trackingRecordSchema, imageReadRecordSchema } from '../src/application/index.js';
import type { ImageReadDraft, PixelOpenDraft, TrackingEventDraft } from '../src/domain/index.js';
import type { TrackerConfig } from '../src/infrastructure/index.js';

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    level: 'info',
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    silent: vi.fn(),
  } as unknown as BaseLogger;
}

export interface MemoryStores {
  events: MemoryEventStore<TrackingEventDraft>;
  imageReads: MemoryEventStore<ImageReadDraft>;
}

export function memoryStores(): MemoryStores {
  return {
    events: new MemoryEventStore<TrackingEventDraft>(trackingRecordSchema),
    imageReads: new MemoryEventStore<ImageReadDraft>(imageReadRecordSchema),
  };
}

/** Factory for open drafts with sensible defaults. */
export function openDraft(overrides: Partial<PixelOpenDraft> = {}): PixelOpenDraft {
  return {
    type: 'pixel_open',
    email: overrides.email ?? 'a@x.com',
    message_id: overrides.message_id === undefined ? 'm1' : overrides.message_id,
    image_param: overrides.image_param ?? null,
    user_agent: overrides.user_agent ?? null,
    remote_addr: overrides.remote_addr ?? null,
  };
}

/** Fresh directory under the OS temp dir; remove with `removeDir`. */
export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), 'mailbeacon-test-'));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export function testConfig(dir: string, overrides: Partial<TrackerConfig> = {}): TrackerConfig {
  return {
    host: '127.0.0.1',
    port: 0,
    logLevel: 'silent',
    trustProxy: false,
    uploadDir: join(dir, 'uploads'),
    dedupWindowMinutes: 10,
    remoteFetchTimeoutMs: 8000,
    remoteMaxBytes: 10485760,
    store: {
      kind: 'file',
      trackingLogFile: join(dir, 'tracking_logs.jsonl'),
      imgReadLogFile: join(dir, 'img_reads.jsonl'),
    },
    ...overrides,
  };
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of source) out.push(item);
  return out;
}

/** Fixed reference instant for window tests. */
export const T0 = new Date('2026-03-01T12:00:00.000Z');

export function minutesAfter(base: Date, minutes: number): Date {
  return new Date(base.getTime() + minutes * 60_000);
}
