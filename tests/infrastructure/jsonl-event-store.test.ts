import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { appendFileSync, existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { JsonlEventStore } from '../../src/infrastructure/store/index.js';
import { trackingRecordSchema } from '../../src/application/index.js';
import type { TrackingEventDraft } from '../../src/domain/index.js';
import { collect, fakeLogger, makeTmpDir, openDraft, removeDir } from '../helpers.js';

const ISO_UTC = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/;

describe('JsonlEventStore', () => {
  let dir: string;
  let path: string;
  let store: JsonlEventStore<TrackingEventDraft>;

  beforeEach(() => {
    dir = makeTmpDir();
    path = join(dir, 'nested', 'logs', 'tracking_logs.jsonl');
    store = new JsonlEventStore<TrackingEventDraft>({
      path,
      schema: trackingRecordSchema,
      log: fakeLogger(),
    });
  });

  afterEach(() => {
    removeDir(dir);
  });

  // ─── append ──────────────────────────────────────────────────

  it('stamps a UTC ISO-8601 time when the draft has none', async () => {
    const record = await store.append(openDraft());
    expect(record.time).toMatch(ISO_UTC);
  });

  it('keeps a time the draft already carries', async () => {
    const record = await store.append({ ...openDraft(), time: '2026-01-01T00:00:00.000Z' });
    expect(record.time).toBe('2026-01-01T00:00:00.000Z');
  });

  it('creates the directory and file on first append', async () => {
    expect(existsSync(path)).toBe(false);
    await store.append(openDraft());
    expect(existsSync(path)).toBe(true);
  });

  it('writes one self-contained JSON line per record, time last', async () => {
    await store.append({
      type: 'click',
      email: 'a@x.com',
      message_id: null,
      redirect: 'https://example.com',
      user_agent: null,
      remote_addr: null,
      time: '2026-01-01T00:00:00.000Z',
    });

    expect(readFileSync(path, 'utf-8')).toBe(
      '{"type":"click","email":"a@x.com","message_id":null,"redirect":"https://example.com",'
      + '"user_agent":null,"remote_addr":null,"time":"2026-01-01T00:00:00.000Z"}\n',
    );
  });

  it('never truncates existing content', async () => {
    await store.append(openDraft({ email: 'first@x.com' }));

    const second = new JsonlEventStore<TrackingEventDraft>({
      path,
      schema: trackingRecordSchema,
      log: fakeLogger(),
    });
    await second.append(openDraft({ email: 'second@x.com' }));

    const emails = (await store.readAll()).map((e) => e.email);
    expect(emails).toEqual(['first@x.com', 'second@x.com']);
  });

  it('serializes concurrent appends into whole lines with non-decreasing times', async () => {
    await Promise.all(
      Array.from({ length: 50 }, (_, i) => store.append(openDraft({ email: `user${i}@x.com` }))),
    );

    const lines = readFileSync(path, 'utf-8').trimEnd().split('\n');
    expect(lines).toHaveLength(50);
    expect(lines.map((l) => (JSON.parse(l) as { email: string }).email)).toEqual(
      Array.from({ length: 50 }, (_, i) => `user${i}@x.com`),
    );

    const times = (await store.readAll()).map((e) => e.time);
    expect([...times].sort()).toEqual(times);
  });

  // ─── readAll / readReverse ───────────────────────────────────

  it('creates an empty log when reading a missing file', async () => {
    expect(await store.readAll()).toEqual([]);
    expect(readFileSync(path, 'utf-8')).toBe('');
  });

  it('returns records in append order', async () => {
    await store.append(openDraft({ email: 'one@x.com' }));
    await store.append(openDraft({ email: 'two@x.com' }));
    await store.append(openDraft({ email: 'three@x.com' }));

    const records = await store.readAll();
    expect(records.map((r) => r.email)).toEqual(['one@x.com', 'two@x.com', 'three@x.com']);
    for (const r of records) expect(r.time).toMatch(ISO_UTC);
  });

  it('skips malformed lines without throwing and keeps relative order', async () => {
    await store.append(openDraft({ email: 'before@x.com' }));
    appendFileSync(path, 'this is not json\n');
    appendFileSync(path, '{"type":"pixel_open"}\n');
    appendFileSync(path, '{"type":"unsubscribe","email":"a@x.com","time":"2026-01-01T00:00:00Z"}\n');
    appendFileSync(path, '\n   \n');
    await store.append(openDraft({ email: 'after@x.com' }));

    expect((await store.readAll()).map((r) => r.email)).toEqual(['before@x.com', 'after@x.com']);
    expect((await collect(store.readReverse())).map((r) => r.email)).toEqual(['after@x.com', 'before@x.com']);
  });

  it('reads records newest first across small chunks', async () => {
    const small = new JsonlEventStore<TrackingEventDraft>({
      path,
      schema: trackingRecordSchema,
      log: fakeLogger(),
      chunkSize: 16,
    });
    for (const email of ['é1@x.com', 'ü2@x.com', 'ø3@x.com']) {
      await small.append(openDraft({ email }));
    }

    expect((await collect(small.readReverse())).map((r) => r.email)).toEqual(['ø3@x.com', 'ü2@x.com', 'é1@x.com']);
  });

  it('fills in a missing message_id as null when decoding', async () => {
    await store.readAll();
    appendFileSync(path, '{"type":"pixel_open","email":"a@x.com","time":"2026-01-01T00:00:00Z"}\n');

    const [record] = await store.readAll();
    expect(record).toEqual({
      type: 'pixel_open',
      email: 'a@x.com',
      message_id: null,
      image_param: null,
      user_agent: null,
      remote_addr: null,
      time: '2026-01-01T00:00:00Z',
    });
  });

  // ─── readRaw ─────────────────────────────────────────────────

  it('returns the raw bytes unmodified, malformed lines included', async () => {
    await store.append({ ...openDraft(), time: '2026-01-01T00:00:00.000Z' });
    appendFileSync(path, 'garbage\n');

    const raw = await store.readRaw();
    expect(raw.toString('utf-8')).toBe(readFileSync(path, 'utf-8'));
    expect(raw.toString('utf-8').endsWith('garbage\n')).toBe(true);
  });
});
