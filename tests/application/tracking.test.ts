import { describe, it, expect, vi, afterEach } from 'vitest';
import { trackPixelOpen, trackClick } from '../../src/application/tracking.js';
import type { PixelOpenInput } from '../../src/application/tracking.js';
import { memoryStores, minutesAfter, T0 } from '../helpers.js';

const OPEN: PixelOpenInput = {
  email: 'a@x.com',
  messageId: 'm1',
  imageParam: null,
  userAgent: 'TestMail/1.0',
  remoteAddr: '203.0.113.7',
};

afterEach(() => {
  vi.useRealTimers();
});

// ─── trackPixelOpen ──────────────────────────────────────────

describe('trackPixelOpen', () => {
  it('appends a pixel_open with the request metadata', async () => {
    const { events } = memoryStores();

    const outcome = await trackPixelOpen(events, { ...OPEN, imageParam: 'photo.png' });

    expect(outcome).toEqual({
      suppressed: false,
      event: {
        type: 'pixel_open',
        email: 'a@x.com',
        message_id: 'm1',
        image_param: 'photo.png',
        user_agent: 'TestMail/1.0',
        remote_addr: '203.0.113.7',
        time: expect.any(String),
      },
    });
    expect(await events.readAll()).toHaveLength(1);
  });

  it('collapses repeated opens inside the window into one event', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    const { events } = memoryStores();

    vi.setSystemTime(T0);
    expect((await trackPixelOpen(events, OPEN)).suppressed).toBe(false);

    vi.setSystemTime(minutesAfter(T0, 5));
    expect((await trackPixelOpen(events, OPEN)).suppressed).toBe(true);

    vi.setSystemTime(minutesAfter(T0, 11));
    expect((await trackPixelOpen(events, OPEN)).suppressed).toBe(false);

    const times = (await events.readAll()).map((e) => e.time);
    expect(times).toEqual([T0.toISOString(), minutesAfter(T0, 11).toISOString()]);
  });

  it('records separate opens for different recipients or messages', async () => {
    const { events } = memoryStores();

    await trackPixelOpen(events, OPEN);
    await trackPixelOpen(events, { ...OPEN, email: 'b@x.com' });
    await trackPixelOpen(events, { ...OPEN, messageId: 'm2' });
    await trackPixelOpen(events, { ...OPEN, messageId: null });

    expect(await events.readAll()).toHaveLength(4);
  });

  it('uses the configured window', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    const { events } = memoryStores();

    vi.setSystemTime(T0);
    await trackPixelOpen(events, OPEN, { windowMinutes: 1 });
    vi.setSystemTime(minutesAfter(T0, 2));
    const outcome = await trackPixelOpen(events, OPEN, { windowMinutes: 1 });

    expect(outcome.suppressed).toBe(false);
    expect(await events.readAll()).toHaveLength(2);
  });
});

// ─── trackClick ──────────────────────────────────────────────

describe('trackClick', () => {
  it('records every click, without dedup', async () => {
    const { events } = memoryStores();
    const input = {
      email: 'a@x.com',
      messageId: null,
      redirect: 'https://example.com/landing',
      userAgent: null,
      remoteAddr: '203.0.113.7',
    };

    const first = await trackClick(events, input);
    await trackClick(events, input);

    expect(first).toEqual({
      type: 'click',
      email: 'a@x.com',
      message_id: null,
      redirect: 'https://example.com/landing',
      user_agent: null,
      remote_addr: '203.0.113.7',
      time: expect.any(String),
    });
    expect(await events.readAll()).toHaveLength(2);
  });
});
