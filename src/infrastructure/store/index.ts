export type { EventStore, RecordSchema, Appendable, DecodeResult } from './event-store.js';
export { decodeLine, encodeLine, stamp, utcNow } from './event-store.js';
export { JsonlEventStore } from './jsonl-event-store.js';
export type { JsonlEventStoreOptions } from './jsonl-event-store.js';
export { MemoryEventStore } from './memory-event-store.js';
export { RedisEventStore, ioredisStreamClient } from './redis-event-store.js';
export type { RedisEventStoreOptions, StreamClient, StreamEntry } from './redis-event-store.js';
export { readLinesReverse } from './reverse-lines.js';
export { WriteQueue } from './write-queue.js';
