export { loadConfig } from './config.js';
export type { TrackerConfig, StoreConfig, LogLevel } from './config.js';
export { default as trackingPlugin } from './tracking-plugin.js';
export type { TrackingServices, TrackingPluginOptions } from './tracking-plugin.js';
export {
  JsonlEventStore,
  MemoryEventStore,
  RedisEventStore,
  ioredisStreamClient,
} from './store/index.js';
export type { EventStore, StreamClient } from './store/index.js';
