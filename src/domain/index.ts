export { PIXEL_OPEN, CLICK, isPixelOpen, isClick } from './event.js';
export type {
  TrackingEventType,
  ServedFrom,
  Stamped,
  PixelOpenDraft,
  ClickDraft,
  TrackingEventDraft,
  PixelOpenEvent,
  ClickEvent,
  TrackingEvent,
  ImageReadDraft,
  ImageReadEvent,
} from './event.js';
