import type { StageEvent } from './types';

export type SseEventName = 'stage-event' | 'fetch-result' | 'fatal';

export interface SseStreamOptions {
  heartbeatMs: number;
  onClose?: () => void;
}

export interface SseStream {
  /** Aborted when the client disconnects. */
  controller: AbortController;
  send: <T>(event: StageEvent<T>) => void;
  sendJson: (eventName: SseEventName, payload: unknown) => void;
  close: () => void;
  readonly closed: boolean;
}
