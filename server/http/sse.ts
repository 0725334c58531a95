import type { SseEventName, SseStream, SseStreamOptions } from '../../shared/sse';
import type { Logger } from '../obs/logger';
import { createSilentLogger } from '../obs/logger';

/** The slice of an HTTP response an event stream writes to; Express responses satisfy it. */
export interface SseResponse {
  setHeader(name: string, value: string): unknown;
  flushHeaders?(): void;
  write(chunk: string): boolean;
  end(): unknown;
  on(event: 'close', listener: () => void): unknown;
  readonly writableEnded: boolean;
}

export const createSseStream = (
  res: SseResponse,
  options: SseStreamOptions,
  logger: Logger = createSilentLogger(),
): SseStream => {
  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Connection', 'keep-alive');
  res.flushHeaders?.();

  const controller = new AbortController();
  let closed = false;
  let nextId = 1;

  const heartbeat = setInterval(() => {
    if (!closed) res.write(': heartbeat\n\n');
  }, options.heartbeatMs);

  const close = () => {
    if (closed) return;
    closed = true;
    clearInterval(heartbeat);
    controller.abort();
    if (!res.writableEnded) res.end();
    try {
      options.onClose?.();
    } catch (error) {
      logger.warn('SSE close observer failed', { message: error instanceof Error ? error.message : String(error) });
    }
  };

  // Client disconnects abort whatever the stream is driving.
  res.on('close', close);

  const sendJson = (eventName: SseEventName, payload: unknown) => {
    if (closed) {
      logger.debug('Dropping SSE frame for closed stream', { eventName });
      return;
    }
    const data = typeof payload === 'string' ? payload : JSON.stringify(payload);
    res.write(`id: ${nextId}\nevent: ${eventName}\ndata: ${data}\n\n`);
    nextId += 1;
  };

  return {
    controller,
    send: (event) => sendJson('stage-event', event),
    sendJson,
    close,
    get closed() {
      return closed;
    },
  };
};
