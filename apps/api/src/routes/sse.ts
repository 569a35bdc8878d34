/**
 * Server-Sent Events plumbing shared by the widget and agent streams
 *
 * Each connection hijacks the Fastify reply and writes frames to the raw
 * response. Heartbeat comments keep proxies from dropping the connection;
 * the idle timer only resets on real events, so a stream nobody talks to
 * ends and the client reconnects with Last-Event-ID. A client that stops
 * reading gets `drainTimeoutMs` to catch up before the stream is dropped.
 */
import type { OutgoingHttpHeaders } from 'node:http';

import { createLogger, toError } from '@chatrouter/core';

const logger = createLogger({ name: 'sse' });

// =============================================================================
// Types
// =============================================================================

export interface StreamTimings {
  heartbeatMs: number;
  idleTimeoutMs: number;
  drainTimeoutMs: number;
}

export type StreamCloseReason = 'client' | 'idle' | 'shutdown' | 'error' | 'backpressure';

/** The parts of the raw response a stream writes to */
export interface StreamResponse {
  readonly writableEnded: boolean;
  readonly writableLength: number;
  writeHead(statusCode: number, headers: OutgoingHttpHeaders): unknown;
  write(chunk: string): boolean;
  end(): unknown;
  destroy(): unknown;
  on(event: 'close', listener: () => void): unknown;
  once(event: 'drain', listener: () => void): unknown;
  removeListener(event: 'drain', listener: () => void): unknown;
}

/** The parts of a Fastify reply a stream takes over */
export interface StreamReply {
  readonly raw: StreamResponse;
  hijack(): unknown;
  getHeaders(): OutgoingHttpHeaders;
}

export interface SSEFrame {
  event: string;
  data: unknown;
  id?: number | string;
}

/**
 * Serialize one frame; `data` is JSON so it never spans lines
 */
export function formatSSEFrame(frame: SSEFrame): string {
  const lines: string[] = [];
  if (frame.id !== undefined) {
    lines.push(`id: ${frame.id}`);
  }
  lines.push(`event: ${frame.event}`);
  lines.push(`data: ${JSON.stringify(frame.data)}`);
  return `${lines.join('\n')}\n\n`;
}

// =============================================================================
// Stream
// =============================================================================

export class SSEStream {
  private closed = false;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private idleTimer: NodeJS.Timeout | null = null;
  private drainTimer: NodeJS.Timeout | null = null;
  private readonly closeListeners: ((reason: StreamCloseReason) => void)[] = [];

  constructor(
    private readonly reply: StreamReply,
    private readonly timings: StreamTimings
  ) {}

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Take over the response, write the headers and start the timers
   */
  open(): void {
    this.reply.hijack();
    this.reply.raw.writeHead(200, {
      ...this.reply.getHeaders(),
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
      'X-Accel-Buffering': 'no',
    });

    this.reply.raw.on('close', () => this.close('client'));

    this.heartbeatTimer = setInterval(() => this.comment('heartbeat'), this.timings.heartbeatMs);
    this.resetIdleTimer();
  }

  send(frame: SSEFrame): boolean {
    if (!this.write(formatSSEFrame(frame))) {
      return false;
    }
    this.resetIdleTimer();
    return true;
  }

  /** Skipped while the client is behind; a heartbeat is worthless then */
  comment(text: string): boolean {
    if (this.drainTimer) return false;
    return this.write(`: ${text}\n\n`);
  }

  onClose(listener: (reason: StreamCloseReason) => void): void {
    this.closeListeners.push(listener);
  }

  close(reason: StreamCloseReason): void {
    if (this.closed) return;
    this.closed = true;

    if (this.heartbeatTimer) clearInterval(this.heartbeatTimer);
    if (this.idleTimer) clearTimeout(this.idleTimer);
    this.heartbeatTimer = null;
    this.idleTimer = null;
    this.clearDrainWait();

    for (const listener of this.closeListeners) {
      try {
        listener(reason);
      } catch (error) {
        logger.warn({ err: toError(error) }, 'Stream close listener failed');
      }
    }

    if (reason === 'backpressure') {
      // Whatever is still buffered would never reach this client
      this.reply.raw.destroy();
    } else if (!this.reply.raw.writableEnded) {
      this.reply.raw.end();
    }
  }

  private write(chunk: string): boolean {
    if (this.closed) return false;
    try {
      if (!this.reply.raw.write(chunk)) {
        this.awaitDrain();
      }
      return true;
    } catch (error) {
      logger.debug({ err: toError(error) }, 'Failed to write to stream');
      this.close('error');
      return false;
    }
  }

  private awaitDrain(): void {
    if (this.drainTimer) return;
    this.reply.raw.once('drain', this.onDrain);
    this.drainTimer = setTimeout(() => {
      logger.warn(
        { bufferedBytes: this.reply.raw.writableLength },
        'Stream client stopped reading, closing'
      );
      this.close('backpressure');
    }, this.timings.drainTimeoutMs);
  }

  private readonly onDrain = (): void => {
    this.clearDrainWait();
  };

  private clearDrainWait(): void {
    if (!this.drainTimer) return;
    clearTimeout(this.drainTimer);
    this.drainTimer = null;
    this.reply.raw.removeListener('drain', this.onDrain);
  }

  private resetIdleTimer(): void {
    if (this.idleTimer) clearTimeout(this.idleTimer);
    this.idleTimer = setTimeout(() => this.close('idle'), this.timings.idleTimeoutMs);
  }
}

// =============================================================================
// Registry
// =============================================================================

/**
 * Open streams of one app instance, ended together on shutdown so
 * `app.close()` does not wait on long-lived connections
 */
export class StreamRegistry {
  private readonly streams = new Set<SSEStream>();

  get size(): number {
    return this.streams.size;
  }

  track(stream: SSEStream): void {
    this.streams.add(stream);
    stream.onClose(() => this.streams.delete(stream));
  }

  closeAll(): void {
    for (const stream of [...this.streams]) {
      stream.close('shutdown');
    }
  }
}

/**
 * Resume point from `since_id` or the Last-Event-ID header
 */
export function resumeCursor(sinceId: number | undefined, lastEventId: unknown): number {
  if (sinceId !== undefined) return sinceId;
  if (typeof lastEventId === 'string' && /^\d+$/.test(lastEventId)) {
    return Number.parseInt(lastEventId, 10);
  }
  return 0;
}
