import type { LogEvent, LogEventLevel } from "./types";
import { logger } from "../logger";

export type LogEventListener = (event: LogEvent) => void;

export interface LogChannelOptions {
  /**
   * Cap on events held between drains. Unset means unbounded: a session nobody
   * drains keeps every event in memory until it is stopped and released.
   */
  maxBuffered?: number;
  now?: () => number;
}

/**
 * Ordered event stream from one session runner to any number of consumers.
 *
 * Consumers either `drain()` the buffer (each event is handed out once, FIFO) or
 * subscribe with `onEvent()` to see events as they are appended; subscribing does not
 * consume anything.
 */
export class LogChannel {
  private buffer: LogEvent[] = [];
  private listeners = new Set<LogEventListener>();
  private nextSeq = 1;
  private droppedSinceDrain = 0;
  private lastDroppedSeq = 0;
  private droppedTotal = 0;
  private readonly maxBuffered?: number;
  private readonly now: () => number;

  constructor(options: LogChannelOptions = {}) {
    this.maxBuffered = options.maxBuffered;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.buffer.length;
  }

  get totalAppended(): number {
    return this.nextSeq - 1;
  }

  get dropped(): number {
    return this.droppedTotal;
  }

  append(level: LogEventLevel, message: string): LogEvent {
    const event: LogEvent = Object.freeze({
      seq: this.nextSeq++,
      timestamp: new Date(this.now()),
      level,
      message,
    });
    this.buffer.push(event);
    if (this.maxBuffered !== undefined && this.buffer.length > this.maxBuffered) {
      const overflow = this.buffer.splice(0, this.buffer.length - this.maxBuffered);
      this.droppedSinceDrain += overflow.length;
      this.droppedTotal += overflow.length;
      this.lastDroppedSeq = overflow[overflow.length - 1]?.seq ?? this.lastDroppedSeq;
    }
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        logger.warn(
          { error: error instanceof Error ? error.message : String(error), seq: event.seq },
          "Log channel listener failed",
        );
      }
    }
    return event;
  }

  drain(): LogEvent[] {
    const events = this.buffer.splice(0);
    if (this.droppedSinceDrain === 0) {
      return events;
    }
    const notice: LogEvent = Object.freeze({
      seq: this.lastDroppedSeq,
      timestamp: new Date(this.now()),
      level: "info",
      message: `dropped ${this.droppedSinceDrain} earlier event(s)`,
    });
    this.droppedSinceDrain = 0;
    return [notice, ...events];
  }

  onEvent(listener: LogEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
