import { EventEmitter } from "node:events";

/**
 * EventEmitter that buffers events raised during a tick and delivers them
 * in one batch once the tick is complete.
 *
 * `TEvents` maps each event name to its payload type.
 */
export class BatchedEventEmitter<
  TEvents extends Record<string, unknown>,
> extends EventEmitter {
  private eventQueue: Array<{ name: keyof TEvents & string; payload: unknown }> =
    [];
  private batchingEnabled = true;

  constructor() {
    super();
    this.setMaxListeners(50);
  }

  public queueEvent<K extends keyof TEvents & string>(
    name: K,
    payload: TEvents[K],
  ): void {
    if (!this.batchingEnabled) {
      super.emit(name, payload);
      return;
    }

    this.eventQueue.push({ name, payload });
  }

  public subscribe<K extends keyof TEvents & string>(
    name: K,
    listener: (payload: TEvents[K]) => void,
  ): () => void {
    this.on(name, listener);
    return () => {
      this.off(name, listener);
    };
  }

  public flushEvents(): void {
    if (this.eventQueue.length === 0) return;

    const batch = this.eventQueue.splice(0);
    for (const event of batch) {
      super.emit(event.name, event.payload);
    }
  }

  public setBatchingEnabled(enabled: boolean): void {
    this.batchingEnabled = enabled;
    if (!enabled) {
      this.flushEvents();
    }
  }

  public clearQueue(): void {
    this.eventQueue = [];
  }

  public getQueueSize(): number {
    return this.eventQueue.length;
  }
}
