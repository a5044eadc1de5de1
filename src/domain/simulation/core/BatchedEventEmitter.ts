import { EventEmitter } from "node:events";
import type { GameEventType } from "../../../shared/constants/EventEnums";

interface QueuedEvent {
  name: GameEventType;
  payload: unknown;
}

/**
 * EventEmitter con buffer de eventos para procesamiento por lotes.
 * Los eventos emitidos durante un turno se entregan juntos en flushEvents(),
 * después de que el turno termina.
 */
export class BatchedEventEmitter extends EventEmitter {
  private eventQueue: QueuedEvent[] = [];
  private batchingEnabled = true;

  constructor() {
    super();
    this.setMaxListeners(50);
  }

  public queueEvent(name: GameEventType, payload: unknown): void {
    if (!this.batchingEnabled) {
      super.emit(name, payload);
      return;
    }

    this.eventQueue.push({ name, payload });
  }

  public flushEvents(): void {
    if (this.eventQueue.length === 0) return;

    const batch = this.eventQueue.splice(0);
    const wasBatchingEnabled = this.batchingEnabled;

    this.batchingEnabled = false;

    try {
      for (const event of batch) {
        super.emit(event.name, event.payload);
      }
    } finally {
      this.batchingEnabled = wasBatchingEnabled;
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
