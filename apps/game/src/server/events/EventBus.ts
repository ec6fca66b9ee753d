import EventEmitter from "eventemitter3";
import type { GameEvent, GameEventOf, GameEventType } from "./GameEvents";

export type GameEventHandler<T extends GameEventType> = (event: GameEventOf<T>) => void;

/**
 * Synchronous, typed event bus. Handlers run inline during `emit`, in
 * registration order, on the single server thread.
 */
export class EventBus {
  private readonly emitter = new EventEmitter();

  emit(event: GameEvent): void {
    this.emitter.emit(event.type, event);
  }

  /**
   * Subscribes to one event type.
   * @returns A function that removes this subscription.
   */
  on<T extends GameEventType>(type: T, handler: GameEventHandler<T>): () => void {
    this.emitter.on(type, handler);
    return () => {
      this.emitter.off(type, handler);
    };
  }

  listenerCount(type: GameEventType): number {
    return this.emitter.listenerCount(type);
  }

  clear(): void {
    this.emitter.removeAllListeners();
  }
}
