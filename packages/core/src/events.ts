import { EventEmitter } from 'node:events';
import type { Logger } from './logger.js';

export type Unsubscribe = () => void;

/**
 * Typed wrapper around node:events. Listeners are isolated: one that throws
 * is logged and does not stop delivery to the others or reach the emitter.
 */
export class TypedEvents<Events extends object> {
  private readonly emitter = new EventEmitter();

  constructor(private readonly logger?: Logger) {
    this.emitter.setMaxListeners(0);
  }

  on<E extends keyof Events & string>(event: E, listener: (payload: Events[E]) => void): Unsubscribe {
    const wrapped = (payload: Events[E]) => {
      try {
        listener(payload);
      } catch (err) {
        this.logger?.error(`listener for "${event}" threw`, err);
      }
    };
    this.emitter.on(event, wrapped);
    return () => {
      this.emitter.off(event, wrapped);
    };
  }

  once<E extends keyof Events & string>(event: E, listener: (payload: Events[E]) => void): Unsubscribe {
    const unsubscribe = this.on(event, (payload) => {
      unsubscribe();
      listener(payload);
    });
    return unsubscribe;
  }

  emit<E extends keyof Events & string>(event: E, payload: Events[E]): void {
    this.emitter.emit(event, payload);
  }

  listenerCount(event: keyof Events & string): number {
    return this.emitter.listenerCount(event);
  }

  clear(): void {
    this.emitter.removeAllListeners();
  }
}
