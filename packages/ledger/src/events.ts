import { EventEmitter } from "node:events";

/**
 * Typed wrapper around EventEmitter. Subclasses publish through `emit`;
 * observers subscribe with `on`, which returns an unsubscribe function.
 */
export class LedgerEmitter<Events extends object> {
  private readonly emitter = new EventEmitter();

  on<K extends keyof Events & string>(event: K, listener: (payload: Events[K]) => void): () => void {
    this.emitter.on(event, listener);
    return () => {
      this.emitter.off(event, listener);
    };
  }

  protected emit<K extends keyof Events & string>(event: K, payload: Events[K]): void {
    this.emitter.emit(event, payload);
  }
}
