import { EventEmitter } from 'node:events';
import { createLogger, type Logger } from '../utils/logger.js';

/**
 * A type-safe EventEmitter wrapper.
 *
 * Unlike a bare EventEmitter, a listener that throws does not unwind into
 * the code that emitted: the error is logged and the remaining listeners
 * still run. Events are emitted from transport and timer callbacks, which
 * must keep running whatever a consumer does.
 *
 * @template Events - A map of event names to listener signatures.
 */
export class TypedEventEmitter<Events extends { [K in keyof Events]: (...args: any[]) => void }> {
  private readonly emitter = new EventEmitter();

  constructor(protected readonly logger: Logger = createLogger('TypedEventEmitter')) { }

  public on<K extends keyof Events & string>(event: K, listener: Events[K]): this {
    this.emitter.on(event, listener);
    return this;
  }

  public once<K extends keyof Events & string>(event: K, listener: Events[K]): this {
    this.emitter.once(event, listener);
    return this;
  }

  public off<K extends keyof Events & string>(event: K, listener: Events[K]): this {
    this.emitter.off(event, listener);
    return this;
  }

  public listenerCount<K extends keyof Events & string>(event: K): number {
    return this.emitter.listenerCount(event);
  }

  /**
   * Invokes every listener for `event` in registration order.
   * @returns whether any listener was registered.
   */
  public emit<K extends keyof Events & string>(event: K, ...args: Parameters<Events[K]>): boolean {
    // rawListeners keeps `once` wrappers, which unregister themselves when called
    const listeners = this.emitter.rawListeners(event);
    for (const listener of listeners) {
      try {
        Reflect.apply(listener, this, args);
      } catch (err) {
        this.logger.error(`Listener for "${event}" threw:`, err);
      }
    }
    return listeners.length > 0;
  }

  public removeAllListeners<K extends keyof Events & string>(event?: K): this {
    if (event) {
      this.emitter.removeAllListeners(event);
    } else {
      this.emitter.removeAllListeners();
    }
    return this;
  }
}
