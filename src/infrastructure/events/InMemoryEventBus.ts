import { EventEmitter } from 'events';
import { IEventBus, EventHandler } from '../../domain/events/IEventBus';
import { ILogger } from '../../domain/common/ILogger';

/**
 * In-memory event bus on top of Node.js EventEmitter.
 * A failing handler is logged and does not affect the other handlers
 * or the operation that emitted the event.
 */
export class InMemoryEventBus implements IEventBus {
  private emitter: EventEmitter;
  private logger: ILogger;

  constructor(logger: ILogger) {
    this.emitter = new EventEmitter();
    this.logger = logger;
    this.emitter.setMaxListeners(100);
  }

  async emit<T>(event: string, data: T): Promise<void> {
    this.logger.debug(`Event emitted: ${event}`, { event });

    // Raw listeners so once() wrappers unregister themselves when called
    const listeners = this.emitter.rawListeners(event);

    const promises = listeners.map(async (listener) => {
      try {
        await listener(data);
      } catch (error) {
        this.logger.error(`Error in event handler for ${event}:`, error instanceof Error ? error : new Error(String(error)));
      }
    });

    await Promise.all(promises);
  }

  on<T>(event: string, handler: EventHandler<T>): void {
    this.emitter.on(event, handler);
    this.logger.debug(`Handler registered for: ${event}`);
  }

  off<T>(event: string, handler: EventHandler<T>): void {
    this.emitter.off(event, handler);
    this.logger.debug(`Handler removed for: ${event}`);
  }

  once<T>(event: string, handler: EventHandler<T>): void {
    this.emitter.once(event, handler);
    this.logger.debug(`One-time handler registered for: ${event}`);
  }

  /**
   * Remove all listeners for an event, or all events if not specified.
   */
  removeAllListeners(event?: string): void {
    if (event) {
      this.emitter.removeAllListeners(event);
    } else {
      this.emitter.removeAllListeners();
    }
  }

  listenerCount(event: string): number {
    return this.emitter.listenerCount(event);
  }
}
