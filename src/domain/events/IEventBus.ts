/**
 * Event handler function type.
 */
export type EventHandler<T = unknown> = (data: T) => void | Promise<void>;

/**
 * Interface for event bus implementations.
 * Provides publish-subscribe pattern for sequence events.
 */
export interface IEventBus {
  /**
   * Emit an event with data.
   * @param event - Event name/type
   * @param data - Event payload
   */
  emit<T>(event: string, data: T): Promise<void>;

  /**
   * Subscribe to an event.
   */
  on<T>(event: string, handler: EventHandler<T>): void;

  /**
   * Unsubscribe from an event.
   */
  off<T>(event: string, handler: EventHandler<T>): void;

  /**
   * Subscribe to an event for one-time execution.
   */
  once<T>(event: string, handler: EventHandler<T>): void;

  /**
   * Remove all listeners for an event.
   * @param event - Event name/type (optional - if not provided, removes all)
   */
  removeAllListeners(event?: string): void;

  /**
   * Get count of listeners for an event.
   */
  listenerCount?(event: string): number;
}
