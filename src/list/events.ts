/**
 * Event system for Stride lists.
 * Provides a pub/sub mechanism for buffer reallocations.
 */

// =============================================================================
// Event Types
// =============================================================================

/**
 * Base event interface.
 */
export interface ListEvent {
  readonly type: string;
  readonly timestamp: number;
}

/**
 * Why the buffer was reallocated.
 */
export type ResizeReason = 'grow' | 'shrink' | 'clear';

/**
 * Fired after the backing buffer changes capacity.
 */
export interface ResizeEvent extends ListEvent {
  readonly type: 'resize';
  readonly reason: ResizeReason;
  /** Capacity before the reallocation */
  readonly previousCapacity: number;
  /** Capacity after the reallocation */
  readonly capacity: number;
  /** Logical size at the moment of reallocation */
  readonly size: number;
}

/**
 * Union of all list events.
 */
export type AnyListEvent = ResizeEvent;

/**
 * Event type to handler mapping.
 */
export interface ListEventMap {
  'resize': ResizeEvent;
}

// =============================================================================
// Event Handler Types
// =============================================================================

/**
 * Handler function for a specific event type.
 */
export type EventHandler<T extends AnyListEvent> = (event: T) => void;

/**
 * Unsubscribe function returned by addEventListener.
 */
export type Unsubscribe = () => void;

// =============================================================================
// Event Emitter
// =============================================================================

/**
 * Type-safe pub/sub for list events.
 */
export interface ListEventEmitter {
  /**
   * Add an event listener for a specific event type.
   * @returns Unsubscribe function
   */
  addEventListener<K extends keyof ListEventMap>(
    type: K,
    handler: EventHandler<ListEventMap[K]>
  ): Unsubscribe;

  /**
   * Remove an event listener.
   */
  removeEventListener<K extends keyof ListEventMap>(
    type: K,
    handler: EventHandler<ListEventMap[K]>
  ): void;

  /**
   * Emit an event to all registered handlers.
   */
  emit<K extends keyof ListEventMap>(type: K, event: ListEventMap[K]): void;

  /**
   * True when at least one handler is registered for `type`.
   */
  hasListeners(type: keyof ListEventMap): boolean;

  /**
   * Remove all event listeners.
   */
  removeAllListeners(): void;
}

type HandlerSets = {
  [K in keyof ListEventMap]: Set<EventHandler<ListEventMap[K]>>;
};

/**
 * Create a new list event emitter.
 */
export function createListEventEmitter(): ListEventEmitter {
  const handlers: HandlerSets = {
    resize: new Set(),
  };

  return {
    addEventListener<K extends keyof ListEventMap>(
      type: K,
      handler: EventHandler<ListEventMap[K]>
    ): Unsubscribe {
      const typeHandlers: Set<EventHandler<ListEventMap[K]>> = handlers[type];
      typeHandlers.add(handler);

      return () => {
        typeHandlers.delete(handler);
      };
    },

    removeEventListener<K extends keyof ListEventMap>(
      type: K,
      handler: EventHandler<ListEventMap[K]>
    ): void {
      const typeHandlers: Set<EventHandler<ListEventMap[K]>> = handlers[type];
      typeHandlers.delete(handler);
    },

    emit<K extends keyof ListEventMap>(type: K, event: ListEventMap[K]): void {
      const typeHandlers: Set<EventHandler<ListEventMap[K]>> = handlers[type];
      for (const handler of typeHandlers) {
        try {
          handler(event);
        } catch (error) {
          console.error(`Event handler error for '${type}':`, error);
        }
      }
    },

    hasListeners(type: keyof ListEventMap): boolean {
      return handlers[type].size > 0;
    },

    removeAllListeners(): void {
      handlers.resize.clear();
    },
  };
}

// =============================================================================
// Event Helpers
// =============================================================================

/**
 * Create a resize event.
 */
export function createResizeEvent(
  reason: ResizeReason,
  previousCapacity: number,
  capacity: number,
  size: number
): ResizeEvent {
  return Object.freeze({
    type: 'resize' as const,
    timestamp: Date.now(),
    reason,
    previousCapacity,
    capacity,
    size,
  });
}
