import logger from '../../utils/logger';

export enum EventType {
  MEDIA_ITEM_ADDED = 'media_item_added',
  MEDIA_ITEM_UPDATED = 'media_item_updated',
  MEDIA_ITEM_DELETED = 'media_item_deleted',
  SYNC_TASKS_UPDATED = 'sync_tasks_updated',
}

export interface LibraryEvent {
  event: EventType;
  uri: string;
  data: unknown;
}

export type LibraryEventListener = (event: LibraryEvent) => void;

/**
 * Fans library events out to downstream consumers (websocket clients, UI refresh, tests).
 * A throwing listener is logged and never affects the operation that emitted the event.
 */
export class EventNotifier {
  private readonly listeners = new Set<LibraryEventListener>();

  emit(event: EventType, uri: string, data: unknown): void {
    const payload: LibraryEvent = { event, uri, data };
    for (const listener of this.listeners) {
      try {
        listener(payload);
      } catch (error) {
        logger.error(`[EventNotifier] Listener failed for ${event} ${uri}: ${error}`);
      }
    }
  }

  /** Subscribe to all events. Returns an unsubscribe function. */
  subscribe(listener: LibraryEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
