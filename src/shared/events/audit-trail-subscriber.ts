import { BoundedBuffer } from '../utils/bounded-buffer';
import { EventDispatcher, EventPriorities } from './event-dispatcher';
import { EventType, EventTypes, GameEvent } from './game-event';

export interface AuditEntry {
  eventId: string;
  type: string;
  gameId: string;
  recordedAt: Date;
}

/**
 * Records every game event before any other handler runs.
 * Handlers are synchronous and registered at Critical priority.
 */
export class AuditTrailSubscriber {
  private readonly trail: BoundedBuffer<AuditEntry>;
  private handlerIds: Array<{ type: string; id: string }> = [];

  constructor(
    capacity: number = 1000,
    private readonly types: readonly EventType[] = Object.values(EventTypes)
  ) {
    this.trail = new BoundedBuffer<AuditEntry>(capacity);
  }

  register(dispatcher: EventDispatcher): void {
    this.handlerIds = this.types.map((type) => ({
      type,
      id: dispatcher.subscribeSync(type, (event) => this.record(event), {
        priority: EventPriorities.CRITICAL,
        name: `audit_${type}`,
      }),
    }));
  }

  unregister(dispatcher: EventDispatcher): void {
    for (const { type, id } of this.handlerIds) {
      dispatcher.unsubscribe(type, id);
    }
    this.handlerIds = [];
  }

  /** Oldest first */
  getEntries(): AuditEntry[] {
    return this.trail.toArray();
  }

  private record(event: GameEvent): void {
    this.trail.push({
      eventId: event.id,
      type: event.type,
      gameId: event.gameId,
      recordedAt: new Date(),
    });
  }
}
