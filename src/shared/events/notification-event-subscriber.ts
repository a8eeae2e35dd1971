import { z } from 'zod';
import { moveRecordSchema, playerSchema } from '../../domain/game';
import { NotificationService } from '../../modules/notifications/notification.service';
import { logger } from '../../config/logger.config';
import { EventDispatcher, EventPriorities } from './event-dispatcher';
import { EventTypes, GameEvent } from './game-event';

const movePayloadSchema = z.object({ move: moveRecordSchema });
const checkPayloadSchema = z.object({ playerInCheck: playerSchema });
const gameEndedPayloadSchema = z.object({
  winner: playerSchema.nullable(),
  reason: z.string().nullable(),
});

/**
 * NotificationEventSubscriber translates game events into player-facing
 * notifications. Handlers run at Low priority, after state-keeping
 * subscribers have seen the event.
 */
export class NotificationEventSubscriber {
  private handlerIds: Array<{ type: string; id: string }> = [];

  constructor(private readonly notificationService: NotificationService) {}

  register(dispatcher: EventDispatcher): void {
    const options = { priority: EventPriorities.LOW };

    this.handlerIds = [
      {
        type: EventTypes.MOVE_MADE,
        id: dispatcher.subscribeAsync(EventTypes.MOVE_MADE, (event) => this.handleMoveMade(event), {
          ...options,
          name: 'notify_move_made',
        }),
      },
      {
        type: EventTypes.CHECK_DETECTED,
        id: dispatcher.subscribeAsync(EventTypes.CHECK_DETECTED, (event) => this.handleCheck(event), {
          ...options,
          name: 'notify_check',
        }),
      },
      {
        type: EventTypes.GAME_ENDED,
        id: dispatcher.subscribeAsync(EventTypes.GAME_ENDED, (event) => this.handleGameEnded(event), {
          ...options,
          name: 'notify_game_over',
        }),
      },
    ];
  }

  unregister(dispatcher: EventDispatcher): void {
    for (const { type, id } of this.handlerIds) {
      dispatcher.unsubscribe(type, id);
    }
    this.handlerIds = [];
  }

  private async handleMoveMade(event: GameEvent): Promise<void> {
    const parsed = movePayloadSchema.safeParse(event.payload);
    if (!parsed.success) {
      logger.warn(`NotificationEventSubscriber: malformed ${event.type} payload`, { eventId: event.id });
      return;
    }
    await this.notificationService.notifyMoveMade(event.gameId, parsed.data.move);
  }

  private async handleCheck(event: GameEvent): Promise<void> {
    const parsed = checkPayloadSchema.safeParse(event.payload);
    if (!parsed.success) {
      logger.warn(`NotificationEventSubscriber: malformed ${event.type} payload`, { eventId: event.id });
      return;
    }
    await this.notificationService.notifyCheck(event.gameId, parsed.data.playerInCheck);
  }

  private async handleGameEnded(event: GameEvent): Promise<void> {
    const parsed = gameEndedPayloadSchema.safeParse(event.payload);
    if (!parsed.success) {
      logger.warn(`NotificationEventSubscriber: malformed ${event.type} payload`, { eventId: event.id });
      return;
    }
    await this.notificationService.notifyGameOver(event.gameId, {
      winner: parsed.data.winner,
      endReason: parsed.data.reason,
    });
  }
}
