/**
 * Game notifications
 *
 * The engine only knows this contract; delivery (UI toast, push, chat) is up
 * to the implementation wired into the session.
 */

import { logger } from '../../config/logger.config';
import { GameStatus, MoveRecord, Player } from '../../domain/game';

export interface GameNotification {
  gameId: string;
  title: string;
  body: string;
}

export interface NotificationService {
  notifyMoveMade(gameId: string, move: MoveRecord): Promise<void>;
  notifyCheck(gameId: string, playerInCheck: Player): Promise<void>;
  notifyGameOver(gameId: string, status: Pick<GameStatus, 'winner' | 'endReason'>): Promise<void>;
}

/**
 * Formats notifications and writes them to the application log.
 * Keeps the last `limit` notifications for inspection.
 */
export class LoggingNotificationService implements NotificationService {
  private sent: GameNotification[] = [];

  constructor(private readonly limit: number = 50) {}

  async notifyMoveMade(gameId: string, move: MoveRecord): Promise<void> {
    const capture = move.capturedPiece ? ` capturing ${move.capturedPiece}` : '';
    this.send({ gameId, title: 'Move made', body: `${move.player} played ${move.notation}${capture}` });
  }

  async notifyCheck(gameId: string, playerInCheck: Player): Promise<void> {
    this.send({ gameId, title: 'Check', body: `${playerInCheck} is in check` });
  }

  async notifyGameOver(
    gameId: string,
    status: Pick<GameStatus, 'winner' | 'endReason'>
  ): Promise<void> {
    const result = status.winner ? `${status.winner} wins` : 'Draw';
    const reason = status.endReason ? ` (${status.endReason})` : '';
    this.send({ gameId, title: 'Game over', body: `${result}${reason}` });
  }

  getSentNotifications(): GameNotification[] {
    return [...this.sent];
  }

  private send(notification: GameNotification): void {
    this.sent.push(notification);
    if (this.sent.length > this.limit) {
      this.sent.shift();
    }
    logger.info(`[notification] ${notification.title}: ${notification.body}`, {
      gameId: notification.gameId,
    });
  }
}
