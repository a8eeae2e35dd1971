// Ensure env is loaded before accessing process.env
import { env } from './config/env.config';
import { logger } from './config/logger.config';

import { Container, GameSessionServices, KEYS } from './container';
import { closePool, createPool } from './db/pool';
import { Game, Player, STANDARD_START_POSITION } from './domain/game';
import { RuleOracle } from './domain/rules/rule-oracle';
import { GameCommandValidator } from './modules/games/game-command.validator';
import { GameSessionContext } from './modules/games/game-session.utils';
import {
  GameStateRepository,
  GameStateStore,
  InMemoryGameStateRepository,
} from './modules/games/games.repository';
import { GamesService } from './modules/games/games.service';
import {
  LoggingNotificationService,
  NotificationService,
} from './modules/notifications/notification.service';
import { CommandExecutor } from './shared/commands';
import { AuditTrailSubscriber } from './shared/events/audit-trail-subscriber';
import { EventDispatcher } from './shared/events/event-dispatcher';
import { LoggingMiddleware } from './shared/events/event-middleware';
import { NotificationEventSubscriber } from './shared/events/notification-event-subscriber';

export interface GameSessionOptions {
  oracle: RuleOracle;
  gameId?: string;
  position?: string;
  firstPlayer?: Player;
  /** Defaults to PostgreSQL when DATABASE_URL is set, otherwise in memory */
  store?: GameStateStore;
  notificationService?: NotificationService;
  maxCommandHistory?: number;
  maxEventHistory?: number;
  handlerTimeoutMs?: number;
}

export interface GameSession {
  container: Container<GameSessionServices>;
  games: GamesService;
  dispatcher: EventDispatcher;
  executor: CommandExecutor;
  auditTrail: AuditTrailSubscriber;
  /** Unsubscribe session handlers and release the database pool, if any */
  close(): Promise<void>;
}

/**
 * Wire one game session. Each call builds its own executor, dispatcher and
 * aggregate; sessions share nothing.
 */
export function createGameSession(options: GameSessionOptions): GameSession {
  const container = new Container<GameSessionServices>();
  const position = options.position ?? STANDARD_START_POSITION;

  // Database (only when no store was supplied)
  container.register(KEYS.POOL, () => createPool());

  // Game state
  container.register(KEYS.GAME, () =>
    Game.create({ gameId: options.gameId, position, firstPlayer: options.firstPlayer })
  );
  container.register(KEYS.ORACLE, () => options.oracle);
  container.register(KEYS.STORE, (c) => {
    if (options.store) return options.store;
    if (env.DATABASE_URL) return new GameStateRepository(c.resolve(KEYS.POOL));
    return new InMemoryGameStateRepository();
  });

  // Engine
  container.register(
    KEYS.EXECUTOR,
    (c) =>
      new CommandExecutor({
        validator: new GameCommandValidator(c.resolve(KEYS.GAME)),
        maxHistory: options.maxCommandHistory ?? env.COMMAND_HISTORY_LIMIT,
      })
  );
  container.register(KEYS.DISPATCHER, () => {
    const dispatcher = new EventDispatcher({
      maxHistory: options.maxEventHistory ?? env.EVENT_HISTORY_LIMIT,
      handlerTimeoutMs: options.handlerTimeoutMs ?? env.HANDLER_TIMEOUT_MS,
    });
    dispatcher.addMiddleware(new LoggingMiddleware());
    return dispatcher;
  });

  // Subscribers
  container.register(
    KEYS.NOTIFICATION_SERVICE,
    () => options.notificationService ?? new LoggingNotificationService()
  );
  container.register(
    KEYS.NOTIFICATION_SUBSCRIBER,
    (c) => new NotificationEventSubscriber(c.resolve(KEYS.NOTIFICATION_SERVICE))
  );
  container.register(KEYS.AUDIT_TRAIL, () => new AuditTrailSubscriber(env.EVENT_HISTORY_LIMIT));

  // Services
  container.register(KEYS.GAMES_SERVICE, (c) => {
    const ctx: GameSessionContext = {
      game: c.resolve(KEYS.GAME),
      executor: c.resolve(KEYS.EXECUTOR),
      dispatcher: c.resolve(KEYS.DISPATCHER),
      oracle: c.resolve(KEYS.ORACLE),
      store: c.resolve(KEYS.STORE),
    };
    return new GamesService(ctx, position);
  });

  const dispatcher = container.resolve(KEYS.DISPATCHER);
  const auditTrail = container.resolve(KEYS.AUDIT_TRAIL);
  const notificationSubscriber = container.resolve(KEYS.NOTIFICATION_SUBSCRIBER);
  auditTrail.register(dispatcher);
  notificationSubscriber.register(dispatcher);

  const games = container.resolve(KEYS.GAMES_SERVICE);
  const usesPool = !options.store && Boolean(env.DATABASE_URL);

  logger.info('Game session created', {
    gameId: games.gameId,
    store: usesPool ? 'postgres' : options.store ? 'custom' : 'memory',
  });

  return {
    container,
    games,
    dispatcher,
    executor: container.resolve(KEYS.EXECUTOR),
    auditTrail,
    async close() {
      auditTrail.unregister(dispatcher);
      notificationSubscriber.unregister(dispatcher);
      if (usesPool) {
        await closePool(container.resolve(KEYS.POOL));
      }
      logger.info('Game session closed', { gameId: games.gameId });
    },
  };
}
