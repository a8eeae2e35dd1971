import { Pool } from 'pg';
import { Game } from './domain/game';
import { RuleOracle } from './domain/rules/rule-oracle';
import { GamesService } from './modules/games/games.service';
import { GameStateStore } from './modules/games/games.repository';
import { NotificationService } from './modules/notifications/notification.service';
import { CommandExecutor } from './shared/commands';
import { AuditTrailSubscriber } from './shared/events/audit-trail-subscriber';
import { EventDispatcher } from './shared/events/event-dispatcher';
import { NotificationEventSubscriber } from './shared/events/notification-event-subscriber';

type Factory<TServices, T> = (container: Container<TServices>) => T;

/**
 * Lazily constructed, cached service registry. One container per game
 * session; there is no process-wide instance.
 */
export class Container<TServices> {
  private factories: { [K in keyof TServices]?: Factory<TServices, TServices[K]> } = {};
  private instances: { [K in keyof TServices]?: { value: TServices[K] } } = {};

  register<K extends keyof TServices>(key: K, factory: Factory<TServices, TServices[K]>): void {
    this.factories[key] = factory;
  }

  resolve<K extends keyof TServices>(key: K): TServices[K] {
    // Return cached instance if exists
    const cached = this.instances[key];
    if (cached) {
      return cached.value;
    }

    // Create new instance
    const factory = this.factories[key];
    if (!factory) {
      throw new Error(`No factory registered for key: ${String(key)}`);
    }

    const instance = factory(this);
    this.instances[key] = { value: instance };
    return instance;
  }

  has(key: keyof TServices): boolean {
    return this.factories[key] !== undefined || this.instances[key] !== undefined;
  }

  // For testing: clear all instances
  clearInstances(): void {
    this.instances = {};
  }

  // For testing: override with mock
  override<K extends keyof TServices>(key: K, instance: TServices[K]): void {
    this.instances[key] = { value: instance };
  }
}

export interface GameSessionServices {
  pool: Pool;
  game: Game;
  oracle: RuleOracle;
  store: GameStateStore;
  executor: CommandExecutor;
  dispatcher: EventDispatcher;
  notificationService: NotificationService;
  notificationSubscriber: NotificationEventSubscriber;
  auditTrail: AuditTrailSubscriber;
  gamesService: GamesService;
}

export const KEYS = {
  // Database
  POOL: 'pool',

  // Game state
  GAME: 'game',
  ORACLE: 'oracle',
  STORE: 'store',

  // Engine
  EXECUTOR: 'executor',
  DISPATCHER: 'dispatcher',

  // Subscribers
  NOTIFICATION_SERVICE: 'notificationService',
  NOTIFICATION_SUBSCRIBER: 'notificationSubscriber',
  AUDIT_TRAIL: 'auditTrail',

  // Services
  GAMES_SERVICE: 'gamesService',
} as const satisfies Record<string, keyof GameSessionServices>;
