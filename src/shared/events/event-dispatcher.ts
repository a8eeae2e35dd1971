/**
 * Event Dispatcher
 *
 * Per-session pub/sub registry keyed by event type. Handlers run one after
 * another in descending priority order (registration order among equals),
 * so a Critical handler always observes state before a Low one does.
 *
 * A failing handler is recorded in the DispatchReport and never stops its
 * siblings. Nothing a handler or middleware throws reaches the caller of
 * `dispatch()`.
 */

import { v4 as uuidv4 } from 'uuid';
import { logger } from '../../config/logger.config';
import { toError } from '../../utils/exceptions';
import { BoundedBuffer } from '../utils/bounded-buffer';
import { GameEvent } from './game-event';

export const DEFAULT_EVENT_HISTORY_SIZE = 1000;

export const EventPriorities = {
  LOW: 1,
  NORMAL: 2,
  HIGH: 3,
  CRITICAL: 4,
} as const;

export type EventPriority = (typeof EventPriorities)[keyof typeof EventPriorities];

/** Called inline. A returned promise is still awaited before the next handler. */
export type SyncEventHandler = (event: GameEvent) => void;
/** Awaited before the next handler runs. */
export type EventHandler = (event: GameEvent) => void | Promise<void>;
export type EventFilter = (event: GameEvent) => boolean;
export type HandlerMode = 'sync' | 'async';

export interface SubscribeOptions {
  priority?: EventPriority;
  /** Handler is skipped for events the filter rejects */
  filter?: EventFilter;
  /** Debug name used in reports and logs */
  name?: string;
}

interface RegistrationBase {
  id: string;
  name: string;
  priority: EventPriority;
  filter?: EventFilter;
}

type HandlerRegistration =
  | (RegistrationBase & { mode: 'sync'; handler: SyncEventHandler })
  | (RegistrationBase & { mode: 'async'; handler: EventHandler });

export interface HandlerInfo {
  id: string;
  name: string;
  priority: EventPriority;
  mode: HandlerMode;
  hasFilter: boolean;
}

export interface HandlerFailure {
  handler: string;
  error: string;
}

export interface DispatchReport {
  eventId: string;
  eventType: string;
  /** Handlers that ran to completion */
  handlersCalled: number;
  handlersFailed: number;
  /** Handlers whose filter rejected the event */
  handlersSkipped: number;
  /** True when a middleware dropped the event before any handler ran */
  filtered: boolean;
  errors: HandlerFailure[];
  durationMs: number;
}

/**
 * Middleware wraps every dispatch. `process` runs in registration order
 * before handlers and may return a replacement event, or null to drop the
 * event for all handlers. `after` runs once handlers have finished.
 */
export interface EventMiddleware {
  readonly name: string;
  process(event: GameEvent): GameEvent | null | Promise<GameEvent | null>;
  after?(event: GameEvent, report: DispatchReport): void | Promise<void>;
}

export interface EventDispatcherOptions {
  /** Events retained for `getEventHistory()` */
  maxHistory?: number;
  /** Upper bound for a single async handler; exceeded counts as a failure */
  handlerTimeoutMs?: number;
}

export interface EventHistoryQuery {
  type?: string;
  /** Keep only the most recent N matching events */
  limit?: number;
}

export class EventDispatcher {
  private handlers = new Map<string, HandlerRegistration[]>();
  private middlewares: EventMiddleware[] = [];
  private readonly history: BoundedBuffer<GameEvent>;
  private readonly handlerTimeoutMs?: number;
  private registeredCount = 0;

  constructor(options: EventDispatcherOptions = {}) {
    this.history = new BoundedBuffer<GameEvent>(options.maxHistory ?? DEFAULT_EVENT_HISTORY_SIZE);
    this.handlerTimeoutMs = options.handlerTimeoutMs;
  }

  /**
   * Register a handler that is called inline.
   */
  subscribeSync(type: string, handler: SyncEventHandler, options: SubscribeOptions = {}): string {
    return this.register(type, options, (base) => ({ ...base, mode: 'sync', handler }));
  }

  /**
   * Register a handler that is awaited before the next one runs.
   */
  subscribeAsync(type: string, handler: EventHandler, options: SubscribeOptions = {}): string {
    return this.register(type, options, (base) => ({ ...base, mode: 'async', handler }));
  }

  /**
   * Register a handler with an explicit mode. Defaults to 'async', which is
   * safe for handlers of either kind.
   * @returns handler id for `unsubscribe`
   */
  subscribe(
    type: string,
    handler: SyncEventHandler,
    options: SubscribeOptions & { mode: 'sync' }
  ): string;
  subscribe(
    type: string,
    handler: EventHandler,
    options?: SubscribeOptions & { mode?: 'async' }
  ): string;
  subscribe(
    type: string,
    handler: EventHandler,
    options: SubscribeOptions & { mode?: HandlerMode } = {}
  ): string {
    return options.mode === 'sync'
      ? this.subscribeSync(type, handler, options)
      : this.subscribeAsync(type, handler, options);
  }

  unsubscribe(type: string, handlerId: string): boolean {
    const registrations = this.handlers.get(type);
    if (!registrations) return false;

    const index = registrations.findIndex((registration) => registration.id === handlerId);
    if (index === -1) return false;

    const [removed] = registrations.splice(index, 1);
    logger.debug('Unsubscribed event handler', { type, handler: removed.name });
    return true;
  }

  /**
   * Remove every handler for a type.
   * @returns number of handlers removed
   */
  unsubscribeAll(type: string): number {
    const count = this.handlers.get(type)?.length ?? 0;
    this.handlers.delete(type);
    logger.debug('Unsubscribed all event handlers', { type, count });
    return count;
  }

  addMiddleware(middleware: EventMiddleware): void {
    this.middlewares.push(middleware);
    logger.debug('Added event middleware', { middleware: middleware.name });
  }

  /**
   * Record the event, run middleware, then run matching handlers in
   * priority order.
   */
  async dispatch(event: GameEvent): Promise<DispatchReport> {
    const startTime = Date.now();
    this.history.push(event);

    const report: DispatchReport = {
      eventId: event.id,
      eventType: event.type,
      handlersCalled: 0,
      handlersFailed: 0,
      handlersSkipped: 0,
      filtered: false,
      errors: [],
      durationMs: 0,
    };

    let processed: GameEvent | null = event;
    try {
      for (const middleware of this.middlewares) {
        processed = await middleware.process(processed);
        if (processed === null) break;
      }
    } catch (error) {
      const message = toError(error).message;
      report.handlersFailed = 1;
      report.errors.push({ handler: 'dispatcher', error: message });
      report.durationMs = Date.now() - startTime;
      logger.error('Event middleware failed', { type: event.type, eventId: event.id, error: message });
      return report;
    }

    if (processed === null) {
      report.filtered = true;
    } else {
      await this.runHandlers(processed, report);
    }

    report.durationMs = Date.now() - startTime;
    await this.runAfterHooks(processed ?? event, report);

    logger.debug('Dispatched event', {
      type: event.type,
      eventId: event.id,
      handlersCalled: report.handlersCalled,
      handlersFailed: report.handlersFailed,
      durationMs: report.durationMs,
    });

    return report;
  }

  /**
   * Past events in chronological order (oldest first).
   */
  getEventHistory(query: EventHistoryQuery = {}): GameEvent[] {
    let events = this.history.toArray();

    if (query.type !== undefined) {
      events = events.filter((event) => event.type === query.type);
    }
    if (query.limit !== undefined) {
      events = events.slice(Math.max(0, events.length - query.limit));
    }

    return events;
  }

  clearHistory(): void {
    this.history.clear();
  }

  getHandlerInfo(): Record<string, HandlerInfo[]> {
    const info: Record<string, HandlerInfo[]> = {};
    for (const [type, registrations] of this.handlers) {
      info[type] = registrations.map((registration) => ({
        id: registration.id,
        name: registration.name,
        priority: registration.priority,
        mode: registration.mode,
        hasFilter: registration.filter !== undefined,
      }));
    }
    return info;
  }

  getHandlerCount(type: string): number {
    return this.handlers.get(type)?.length ?? 0;
  }

  private register(
    type: string,
    options: SubscribeOptions,
    build: (base: RegistrationBase) => HandlerRegistration
  ): string {
    const registrations = this.handlers.get(type) ?? [];
    // Never reused, so names stay unique after an unsubscribe
    const sequence = this.registeredCount++;
    const registration = build({
      id: uuidv4(),
      name: options.name ?? `${type}_handler_${sequence}`,
      priority: options.priority ?? EventPriorities.NORMAL,
      filter: options.filter,
    });

    registrations.push(registration);
    // Array.prototype.sort is stable: equal priorities keep registration order
    registrations.sort((a, b) => b.priority - a.priority);
    this.handlers.set(type, registrations);

    logger.debug('Subscribed event handler', {
      type,
      handler: registration.name,
      priority: registration.priority,
      mode: registration.mode,
    });

    return registration.id;
  }

  private async runHandlers(event: GameEvent, report: DispatchReport): Promise<void> {
    // Copy so handlers that (un)subscribe during dispatch don't shift iteration
    const registrations = [...(this.handlers.get(event.type) ?? [])];

    for (const registration of registrations) {
      try {
        if (registration.filter && !registration.filter(event)) {
          report.handlersSkipped++;
          continue;
        }

        if (registration.mode === 'async') {
          await this.invokeAsync(registration.name, registration.handler, event);
        } else {
          const returned: unknown = registration.handler(event);
          if (isPromiseLike(returned)) {
            await this.invokeAsync(registration.name, () => returned, event);
          }
        }

        report.handlersCalled++;
      } catch (error) {
        const err = toError(error);
        report.handlersFailed++;
        report.errors.push({ handler: registration.name, error: err.message });
        logger.error('Event handler failed', {
          type: event.type,
          eventId: event.id,
          handler: registration.name,
          error: err.message,
          stack: err.stack,
        });
      }
    }
  }

  private async invokeAsync(
    name: string,
    handler: (event: GameEvent) => void | PromiseLike<unknown>,
    event: GameEvent
  ): Promise<void> {
    const timeoutMs = this.handlerTimeoutMs;
    if (timeoutMs === undefined) {
      await handler(event);
      return;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`Handler ${name} timed out after ${timeoutMs}ms`)),
        timeoutMs
      );
    });

    try {
      await Promise.race([handler(event), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async runAfterHooks(event: GameEvent, report: DispatchReport): Promise<void> {
    for (const middleware of this.middlewares) {
      if (!middleware.after) continue;
      try {
        await middleware.after(event, report);
      } catch (error) {
        logger.warn('Event middleware after-hook failed', {
          middleware: middleware.name,
          eventId: event.id,
          error: toError(error).message,
        });
      }
    }
  }
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}
