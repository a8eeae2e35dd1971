import { logger } from '../../config/logger.config';
import { DispatchReport, EventMiddleware } from './event-dispatcher';
import { GameEvent } from './game-event';

/**
 * Logs every event on its way in and the handler outcome on its way out.
 */
export class LoggingMiddleware implements EventMiddleware {
  readonly name = 'logging';

  process(event: GameEvent): GameEvent {
    logger.info('Event dispatched', {
      type: event.type,
      eventId: event.id,
      gameId: event.gameId,
      payload: event.payload,
    });
    return event;
  }

  after(event: GameEvent, report: DispatchReport): void {
    if (report.handlersFailed > 0) {
      logger.warn('Event handlers failed', {
        type: event.type,
        eventId: event.id,
        failed: report.handlersFailed,
        errors: report.errors,
      });
    }
  }
}

/**
 * Collects dispatch durations per event type.
 */
export class TimingMiddleware implements EventMiddleware {
  readonly name = 'timing';
  private timings = new Map<string, number[]>();

  process(event: GameEvent): GameEvent {
    return event;
  }

  after(event: GameEvent, report: DispatchReport): void {
    const samples = this.timings.get(event.type) ?? [];
    samples.push(report.durationMs);
    this.timings.set(event.type, samples);
  }

  /**
   * Average dispatch time in milliseconds, or null if the type was never seen.
   */
  getAverageTime(type: string): number | null {
    const samples = this.timings.get(type);
    if (!samples || samples.length === 0) return null;
    return samples.reduce((sum, sample) => sum + sample, 0) / samples.length;
  }

  getSampleCount(type: string): number {
    return this.timings.get(type)?.length ?? 0;
  }

  reset(): void {
    this.timings.clear();
  }
}

/**
 * Drops events the predicate rejects before any handler sees them.
 */
export class EventFilterMiddleware implements EventMiddleware {
  readonly name: string;

  constructor(
    private readonly predicate: (event: GameEvent) => boolean,
    name = 'filter'
  ) {
    this.name = name;
  }

  process(event: GameEvent): GameEvent | null {
    return this.predicate(event) ? event : null;
  }
}
