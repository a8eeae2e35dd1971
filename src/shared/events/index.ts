export { GameEvent, EventTypes, EventType, createGameEvent } from './game-event';
export {
  EventDispatcher,
  EventDispatcherOptions,
  EventPriorities,
  EventPriority,
  EventHandler,
  SyncEventHandler,
  EventFilter,
  EventMiddleware,
  EventHistoryQuery,
  HandlerMode,
  HandlerInfo,
  HandlerFailure,
  DispatchReport,
  SubscribeOptions,
  DEFAULT_EVENT_HISTORY_SIZE,
} from './event-dispatcher';
export { LoggingMiddleware, TimingMiddleware, EventFilterMiddleware } from './event-middleware';
export { NotificationEventSubscriber } from './notification-event-subscriber';
export { AuditTrailSubscriber, AuditEntry } from './audit-trail-subscriber';
