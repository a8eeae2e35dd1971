export { createGameSession, GameSession, GameSessionOptions } from './bootstrap';
export { Container, GameSessionServices, KEYS } from './container';
export * from './domain';
export * from './shared/commands';
export * from './shared/events';
export { BoundedBuffer } from './shared/utils/bounded-buffer';
export * from './modules/games';
export {
  NotificationService,
  LoggingNotificationService,
  GameNotification,
} from './modules/notifications/notification.service';
export {
  AppException,
  ValidationException,
  NotFoundException,
  ConflictException,
  PersistenceException,
  ErrorCode,
  GameErrors,
} from './utils/exceptions';
