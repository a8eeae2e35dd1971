export { GamesService, StartGameOptions } from './games.service';
export { GameCommandValidator } from './game-command.validator';
export { GameStateStore, GameStateRepository, InMemoryGameStateRepository } from './games.repository';
export { GameSessionContext } from './game-session.utils';
export {
  GameActionResult,
  GameStateView,
  MoveMetadata,
  LegalMoveMetadata,
  LegalMovesResult,
  GameMessages,
} from './games.model';
export { MakeMoveCommand, MakeMoveData, ResignCommand, ResignData } from './commands';
export * from './use-cases';
