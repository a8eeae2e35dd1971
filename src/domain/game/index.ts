export * from './game.model';
export { Game, CreateGameParams } from './game';
export {
  gameStateSchema,
  moveRecordSchema,
  moveRequestSchema,
  playerSchema,
  squareSchema,
} from './game.schemas';
