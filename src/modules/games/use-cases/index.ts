export { makeMove } from './make-move.use-case';
export { undoMove } from './undo-move.use-case';
export { redoMove } from './redo-move.use-case';
export { resignGame } from './resign-game.use-case';
export { getLegalMoves } from './get-legal-moves.use-case';
