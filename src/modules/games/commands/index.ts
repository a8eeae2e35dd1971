export { MakeMoveCommand, MakeMoveData } from './make-move.command';
export { ResignCommand, ResignData } from './resign.command';
