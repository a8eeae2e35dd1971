import { z } from 'zod';
import { PROMOTION_PIECES, Players } from './game.model';

export const playerSchema = z.enum([Players.WHITE, Players.BLACK]);

export const moveRecordSchema = z.object({
  from: z.string(),
  to: z.string(),
  promotion: z.string().nullable(),
  player: playerSchema,
  notation: z.string(),
  capturedPiece: z.string().nullable(),
  isCheck: z.boolean(),
});

export const gameStateSchema = z.object({
  gameId: z.string().min(1),
  position: z.string().min(1),
  currentPlayer: playerSchema,
  moves: z.array(moveRecordSchema),
  isEnded: z.boolean(),
  winner: playerSchema.nullable(),
  endReason: z.string().nullable(),
  createdAt: z.string(),
});

export const squareSchema = z.string().regex(/^[a-h][1-8]$/, 'Square must be a file a-h followed by a rank 1-8');

export const moveRequestSchema = z
  .object({
    from: squareSchema,
    to: squareSchema,
    promotion: z.enum(PROMOTION_PIECES).optional(),
    player: playerSchema.optional(),
  })
  .refine((move) => move.from !== move.to, {
    message: 'Source and destination squares must differ',
    path: ['to'],
  });
