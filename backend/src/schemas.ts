import { z } from "zod";
import { PIECE_COLORS, PIECE_VARIANTS } from "@rookery/shared";

const coordSchema = z.object({
  file: z.number().int(),
  rank: z.number().int()
});

const pieceSchema = z.object({
  color: z.enum(PIECE_COLORS),
  variant: z.enum(PIECE_VARIANTS),
  position: coordSchema
});

export const legalMovesRequestSchema = z.object({
  pieces: z.array(pieceSchema).max(64),
  from: coordSchema
});

export const moveCheckRequestSchema = legalMovesRequestSchema.extend({
  to: coordSchema
});

export const serverConfigSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  HOST: z.string().min(1).default("0.0.0.0")
});
