import { z } from 'zod';
import { ArenaSchema, BadgeSchema, CardSchema } from './common.js';

export const BattleModeSchema = z
  .object({
    name: z.string().optional(),
    deck: z.string().optional(),
    cardLevels: z.string().optional(),
    overtimeSeconds: z.number().optional(),
    players: z.string().optional(),
    sameDeck: z.boolean().optional(),
  })
  .readonly();
export type BattleMode = z.infer<typeof BattleModeSchema>;

/** One side of a battle. */
export const BattlePlayerSchema = z
  .object({
    tag: z.string(),
    name: z.string(),
    crownsEarned: z.number().optional(),
    startTrophies: z.number().optional(),
    trophyChange: z.number().optional(),
    deck: z.array(CardSchema).readonly().optional(),
    clan: z
      .object({
        tag: z.string(),
        name: z.string(),
        badge: BadgeSchema.optional(),
      })
      .readonly()
      .nullable()
      .optional(),
  })
  .readonly();
export type BattlePlayer = z.infer<typeof BattlePlayerSchema>;

export const BattleSchema = z
  .object({
    type: z.string().optional(),
    challengeType: z.string().nullable().optional(),
    mode: BattleModeSchema.optional(),
    winCountBefore: z.number().optional(),
    utcTime: z.number().optional(),
    deckType: z.string().optional(),
    teamSize: z.number().optional(),
    winner: z.number().optional(),
    teamCrowns: z.number().optional(),
    opponentCrowns: z.number().optional(),
    team: z.array(BattlePlayerSchema).readonly().optional(),
    opponent: z.array(BattlePlayerSchema).readonly().optional(),
    arena: ArenaSchema.optional(),
  })
  .readonly();
export type Battle = z.infer<typeof BattleSchema>;

export const BattlesSchema = z.array(BattleSchema).readonly();
