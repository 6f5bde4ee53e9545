import { z } from 'zod';
import { clanShape, detailedClanShape } from './clan.js';
import { ArenaSchema, BadgeSchema, PopularitySchema } from './common.js';
import { profileShape } from './profile.js';

/** Clan in the top list of a location (or the world). */
export const TopClanSchema = z
  .object({
    ...clanShape,
    rank: z.number().optional(),
    previousRank: z.number().optional(),
  })
  .readonly();
export type TopClan = z.infer<typeof TopClanSchema>;

export const TopClansSchema = z.array(TopClanSchema).readonly();

/** Player in the top list of a location (or the world). */
export const TopPlayerSchema = z
  .object({
    tag: z.string(),
    name: z.string(),
    rank: z.number().optional(),
    previousRank: z.number().optional(),
    expLevel: z.number().optional(),
    trophies: z.number().optional(),
    donationsDelta: z.number().nullable().optional(),
    clan: z
      .object({
        tag: z.string(),
        name: z.string(),
        badge: BadgeSchema.optional(),
      })
      .readonly()
      .nullable()
      .optional(),
    arena: ArenaSchema.optional(),
  })
  .readonly();
export type TopPlayer = z.infer<typeof TopPlayerSchema>;

export const TopPlayersSchema = z.array(TopPlayerSchema).readonly();

export const PopularClanSchema = z
  .object({
    ...detailedClanShape,
    popularity: PopularitySchema.optional(),
  })
  .readonly();
export type PopularClan = z.infer<typeof PopularClanSchema>;

export const PopularClansSchema = z.array(PopularClanSchema).readonly();

export const PopularPlayerSchema = z
  .object({
    ...profileShape,
    popularity: PopularitySchema.optional(),
  })
  .readonly();
export type PopularPlayer = z.infer<typeof PopularPlayerSchema>;

export const PopularPlayersSchema = z.array(PopularPlayerSchema).readonly();
