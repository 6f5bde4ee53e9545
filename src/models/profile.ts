import { z } from 'zod';
import { ArenaSchema, BadgeSchema, CardSchema } from './common.js';

/** Clan membership as seen from a player profile. */
export const PlayerClanSchema = z
  .object({
    tag: z.string(),
    name: z.string(),
    role: z.string().optional(),
    donations: z.number().optional(),
    donationsReceived: z.number().optional(),
    donationsDelta: z.number().optional(),
    badge: BadgeSchema.optional(),
  })
  .readonly();
export type PlayerClan = z.infer<typeof PlayerClanSchema>;

export const PlayerStatsSchema = z
  .object({
    clanCardsCollected: z.number().optional(),
    tournamentCardsWon: z.number().optional(),
    maxTrophies: z.number().optional(),
    threeCrownWins: z.number().optional(),
    cardsFound: z.number().optional(),
    favoriteCard: CardSchema.optional(),
    totalDonations: z.number().optional(),
    challengeMaxWins: z.number().optional(),
    challengeCardsWon: z.number().optional(),
    level: z.number().optional(),
  })
  .readonly();
export type PlayerStats = z.infer<typeof PlayerStatsSchema>;

export const PlayerGamesSchema = z
  .object({
    total: z.number().optional(),
    tournamentGames: z.number().optional(),
    wins: z.number().optional(),
    warDayWins: z.number().optional(),
    winsPercent: z.number().optional(),
    losses: z.number().optional(),
    lossesPercent: z.number().optional(),
    draws: z.number().optional(),
    drawsPercent: z.number().optional(),
  })
  .readonly();
export type PlayerGames = z.infer<typeof PlayerGamesSchema>;

/** Upcoming chests of a player and how far away the big ones are. */
export const PlayerChestCycleSchema = z
  .object({
    position: z.number().optional(),
    upcoming: z.array(z.string()).readonly().optional(),
    superMagical: z.number().optional(),
    magical: z.number().optional(),
    legendary: z.number().optional(),
    epic: z.number().optional(),
    giant: z.number().optional(),
  })
  .readonly();
export type PlayerChestCycle = z.infer<typeof PlayerChestCycleSchema>;

export const profileShape = {
  tag: z.string(),
  name: z.string(),
  trophies: z.number().optional(),
  rank: z.number().nullable().optional(),
  arena: ArenaSchema.optional(),
  clan: PlayerClanSchema.nullable().optional(),
  stats: PlayerStatsSchema.optional(),
  games: PlayerGamesSchema.optional(),
  chestCycle: PlayerChestCycleSchema.optional(),
  currentDeck: z.array(CardSchema).readonly().optional(),
  cards: z.array(CardSchema).readonly().optional(),
  deckLink: z.string().optional(),
};

/** Player profile. */
export const ProfileSchema = z.object(profileShape).readonly();
export type Profile = z.infer<typeof ProfileSchema>;

export const ProfilesSchema = z.array(ProfileSchema).readonly();

/** Profile narrowed by `keys` / `excludes`; the API may leave out any field, `tag` included. */
export const ProfileFieldsSchema = z.object(profileShape).partial().readonly();
export type ProfileFields = z.infer<typeof ProfileFieldsSchema>;

export const ProfileFieldsListSchema = z.array(ProfileFieldsSchema).readonly();
