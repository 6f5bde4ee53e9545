import { z } from 'zod';
import { BadgeSchema, PopularitySchema } from './common.js';

export const TournamentClanSchema = z
  .object({
    tag: z.string(),
    name: z.string(),
    badge: BadgeSchema.optional(),
  })
  .readonly();
export type TournamentClan = z.infer<typeof TournamentClanSchema>;

export const TournamentParticipantSchema = z
  .object({
    tag: z.string(),
    name: z.string(),
    score: z.number().optional(),
    rank: z.number().optional(),
    clan: TournamentClanSchema.nullable().optional(),
  })
  .readonly();
export type TournamentParticipant = z.infer<typeof TournamentParticipantSchema>;

export const tournamentShape = {
  tag: z.string(),
  name: z.string(),
  type: z.string().optional(),
  status: z.string().optional(),
  creatorTag: z.string().optional(),
  description: z.string().optional(),
  capacity: z.number().optional(),
  maxCapacity: z.number().optional(),
  preparationDuration: z.number().optional(),
  duration: z.number().optional(),
  createTime: z.number().optional(),
  startTime: z.number().nullable().optional(),
  endTime: z.number().nullable().optional(),
  playerCount: z.number().optional(),
  members: z.array(TournamentParticipantSchema).readonly().optional(),
};

export const TournamentSchema = z.object(tournamentShape).readonly();
export type Tournament = z.infer<typeof TournamentSchema>;

export const PopularTournamentSchema = z
  .object({
    ...tournamentShape,
    popularity: PopularitySchema.optional(),
  })
  .readonly();
export type PopularTournament = z.infer<typeof PopularTournamentSchema>;

export const PopularTournamentsSchema = z.array(PopularTournamentSchema).readonly();
