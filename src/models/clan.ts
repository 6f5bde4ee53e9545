import { z } from 'zod';
import { ArenaSchema, BadgeSchema, LocationSchema } from './common.js';

export const clanShape = {
  tag: z.string(),
  name: z.string(),
  type: z.string().optional(),
  score: z.number().optional(),
  memberCount: z.number().optional(),
  requiredScore: z.number().optional(),
  donations: z.number().optional(),
  badge: BadgeSchema.optional(),
  location: LocationSchema.optional(),
};

/** Clan summary, as returned by clan search. */
export const ClanSchema = z.object(clanShape).readonly();
export type Clan = z.infer<typeof ClanSchema>;

export const ClansSchema = z.array(ClanSchema).readonly();

export const ClanMemberSchema = z
  .object({
    tag: z.string(),
    name: z.string(),
    rank: z.number().optional(),
    previousRank: z.number().optional(),
    role: z.string().optional(),
    expLevel: z.number().optional(),
    trophies: z.number().optional(),
    clanChestCrowns: z.number().optional(),
    donations: z.number().optional(),
    donationsReceived: z.number().optional(),
    donationsDelta: z.number().nullable().optional(),
    donationsPercent: z.number().optional(),
    arena: ArenaSchema.optional(),
  })
  .readonly();
export type ClanMember = z.infer<typeof ClanMemberSchema>;

export const ClanChestSchema = z
  .object({
    status: z.string().optional(),
    crowns: z.number().optional(),
    level: z.number().optional(),
    maxLevel: z.number().optional(),
  })
  .readonly();
export type ClanChest = z.infer<typeof ClanChestSchema>;

/** Whether the API keeps history snapshots for the clan. */
export const ClanTrackingSchema = z
  .object({
    active: z.boolean().optional(),
    available: z.boolean().optional(),
    snapshotCount: z.number().optional(),
    legible: z.boolean().optional(),
  })
  .readonly();
export type ClanTracking = z.infer<typeof ClanTrackingSchema>;

export const detailedClanShape = {
  ...clanShape,
  description: z.string().optional(),
  clanChest: ClanChestSchema.optional(),
  members: z.array(ClanMemberSchema).readonly().optional(),
  tracking: ClanTrackingSchema.optional(),
};

/** Clan with its members, as returned by the clan lookups. */
export const DetailedClanSchema = z.object(detailedClanShape).readonly();
export type DetailedClan = z.infer<typeof DetailedClanSchema>;

export const DetailedClansSchema = z.array(DetailedClanSchema).readonly();

/** Clan narrowed by `keys` / `excludes`; any field may be missing. */
export const DetailedClanFieldsSchema = z.object(detailedClanShape).partial().readonly();
export type DetailedClanFields = z.infer<typeof DetailedClanFieldsSchema>;

export const DetailedClanFieldsListSchema = z.array(DetailedClanFieldsSchema).readonly();

/** One dated snapshot in the history of a tracked clan. */
export const ClanHistorySnapshotSchema = z
  .object({
    donations: z.number().optional(),
    memberCount: z.number().optional(),
    members: z
      .array(
        z
          .object({
            tag: z.string(),
            name: z.string().optional(),
            trophies: z.number().optional(),
            donations: z.number().optional(),
            clanRank: z.number().optional(),
          })
          .readonly(),
      )
      .readonly()
      .optional(),
  })
  .readonly();
export type ClanHistorySnapshot = z.infer<typeof ClanHistorySnapshotSchema>;

/** Clan history keyed by snapshot date. */
export const ClanHistorySchema = z.record(z.string(), ClanHistorySnapshotSchema).readonly();
export type ClanHistory = z.infer<typeof ClanHistorySchema>;

/** Filters of a clan search; every one is optional. */
export const ClanSearchSchema = z
  .object({
    name: z.string().optional(),
    score: z.number().int().optional(),
    minMembers: z.number().int().optional(),
    maxMembers: z.number().int().optional(),
    locationId: z.number().int().optional(),
  })
  .readonly();
export type ClanSearch = z.infer<typeof ClanSearchSchema>;
