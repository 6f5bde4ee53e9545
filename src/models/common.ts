import { z } from 'zod';

/** Clan badge, also listed in the badge constants. */
export const BadgeSchema = z
  .object({
    name: z.string().optional(),
    category: z.string().optional(),
    id: z.number().optional(),
    image: z.string().optional(),
  })
  .readonly();
export type Badge = z.infer<typeof BadgeSchema>;

export const arenaShape = {
  name: z.string().optional(),
  arena: z.string().optional(),
  arenaID: z.number().optional(),
  trophyLimit: z.number().optional(),
};

/** Arena a player or battle belongs to. */
export const ArenaSchema = z.object(arenaShape).readonly();
export type Arena = z.infer<typeof ArenaSchema>;

/** Location a clan is registered in. */
export const LocationSchema = z
  .object({
    name: z.string().optional(),
    isCountry: z.boolean().optional(),
    code: z.string().optional(),
  })
  .readonly();
export type Location = z.infer<typeof LocationSchema>;

/** Card as owned by a player or used in a deck. */
export const CardSchema = z
  .object({
    name: z.string(),
    id: z.number().optional(),
    key: z.string().optional(),
    level: z.number().optional(),
    maxLevel: z.number().optional(),
    count: z.number().optional(),
    rarity: z.string().optional(),
    elixir: z.number().optional(),
    type: z.string().optional(),
    icon: z.string().optional(),
  })
  .readonly();
export type Card = z.infer<typeof CardSchema>;

/** How often a resource was looked up, attached to the popular lists. */
export const PopularitySchema = z
  .object({
    hits: z.number().optional(),
    hitsPerDayAvg: z.number().optional(),
  })
  .readonly();
export type Popularity = z.infer<typeof PopularitySchema>;
