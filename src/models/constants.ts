import { z } from 'zod';
import { arenaShape, BadgeSchema } from './common.js';

const idName = z
  .object({
    id: z.number().optional(),
    name: z.string(),
  })
  .readonly();

/** Clan roles and clan types known to the game. */
export const AllianceSchema = z
  .object({
    roles: z.array(idName).readonly().optional(),
    types: z.array(idName).readonly().optional(),
  })
  .readonly();
export type Alliance = z.infer<typeof AllianceSchema>;

/** Arena as listed in the constants, with its display texts. */
export const ArenaConstantSchema = z
  .object({
    ...arenaShape,
    id: z.number().optional(),
    title: z.string().optional(),
    subtitle: z.string().optional(),
    clanChestMaxLevel: z.number().optional(),
  })
  .readonly();
export type ArenaConstant = z.infer<typeof ArenaConstantSchema>;

export const ArenasSchema = z.array(ArenaConstantSchema).readonly();

export const BadgesSchema = z.array(BadgeSchema).readonly();

/** Order in which chests drop. */
export const ChestCycleListSchema = z
  .object({
    order: z.array(z.string()).readonly(),
  })
  .readonly();
export type ChestCycleList = z.infer<typeof ChestCycleListSchema>;

export const CountryCodeSchema = z
  .object({
    id: z.number().optional(),
    name: z.string(),
    isCountry: z.boolean().optional(),
    code: z.string().optional(),
  })
  .readonly();
export type CountryCode = z.infer<typeof CountryCodeSchema>;

export const CountryCodesSchema = z.array(CountryCodeSchema).readonly();

const numbers = z.array(z.number()).readonly();

/** Card rarity and its upgrade table. */
export const RaritySchema = z
  .object({
    name: z.string(),
    levelCount: z.number().optional(),
    relativeLevel: z.number().optional(),
    maxLevel: z.number().optional(),
    sortCapacity: z.number().optional(),
    upgradeExp: numbers.optional(),
    upgradeMaterialCount: numbers.optional(),
    upgradeCost: numbers.optional(),
    powerLevelMultiplier: numbers.optional(),
    refundGems: z.number().optional(),
  })
  .readonly();
export type Rarity = z.infer<typeof RaritySchema>;

export const RaritiesSchema = z.array(RaritySchema).readonly();

/** Card as defined by the game, independent of any player. */
export const ConstantCardSchema = z
  .object({
    key: z.string(),
    name: z.string(),
    elixir: z.number().optional(),
    type: z.string().optional(),
    rarity: z.string().optional(),
    arena: z.number().optional(),
    description: z.string().optional(),
    id: z.number().optional(),
  })
  .readonly();
export type ConstantCard = z.infer<typeof ConstantCardSchema>;

export const ConstantCardsSchema = z.array(ConstantCardSchema).readonly();

/** All static game configuration in one document. */
export const ConstantsSchema = z
  .object({
    alliance: AllianceSchema.optional(),
    arenas: ArenasSchema.optional(),
    badges: BadgesSchema.optional(),
    chestCycle: ChestCycleListSchema.optional(),
    countryCodes: CountryCodesSchema.optional(),
    rarities: RaritiesSchema.optional(),
    cards: ConstantCardsSchema.optional(),
  })
  .readonly();
export type Constants = z.infer<typeof ConstantsSchema>;
