import type { StandardSchemaV1 } from '@standard-schema/spec';
import {
  AllianceSchema,
  ArenasSchema,
  BadgesSchema,
  BattlesSchema,
  ChestCycleListSchema,
  ClanHistorySchema,
  ClansSchema,
  ConstantCardsSchema,
  ConstantsSchema,
  CountryCodesSchema,
  DetailedClanFieldsListSchema,
  DetailedClanFieldsSchema,
  DetailedClanSchema,
  DetailedClansSchema,
  EndpointsSchema,
  PopularClansSchema,
  PopularPlayersSchema,
  PopularTournamentsSchema,
  ProfileFieldsListSchema,
  ProfileFieldsSchema,
  ProfileSchema,
  ProfilesSchema,
  RaritiesSchema,
  TopClansSchema,
  TopPlayersSchema,
  TournamentSchema,
  VersionSchema,
} from '../models/index.js';

/** A path template relative to the base URL and the schema its response is checked against. */
export interface EndpointDefinition<Output = unknown> {
  path: string;
  response: StandardSchemaV1<unknown, Output>;
  /** Schema for a response narrowed by `keys` / `excludes`, where fields may be missing. */
  narrowedResponse?: StandardSchemaV1<unknown, Output>;
}

/** Every endpoint the transport calls. `{param}` segments are filled by `constructUrl`. */
export const endpoints = {
  version: { path: 'version', response: VersionSchema },
  profile: { path: 'player/{tag}', response: ProfileSchema, narrowedResponse: ProfileFieldsSchema },
  profiles: { path: 'player/{tags}', response: ProfilesSchema, narrowedResponse: ProfileFieldsListSchema },
  clan: { path: 'clan/{tag}', response: DetailedClanSchema, narrowedResponse: DetailedClanFieldsSchema },
  clans: { path: 'clan/{tags}', response: DetailedClansSchema, narrowedResponse: DetailedClanFieldsListSchema },
  clanSearch: { path: 'clan/search', response: ClansSchema },
  clanBattles: { path: 'clan/{tag}/battles', response: BattlesSchema },
  clanHistory: { path: 'clan/{tag}/history', response: ClanHistorySchema },
  topClans: { path: 'top/clans', response: TopClansSchema },
  topClansByLocation: { path: 'top/clans/{location}', response: TopClansSchema },
  topPlayers: { path: 'top/players', response: TopPlayersSchema },
  topPlayersByLocation: { path: 'top/players/{location}', response: TopPlayersSchema },
  tournament: { path: 'tournaments/{tag}', response: TournamentSchema },
  constants: { path: 'constants', response: ConstantsSchema },
  allianceConstants: { path: 'constants/alliance', response: AllianceSchema },
  arenasConstants: { path: 'constants/arenas', response: ArenasSchema },
  badgesConstants: { path: 'constants/badges', response: BadgesSchema },
  chestCycleConstants: { path: 'constants/chestCycle', response: ChestCycleListSchema },
  countryCodesConstants: { path: 'constants/countryCodes', response: CountryCodesSchema },
  raritiesConstants: { path: 'constants/rarities', response: RaritiesSchema },
  cardsConstants: { path: 'constants/cards', response: ConstantCardsSchema },
  endpoints: { path: 'endpoints', response: EndpointsSchema },
  popularClans: { path: 'popular/clans', response: PopularClansSchema },
  popularPlayers: { path: 'popular/players', response: PopularPlayersSchema },
  popularTournaments: { path: 'popular/tournaments', response: PopularTournamentsSchema },
} as const satisfies Record<string, EndpointDefinition>;
