import type {
  Alliance,
  ArenaConstant,
  Badge,
  Battle,
  Clan,
  ClanHistory,
  ClanSearch,
  ChestCycleList,
  ConstantCard,
  Constants,
  CountryCode,
  DetailedClanFields,
  Endpoints,
  PopularClan,
  PopularPlayer,
  PopularTournament,
  ProfileFields,
  Rarity,
  TopClan,
  TopPlayer,
  Tournament,
} from '../models/index.js';
import type { ClanRequest, ClansRequest, ProfileRequest, ProfilesRequest } from '../request/index.js';
import type { FetchClientProvider, RequestOptions } from '../types/request.js';
import type { Logger } from '../utils/logger.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Result of a transport call, error-first. */
export type TransportResult<T> = SafeWrapAsync<Error, T>;

/**
 * Performs the HTTP calls behind {@link RoyaleClient}. Implementations report failures by
 * resolving `[error, null]`; the status code of a failure is read from an `HTTPError` in its
 * cause chain, or from a message ending in `: <code>`.
 */
export interface Transport {
  getVersion(): TransportResult<string>;
  /**
   * A request without `keys` / `excludes` must resolve to a complete `Profile`; a narrowed
   * one may leave fields out.
   */
  getProfile(request: ProfileRequest): TransportResult<ProfileFields>;
  getProfiles(request: ProfilesRequest): TransportResult<readonly ProfileFields[]>;
  /** Complete `DetailedClan` unless the request is narrowed, as for profiles. */
  getClan(request: ClanRequest): TransportResult<DetailedClanFields>;
  getClans(request: ClansRequest): TransportResult<readonly DetailedClanFields[]>;
  /** `null` searches without a filter. */
  getClanSearch(filter: ClanSearch | null): TransportResult<readonly Clan[]>;
  /** `null` gives the world ranking. */
  getTopClans(location: string | null): TransportResult<readonly TopClan[]>;
  /** `null` gives the world ranking. */
  getTopPlayers(location: string | null): TransportResult<readonly TopPlayer[]>;
  getTournaments(tag: string): TransportResult<Tournament>;
  getConstants(): TransportResult<Constants>;
  getAllianceConstants(): TransportResult<Alliance>;
  getArenasConstants(): TransportResult<readonly ArenaConstant[]>;
  getBadgesConstants(): TransportResult<readonly Badge[]>;
  getChestCycleConstants(): TransportResult<ChestCycleList>;
  getCountryCodesConstants(): TransportResult<readonly CountryCode[]>;
  getRaritiesConstants(): TransportResult<readonly Rarity[]>;
  getCardsConstants(): TransportResult<readonly ConstantCard[]>;
  getEndpoints(): TransportResult<Endpoints>;
  getPopularClans(): TransportResult<readonly PopularClan[]>;
  getPopularPlayers(): TransportResult<readonly PopularPlayer[]>;
  getPopularTournaments(): TransportResult<readonly PopularTournament[]>;
  getClanBattles(tag: string): TransportResult<readonly Battle[]>;
  getClanHistory(tag: string): TransportResult<ClanHistory>;
  /** Aborts in-flight calls and frees held resources. */
  dispose?(): void;
}

/** Name of a {@link Transport} call, used to label logs and errors. */
export type TransportOperation = Exclude<keyof Transport, 'dispose'>;

/** Options a {@link TransportProvider} is constructed with, resolved by the client. */
export interface TransportOptions {
  /** Base URL of the API, e.g. `https://api.example.com/`. */
  baseUrl: string;
  /** Developer key sent in the `auth` header. */
  developerKey?: string;
  /** HTTP provider used for the GET calls. */
  fetchProvider?: FetchClientProvider;
  /** Default headers, timeout and retry. */
  fetchOpts?: RequestOptions;
  /** Whether responses are validated against the model schemas. */
  validation: boolean;
  logger: Logger;
}

/** Factory signature for constructing transports. */
export interface TransportProvider {
  new (options: TransportOptions): Transport;
}

/** Configuration for constructing a {@link RoyaleClient}. */
export interface RoyaleClientProps {
  /** Base URL of the API (e.g. `https://api.example.com/`). */
  baseUrl: string;
  /** Developer key; when given it must be a non-empty string. */
  developerKey?: string;
  /** Transport implementation. Defaults to {@link HttpTransport}. */
  transportProvider?: TransportProvider;
  /** HTTP client implementation used by the default transport. Defaults to {@link FetchClient}. */
  fetchProvider?: FetchClientProvider;
  /** Default headers, timeout and retry of the default transport. */
  fetchOpts?: RequestOptions;
  /**
   * Global validation flag.
   *
   * When `true`, responses are validated with the model schemas and unknown fields are stripped.
   * @default true
   */
  validation?: boolean;
  /** Logger receiving call and failure logs. Wins over `debug`. */
  logger?: Logger;
  /**
   * Log to the console when no `logger` is given.
   * @default false
   */
  debug?: boolean;
}
