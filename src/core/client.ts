import { ApiError } from '../error/apiError.js';
import { translateTransportError } from '../error/translateError.js';
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
  DetailedClan,
  DetailedClanFields,
  Endpoints,
  PopularClan,
  PopularPlayer,
  PopularTournament,
  Profile,
  ProfileFields,
  Rarity,
  TopClan,
  TopPlayer,
  Tournament,
} from '../models/index.js';
import { ClanRequest } from '../request/clanRequest.js';
import { ClansRequest } from '../request/clansRequest.js';
import { ProfileRequest } from '../request/profileRequest.js';
import { ProfilesRequest } from '../request/profilesRequest.js';
import { requireTag } from '../request/tag.js';
import { HttpTransport } from '../transport/client.js';
import { requireNonEmptyString } from '../utils/assert.js';
import { type Logger, resolveLogger } from '../utils/logger.js';
import { settleAsync } from '../utils/wrap.js';
import type { RoyaleClientProps, Transport, TransportOperation, TransportResult } from './types.js';

/**
 * Client for the game statistics API, one method per endpoint.
 *
 * Arguments are checked before anything is sent: a missing argument throws a `TypeError`,
 * an empty one an {@link InvalidArgumentError}. Transport failures reject with an
 * {@link ApiError} carrying the status code, or an {@link UnknownTransportError} when the
 * failure has none.
 *
 * @example
 * const client = new RoyaleClient({ baseUrl: 'https://api.example.com/', developerKey: key });
 * const profile = await client.getProfile('#2PPQ');
 */
export class RoyaleClient {
  #transport: Transport;
  #logger: Logger;

  /**
   * @throws TypeError when `baseUrl` is missing, or `developerKey` is given but not a string.
   * @throws InvalidArgumentError when `baseUrl` or a given `developerKey` is empty.
   */
  constructor({
    baseUrl,
    developerKey,
    transportProvider = HttpTransport,
    fetchProvider,
    fetchOpts,
    validation = true,
    logger,
    debug,
  }: RoyaleClientProps) {
    requireNonEmptyString(baseUrl, 'baseUrl');
    if (developerKey !== undefined) {
      requireNonEmptyString(developerKey, 'developerKey');
    }

    this.#logger = resolveLogger({ logger, debug });
    this.#transport = new transportProvider({
      baseUrl,
      developerKey,
      fetchProvider,
      fetchOpts,
      validation,
      logger: this.#logger,
    });
  }

  /** Disposes the transport, aborting in-flight requests. */
  dispose() {
    this.#transport.dispose?.();
  }

  getVersion(): Promise<string> {
    return this.#call('getVersion', (transport) => transport.getVersion());
  }

  /**
   * Gets a player profile by tag, or by a {@link ProfileRequest}. A request with `keys` or
   * `excludes` resolves to the fields the API sent, so the request form is typed as
   * {@link ProfileFields}.
   */
  getProfile(tag: string): Promise<Profile>;
  getProfile(input: string | ProfileRequest): Promise<ProfileFields>;
  getProfile(input: string | ProfileRequest): Promise<ProfileFields> {
    const request = ProfileRequest.from(input);
    return this.#call('getProfile', (transport) => transport.getProfile(request));
  }

  /** Gets several player profiles in one call. */
  getProfiles(tags: readonly string[]): Promise<readonly Profile[]>;
  getProfiles(input: readonly string[] | ProfilesRequest): Promise<readonly ProfileFields[]>;
  getProfiles(input: readonly string[] | ProfilesRequest): Promise<readonly ProfileFields[]> {
    const request = ProfilesRequest.from(input);
    return this.#call('getProfiles', (transport) => transport.getProfiles(request));
  }

  /** Gets a clan with its members; a narrowed {@link ClanRequest} gives {@link DetailedClanFields}. */
  getClan(tag: string): Promise<DetailedClan>;
  getClan(input: string | ClanRequest): Promise<DetailedClanFields>;
  getClan(input: string | ClanRequest): Promise<DetailedClanFields> {
    const request = ClanRequest.from(input);
    return this.#call('getClan', (transport) => transport.getClan(request));
  }

  getClans(tags: readonly string[]): Promise<readonly DetailedClan[]>;
  getClans(input: readonly string[] | ClansRequest): Promise<readonly DetailedClanFields[]>;
  getClans(input: readonly string[] | ClansRequest): Promise<readonly DetailedClanFields[]> {
    const request = ClansRequest.from(input);
    return this.#call('getClans', (transport) => transport.getClans(request));
  }

  /** Searches clans; without a filter the API picks the result. */
  getClanSearch(filter?: ClanSearch | null): Promise<readonly Clan[]> {
    return this.#call('getClanSearch', (transport) => transport.getClanSearch(filter ?? null));
  }

  /** Top clans of a location, or of the world when no location is given. */
  getTopClans(location?: string | null): Promise<readonly TopClan[]> {
    return this.#call('getTopClans', (transport) => transport.getTopClans(location ?? null));
  }

  /** Top players of a location, or of the world when no location is given. */
  getTopPlayers(location?: string | null): Promise<readonly TopPlayer[]> {
    return this.#call('getTopPlayers', (transport) => transport.getTopPlayers(location ?? null));
  }

  getTournaments(tag: string): Promise<Tournament> {
    requireTag(tag, 'tag');
    return this.#call('getTournaments', (transport) => transport.getTournaments(tag));
  }

  getConstants(): Promise<Constants> {
    return this.#call('getConstants', (transport) => transport.getConstants());
  }

  getAllianceConstants(): Promise<Alliance> {
    return this.#call('getAllianceConstants', (transport) => transport.getAllianceConstants());
  }

  getArenasConstants(): Promise<readonly ArenaConstant[]> {
    return this.#call('getArenasConstants', (transport) => transport.getArenasConstants());
  }

  getBadgesConstants(): Promise<readonly Badge[]> {
    return this.#call('getBadgesConstants', (transport) => transport.getBadgesConstants());
  }

  getChestCycleConstants(): Promise<ChestCycleList> {
    return this.#call('getChestCycleConstants', (transport) => transport.getChestCycleConstants());
  }

  getCountryCodesConstants(): Promise<readonly CountryCode[]> {
    return this.#call('getCountryCodesConstants', (transport) => transport.getCountryCodesConstants());
  }

  getRaritiesConstants(): Promise<readonly Rarity[]> {
    return this.#call('getRaritiesConstants', (transport) => transport.getRaritiesConstants());
  }

  getCardsConstants(): Promise<readonly ConstantCard[]> {
    return this.#call('getCardsConstants', (transport) => transport.getCardsConstants());
  }

  /** Lists the paths the API serves. */
  getEndpoints(): Promise<Endpoints> {
    return this.#call('getEndpoints', (transport) => transport.getEndpoints());
  }

  getPopularClans(): Promise<readonly PopularClan[]> {
    return this.#call('getPopularClans', (transport) => transport.getPopularClans());
  }

  getPopularPlayers(): Promise<readonly PopularPlayer[]> {
    return this.#call('getPopularPlayers', (transport) => transport.getPopularPlayers());
  }

  getPopularTournaments(): Promise<readonly PopularTournament[]> {
    return this.#call('getPopularTournaments', (transport) => transport.getPopularTournaments());
  }

  /** Recent battles fought by the members of a clan. */
  getClanBattles(tag: string): Promise<readonly Battle[]> {
    requireTag(tag, 'tag');
    return this.#call('getClanBattles', (transport) => transport.getClanBattles(tag));
  }

  /** Tracked snapshots of a clan, keyed by date. */
  getClanHistory(tag: string): Promise<ClanHistory> {
    requireTag(tag, 'tag');
    return this.#call('getClanHistory', (transport) => transport.getClanHistory(tag));
  }

  /**
   * Runs one transport call; a failed or throwing call rejects with the translated error.
   */
  async #call<T>(operation: TransportOperation, fn: (transport: Transport) => TransportResult<T>): Promise<T> {
    this.#logger.debug(`calling ${operation}`);

    const [err, data] = await settleAsync(() => fn(this.#transport));
    if (err) {
      const translated = translateTransportError(err, operation);
      this.#logger.warn(`${operation} failed`, {
        code: translated instanceof ApiError ? translated.code : null,
        error: err.message,
      });
      throw translated;
    }

    return data;
  }
}
