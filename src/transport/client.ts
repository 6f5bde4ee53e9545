import type { Transport, TransportOperation, TransportOptions } from '../core/types.js';
import { AbortError, isAbortError } from '../error/abortError.js';
import { HTTPError } from '../error/httpError.js';
import { TimeoutError } from '../error/timeoutError.js';
import { unwrapErrorType } from '../error/unwrapErrorType.js';
import { FetchClient } from '../fetch/client.js';
import { mergeHeaderOptions } from '../fetch/utils.js';
import type { ClanSearch, DetailedClanFields, ProfileFields } from '../models/index.js';
import type { ClanRequest, ClansRequest, ProfileRequest, ProfilesRequest } from '../request/index.js';
import { normalizeTag } from '../request/tag.js';
import type { ErrorStatusCode, FetchClientProviderDefinition, RequestOptions } from '../types/request.js';
import { constructUrl, type PathParams, type SearchParams } from '../utils/constructUrl.js';
import { getResponseData } from '../utils/getResponseData.js';
import { type Logger, silentLogger } from '../utils/logger.js';
import { retry } from '../utils/retry.js';
import { createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import { validator } from '../utils/validator.js';
import { type SafeWrapAsync, settleAsync } from '../utils/wrap.js';
import { type EndpointDefinition, endpoints } from './endpoints.js';

/**
 * Default {@link Transport}: GET requests through a pluggable fetch provider, with
 * - the developer key in the `auth` header,
 * - retries on transient status codes and per-attempt timeouts,
 * - response validation against the model schemas.
 *
 * Every method resolves to an error-first tuple; nothing is thrown.
 */
export class HttpTransport implements Transport {
  /** Underlying fetch-capable HTTP provider instance. */
  #fetchClient: FetchClientProviderDefinition;
  /** Default request-level options (timeout, retry). */
  #requestOpts: Pick<RequestOptions, 'timeout' | 'retry'>;
  /** Default HTTP status codes to retry on when unspecified. */
  #defaultRetryCodes: ErrorStatusCode[] = [408, 429, 500, 501, 502, 503, 504];
  /** Default request timeout in milliseconds. */
  #defaultTimeout = 60_000;
  /** Validation flag controlling response validation. */
  #validation: boolean;
  #logger: Logger;
  /** Global abort-controller for disposing */
  #abortController: AbortController;

  constructor({
    baseUrl,
    developerKey,
    fetchProvider = FetchClient,
    fetchOpts,
    validation = true,
    logger = silentLogger,
  }: TransportOptions) {
    const { timeout, retry, headers } = { ...fetchOpts };

    this.#requestOpts = { timeout, retry };
    this.#validation = validation;
    this.#logger = logger;
    this.#abortController = new AbortController();
    this.#fetchClient = new fetchProvider(baseUrl, {
      headers: mergeHeaderOptions(
        { Accept: 'application/json' },
        headers,
        developerKey === undefined ? undefined : { auth: developerKey },
      ),
    });
  }

  /**
   * Aborts in-flight requests with an {@link AbortError} and disposes the fetch provider.
   * Requests made afterwards fail immediately.
   */
  dispose() {
    this.#abortController.abort(new AbortError('error transport was disposed'));
    this.#fetchClient.dispose?.();
  }

  getVersion() {
    return this.#get('getVersion', endpoints.version);
  }

  getProfile(request: ProfileRequest) {
    return this.#get<ProfileFields>(
      'getProfile',
      endpoints.profile,
      { tag: normalizeTag(request.tag) },
      request.toSearch(),
      request.isNarrowed(),
    );
  }

  getProfiles(request: ProfilesRequest) {
    return this.#get<readonly ProfileFields[]>(
      'getProfiles',
      endpoints.profiles,
      { tags: request.tags.map(normalizeTag) },
      request.toSearch(),
      request.isNarrowed(),
    );
  }

  getClan(request: ClanRequest) {
    return this.#get<DetailedClanFields>(
      'getClan',
      endpoints.clan,
      { tag: normalizeTag(request.tag) },
      request.toSearch(),
      request.isNarrowed(),
    );
  }

  getClans(request: ClansRequest) {
    return this.#get<readonly DetailedClanFields[]>(
      'getClans',
      endpoints.clans,
      { tags: request.tags.map(normalizeTag) },
      request.toSearch(),
      request.isNarrowed(),
    );
  }

  getClanSearch(filter: ClanSearch | null) {
    return this.#get('getClanSearch', endpoints.clanSearch, {}, { ...filter });
  }

  getTopClans(location: string | null) {
    if (!location) {
      return this.#get('getTopClans', endpoints.topClans);
    }

    return this.#get('getTopClans', endpoints.topClansByLocation, { location });
  }

  getTopPlayers(location: string | null) {
    if (!location) {
      return this.#get('getTopPlayers', endpoints.topPlayers);
    }

    return this.#get('getTopPlayers', endpoints.topPlayersByLocation, { location });
  }

  getTournaments(tag: string) {
    return this.#get('getTournaments', endpoints.tournament, { tag: normalizeTag(tag) });
  }

  getConstants() {
    return this.#get('getConstants', endpoints.constants);
  }

  getAllianceConstants() {
    return this.#get('getAllianceConstants', endpoints.allianceConstants);
  }

  getArenasConstants() {
    return this.#get('getArenasConstants', endpoints.arenasConstants);
  }

  getBadgesConstants() {
    return this.#get('getBadgesConstants', endpoints.badgesConstants);
  }

  getChestCycleConstants() {
    return this.#get('getChestCycleConstants', endpoints.chestCycleConstants);
  }

  getCountryCodesConstants() {
    return this.#get('getCountryCodesConstants', endpoints.countryCodesConstants);
  }

  getRaritiesConstants() {
    return this.#get('getRaritiesConstants', endpoints.raritiesConstants);
  }

  getCardsConstants() {
    return this.#get('getCardsConstants', endpoints.cardsConstants);
  }

  getEndpoints() {
    return this.#get('getEndpoints', endpoints.endpoints);
  }

  getPopularClans() {
    return this.#get('getPopularClans', endpoints.popularClans);
  }

  getPopularPlayers() {
    return this.#get('getPopularPlayers', endpoints.popularPlayers);
  }

  getPopularTournaments() {
    return this.#get('getPopularTournaments', endpoints.popularTournaments);
  }

  getClanBattles(tag: string) {
    return this.#get('getClanBattles', endpoints.clanBattles, { tag: normalizeTag(tag) });
  }

  getClanHistory(tag: string) {
    return this.#get('getClanHistory', endpoints.clanHistory, { tag: normalizeTag(tag) });
  }

  /**
   * Builds the URL of an endpoint, performs the request and validates the decoded body
   * against the endpoint schema when validation is enabled. A `narrowed` request is checked
   * against the endpoint's `narrowedResponse` schema, where one exists.
   */
  async #get<Output>(
    operation: TransportOperation,
    definition: EndpointDefinition<Output>,
    path?: PathParams,
    search?: SearchParams,
    narrowed = false,
  ): SafeWrapAsync<Error, Output> {
    const [errUrl, url] = constructUrl(definition.path, path, search);
    if (errUrl) {
      return [new Error(`error constructing URL in ${operation}`, { cause: errUrl }), null];
    }

    const [errReq, result] = await this.#request<Output>(operation, url);
    if (errReq) {
      return [new Error(`error doing request in ${operation}`, { cause: errReq }), null];
    }

    if (!this.#validation) {
      return [null, result];
    }

    const schema = narrowed && definition.narrowedResponse ? definition.narrowedResponse : definition.response;
    const [errParse, parsed] = await validator(result, schema);
    if (errParse) {
      return [new Error(`error parsing response in ${operation}`, { cause: errParse }), null];
    }

    return [null, parsed];
  }

  /**
   * Internal request executor that applies retry/timeout handling and response parsing.
   *
   * - Normalizes retry options and merges the timeout and dispose signals per attempt.
   * - Calls the underlying HTTP provider, folding a throw into the error slot.
   * - Turns a non-2xx response into an {@link HTTPError} and decodes the body otherwise.
   */
  #request<Output>(operation: TransportOperation, url: string): SafeWrapAsync<Error, Output> {
    const retryOptions = this.#requestOpts.retry ?? { limit: 2 };
    const simpleRetry = typeof retryOptions === 'number';
    const timeout = this.#requestOpts.timeout ?? this.#defaultTimeout;

    let retryAttempts = 2;
    let retryTimeout = 1000;
    let retryIgnoreStatusCodes: ErrorStatusCode[] | null = null;
    let retryStatusCodes: ErrorStatusCode[] = this.#defaultRetryCodes;

    if (simpleRetry) {
      retryAttempts = retryOptions;
    }

    if (!simpleRetry) {
      if (retryOptions.timeout !== undefined) {
        retryTimeout = retryOptions.timeout;
      }

      if (typeof retryOptions.limit === 'number') {
        retryAttempts = retryOptions.limit;
      }

      if (retryOptions.ignoreStatusCodes) {
        retryIgnoreStatusCodes = retryOptions.ignoreStatusCodes;
      }

      if (retryOptions.statusCodes) {
        retryStatusCodes = retryOptions.statusCodes;
      }
    }

    const isRetryableStatus = (status: number) => {
      if (retryIgnoreStatusCodes) {
        return !retryIgnoreStatusCodes.some((code) => code === status);
      }

      return retryStatusCodes.some((code) => code === status);
    };

    return retry<Output>({
      attempts: retryAttempts,
      timeout: retryTimeout,
      errFn: (err) => {
        if (isAbortError(err)) {
          return true;
        }

        if (unwrapErrorType(TimeoutError, err)) {
          return false;
        }

        const httpError = unwrapErrorType(HTTPError, err);
        if (httpError) {
          return !isRetryableStatus(httpError.status);
        }

        // fetch rejects with a TypeError on network failures
        return !unwrapErrorType(TypeError, err);
      },
      onRetry: (err, attempt) => {
        this.#logger.debug(`retrying ${operation}`, { url, attempt, error: err.message });
      },
      fn: async () => {
        const timeoutSignal = createTimeoutSignal(timeout);
        const merged = mergeSignals([timeoutSignal?.signal, this.#abortController.signal]);

        try {
          const [err, response] = await settleAsync(() =>
            this.#fetchClient.get(url, { ...(merged && { signal: merged.signal }) }),
          );
          if (err) {
            return [new Error(`error request GET in ${operation}`, { cause: err }), null];
          }

          if (!response.ok) {
            return [new HTTPError(response), null];
          }

          const [errResponse, result] = await getResponseData<Output>(response);
          if (errResponse) {
            return [new Error(`error getting response in ${operation}`, { cause: errResponse }), null];
          }

          return [null, result];
        } finally {
          timeoutSignal?.release();
          merged?.release();
        }
      },
    });
  }
}
