import { TagRequest, type TagRequestInit, TagRequestBuilder } from './base.js';

/**
 * Request for one player profile, with optional field filters.
 * @example
 * const request = ProfileRequest.builder().tag('2PPQ').excludes(['cards']).build();
 */
export class ProfileRequest extends TagRequest {
  constructor(init: TagRequestInit) {
    super('ProfileRequest', init);
  }

  static builder(): TagRequestBuilder<ProfileRequest> {
    return new TagRequestBuilder((init) => new ProfileRequest(init));
  }

  /**
   * Normalizes the tag shorthand into a request; a request is returned as is.
   *
   * @throws TypeError when the input is missing.
   * @throws InvalidArgumentError when the tag is empty.
   */
  static from(input: string | ProfileRequest | null | undefined): ProfileRequest {
    if (input instanceof ProfileRequest) {
      return input;
    }

    if (input === null || input === undefined) {
      throw new TypeError(`profile request must not be ${input}`);
    }

    return ProfileRequest.builder().tag(input).build();
  }
}
