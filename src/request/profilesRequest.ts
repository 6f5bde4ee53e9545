import { InvalidArgumentError } from '../error/invalidArgumentError.js';
import { TagListRequest, type TagListRequestInit, TagListRequestBuilder } from './base.js';

/**
 * Request for several player profiles in one call, with optional field filters.
 */
export class ProfilesRequest extends TagListRequest {
  constructor(init: TagListRequestInit) {
    super('ProfilesRequest', init);
  }

  static builder(): TagListRequestBuilder<ProfilesRequest> {
    return new TagListRequestBuilder((init) => new ProfilesRequest(init));
  }

  /**
   * Normalizes a tag list into a request; a request is returned as is.
   *
   * @throws InvalidArgumentError when the input is missing, or the list or one of its tags is empty.
   * @throws TypeError when the list holds a non-string.
   */
  static from(input: readonly string[] | ProfilesRequest | null | undefined): ProfilesRequest {
    if (input instanceof ProfilesRequest) {
      return input;
    }

    if (input === null || input === undefined) {
      throw new InvalidArgumentError(`profiles request must not be ${input}`, 'tags');
    }

    return ProfilesRequest.builder().tags(input).build();
  }
}
