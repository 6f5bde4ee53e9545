import { InvalidArgumentError } from '../error/invalidArgumentError.js';
import { TagListRequest, type TagListRequestInit, TagListRequestBuilder } from './base.js';

/**
 * Request for several clans in one call, with optional field filters.
 */
export class ClansRequest extends TagListRequest {
  constructor(init: TagListRequestInit) {
    super('ClansRequest', init);
  }

  static builder(): TagListRequestBuilder<ClansRequest> {
    return new TagListRequestBuilder((init) => new ClansRequest(init));
  }

  /**
   * Normalizes a tag list into a request; a request is returned as is.
   *
   * @throws InvalidArgumentError when the input is missing, or the list or one of its tags is empty.
   * @throws TypeError when the list holds a non-string.
   */
  static from(input: readonly string[] | ClansRequest | null | undefined): ClansRequest {
    if (input instanceof ClansRequest) {
      return input;
    }

    if (input === null || input === undefined) {
      throw new InvalidArgumentError(`clans request must not be ${input}`, 'tags');
    }

    return ClansRequest.builder().tags(input).build();
  }
}
