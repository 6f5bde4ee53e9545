import { TagRequest, type TagRequestInit, TagRequestBuilder } from './base.js';

/** Request for one clan with its members, with optional field filters. */
export class ClanRequest extends TagRequest {
  constructor(init: TagRequestInit) {
    super('ClanRequest', init);
  }

  static builder(): TagRequestBuilder<ClanRequest> {
    return new TagRequestBuilder((init) => new ClanRequest(init));
  }

  /**
   * Normalizes the tag shorthand into a request; a request is returned as is.
   *
   * @throws TypeError when the input is missing.
   * @throws InvalidArgumentError when the tag is empty.
   */
  static from(input: string | ClanRequest | null | undefined): ClanRequest {
    if (input instanceof ClanRequest) {
      return input;
    }

    if (input === null || input === undefined) {
      throw new TypeError(`clan request must not be ${input}`);
    }

    return ClanRequest.builder().tag(input).build();
  }
}
