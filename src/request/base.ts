import { optionalStringList, requireNonEmptyList } from '../utils/assert.js';
import type { SearchParams } from '../utils/constructUrl.js';
import { requireTag } from './tag.js';

/** Field filters shared by every request; they narrow the fields the API returns. */
export interface FilterInit {
  /** Only return these fields. */
  keys?: readonly string[] | null;
  /** Leave these fields out. */
  excludes?: readonly string[] | null;
}

/** Input of a request identified by one tag. */
export interface TagRequestInit extends FilterInit {
  tag?: string | null;
}

/** Input of a request identified by a list of tags. */
export interface TagListRequestInit extends FilterInit {
  tags?: readonly string[] | null;
}

const sameList = (a: readonly string[], b: readonly string[]) =>
  a.length === b.length && a.every((item, index) => item === b[index]);

const listString = (list: readonly string[]) => `[${list.join(', ')}]`;

/**
 * Base of the request objects: immutable `keys` / `excludes` filters and their query form.
 */
abstract class FilterRequest {
  readonly keys: readonly string[];
  readonly excludes: readonly string[];
  #kind: string;

  constructor(kind: string, init: FilterInit) {
    this.#kind = kind;
    this.keys = Object.freeze(optionalStringList(init.keys, 'keys'));
    this.excludes = Object.freeze(optionalStringList(init.excludes, 'excludes'));
  }

  /** Query parameters for the filters, empty filters left out. */
  toSearch(): SearchParams {
    return {
      keys: this.keys.length > 0 ? this.keys.join(',') : undefined,
      exclude: this.excludes.length > 0 ? this.excludes.join(',') : undefined,
    };
  }

  /** Whether `keys` or `excludes` narrow the fields of the response. */
  isNarrowed(): boolean {
    return this.keys.length > 0 || this.excludes.length > 0;
  }

  protected sameFilters(other: FilterRequest): boolean {
    return other.constructor === this.constructor && sameList(this.keys, other.keys) && sameList(this.excludes, other.excludes);
  }

  protected describe(identity: string): string {
    return `${this.#kind}{${identity}, keys=${listString(this.keys)}, excludes=${listString(this.excludes)}}`;
  }
}

/** Request for a single resource identified by its tag. */
export abstract class TagRequest extends FilterRequest {
  readonly tag: string;

  /**
   * @throws TypeError when `tag` is missing or not a string.
   * @throws InvalidArgumentError when `tag` is empty or only `#`.
   */
  constructor(kind: string, init: TagRequestInit) {
    super(kind, init);
    this.tag = requireTag(init.tag, 'tag');
    Object.freeze(this);
  }

  /** Value equality: same request type, tag and filters. */
  equals(other: unknown): boolean {
    return other instanceof TagRequest && this.sameFilters(other) && other.tag === this.tag;
  }

  override toString(): string {
    return this.describe(`tag=${this.tag}`);
  }
}

/** Request for several resources identified by their tags. */
export abstract class TagListRequest extends FilterRequest {
  readonly tags: readonly string[];

  /**
   * @throws TypeError when `tags` is missing or holds a non-string.
   * @throws InvalidArgumentError when `tags` or one of its tags is empty or only `#`.
   */
  constructor(kind: string, init: TagListRequestInit) {
    super(kind, init);
    const tags = requireNonEmptyList(init.tags, 'tags');
    this.tags = Object.freeze(tags.map((tag, index) => requireTag(tag, `tags[${index}]`)));
    Object.freeze(this);
  }

  /** Value equality: same request type, tags (in order) and filters. */
  equals(other: unknown): boolean {
    return other instanceof TagListRequest && this.sameFilters(other) && sameList(other.tags, this.tags);
  }

  override toString(): string {
    return this.describe(`tags=${listString(this.tags)}`);
  }
}

/** Builders hand their lists to the request constructor, which validates and copies them. */
abstract class FilterRequestBuilder {
  protected keyList: readonly string[] = [];
  protected excludeList: readonly string[] = [];

  /** Sets the fields to return. */
  keys(keys: readonly string[]): this {
    this.keyList = keys;
    return this;
  }

  /** Sets the fields to leave out. */
  excludes(excludes: readonly string[]): this {
    this.excludeList = excludes;
    return this;
  }
}

/** Fluent builder of a {@link TagRequest}. */
export class TagRequestBuilder<Request extends TagRequest> extends FilterRequestBuilder {
  #tag?: string;
  #create: (init: TagRequestInit) => Request;

  constructor(create: (init: TagRequestInit) => Request) {
    super();
    this.#create = create;
  }

  tag(tag: string): this {
    this.#tag = tag;
    return this;
  }

  build(): Request {
    return this.#create({ tag: this.#tag, keys: this.keyList, excludes: this.excludeList });
  }
}

/** Fluent builder of a {@link TagListRequest}. */
export class TagListRequestBuilder<Request extends TagListRequest> extends FilterRequestBuilder {
  #tags?: readonly string[];
  #create: (init: TagListRequestInit) => Request;

  constructor(create: (init: TagListRequestInit) => Request) {
    super();
    this.#create = create;
  }

  tags(tags: readonly string[]): this {
    this.#tags = tags;
    return this;
  }

  build(): Request {
    return this.#create({ tags: this.#tags, keys: this.keyList, excludes: this.excludeList });
  }
}
