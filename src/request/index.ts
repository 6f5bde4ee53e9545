export { TagListRequest, type TagListRequestInit, TagListRequestBuilder, TagRequest, type TagRequestInit, TagRequestBuilder } from './base.js';
export { ClanRequest } from './clanRequest.js';
export { ClansRequest } from './clansRequest.js';
export { ProfileRequest } from './profileRequest.js';
export { ProfilesRequest } from './profilesRequest.js';
export { normalizeTag, requireTag } from './tag.js';
