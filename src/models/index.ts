/**
 * Models entrypoint: zod schemas for every document the API returns, and the record
 * types inferred from them.
 * @module
 */

export * from './battle.js';
export * from './clan.js';
export * from './common.js';
export * from './constants.js';
export * from './meta.js';
export * from './profile.js';
export * from './ranking.js';
export * from './tournament.js';
