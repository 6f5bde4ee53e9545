import { readFileSync } from 'node:fs';
import { describe, expect, test } from 'vitest';
import { BattlesSchema } from './battle.js';
import { ClanHistorySchema, DetailedClanSchema } from './clan.js';
import { ConstantsSchema } from './constants.js';
import { EndpointsSchema, VersionSchema } from './meta.js';
import { ProfileSchema } from './profile.js';
import { PopularPlayerSchema, TopClanSchema } from './ranking.js';
import { TournamentSchema } from './tournament.js';

function fixture(name: string): unknown {
  return JSON.parse(readFileSync(new URL(`./fixtures/${name}.json`, import.meta.url), 'utf8'));
}

describe('models', () => {
  describe('ProfileSchema', () => {
    test('parses a profile and strips unknown fields', () => {
      const profile = ProfileSchema.parse(fixture('profile'));

      expect(profile.tag).toBe('2PPQ');
      expect(profile.rank).toBeNull();
      expect(profile.clan?.badge?.id).toBe(16000001);
      expect(profile.stats?.favoriteCard?.name).toBe('Test Knight');
      expect(profile.currentDeck).toHaveLength(2);
      expect('seasonStats' in profile).toBe(false);
    });

    test('freezes parsed profiles', () => {
      const profile = ProfileSchema.parse(fixture('profile'));

      expect(Object.isFrozen(profile)).toBe(true);
      expect(Object.isFrozen(profile.clan)).toBe(true);
    });

    test('rejects a profile without a tag', () => {
      const result = ProfileSchema.safeParse({ name: 'Test Player' });

      expect(result.success).toBe(false);
      expect(result.error?.issues[0]?.path).toStrictEqual(['tag']);
    });

    test('parsed profiles compare by value', () => {
      expect(ProfileSchema.parse(fixture('profile'))).toStrictEqual(ProfileSchema.parse(fixture('profile')));
    });
  });

  describe('DetailedClanSchema', () => {
    test('parses a clan with its members', () => {
      const clan = DetailedClanSchema.parse(fixture('clan'));

      expect(clan.location?.code).toBe('EU');
      expect(clan.members?.map((member) => member.tag)).toStrictEqual(['2PPQ', '8QLL']);
      expect(clan.members?.[1]?.donationsDelta).toBeNull();
      expect(clan.tracking?.snapshotCount).toBe(3);
    });
  });

  test('TopClanSchema keeps the rank next to the clan summary', () => {
    const clan = TopClanSchema.parse({ tag: '9V2Y', name: 'Test Clan', rank: 4, previousRank: 7, members: [] });

    expect(clan).toStrictEqual({ tag: '9V2Y', name: 'Test Clan', rank: 4, previousRank: 7 });
  });

  test('PopularPlayerSchema adds popularity to a profile', () => {
    const player = PopularPlayerSchema.parse({ tag: '2PPQ', name: 'Test Player', popularity: { hits: 10, hitsPerDayAvg: 2.5 } });

    expect(player.popularity).toStrictEqual({ hits: 10, hitsPerDayAvg: 2.5 });
  });

  test('ConstantsSchema parses every section', () => {
    const constants = ConstantsSchema.parse(fixture('constants'));

    expect(constants.alliance?.roles?.map((role) => role.name)).toStrictEqual(['Member', 'Leader']);
    expect(constants.arenas?.[0]?.subtitle).toBe('Test Stadium');
    expect(constants.chestCycle?.order).toHaveLength(5);
    expect(constants.countryCodes?.[0]?.id).toBe(57000001);
    expect(constants.rarities?.[0]?.upgradeCost).toStrictEqual([5, 20, 50]);
    expect(constants.cards?.[0]?.key).toBe('test-knight');
  });

  test('BattlesSchema parses both sides of a battle', () => {
    const [battle] = BattlesSchema.parse(fixture('battles'));

    expect(battle?.challengeType).toBeNull();
    expect(battle?.mode?.players).toBe('1v1');
    expect(battle?.team?.[0]?.deck?.[0]?.level).toBe(12);
    expect(battle?.opponent?.[0]?.clan).toBeNull();
  });

  test('TournamentSchema parses participants', () => {
    const tournament = TournamentSchema.parse(fixture('tournament'));

    expect(tournament.endTime).toBeNull();
    expect(tournament.members?.[0]?.clan?.name).toBe('Test Clan');
    expect(tournament.members?.[1]?.clan).toBeUndefined();
  });

  test('ClanHistorySchema is keyed by snapshot date', () => {
    const history = ClanHistorySchema.parse({
      '2024-01-01': { donations: 100, memberCount: 2 },
      '2024-01-02': { donations: 250, memberCount: 3, members: [{ tag: '2PPQ', trophies: 4210 }] },
    });

    expect(Object.keys(history)).toStrictEqual(['2024-01-01', '2024-01-02']);
    expect(history['2024-01-02']?.members?.[0]?.tag).toBe('2PPQ');
  });

  test('VersionSchema and EndpointsSchema', () => {
    expect(VersionSchema.parse('6.1.0')).toBe('6.1.0');
    expect(EndpointsSchema.parse(['/version', '/player/:tag'])).toStrictEqual(['/version', '/player/:tag']);
    expect(VersionSchema.safeParse(6).success).toBe(false);
  });
});
