import { readFileSync } from 'node:fs';
import { type ServerType, serve } from '@hono/node-server';
import { Hono } from 'hono';
import { type SafeWrapAsync, safeWrapAsync } from '../src/utils/wrap.js';

export type E2EServer = {
  url: string;
  close: () => Promise<Error | null>;
  reset: () => void;
  getCounts: () => Record<string, number>;
  /** Makes the next `times` requests to `/top/players` answer 503. */
  failTopPlayers: (times: number) => void;
};

export const E2E_DEVELOPER_KEY = 'test-secret';
export const E2E_VERSION = '1.2.0';
/** Tag the server answers with 404. */
export const E2E_MISSING_TAG = 'NOTFOUND';

function fixture(name: string): string {
  return readFileSync(new URL(`../src/models/fixtures/${name}.json`, import.meta.url), 'utf8');
}

/** Keeps the top-level fields named in a `keys` query, the way the API narrows a document. */
function pickKeys(text: string, keys: string[]): string {
  const parsed: unknown = JSON.parse(text);
  if (typeof parsed !== 'object' || parsed === null) {
    return text;
  }

  return JSON.stringify(Object.fromEntries(Object.entries(parsed).filter(([key]) => keys.includes(key))));
}

function jsonBody(text: string, status = 200): Response {
  return new Response(text, { status, headers: { 'content-type': 'application/json' } });
}

export async function startE2EServer(): SafeWrapAsync<Error, E2EServer> {
  const counts: Record<string, number> = {};
  let topPlayerFailures = 0;
  const fixtures = {
    profile: fixture('profile'),
    clan: fixture('clan'),
    constants: fixture('constants'),
    battles: fixture('battles'),
    tournament: fixture('tournament'),
  };
  const app = new Hono();

  function incremenet(key: string) {
    counts[key] = (counts[key] ?? 0) + 1;
    return counts[key];
  }

  app.use('*', async (c, next) => {
    incremenet(`${c.req.method} ${c.req.path}`);
    if (c.req.header('auth') !== E2E_DEVELOPER_KEY) {
      return c.json({ error: 'missing or wrong developer key' }, 401);
    }

    await next();
  });

  app.get('/version', (c) => c.text(E2E_VERSION));

  app.get('/endpoints', (c) => c.json(['/version', '/player/:tag', '/clan/:tag', '/constants']));

  app.get('/player/:tags', (c) => {
    const tags = c.req.param('tags').split(',');
    if (tags.includes(E2E_MISSING_TAG)) {
      return c.json({ error: 'player not found' }, 404);
    }

    if (tags.length === 1) {
      const keys = c.req.query('keys');
      return jsonBody(keys ? pickKeys(fixtures.profile, keys.split(',')) : fixtures.profile);
    }

    return jsonBody(`[${tags.map(() => fixtures.profile).join(',')}]`);
  });

  app.get('/clan/search', (c) => {
    if (c.req.query('name') !== 'Test') {
      return c.json([]);
    }

    return jsonBody(`[${fixtures.clan}]`);
  });

  app.get('/clan/:tag/battles', () => jsonBody(fixtures.battles));

  app.get('/clan/:tag/history', (c) => c.json({ '2024-01-01': { donations: 8400, memberCount: 2 } }));

  app.get('/clan/:tags', (c) => {
    const tags = c.req.param('tags').split(',');
    if (tags.length === 1) {
      return jsonBody(fixtures.clan);
    }

    return jsonBody(`[${tags.map(() => fixtures.clan).join(',')}]`);
  });

  app.get('/tournaments/:tag', () => jsonBody(fixtures.tournament));

  app.get('/top/clans', (c) => c.json([{ tag: '9V2Y', name: 'Test Clan', rank: 1, previousRank: 2 }]));

  app.get('/top/clans/:location', (c) =>
    c.json([{ tag: '9V2Y', name: `Top of ${c.req.param('location')}`, rank: 1, previousRank: 1 }]),
  );

  app.get('/top/players', (c) => {
    if (topPlayerFailures > 0) {
      topPlayerFailures -= 1;
      return c.json({ error: 'service unavailable' }, 503);
    }

    return c.json([{ tag: '2PPQ', name: 'Test Player', rank: 1, trophies: 4210 }]);
  });

  app.get('/constants', () => jsonBody(fixtures.constants));

  // wrong shape on purpose, fails validation
  app.get('/popular/clans', (c) => c.json({ data: 'wrong-format', etc: 'test' }));

  const [errServer, serverAndPort] = await safeWrapAsync(
    () =>
      new Promise<[ServerType, number]>((resolve) => {
        const srv = serve({ fetch: app.fetch, port: 0, hostname: '127.0.0.1' }, (serverInfo) => {
          resolve([srv, serverInfo.port]);
        });
      }),
  );

  if (errServer) {
    return [new Error('error starting server', { cause: errServer }), null];
  }

  let [server, port] = serverAndPort;
  const address = server.address();
  if (address && typeof address !== 'string') {
    port = address.port;
  }

  return [
    null,
    {
      url: `http://127.0.0.1:${port}/`,
      reset: () => {
        topPlayerFailures = 0;
        for (const k of Object.keys(counts)) {
          delete counts[k];
        }
      },
      getCounts: () => structuredClone(counts),
      failTopPlayers: (times) => {
        topPlayerFailures = times;
      },
      close: () =>
        new Promise<Error | null>((resolve) =>
          server.close((err) => {
            if (err) {
              resolve(new Error('error closing server', { cause: err }));
              return;
            }

            resolve(null);
          }),
        ),
    },
  ];
}
