import { type ServerType, serve } from '@hono/node-server';
import { type Context, Hono } from 'hono';
import { safeWrapAsync, type SafeWrapAsync } from '../src/utils/wrap.js';

export const E2E_USER = 'extranet\\editor';
export const E2E_PASSWORD = 'test-secret';
/** Printable key strings, their UTF-8 bytes form the modulus the client encrypts with. */
export const E2E_KEY = { modulus: `${'k'.repeat(127)}Q`, exponent: 'AQAB' };

const ITEM_PREFIX = '/-/item/v1';

export interface RecordedRequest {
  method: string;
  path: string;
  headers: Record<string, string>;
}

export type E2EServer = {
  url: string;
  close: () => Promise<Error | null>;
  reset: () => void;
  getRequests: () => RecordedRequest[];
};

type Authentication = 'anonymous' | 'plain' | 'encrypted' | 'denied';

function isCiphertext(value: string | undefined): boolean {
  return value !== undefined && Buffer.from(value, 'base64').byteLength === 128;
}

/**
 * Reads the credential headers. Encrypted values can only be checked for shape, the stub
 * holds no private key for its public key.
 */
function authenticate(headers: Record<string, string>): Authentication {
  const userName = headers['x-scitemwebapi-username'];
  const password = headers['x-scitemwebapi-password'];
  if (userName === undefined && password === undefined) {
    return 'anonymous';
  }

  if (headers['x-scitemwebapi-encrypted'] === '1') {
    return isCiphertext(userName) && isCiphertext(password) ? 'encrypted' : 'denied';
  }

  return userName === E2E_USER && password === E2E_PASSWORD ? 'plain' : 'denied';
}

function seedItems(): Map<string, Record<string, string>> {
  return new Map([['/sitecore/content/home', { Title: 'Home' }]]);
}

/**
 * Starts an in-process stand-in for the item web API on a random local port.
 */
export async function startE2EServer(): SafeWrapAsync<Error, E2EServer> {
  const requests: RecordedRequest[] = [];
  let items = seedItems();
  const app = new Hono();

  function notFound(c: Context) {
    return c.json({ statusCode: 404, error: { message: 'item not found' } }, 404);
  }

  app.use('*', async (c, next) => {
    requests.push({ method: c.req.method, path: c.req.path, headers: c.req.header() });
    await next();
  });

  app.get(`${ITEM_PREFIX}/-/actions/getpublickey`, (c) =>
    c.body(
      `<?xml version="1.0" encoding="utf-8"?><RSAKeyValue><Modulus>${E2E_KEY.modulus}</Modulus><Exponent>${E2E_KEY.exponent}</Exponent></RSAKeyValue>`,
      200,
      { 'content-type': 'text/xml; charset=utf-8' },
    ),
  );

  app.get(`${ITEM_PREFIX}/sitecore/content/blank`, (c) => c.body('  \n', 200));

  app.on(['GET', 'POST', 'PUT', 'DELETE'], `${ITEM_PREFIX}/*`, async (c) => {
    const method = c.req.method;
    const path = c.req.path.slice(ITEM_PREFIX.length);
    const authentication = authenticate(c.req.header());

    if (authentication === 'denied' || (authentication === 'anonymous' && method !== 'GET')) {
      return c.json({ statusCode: 401, error: { message: 'access to the item web API is denied' } }, 401);
    }

    if (method === 'POST') {
      const name = c.req.query('name');
      if (!name) {
        return c.json({ statusCode: 400, error: { message: 'name is required' } }, 400);
      }

      const body = await c.req.parseBody();
      const fields = Object.fromEntries(
        Object.entries(body).filter((entry): entry is [string, string] => typeof entry[1] === 'string'),
      );
      items.set(`${path}/${name}`, fields);

      return c.json({ statusCode: 200, result: { count: 1, path: `${path}/${name}` } });
    }

    const item = items.get(path);
    if (!item) {
      return notFound(c);
    }

    if (method === 'PUT') {
      const body = await c.req.parseBody();
      for (const [key, value] of Object.entries(body)) {
        if (typeof value === 'string') {
          item[key] = value;
        }
      }

      return c.json({ statusCode: 200, result: { count: 1 } });
    }

    if (method === 'DELETE') {
      items.delete(path);
      return c.json({ statusCode: 200, result: { count: 1 } });
    }

    return c.json({ statusCode: 200, result: { totalCount: 1, items: [{ Path: path, Fields: item }] } });
  });

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

  const [server, port] = serverAndPort;

  return [
    null,
    {
      url: `http://127.0.0.1:${port}`,
      reset: () => {
        requests.length = 0;
        items = seedItems();
      },
      getRequests: () => structuredClone(requests),
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
