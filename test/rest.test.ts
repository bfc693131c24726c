/**
 * Gateway discovery tests.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { RestGatewayInfoProvider } from '../src/rest.ts';
import { FatalError, TransportError, ValidationError } from '../src/errors.ts';

const body = {
  url: 'wss://gateway.test',
  shards: 4,
  session_start_limit: { total: 1000, remaining: 998, reset_after: 14400000, max_concurrency: 2 },
};

function fakeFetch(respond: () => Response) {
  const calls: { url: string; authorization: string | null }[] = [];
  const fetch: typeof globalThis.fetch = async (input, init) => {
    calls.push({ url: String(input), authorization: new Headers(init?.headers).get('authorization') });
    return respond();
  };
  return { fetch, calls };
}

describe('RestGatewayInfoProvider', () => {
  it('should fetch gateway info with the bot token', async () => {
    const { fetch, calls } = fakeFetch(() => Response.json(body));
    const provider = new RestGatewayInfoProvider({ token: 'test-token', baseUrl: 'https://api.test/v10/', fetch });

    const info = await provider.getGatewayBot();
    assert.deepStrictEqual(info, body);
    assert.deepStrictEqual(calls, [{ url: 'https://api.test/v10/gateway/bot', authorization: 'Bot test-token' }]);
  });

  it('should treat 401 as fatal', async () => {
    const { fetch } = fakeFetch(() => new Response('', { status: 401 }));
    const provider = new RestGatewayInfoProvider({ token: 'test-token', baseUrl: 'https://api.test/v10', fetch });

    await assert.rejects(provider.getGatewayBot(), (err: Error) => {
      assert.ok(err instanceof FatalError);
      assert.strictEqual(err.closeCode, 4004);
      return true;
    });
  });

  it('should report other failures as transport errors', async () => {
    const { fetch } = fakeFetch(() => new Response('', { status: 502 }));
    const provider = new RestGatewayInfoProvider({ token: 'test-token', baseUrl: 'https://api.test/v10', fetch });

    await assert.rejects(provider.getGatewayBot(), {
      name: 'TransportError',
      message: 'GET /gateway/bot returned 502',
    });
  });

  it('should wrap network errors', async () => {
    const fetch: typeof globalThis.fetch = async () => {
      throw new Error('getaddrinfo ENOTFOUND api.test');
    };
    const provider = new RestGatewayInfoProvider({ token: 'test-token', baseUrl: 'https://api.test/v10', fetch });

    await assert.rejects(provider.getGatewayBot(), (err: Error) => {
      assert.ok(err instanceof TransportError);
      assert.strictEqual(err.message, 'GET /gateway/bot failed: getaddrinfo ENOTFOUND api.test');
      return true;
    });
  });

  it('should validate the body', async () => {
    const { fetch } = fakeFetch(() => Response.json({ url: 'wss://gateway.test' }));
    const provider = new RestGatewayInfoProvider({ token: 'test-token', baseUrl: 'https://api.test/v10', fetch });
    await assert.rejects(provider.getGatewayBot(), ValidationError);
  });
});
