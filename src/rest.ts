/**
 * Gateway discovery over REST.
 *
 * Only the one call the gateway needs; everything else REST is out of scope.
 */

import createDebug from 'debug';
import { CloseCode } from './closeCodes.ts';
import { FatalError, TransportError } from './errors.ts';
import type { GatewayBotInfo, GatewayInfoProvider } from './types.ts';
import { gatewayBotValidator } from './validation.ts';

const debug = createDebug('shard-gateway:rest');

export interface RestGatewayInfoProviderOptions {
  token: string;
  /** API base including version, e.g. `https://api.example.com/v10`. */
  baseUrl: string;
  fetch?: typeof globalThis.fetch;
}

export class RestGatewayInfoProvider implements GatewayInfoProvider {
  private _token: string;
  private _baseUrl: string;
  private _fetch: typeof globalThis.fetch;

  constructor(options: RestGatewayInfoProviderOptions) {
    this._token = options.token;
    this._baseUrl = options.baseUrl.replace(/\/+$/, '');
    this._fetch = options.fetch ?? globalThis.fetch;
  }

  /**
   * @throws TransportError on network failure or an unexpected status
   * @throws FatalError when the token is rejected
   * @throws ValidationError when the body has the wrong shape
   */
  async getGatewayBot(): Promise<GatewayBotInfo> {
    const url = `${this._baseUrl}/gateway/bot`;
    debug('GET %s', url);

    let res: Response;
    try {
      res = await this._fetch(url, { headers: { Authorization: `Bot ${this._token}` } });
    } catch (err) {
      throw new TransportError(`GET /gateway/bot failed: ${err instanceof Error ? err.message : String(err)}`);
    }

    if (res.status === 401) {
      throw new FatalError(CloseCode.AUTHENTICATION_FAILED, 'HTTP 401 from /gateway/bot', 'authentication failed');
    }
    if (!res.ok) {
      throw new TransportError(`GET /gateway/bot returned ${res.status}`);
    }

    const body: unknown = await res.json();
    return gatewayBotValidator.validate(body);
  }
}
