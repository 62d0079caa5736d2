import { createHmac } from 'node:crypto';

export type QueryValue = string | number | boolean | undefined | null;
export type QueryParams = Record<string, QueryValue>;

/**
 * HMAC-SHA256 request signing for the futures REST API.
 *
 * Signed endpoints take `timestamp`, `recvWindow` and a `signature` computed
 * over the exact query string sent, plus the `X-MBX-APIKEY` header.
 */
export class RequestSigner {
  readonly #apiKey: string;
  readonly #secretKey: string;

  constructor(apiKey: string, secretKey: string) {
    this.#apiKey = apiKey;
    this.#secretKey = secretKey;
  }

  get apiKey(): string {
    return this.#apiKey;
  }

  /** Undefined and null values are left out. */
  buildQueryString(params: QueryParams): string {
    const entries: string[] = [];

    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined && value !== null) {
        entries.push(`${key}=${encodeURIComponent(String(value))}`);
      }
    }

    return entries.join('&');
  }

  signString(data: string): string {
    return createHmac('sha256', this.#secretKey).update(data).digest('hex');
  }

  buildSignedUrl(
    baseUrl: string,
    endpoint: string,
    params: QueryParams,
    recvWindow: number,
    timestamp: number = Date.now()
  ): string {
    const queryString = this.buildQueryString({ ...params, timestamp, recvWindow });
    const signature = this.signString(queryString);

    return `${baseUrl}${endpoint}?${queryString}&signature=${signature}`;
  }

  getHeaders(): Record<string, string> {
    return {
      'X-MBX-APIKEY': this.#apiKey,
      'Content-Type': 'application/x-www-form-urlencoded',
    };
  }
}
