import { createHmac } from 'node:crypto';

export const API_VERSION = 'v2';

/**
 * Strictly increasing nonce derived from wall-clock time (microsecond scale).
 * Calls within the same millisecond still get distinct, larger values.
 */
export class NonceGenerator {
  private last = 0;

  next(): string {
    const candidate = Date.now() * 1000;
    this.last = candidate > this.last ? candidate : this.last + 1;
    return this.last.toString();
  }
}

// REST calls and the streaming auth handshake share one sequence: the venue
// rejects any nonce lower than the last one it saw for the key.
export const defaultNonce = new NonceGenerator();

/**
 * Sign a payload using HMAC-SHA384 (hex digest)
 */
export function signPayload(secret: string, payload: string): string {
  return createHmac('sha384', secret).update(payload).digest('hex');
}

/**
 * Build authentication headers for an authenticated REST endpoint.
 * Signature covers `/api/{version}/{endpoint}{nonce}{body}`.
 */
export function buildAuthHeaders(
  apiKey: string,
  apiSecret: string,
  endpoint: string,
  body: string,
  nonce: string,
): Record<string, string> {
  const signature = signPayload(apiSecret, `/api/${API_VERSION}/${endpoint}${nonce}${body}`);

  return {
    'bfx-nonce': nonce,
    'bfx-apikey': apiKey,
    'bfx-signature': signature,
    'Content-Type': 'application/json',
  };
}

export interface AuthPayload {
  event: 'auth';
  apiKey: string;
  authSig: string;
  authNonce: string;
  authPayload: string;
}

/**
 * Build the streaming authentication message (`AUTH{nonce}` signed with the secret).
 */
export function buildWsAuthPayload(apiKey: string, apiSecret: string, nonce: string): AuthPayload {
  const authPayload = `AUTH${nonce}`;
  return {
    event: 'auth',
    apiKey,
    authSig: signPayload(apiSecret, authPayload),
    authNonce: nonce,
    authPayload,
  };
}
