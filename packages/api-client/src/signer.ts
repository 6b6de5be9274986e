/**
 * Request signing for the comics API.
 *
 * Every call carries `ts`, `apikey` and `hash = md5(ts + privateKey + publicKey)`.
 * The service checks the digest; nothing is verified locally.
 *
 * @module @storypage/api-client/signer
 */

import { md5 } from '@storypage/crypto';

export interface Credentials {
  readonly publicKey: string;
  readonly privateKey: string;
}

export type QueryParams = Readonly<Record<string, string>>;

export interface AuthParams {
  ts: string;
  hash: string;
  apikey: string;
}

export type SignedParams = AuthParams & Record<string, string>;

/** Milliseconds since epoch, like `Date.now`. */
export type Clock = () => number;

export type Signer = (params?: QueryParams) => SignedParams;

export function timestampSeconds(nowMs: number): string {
  return Math.floor(nowMs / 1000).toString();
}

export function signatureFor(ts: string, credentials: Credentials): string {
  return md5(ts + credentials.privateKey + credentials.publicKey);
}

/**
 * Merge fresh auth parameters into `params`. Caller keys win on collision.
 */
export function signParams(
  params: QueryParams,
  credentials: Credentials,
  now: Clock = Date.now,
): SignedParams {
  const ts = timestampSeconds(now());
  return {
    ts,
    hash: signatureFor(ts, credentials),
    apikey: credentials.publicKey,
    ...params,
  };
}

export function createSigner(credentials: Credentials, now: Clock = Date.now): Signer {
  return (params = {}) => signParams(params, credentials, now);
}
