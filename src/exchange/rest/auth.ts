import * as jose from 'jose';
import { createHash, randomUUID } from 'node:crypto';

/**
 * Private API JWT (HS256).
 * 파라미터가 있으면 query_hash(SHA512), query_hash_alg 포함.
 */
export async function createAuthToken(
  accessKey: string,
  secretKey: string,
  options?: { queryHash?: string; now?: number },
): Promise<string> {
  if (!accessKey || !secretKey) {
    throw new Error('API key/secret not configured');
  }
  const payload: Record<string, string | number> = {
    access_key: accessKey,
    nonce: randomUUID(),
    timestamp: options?.now ?? Date.now(),
  };
  if (options?.queryHash) {
    payload.query_hash = options.queryHash;
    payload.query_hash_alg = 'SHA512';
  }
  return await new jose.SignJWT(payload)
    .setProtectedHeader({ alg: 'HS256', typ: 'JWT' })
    .sign(new TextEncoder().encode(secretKey));
}

/** 키 삽입 순서 유지 query string → SHA512 (소문자 hex) */
export function sha512Params(params: Record<string, string>): string {
  const qs = Object.entries(params)
    .map(([k, v]) => `${k}=${v}`)
    .join('&');
  return createHash('sha512').update(qs).digest('hex').toLowerCase();
}
