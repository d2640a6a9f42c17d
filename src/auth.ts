import { SignJWT } from 'jose';

const JWT_ALGORITHM = 'HS256';

/** Lifetime of each request token, in seconds */
export const TOKEN_TTL_SECONDS = 600;

/**
 * Sign a short-lived request token. The API identifies the caller by the
 * `kid` header and `sub` claim, both set to the API key.
 */
export async function generateJwt(
  apiKey: string,
  apiSecret: string,
  now: Date = new Date()
): Promise<string> {
  const issuedAt = Math.floor(now.getTime() / 1000);

  return new SignJWT({})
    .setProtectedHeader({ alg: JWT_ALGORITHM, typ: 'JWT', kid: apiKey })
    .setSubject(apiKey)
    .setIssuedAt(issuedAt)
    .setExpirationTime(issuedAt + TOKEN_TTL_SECONDS)
    .setIssuer('sdk')
    .sign(new TextEncoder().encode(apiSecret));
}
