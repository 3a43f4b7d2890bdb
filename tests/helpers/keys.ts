/**
 * RSA key pairs and token minting for auth tests. Keys are generated per run.
 */

import * as jose from 'jose';

export interface TestKeys {
  publicKeyPem: string;
  privateKeyPem: string;
  privateKey: jose.KeyLike;
  /** A second key whose signatures the verifier must reject */
  foreignPrivateKey: jose.KeyLike;
}

export async function generateTestKeys(): Promise<TestKeys> {
  const [pair, foreign] = await Promise.all([
    jose.generateKeyPair('RS256', { modulusLength: 2048, extractable: true }),
    jose.generateKeyPair('RS256', { modulusLength: 2048 }),
  ]);

  return {
    publicKeyPem: await jose.exportSPKI(pair.publicKey),
    privateKeyPem: await jose.exportPKCS8(pair.privateKey),
    privateKey: pair.privateKey,
    foreignPrivateKey: foreign.privateKey,
  };
}

export interface SignOptions {
  /** Seconds since the epoch */
  issuedAt: number;
  /** Seconds since the epoch */
  expiresAt?: number;
  issuer?: string;
  audience?: string;
  claims?: jose.JWTPayload;
}

export function signToken(privateKey: jose.KeyLike, options: SignOptions): Promise<string> {
  let builder = new jose.SignJWT({ user_id: 'user-123', ...options.claims })
    .setProtectedHeader({ alg: 'RS256', typ: 'JWT' })
    .setIssuedAt(options.issuedAt)
    .setIssuer(options.issuer ?? 'test-issuer')
    .setAudience(options.audience ?? 'test-audience');

  if (options.expiresAt !== undefined) {
    builder = builder.setExpirationTime(options.expiresAt);
  }
  return builder.sign(privateKey);
}
