/**
 * Gateway - Token Verifier
 *
 * RS256 bearer token verification with a public key imported once at startup.
 * Signature checks are delegated to jose.
 */

import * as jose from 'jose';

import logger from '../utils/logger.js';
import { errorMessage } from '../utils/helpers.js';
import { AuthenticationError, ConfigurationError, type AuthFailureReason } from '../utils/types.js';

import type { CallerIdentity, TokenVerifierOptions, UnverifiedClaims } from './types.js';

export const TOKEN_ALGORITHM = 'RS256';

const BASE64URL_SEGMENT = /^[A-Za-z0-9_-]+$/;

// =============================================================================
// Key Import
// =============================================================================

/**
 * Import the SPKI public key. Private key material is refused.
 */
export async function importPublicKey(pem: string): Promise<jose.KeyLike> {
  if (pem.includes('PRIVATE KEY')) {
    throw new ConfigurationError('JWT verification key must be a public key, not a private key');
  }

  try {
    return await jose.importSPKI(pem, TOKEN_ALGORITHM);
  } catch (error) {
    throw new ConfigurationError(`JWT public key is not a valid RSA SPKI PEM: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

// =============================================================================
// Header Parsing
// =============================================================================

/**
 * Pull the token out of an `Authorization: Bearer <token>` header
 */
export function extractBearerToken(header: string | undefined): string {
  if (header === undefined || header.trim() === '') {
    throw new AuthenticationError('missing');
  }

  const [scheme, token, ...rest] = header.trim().split(/\s+/);
  if (scheme?.toLowerCase() !== 'bearer' || rest.length > 0) {
    throw new AuthenticationError('malformed');
  }
  if (token === undefined || token === '') {
    throw new AuthenticationError('missing');
  }
  return token;
}

/**
 * UNVERIFIED: decode header and claims without checking the signature.
 * For log context on rejected tokens only. Never use the result to grant access.
 */
export function decodeUnverified(token: string): UnverifiedClaims | null {
  try {
    const claims = jose.decodeJwt(token);
    const header = jose.decodeProtectedHeader(token);
    const subject = claims['user_id'] ?? claims.sub;

    return {
      subject: typeof subject === 'string' ? subject : null,
      issuer: claims.iss ?? null,
      expiresAt: typeof claims.exp === 'number' ? new Date(claims.exp * 1000) : null,
      algorithm: header.alg ?? null,
    };
  } catch {
    return null;
  }
}

function hasTokenShape(token: string): boolean {
  const segments = token.split('.');
  return segments.length === 3 && segments.every((segment) => BASE64URL_SEGMENT.test(segment));
}

function reasonFor(error: jose.errors.JOSEError): AuthFailureReason {
  if (error instanceof jose.errors.JWTExpired) {
    return 'expired';
  }
  if (error instanceof jose.errors.JWTClaimValidationFailed) {
    if (error.claim === 'iss') {
      return 'issuer_mismatch';
    }
    if (error.claim === 'aud') {
      return 'audience_mismatch';
    }
    return 'malformed';
  }
  if (
    error instanceof jose.errors.JWSSignatureVerificationFailed ||
    error instanceof jose.errors.JOSEAlgNotAllowed
  ) {
    return 'bad_signature';
  }
  return 'malformed';
}

// =============================================================================
// Token Verifier Class
// =============================================================================

export class TokenVerifier {
  private readonly key: jose.KeyLike;
  private readonly issuer: string;
  private readonly audience: string;
  private readonly clockToleranceSeconds: number;
  private readonly clock: () => number;

  constructor(key: jose.KeyLike, options: TokenVerifierOptions) {
    this.key = key;
    this.issuer = options.issuer;
    this.audience = options.audience;
    this.clockToleranceSeconds = options.clockToleranceSeconds ?? 0;
    this.clock = options.clock ?? Date.now;
  }

  static async fromPem(pem: string, options: TokenVerifierOptions): Promise<TokenVerifier> {
    return new TokenVerifier(await importPublicKey(pem), options);
  }

  /**
   * Verify a bearer token and return the caller it identifies.
   * Throws AuthenticationError with the failure reason.
   */
  public async verify(token: string | undefined): Promise<CallerIdentity> {
    if (token === undefined || token.trim() === '') {
      throw new AuthenticationError('missing');
    }
    if (!hasTokenShape(token)) {
      throw new AuthenticationError('malformed');
    }

    let claims: jose.JWTPayload;
    try {
      jose.decodeProtectedHeader(token);
      claims = jose.decodeJwt(token);
    } catch (error) {
      throw new AuthenticationError('malformed', { cause: error });
    }

    // Expiry is checked ahead of the signature so an expired token is rejected
    // as expired whatever its signature. This can only reject, never accept.
    const nowSeconds = Math.floor(this.clock() / 1000);
    if (typeof claims.exp === 'number' && claims.exp <= nowSeconds - this.clockToleranceSeconds) {
      throw new AuthenticationError('expired');
    }

    let payload: jose.JWTPayload;
    try {
      const result = await jose.jwtVerify(token, this.key, {
        algorithms: [TOKEN_ALGORITHM],
        issuer: this.issuer,
        audience: this.audience,
        clockTolerance: this.clockToleranceSeconds,
        currentDate: new Date(this.clock()),
        requiredClaims: ['exp'],
      });
      payload = result.payload;
    } catch (error) {
      if (error instanceof jose.errors.JOSEError) {
        throw new AuthenticationError(reasonFor(error), { cause: error });
      }
      throw error;
    }

    return this.toIdentity(payload);
  }

  private toIdentity(payload: jose.JWTPayload): CallerIdentity {
    const userId = payload['user_id'] ?? payload.sub;
    if (typeof userId !== 'string' || userId === '' || typeof payload.exp !== 'number') {
      logger.debug('Verified token lacks a user id', { claims: Object.keys(payload) });
      throw new AuthenticationError('malformed');
    }

    const identity: CallerIdentity = {
      userId,
      issuedAt: typeof payload.iat === 'number' ? new Date(payload.iat * 1000) : null,
      expiresAt: new Date(payload.exp * 1000),
      issuer: payload.iss ?? this.issuer,
      audience: payload.aud ?? this.audience,
    };

    const username = payload['username'];
    if (typeof username === 'string') {
      identity.username = username;
    }

    return identity;
  }
}
