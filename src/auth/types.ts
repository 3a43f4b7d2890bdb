/**
 * Gateway - Authentication Types
 */

/**
 * Identity extracted from a verified token. Lives for one request only.
 */
export interface CallerIdentity {
  userId: string;
  username?: string;
  issuedAt: Date | null;
  expiresAt: Date;
  issuer: string;
  audience: string | string[];
}

/**
 * Claims read without verifying the signature. Only ever used for diagnostics.
 */
export interface UnverifiedClaims {
  subject: string | null;
  issuer: string | null;
  expiresAt: Date | null;
  algorithm: string | null;
}

export interface TokenVerifierOptions {
  issuer: string;
  audience: string;
  clockToleranceSeconds?: number;
  /** Milliseconds since the epoch; defaults to Date.now */
  clock?: () => number;
}
