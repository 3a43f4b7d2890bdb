/**
 * Gateway - Authentication Module
 */

export {
  TokenVerifier,
  TOKEN_ALGORITHM,
  decodeUnverified,
  extractBearerToken,
  importPublicKey,
} from './token-verifier.js';

export { createAuthMiddleware, type AuthMiddlewareOptions } from './middleware.js';

export type { CallerIdentity, TokenVerifierOptions, UnverifiedClaims } from './types.js';
