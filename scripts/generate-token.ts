/**
 * Gateway - Development Token Tool
 *
 * Mint an RS256 bearer token for local testing, or write a fresh key pair.
 *
 * Usage:
 *   node dist/scripts/generate-token.js --generate-keys ./keys
 *   node dist/scripts/generate-token.js --key ./keys/private.pem --user alice \
 *     --issuer passenger-auth --audience passenger-inference --expires-in 1h
 */

import fs from 'fs';
import path from 'path';
import { parseArgs } from 'util';

import * as jose from 'jose';

import logger from '../src/utils/logger.js';
import { errorMessage } from '../src/utils/helpers.js';

const ALGORITHM = 'RS256';

interface TokenOptions {
  keyPath: string;
  userId: string;
  username?: string;
  issuer: string;
  audience: string;
  expiresIn: string;
}

async function generateKeys(directory: string): Promise<void> {
  const { publicKey, privateKey } = await jose.generateKeyPair(ALGORITHM, {
    modulusLength: 2048,
    extractable: true,
  });

  await fs.promises.mkdir(directory, { recursive: true });
  const privatePath = path.join(directory, 'private.pem');
  const publicPath = path.join(directory, 'public.pem');

  await fs.promises.writeFile(privatePath, await jose.exportPKCS8(privateKey), { mode: 0o600 });
  await fs.promises.writeFile(publicPath, await jose.exportSPKI(publicKey));

  logger.info('Key pair written', { privateKey: privatePath, publicKey: publicPath });
}

async function mintToken(options: TokenOptions): Promise<string> {
  const pem = await fs.promises.readFile(options.keyPath, 'utf-8');
  const privateKey = await jose.importPKCS8(pem, ALGORITHM);

  const claims: jose.JWTPayload = { user_id: options.userId };
  if (options.username !== undefined) {
    claims['username'] = options.username;
  }

  return new jose.SignJWT(claims)
    .setProtectedHeader({ alg: ALGORITHM, typ: 'JWT' })
    .setSubject(options.userId)
    .setIssuer(options.issuer)
    .setAudience(options.audience)
    .setIssuedAt()
    .setExpirationTime(options.expiresIn)
    .sign(privateKey);
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      'generate-keys': { type: 'string' },
      key: { type: 'string' },
      user: { type: 'string' },
      username: { type: 'string' },
      issuer: { type: 'string' },
      audience: { type: 'string' },
      'expires-in': { type: 'string' },
    },
    strict: true,
  });

  const keysDir = values['generate-keys'];
  if (keysDir !== undefined) {
    await generateKeys(keysDir);
    return;
  }

  if (values.key === undefined) {
    throw new Error('--key <private.pem> is required to mint a token');
  }

  const token = await mintToken({
    keyPath: values.key,
    userId: values.user ?? 'dev-user',
    username: values.username,
    issuer: values.issuer ?? process.env['JWT_ISSUER'] ?? 'passenger-auth',
    audience: values.audience ?? process.env['JWT_AUDIENCE'] ?? 'passenger-inference',
    expiresIn: values['expires-in'] ?? '1h',
  });

  process.stdout.write(`${token}\n`);
}

main().catch((error: unknown) => {
  logger.error('Token tool failed', { error: errorMessage(error) });
  process.exitCode = 1;
});
