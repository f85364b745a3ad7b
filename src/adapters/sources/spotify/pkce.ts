import crypto from 'node:crypto';

export interface PkcePair {
  verifier: string;
  challenge: string;
}

function base64UrlEncode(buffer: Buffer): string {
  return buffer
    .toString('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_')
    .replace(/=+$/g, '');
}

export function deriveCodeChallenge(verifier: string): string {
  return base64UrlEncode(crypto.createHash('sha256').update(verifier).digest());
}

export function createPkcePair(): PkcePair {
  const verifier = base64UrlEncode(crypto.randomBytes(32));
  return { verifier, challenge: deriveCodeChallenge(verifier) };
}

export function createOAuthState(): string {
  return base64UrlEncode(crypto.randomBytes(16));
}
