import { randomInt } from 'crypto';

export const TOKEN_LENGTH = 6;
const ALPHABET = 'abcdefghijklmnopqrstuvwxyz';
const MAX_ATTEMPTS = 10_000;

export type TokenGenerator = () => string;

/**
 * Random lowercase token of fixed length.
 */
export function generateToken(length: number = TOKEN_LENGTH): string {
  let token = '';
  for (let i = 0; i < length; i++) {
    token += ALPHABET[randomInt(ALPHABET.length)];
  }
  return token;
}

/**
 * Draw tokens until one is not taken.
 */
export function uniqueToken(isTaken: (token: string) => boolean, generate: TokenGenerator = generateToken): string {
  for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
    const candidate = generate();
    if (!isTaken(candidate)) return candidate;
  }
  throw new Error(`No free identifier found after ${MAX_ATTEMPTS} attempts`);
}
