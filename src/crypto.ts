import { scryptSync, randomBytes, createHmac } from 'crypto';

/**
 * Derives the local oracle's signing key from a secret using scrypt.
 * @param secret The input secret from which to derive the key.
 * @returns A 32-byte Buffer representing the derived key.
 */
export function deriveOracleKey(secret: string): Buffer {
    return scryptSync(Buffer.from(secret, 'utf8'), Buffer.from('raffle-oracle-salt', 'utf8'), 32);
}

/**
 * Derives one 256-bit random word for a request.
 * The word is HMAC-SHA256(key, token:index) read as an unsigned big-endian integer,
 * so anyone holding the key can recompute and verify it.
 */
export function deriveRandomWord(key: Buffer, token: string, index: number): bigint {
    const digest = createHmac('sha256', key).update(`${token}:${index}`, 'utf8').digest('hex');
    return BigInt(`0x${digest}`);
}

/**
 * Generates a cryptographically secure random ID.
 * @returns A 32-character hex string.
 */
export function cryptoRandomId(): string {
    return randomBytes(16).toString('hex');
}
