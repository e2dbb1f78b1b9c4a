// ─── Encrypted Roster Format ─────────────────────────────────────────────────
//
// OpenSSL `enc -aes-256-cbc -pbkdf2 -iter 1000 -md sha256` compatible:
// optional base64 wrapping, "Salted__" + 8-byte salt, then AES-256-CBC/PKCS7.

import * as crypto from 'crypto';
import { TextDecoder } from 'util';
import { RosterDecryptError, errorMessage } from '../errors';

const MAGIC = Buffer.from('Salted__', 'latin1');
const FALLBACK_SALT = Buffer.from('12345678', 'latin1');
const PBKDF2_ITERATIONS = 1000;
const KEY_LENGTH = 32;
const IV_LENGTH = 16;
const BLOCK_SIZE = 16;

function deriveKeyIv(password: string, salt: Buffer): { key: Buffer; iv: Buffer } {
	const material = crypto.pbkdf2Sync(password, salt, PBKDF2_ITERATIONS, KEY_LENGTH + IV_LENGTH, 'sha256');
	return {
		key: material.subarray(0, KEY_LENGTH),
		iv: material.subarray(KEY_LENGTH, KEY_LENGTH + IV_LENGTH),
	};
}

/**
 * Undo base64 wrapping when the payload is base64 text; binary input is returned as-is
 */
export function unwrapBase64(data: Buffer): Buffer {
	if (data.subarray(0, MAGIC.length).equals(MAGIC)) {
		return data;
	}
	const text = data.toString('latin1').replace(/\s+/g, '');
	if (text.length > 0 && text.length % 4 === 0 && /^[A-Za-z0-9+/]+={0,2}$/.test(text)) {
		return Buffer.from(text, 'base64');
	}
	return data;
}

export function decryptRoster(data: Buffer, password: string): string {
	const payload = unwrapBase64(data);

	let salt: Buffer = FALLBACK_SALT;
	let ciphertext = payload;
	if (payload.subarray(0, MAGIC.length).equals(MAGIC)) {
		salt = payload.subarray(MAGIC.length, MAGIC.length + 8);
		ciphertext = payload.subarray(MAGIC.length + 8);
	}

	if (ciphertext.length === 0 || ciphertext.length % BLOCK_SIZE !== 0) {
		throw new RosterDecryptError('Encrypted roster is corrupted (ciphertext is not a whole number of blocks)');
	}

	const { key, iv } = deriveKeyIv(password, salt);
	let plain: Buffer;
	try {
		const decipher = crypto.createDecipheriv('aes-256-cbc', key, iv);
		plain = Buffer.concat([decipher.update(ciphertext), decipher.final()]);
	} catch (error) {
		throw new RosterDecryptError(`Failed to decrypt roster (wrong password or corrupted file): ${errorMessage(error)}`);
	}

	try {
		return new TextDecoder('utf-8', { fatal: true }).decode(plain);
	} catch {
		throw new RosterDecryptError('Failed to decrypt roster (wrong password or corrupted file): result is not UTF-8');
	}
}

/**
 * Encrypt roster text; the result is base64 wrapped at 64 columns like `openssl enc -a`
 */
export function encryptRoster(plain: string, password: string, salt: Buffer = crypto.randomBytes(8)): string {
	if (salt.length !== 8) {
		throw new RangeError('salt must be 8 bytes');
	}
	const { key, iv } = deriveKeyIv(password, salt);
	const cipher = crypto.createCipheriv('aes-256-cbc', key, iv);
	const body = Buffer.concat([MAGIC, salt, cipher.update(plain, 'utf-8'), cipher.final()]);
	const encoded = body.toString('base64');
	return (encoded.match(/.{1,64}/g) ?? []).join('\n') + '\n';
}
