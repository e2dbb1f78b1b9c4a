// ─── Roster Encryption Tests ─────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import { RosterDecryptError } from '../../errors';
import { decryptRoster, encryptRoster, unwrapBase64 } from '../../roster/crypto';

const PLAIN = '!a1b2c3d4,Base,Ridge Top,47.61,-122.33\n!0000beef,Hill\n';
const SALT = Buffer.from('abcdefgh', 'latin1');

// `openssl enc -aes-256-cbc -pbkdf2 -iter 1000 -md sha256 -a` output for PLAIN, salt "abcdefgh"
const OPENSSL_OUTPUT =
	'U2FsdGVkX19hYmNkZWZnaNCev0J9hQf4lbxl9bUQ4SXD9ghVJe5oFCaABnNw2yS/\n' +
	'YHkE4uEJT/08hGe0XutuPdgQNTkcRz9Q33oxPthiJXI=\n';

describe('encryptRoster', () => {
	it('should produce OpenSSL-compatible base64 output', () => {
		expect(encryptRoster(PLAIN, 'test-secret', SALT)).toBe(OPENSSL_OUTPUT);
	});

	it('should reject salts of the wrong size', () => {
		expect(() => encryptRoster(PLAIN, 'test-secret', Buffer.from('short'))).toThrow(RangeError);
	});

	it('should use a fresh salt by default', () => {
		const first = encryptRoster(PLAIN, 'test-secret');
		const second = encryptRoster(PLAIN, 'test-secret');
		expect(first).not.toBe(second);
		expect(decryptRoster(Buffer.from(first), 'test-secret')).toBe(PLAIN);
		expect(decryptRoster(Buffer.from(second), 'test-secret')).toBe(PLAIN);
	});
});

describe('decryptRoster', () => {
	it('should decrypt base64 output with a salt header', () => {
		expect(decryptRoster(Buffer.from(OPENSSL_OUTPUT), 'test-secret')).toBe(PLAIN);
	});

	it('should decrypt the binary form', () => {
		const binary = Buffer.from(OPENSSL_OUTPUT.replace(/\n/g, ''), 'base64');
		expect(decryptRoster(binary, 'test-secret')).toBe(PLAIN);
	});

	it('should fall back to the fixed salt when there is no header', () => {
		expect(decryptRoster(Buffer.from('nIgy500TpHoVFWeC14D0Pw==\n'), 'test-secret')).toBe('!cafe,Ops\n');
		expect(decryptRoster(Buffer.from('9c8832e74d13a47a15156782d780f43f', 'hex'), 'test-secret')).toBe('!cafe,Ops\n');
	});

	it('should fail on a wrong password instead of returning garbage', () => {
		expect(() => decryptRoster(Buffer.from(OPENSSL_OUTPUT), 'wrong-secret')).toThrow(RosterDecryptError);
	});

	it('should fail on truncated ciphertext', () => {
		const truncated = Buffer.concat([Buffer.from('Salted__abcdefgh', 'latin1'), Buffer.from([1, 2, 3, 4, 5])]);
		expect(() => decryptRoster(truncated, 'test-secret')).toThrow(/corrupted/);
	});
});

describe('unwrapBase64', () => {
	it('should pass binary payloads through', () => {
		const binary = Buffer.from('Salted__abcdefgh', 'latin1');
		expect(unwrapBase64(binary)).toBe(binary);
	});

	it('should decode wrapped base64 text', () => {
		expect(unwrapBase64(Buffer.from('U2Fs\ndGVk\n')).toString('latin1')).toBe('Salted');
	});
});
