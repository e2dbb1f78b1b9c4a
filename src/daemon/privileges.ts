// ─── Privilege Drop ──────────────────────────────────────────────────────────

import { PrivilegeError, errorMessage } from '../errors';
import { Logger } from './log';

/**
 * The identity calls the daemon needs; `process` on POSIX platforms
 */
export interface ProcessIdentity {
	getuid(): number;
	getgid(): number;
	geteuid(): number;
	seteuid(id: string | number): void;
	setgroups(groups: Array<string | number>): void;
	setgid(id: string | number): void;
	setuid(id: string | number): void;
}

export interface PrivilegeTarget {
	user: string;
	group: string;
}

/**
 * Process identity of this platform, or null where there is none (Windows)
 */
export function processIdentity(): ProcessIdentity | null {
	const { getuid, getgid, geteuid, seteuid, setgroups, setgid, setuid } = process;
	if (!getuid || !getgid || !geteuid || !seteuid || !setgroups || !setgid || !setuid) {
		return null;
	}
	return {
		getuid: () => getuid.call(process),
		getgid: () => getgid.call(process),
		geteuid: () => geteuid.call(process),
		seteuid: (id) => seteuid.call(process, id),
		setgroups: (groups) => setgroups.call(process, groups),
		setgid: (id) => setgid.call(process, id),
		setuid: (id) => setuid.call(process, id),
	};
}

function isUnknownCredential(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'ERR_UNKNOWN_CREDENTIAL';
}

/**
 * Numeric id of `user`: switched to briefly as the effective uid, which root
 * can take back
 */
function resolveUid(identity: ProcessIdentity, user: string): number {
	identity.seteuid(user);
	const uid = identity.geteuid();
	identity.seteuid(0);
	return uid;
}

/**
 * Switch to the configured group, then user. Only attempted as root; the
 * user switch comes last because it cannot be undone. Before it, the log
 * file is handed to the new identity so logging and rotation carry on.
 * Returns true if the identity was changed.
 */
export function dropPrivileges(
	target: PrivilegeTarget,
	logger: Logger,
	identity: ProcessIdentity | null = processIdentity()
): boolean {
	if (!target.user && !target.group) {
		return false;
	}

	if (!identity || identity.getuid() !== 0) {
		logger.debug('lifecycle', 'Not running as root, keeping current identity');
		return false;
	}

	if (target.group) {
		try {
			identity.setgroups([target.group]);
			identity.setgid(target.group);
		} catch (error) {
			if (isUnknownCredential(error)) {
				throw new PrivilegeError(`Group not found: ${target.group}`);
			}
			throw new PrivilegeError(`Cannot change to group ${target.group}: ${errorMessage(error)}`);
		}
		logger.info('lifecycle', `Dropped to group: ${target.group}`);
	}

	if (target.user) {
		try {
			const uid = resolveUid(identity, target.user);
			logger.transferOwnership(uid, identity.getgid());
			identity.setuid(uid);
		} catch (error) {
			if (isUnknownCredential(error)) {
				throw new PrivilegeError(`User not found: ${target.user}`);
			}
			throw new PrivilegeError(`Cannot change to user ${target.user}: ${errorMessage(error)}`);
		}
		logger.info('lifecycle', `Dropped to user: ${target.user}`);
	}

	return true;
}
