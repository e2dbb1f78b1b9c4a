// ─── Error Types ─────────────────────────────────────────────────────────────

export type DaemonErrorCode =
	| 'CONFIG_INVALID'
	| 'ROSTER_INVALID'
	| 'ROSTER_DECRYPT'
	| 'PUBLISH_FAILED'
	| 'PRIVILEGE_DROP'
	| 'PID_FILE'
	| 'STARTUP';

/**
 * Base class for every error the daemon raises on purpose
 */
export class DaemonError extends Error {
	constructor(message: string, public readonly code: DaemonErrorCode) {
		super(message);
		this.name = new.target.name;
	}
}

export class ConfigError extends DaemonError {
	constructor(message: string, public readonly problems: string[] = []) {
		super(message, 'CONFIG_INVALID');
	}
}

export class RosterError extends DaemonError {
	constructor(message: string, public readonly line?: number) {
		super(message, 'ROSTER_INVALID');
	}
}

export class RosterDecryptError extends DaemonError {
	constructor(message: string) {
		super(message, 'ROSTER_DECRYPT');
	}
}

export class SnapshotPublishError extends DaemonError {
	constructor(message: string, public readonly failedPaths: string[] = []) {
		super(message, 'PUBLISH_FAILED');
	}
}

export class PrivilegeError extends DaemonError {
	constructor(message: string) {
		super(message, 'PRIVILEGE_DROP');
	}
}

export class PidFileError extends DaemonError {
	constructor(message: string, public readonly pid?: number) {
		super(message, 'PID_FILE');
	}
}

export class StartupError extends DaemonError {
	constructor(message: string) {
		super(message, 'STARTUP');
	}
}

/**
 * Human-readable text for anything caught in a catch clause
 */
export function errorMessage(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}
	return String(error);
}
