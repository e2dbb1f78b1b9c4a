// ─── Structured Logging ──────────────────────────────────────────────────────

import * as fs from 'fs';
import * as path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
	ts: string;
	level: LogLevel;
	component: string;
	msg: string;
	data?: unknown;
}

export interface LoggerOptions {
	level?: LogLevel;
	logFile?: string;
	foreground?: boolean;
	/** Receives every formatted line instead of stdout (tests, embedding) */
	sink?: (line: string) => void;
	/** Rotate once the file reaches this size (default 50MB) */
	maxFileSize?: number;
	/** Rotated files kept beside the log (default 5) */
	maxBackups?: number;
}

const LOG_LEVELS: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

/**
 * Logger - JSON-line logging for the collector
 *
 * The log file is opened once and written through the same descriptor, so
 * the daemon keeps logging after it gives up root. `transferOwnership` hands
 * the file (and a directory the logger created) to the unprivileged identity
 * so rotation keeps working too.
 */
export class Logger {
	private level: LogLevel;
	private readonly logFile?: string;
	private readonly foreground: boolean;
	private readonly sink?: (line: string) => void;
	private readonly maxFileSize: number;
	private readonly maxBackups: number;
	private fd: number | null = null;
	private size = 0;
	private createdDir = false;

	constructor(options: LoggerOptions = {}) {
		this.level = options.level || 'info';
		this.logFile = options.logFile || undefined;
		this.foreground = options.foreground ?? false;
		this.sink = options.sink;
		this.maxFileSize = options.maxFileSize ?? 50 * 1024 * 1024;
		this.maxBackups = Math.max(1, options.maxBackups ?? 5);

		if (this.logFile && !this.sink) {
			const dir = path.dirname(this.logFile);
			if (!fs.existsSync(dir)) {
				fs.mkdirSync(dir, { recursive: true });
				this.createdDir = true;
			}
			this.open();
		}
	}

	log(level: LogLevel, component: string, msg: string, data?: unknown): void {
		if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) {
			return;
		}

		const entry: LogEntry = {
			ts: new Date().toISOString(),
			level,
			component,
			msg,
		};
		if (data !== undefined) {
			entry.data = data;
		}
		const line = JSON.stringify(entry);

		if (this.sink) {
			this.sink(line);
			return;
		}

		if (this.foreground || !this.logFile) {
			console.log(line);
		}
		if (this.logFile) {
			this.writeToFile(line);
		}
	}

	debug(component: string, msg: string, data?: unknown): void {
		this.log('debug', component, msg, data);
	}

	info(component: string, msg: string, data?: unknown): void {
		this.log('info', component, msg, data);
	}

	warn(component: string, msg: string, data?: unknown): void {
		this.log('warn', component, msg, data);
	}

	error(component: string, msg: string, data?: unknown): void {
		this.log('error', component, msg, data);
	}

	setLevel(level: LogLevel): void {
		if (level === this.level) {
			return;
		}
		this.level = level;
		this.info('logger', `Log level changed to ${level}`);
	}

	getLevel(): LogLevel {
		return this.level;
	}

	/**
	 * Give the log file, its backups and a directory this logger created to
	 * `uid`/`gid`. Call while still privileged. Returns the paths changed.
	 */
	transferOwnership(uid: number, gid: number): string[] {
		if (!this.logFile || this.sink) {
			return [];
		}

		const paths: string[] = [];
		if (this.createdDir) {
			paths.push(path.dirname(this.logFile));
		}
		for (const candidate of [this.logFile, ...this.backupPaths()]) {
			if (fs.existsSync(candidate)) {
				paths.push(candidate);
			}
		}

		for (const target of paths) {
			fs.chownSync(target, uid, gid);
		}
		return paths;
	}

	/**
	 * Close the log file; a later line reopens it
	 */
	close(): void {
		if (this.fd === null) {
			return;
		}
		const fd = this.fd;
		this.fd = null;
		fs.closeSync(fd);
	}

	private open(): void {
		if (!this.logFile) {
			return;
		}
		this.fd = fs.openSync(this.logFile, 'a', 0o640);
		this.size = fs.fstatSync(this.fd).size;
	}

	private backupPaths(): string[] {
		const backups: string[] = [];
		for (let i = 1; i <= this.maxBackups; i++) {
			backups.push(`${this.logFile}.${i}`);
		}
		return backups;
	}

	private writeToFile(line: string): void {
		try {
			if (this.fd === null) {
				this.open();
			}
			if (this.size >= this.maxFileSize) {
				this.rotate();
			}
			if (this.fd === null) {
				return;
			}
			const data = line + '\n';
			fs.writeSync(this.fd, data);
			this.size += Buffer.byteLength(data);
		} catch (error) {
			console.error('Failed to write to log file:', error);
			console.log(line);
		}
	}

	/**
	 * daemon.log → daemon.log.1 → … → daemon.log.N, then reopen. If the new
	 * file cannot be opened, writing continues through the old descriptor.
	 */
	private rotate(): void {
		if (!this.logFile) {
			return;
		}

		try {
			const oldest = `${this.logFile}.${this.maxBackups}`;
			if (fs.existsSync(oldest)) {
				fs.unlinkSync(oldest);
			}
			for (let i = this.maxBackups - 1; i >= 1; i--) {
				const from = `${this.logFile}.${i}`;
				if (fs.existsSync(from)) {
					fs.renameSync(from, `${this.logFile}.${i + 1}`);
				}
			}
			fs.renameSync(this.logFile, `${this.logFile}.1`);

			const previous = this.fd;
			this.open();
			if (previous !== null) {
				fs.closeSync(previous);
			}
		} catch (error) {
			console.error('Failed to rotate log file:', error);
			// Try again only after another full file's worth
			this.size = 0;
		}
	}
}

/**
 * Logger that drops everything (one-shot commands, tests)
 */
export function createSilentLogger(): Logger {
	return new Logger({ level: 'error', sink: () => undefined });
}
