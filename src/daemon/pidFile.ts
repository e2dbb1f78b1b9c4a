// ─── PID File ────────────────────────────────────────────────────────────────

import * as fs from 'fs';
import * as path from 'path';
import { PidFileError, errorMessage } from '../errors';

/**
 * Check if a process exists (signal 0 only probes)
 */
export function isProcessRunning(pid: number): boolean {
	try {
		process.kill(pid, 0);
		return true;
	} catch (error) {
		// EPERM: the process exists but belongs to someone else
		return error instanceof Error && 'code' in error && error.code === 'EPERM';
	}
}

/**
 * PID recorded in the file, or null when absent or unparsable
 */
export function readPid(pidFile: string): number | null {
	if (!fs.existsSync(pidFile)) {
		return null;
	}
	const pid = parseInt(fs.readFileSync(pidFile, 'utf-8').trim(), 10);
	return Number.isNaN(pid) || pid <= 0 ? null : pid;
}

/**
 * PID of the live process owning the file; a stale file is reported as null
 */
export function getRunningPid(pidFile: string): number | null {
	const pid = readPid(pidFile);
	if (pid === null || !isProcessRunning(pid)) {
		return null;
	}
	return pid;
}

/**
 * Write the PID file, refusing to take over one held by another live process
 */
export function writePidFile(pidFile: string, pid: number = process.pid): void {
	const existing = getRunningPid(pidFile);
	if (existing !== null && existing !== pid) {
		throw new PidFileError(`Daemon already running (PID: ${existing})`, existing);
	}

	try {
		const dir = path.dirname(pidFile);
		if (!fs.existsSync(dir)) {
			fs.mkdirSync(dir, { recursive: true });
		}
		fs.writeFileSync(pidFile, String(pid), 'utf-8');
	} catch (error) {
		throw new PidFileError(`Failed to write PID file ${pidFile}: ${errorMessage(error)}`);
	}
}

export function removePidFile(pidFile: string): void {
	fs.rmSync(pidFile, { force: true });
}

/**
 * Send a signal to the daemon named by the PID file; returns its PID, or null if not running
 */
export function signalDaemon(pidFile: string, signal: NodeJS.Signals): number | null {
	const pid = getRunningPid(pidFile);
	if (pid === null) {
		return null;
	}
	process.kill(pid, signal);
	return pid;
}
