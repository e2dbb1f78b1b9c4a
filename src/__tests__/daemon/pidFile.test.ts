// ─── PID File Tests ──────────────────────────────────────────────────────────

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { getRunningPid, isProcessRunning, readPid, removePidFile, writePidFile } from '../../daemon/pidFile';
import { PidFileError } from '../../errors';

// Far above any default pid_max
const DEAD_PID = 2 ** 30;

describe('PID file', () => {
	let tempDir: string;
	let pidFile: string;

	beforeEach(() => {
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pid-file-test-'));
		pidFile = path.join(tempDir, 'run', 'daemon.pid');
	});

	afterEach(() => {
		fs.rmSync(tempDir, { recursive: true, force: true });
	});

	it('should write the current PID and create the directory', () => {
		writePidFile(pidFile);
		expect(fs.readFileSync(pidFile, 'utf-8')).toBe(String(process.pid));
		expect(readPid(pidFile)).toBe(process.pid);
		expect(getRunningPid(pidFile)).toBe(process.pid);
	});

	it('should overwrite a stale PID file', () => {
		fs.mkdirSync(path.dirname(pidFile), { recursive: true });
		fs.writeFileSync(pidFile, String(DEAD_PID));

		expect(getRunningPid(pidFile)).toBeNull();
		writePidFile(pidFile);
		expect(readPid(pidFile)).toBe(process.pid);
	});

	it('should refuse a PID file owned by another live process', () => {
		fs.mkdirSync(path.dirname(pidFile), { recursive: true });
		fs.writeFileSync(pidFile, String(process.ppid));

		expect(() => writePidFile(pidFile)).toThrow(PidFileError);
		expect(() => writePidFile(pidFile)).toThrow(`Daemon already running (PID: ${process.ppid})`);
	});

	it('should treat unparsable content as no PID', () => {
		fs.mkdirSync(path.dirname(pidFile), { recursive: true });
		fs.writeFileSync(pidFile, 'not-a-pid\n');
		expect(readPid(pidFile)).toBeNull();
	});

	it('should remove the file and tolerate a missing one', () => {
		writePidFile(pidFile);
		removePidFile(pidFile);
		expect(fs.existsSync(pidFile)).toBe(false);
		expect(() => removePidFile(pidFile)).not.toThrow();
	});

	it('should probe processes', () => {
		expect(isProcessRunning(process.pid)).toBe(true);
		expect(isProcessRunning(DEAD_PID)).toBe(false);
	});
});
