// ─── Lifecycle Controller Tests ──────────────────────────────────────────────

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { EventEmitter } from 'events';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { LifecycleController, LifecycleDeps } from '../../daemon/lifecycle';
import { Logger } from '../../daemon/log';
import { ProcessIdentity } from '../../daemon/privileges';
import { capturingLogger, FakeSource, recordingSleep } from '../helpers/fakes';

describe('LifecycleController', () => {
	let tempDir: string;
	let configPath: string;
	let pidFile: string;
	let rosterFile: string;
	let outDir: string;
	let signals: EventEmitter;
	let source: FakeSource;
	let logger: Logger;
	let logLines: string[];
	let stderrLines: string[];

	function writeConfig(extra: string = '', directory: string = outDir, outputExtra: string = ''): void {
		fs.writeFileSync(configPath, `
[daemon]
pollInterval = 5
pidFile = "${pidFile}"
${extra}

[meshtastic]
dwellTime = 0

[devices]
file = "${rosterFile}"

[output]
directory = "${directory}"
${outputExtra}

[monitoring]
enableStats = false
`, 'utf-8');
	}

	function controller(deps: LifecycleDeps = {}, foreground: boolean = true): LifecycleController {
		return new LifecycleController({ configPath, foreground }, {
			createSource: () => source,
			createLogger: () => logger,
			identity: null,
			signals,
			stderr: line => stderrLines.push(line),
			...deps,
		});
	}

	beforeEach(() => {
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'lifecycle-test-'));
		configPath = path.join(tempDir, 'config.toml');
		pidFile = path.join(tempDir, 'run', 'mesh-telemetryd.pid');
		rosterFile = path.join(tempDir, 'devices.csv');
		outDir = path.join(tempDir, 'textfile');
		fs.writeFileSync(rosterFile, '!a1,Base\n!b2\n');
		writeConfig();
		signals = new EventEmitter();
		source = new FakeSource({ '!a1': { Battery: 87 } });
		({ logger, lines: logLines } = capturingLogger());
		stderrLines = [];
	});

	afterEach(() => {
		fs.rmSync(tempDir, { recursive: true, force: true });
	});

	it('should stop from the inter-cycle sleep and clean up', async () => {
		let pidDuringRun = '';
		let daemon: LifecycleController | undefined;
		const { sleep, calls } = recordingSleep(() => {
			if (daemon?.getScheduler()?.getState() === 'sleeping') {
				pidDuringRun = fs.readFileSync(pidFile, 'utf-8');
				signals.emit('SIGTERM');
			}
		});
		daemon = controller({ sleep });

		const code = await daemon.start();

		expect(code).toBe(0);
		expect(pidDuringRun).toBe(String(process.pid));
		expect(fs.existsSync(pidFile)).toBe(false);
		expect(source.closeCalls).toBe(1);
		expect(source.connections).toEqual([{ mode: 'serial', address: '/dev/ttyACM0' }]);
		expect(source.fetched).toEqual(['!a1', '!b2']);
		expect(calls).toEqual([1000]);
		expect(signals.listenerCount('SIGTERM')).toBe(0);
		expect(signals.listenerCount('SIGINT')).toBe(0);
		expect(signals.listenerCount('SIGHUP')).toBe(0);
		expect(fs.readFileSync(path.join(outDir, 'meshtastic.prom'), 'utf-8').split('\n')).toEqual([
			'meshtastic_battery{node="!a1"} 87',
			'meshtastic_contact{node="!a1",contact="Base"} 1',
			expect.stringMatching(/^meshtastic_up\{node="!a1",version="[^"]+"\} 1$/),
			expect.stringMatching(/^meshtastic_up\{node="!b2",version="[^"]+"\} 0$/),
			'',
		]);
	});

	it('should apply a reloaded config from the next cycle', async () => {
		const newDir = path.join(tempDir, 'textfile-2');
		let daemon: LifecycleController | undefined;
		let reloadSent = false;
		const { sleep } = recordingSleep(() => {
			if (daemon?.getScheduler()?.getState() !== 'sleeping') {
				return;
			}
			if (!reloadSent) {
				reloadSent = true;
				writeConfig('logLevel = "debug"', newDir);
				signals.emit('SIGHUP');
			} else if (source.fetched.length === 4) {
				signals.emit('SIGTERM');
			}
		});
		daemon = controller({ sleep });

		const code = await daemon.start();

		expect(code).toBe(0);
		expect(source.fetched).toHaveLength(4);
		expect(fs.existsSync(path.join(newDir, 'meshtastic.prom'))).toBe(true);
		expect(daemon.getConfig()?.output.directory).toBe(newDir);
		expect(logger.getLevel()).toBe('debug');
	});

	it('should keep the previous config when a reload fails', async () => {
		let reloaded: boolean | undefined;
		let daemon: LifecycleController | undefined;
		const { sleep } = recordingSleep(() => {
			if (!daemon || daemon.getScheduler()?.getState() !== 'sleeping' || reloaded !== undefined) {
				return;
			}
			fs.writeFileSync(configPath, '[meshtastic]\nmode = "usb"\n');
			reloaded = daemon.reload();
			daemon.stop();
		});
		daemon = controller({ sleep });

		await daemon.start();

		expect(reloaded).toBe(false);
		expect(daemon.getConfig()?.output.directory).toBe(outDir);
		expect(logLines.some(line => line.includes('"msg":"Failed to reload configuration, keeping previous"'))).toBe(true);
	});

	it('should refuse a roster whose ids share a per-node file', async () => {
		fs.writeFileSync(rosterFile, '!a1b2\na1b2\n');
		writeConfig('', outDir, 'individualFiles = true');
		const createSource = vi.fn(() => source);

		const code = await controller({ createSource }).start();

		expect(code).toBe(1);
		expect(createSource).not.toHaveBeenCalled();
		expect(stderrLines).toEqual(['Error: Node ids share an output file: !a1b2, a1b2 → a1b2']);
	});

	it('should reject a reload that would make per-node files collide', async () => {
		fs.writeFileSync(rosterFile, '!a1b2\na1b2\n');
		let reloaded: boolean | undefined;
		let daemon: LifecycleController | undefined;
		const { sleep } = recordingSleep(() => {
			if (!daemon || daemon.getScheduler()?.getState() !== 'sleeping' || reloaded !== undefined) {
				return;
			}
			writeConfig('', outDir, 'individualFiles = true');
			reloaded = daemon.reload();
			daemon.stop();
		});
		daemon = controller({ sleep });

		const code = await daemon.start();

		expect(code).toBe(0);
		expect(reloaded).toBe(false);
		expect(daemon.getConfig()?.output.individualFiles).toBe(false);
		expect(fs.readdirSync(outDir)).toEqual(['meshtastic.prom']);
	});

	it('should exit 1 on an invalid config before logging starts', async () => {
		fs.writeFileSync(configPath, '[daemon]\npollInterval = "often"\n');
		const createLogger = vi.fn(() => logger);

		const code = await controller({ createLogger }).start();

		expect(code).toBe(1);
		expect(createLogger).not.toHaveBeenCalled();
		expect(stderrLines).toHaveLength(1);
		expect(stderrLines[0]).toMatch(/^Configuration error: Configuration validation failed:\ndaemon\.pollInterval: /);
	});

	it('should exit 1 on an empty roster without creating a source', async () => {
		fs.writeFileSync(rosterFile, '# no devices yet\n');
		const createSource = vi.fn(() => source);

		const code = await controller({ createSource }).start();

		expect(code).toBe(1);
		expect(createSource).not.toHaveBeenCalled();
		expect(fs.existsSync(pidFile)).toBe(false);
		expect(signals.listenerCount('SIGTERM')).toBe(0);
		expect(stderrLines).toEqual([`Error: No devices found in ${rosterFile}`]);
	});

	it('should close the source once when it cannot connect', async () => {
		source.connectResult = { ok: false, error: 'no device on /dev/ttyACM0' };

		const code = await controller().start();

		expect(code).toBe(1);
		expect(source.closeCalls).toBe(1);
		expect(source.fetched).toEqual([]);
		expect(fs.existsSync(pidFile)).toBe(false);
		expect(stderrLines).toEqual(['Error: Failed to connect to meshtastic device: no device on /dev/ttyACM0']);
	});

	it('should refuse to start when another live process owns the PID file', async () => {
		fs.mkdirSync(path.dirname(pidFile), { recursive: true });
		fs.writeFileSync(pidFile, String(process.ppid));

		const code = await controller().start();

		expect(code).toBe(1);
		expect(fs.readFileSync(pidFile, 'utf-8')).toBe(String(process.ppid));
		expect(source.connections).toEqual([]);
	});

	it('should stop before the PID file when the privilege drop fails', async () => {
		writeConfig('user = "mesh"');
		const identity: ProcessIdentity = {
			getuid: () => 0,
			getgid: () => 0,
			geteuid: () => 1001,
			seteuid: () => undefined,
			setgroups: () => undefined,
			setgid: () => undefined,
			setuid: () => {
				throw new Error('EPERM');
			},
		};

		const code = await controller({ identity }).start();

		expect(code).toBe(1);
		expect(fs.existsSync(pidFile)).toBe(false);
		expect(stderrLines).toEqual(['Error: Cannot change to user mesh: EPERM']);
	});

	it('should hand off to a detached copy when not in the foreground', async () => {
		const detach = vi.fn(() => 4242);

		const code = await controller({ detach, env: {} }, false).start();

		expect(code).toBe(0);
		expect(detach).toHaveBeenCalledTimes(1);
		expect(source.connections).toEqual([]);
		expect(signals.listenerCount('SIGTERM')).toBe(0);
		expect(fs.existsSync(pidFile)).toBe(false);
	});

	it('should run in place inside the detached copy', async () => {
		const detach = vi.fn(() => 4242);
		let daemon: LifecycleController | undefined;
		const { sleep } = recordingSleep(() => daemon?.stop());
		daemon = controller({ detach, sleep, env: { MESH_TELEMETRYD_DETACHED: '1' } }, false);
		source = new FakeSource();

		const code = await daemon.start();

		expect(code).toBe(0);
		expect(detach).not.toHaveBeenCalled();
		expect(source.fetched).toEqual(['!a1', '!b2']);
	});
});
