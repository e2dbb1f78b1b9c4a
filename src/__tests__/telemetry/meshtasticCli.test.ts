// ─── Meshtastic CLI Source Tests ─────────────────────────────────────────────

import { describe, it, expect, beforeEach, vi } from 'vitest';

type ExecCallback = (error: Error | null, stdout: string, stderr: string) => void;

const execFileMock = vi.hoisted(() =>
	vi.fn((_file: string, _args: string[], _options: { timeout?: number }, _callback: ExecCallback): void => undefined)
);

// Mock child_process before importing the source
vi.mock('child_process', () => ({
	execFile: execFileMock,
}));

import { createSilentLogger } from '../../daemon/log';
import { MeshtasticCliSource, parseTelemetryOutput } from '../../telemetry/meshtasticCli';

const TELEMETRY_OUTPUT = [
	'Connected to radio',
	'Sending telemetry request to !a1b2c3d4 on channelIndex:0 (this could take a while)',
	'Telemetry received:',
	'Battery level: 87.00%',
	'Voltage: 4.10 V',
	'Total channel utilization: 12.50%',
	'Transmit air utilization: 1.02%',
	'Uptime: 3600 s',
	'',
].join('\n');

const FILTER = /Battery|Voltage|utilization/;

function replyWith(stdout: string): void {
	execFileMock.mockImplementation((_file, _args, _options, callback) => callback(null, stdout, ''));
}

describe('parseTelemetryOutput', () => {
	it('should keep matching readings and drop units', () => {
		expect(parseTelemetryOutput(TELEMETRY_OUTPUT, FILTER)).toEqual({
			'Battery level': '87.00',
			'Voltage': '4.10',
			'Total channel utilization': '12.50',
			'Transmit air utilization': '1.02',
		});
	});

	it('should keep non-numeric values as text', () => {
		expect(parseTelemetryOutput('Voltage: unknown\n', FILTER)).toEqual({ Voltage: 'unknown' });
	});

	it('should return nothing for output without readings', () => {
		expect(parseTelemetryOutput('Connected to radio\nTimed out waiting for telemetry\n', FILTER)).toEqual({});
	});
});

describe('MeshtasticCliSource', () => {
	let source: MeshtasticCliSource;

	beforeEach(() => {
		execFileMock.mockReset();
		source = new MeshtasticCliSource(
			{ command: 'meshtastic', telemetryFilter: 'Battery|Voltage|utilization' },
			createSilentLogger()
		);
	});

	it('should check the CLI on connect', async () => {
		replyWith('2.3.11\n');
		expect(await source.connect('serial', '/dev/ttyUSB0')).toEqual({ ok: true });
		expect(execFileMock).toHaveBeenCalledTimes(1);
		expect(execFileMock.mock.calls[0][0]).toBe('meshtastic');
		expect(execFileMock.mock.calls[0][1]).toEqual(['--version']);
	});

	it('should report a missing CLI', async () => {
		execFileMock.mockImplementation((_file, _args, _options, callback) =>
			callback(new Error('spawn meshtastic ENOENT'), '', '')
		);
		expect(await source.connect('serial', '/dev/ttyUSB0')).toEqual({
			ok: false,
			error: 'Cannot run meshtastic: spawn meshtastic ENOENT',
		});
	});

	it('should return an empty reading before connect', async () => {
		expect(await source.fetch('!a1b2c3d4', 30)).toEqual({});
		expect(execFileMock).not.toHaveBeenCalled();
	});

	it('should request telemetry over the serial port', async () => {
		replyWith('2.3.11\n');
		await source.connect('serial', '/dev/ttyUSB0');
		replyWith(TELEMETRY_OUTPUT);

		const reading = await source.fetch('!a1b2c3d4', 30);

		expect(reading['Battery level']).toBe('87.00');
		const [file, args, options] = execFileMock.mock.calls[1];
		expect(file).toBe('meshtastic');
		expect(args).toEqual(['--port', '/dev/ttyUSB0', '--request-telemetry', '--dest', '!a1b2c3d4']);
		expect(options.timeout).toBe(30000);
	});

	it('should request telemetry over TCP in ip mode', async () => {
		replyWith('2.3.11\n');
		await source.connect('ip', '192.168.1.50');
		replyWith(TELEMETRY_OUTPUT);

		await source.fetch('!0000beef', 10);

		expect(execFileMock.mock.calls[1][1]).toEqual(['--host', '192.168.1.50', '--request-telemetry', '--dest', '!0000beef']);
	});

	it('should return an empty reading when the request fails', async () => {
		replyWith('2.3.11\n');
		await source.connect('serial', '/dev/ttyUSB0');
		execFileMock.mockImplementation((_file, _args, _options, callback) =>
			callback(new Error('Command failed: timed out'), '', '')
		);

		expect(await source.fetch('!a1b2c3d4', 30)).toEqual({});
	});

	it('should stop issuing requests after close', async () => {
		replyWith('2.3.11\n');
		await source.connect('serial', '/dev/ttyUSB0');
		await source.close();

		expect(await source.fetch('!a1b2c3d4', 30)).toEqual({});
		expect(execFileMock).toHaveBeenCalledTimes(1);
	});
});
