// ─── Meshtastic CLI Telemetry Source ─────────────────────────────────────────

import * as cp from 'child_process';
import { MeshtasticSection, SourceMode } from '../daemon/config';
import { Logger } from '../daemon/log';
import { errorMessage } from '../errors';
import { TelemetryReading } from '../metrics/types';
import { ConnectResult, TelemetrySource } from './source';

export interface MeshtasticCliOptions {
	/** Executable name or path of the meshtastic CLI */
	command: string;
	/** Regular expression matched against each reading name */
	telemetryFilter: string;
}

interface CommandOutput {
	stdout: string;
	stderr: string;
}

const READING_LINE = /^([A-Za-z][A-Za-z0-9 _]*):\s*(.+)$/;
const VALUE_WITH_UNIT = /^([+-]?\d+(?:\.\d*)?)\s*(?:%|[A-Za-z]+)?$/;

/**
 * Extract `Key: value` readings from `meshtastic --request-telemetry` output.
 * Units after a numeric value (`100.00%`, `4.20 V`, `12 s`) are dropped.
 */
export function parseTelemetryOutput(output: string, filter: RegExp): Record<string, string> {
	const reading: Record<string, string> = {};

	for (const rawLine of output.split(/\r?\n/)) {
		const match = READING_LINE.exec(rawLine.trim());
		if (!match) {
			continue;
		}

		const key = match[1].trim();
		if (!filter.test(key)) {
			continue;
		}

		const value = match[2].trim();
		const numeric = VALUE_WITH_UNIT.exec(value);
		reading[key] = numeric ? numeric[1] : value;
	}

	return reading;
}

function runCommand(file: string, args: string[], timeoutMs: number): Promise<CommandOutput> {
	return new Promise((resolve, reject) => {
		cp.execFile(file, args, { timeout: timeoutMs, maxBuffer: 1024 * 1024, encoding: 'utf-8' }, (error, stdout, stderr) => {
			if (error) {
				reject(error);
				return;
			}
			resolve({ stdout, stderr });
		});
	});
}

/**
 * MeshtasticCliSource - Requests telemetry by running the meshtastic CLI,
 * one process per node, against a serial port or a TCP host
 */
export class MeshtasticCliSource implements TelemetrySource {
	private connectionArgs: string[] | null = null;
	private readonly filter: RegExp;

	constructor(
		private readonly options: MeshtasticCliOptions,
		private readonly logger: Logger
	) {
		this.filter = new RegExp(options.telemetryFilter);
	}

	static fromConfig(meshtastic: MeshtasticSection, logger: Logger): MeshtasticCliSource {
		return new MeshtasticCliSource(
			{ command: meshtastic.command, telemetryFilter: meshtastic.telemetryFilter },
			logger
		);
	}

	async connect(mode: SourceMode, address: string): Promise<ConnectResult> {
		if (mode !== 'serial' && mode !== 'ip') {
			return { ok: false, error: `Invalid mode: ${String(mode)}` };
		}

		try {
			const { stdout } = await runCommand(this.options.command, ['--version'], 15000);
			this.logger.debug('source', 'meshtastic CLI available', { version: stdout.trim() });
		} catch (error) {
			return { ok: false, error: `Cannot run ${this.options.command}: ${errorMessage(error)}` };
		}

		this.connectionArgs = mode === 'serial' ? ['--port', address] : ['--host', address];
		this.logger.info('source', `Using meshtastic device via ${mode} at ${address}`);
		return { ok: true };
	}

	async fetch(nodeId: string, timeoutSeconds: number): Promise<TelemetryReading> {
		if (!this.connectionArgs) {
			return {};
		}

		try {
			this.logger.debug('source', `Requesting telemetry from ${nodeId}`);
			const { stdout } = await runCommand(
				this.options.command,
				[...this.connectionArgs, '--request-telemetry', '--dest', nodeId],
				timeoutSeconds * 1000
			);
			const reading = parseTelemetryOutput(stdout, this.filter);
			if (Object.keys(reading).length === 0) {
				this.logger.debug('source', `No telemetry data available for ${nodeId}`);
			}
			return reading;
		} catch (error) {
			this.logger.debug('source', `Failed to get telemetry from ${nodeId}`, { error: errorMessage(error) });
			return {};
		}
	}

	async close(): Promise<void> {
		this.connectionArgs = null;
	}
}
