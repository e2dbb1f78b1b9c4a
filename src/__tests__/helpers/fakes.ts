// ─── Test Doubles ────────────────────────────────────────────────────────────

import { SourceMode } from '../../daemon/config';
import { Logger } from '../../daemon/log';
import { Sleep } from '../../daemon/runFlag';
import { Device, TelemetryReading } from '../../metrics/types';
import { ConnectResult, TelemetrySource } from '../../telemetry/source';

export function device(nodeId: string, contactName: string = ''): Device {
	return { nodeId, contactName, location: '', latitude: '', longitude: '' };
}

/**
 * In-memory telemetry source with canned readings per node
 */
export class FakeSource implements TelemetrySource {
	readonly fetched: string[] = [];
	readonly connections: Array<{ mode: SourceMode; address: string }> = [];
	closeCalls = 0;
	connectResult: ConnectResult = { ok: true };
	failingNodes = new Set<string>();

	constructor(private readonly readings: Record<string, TelemetryReading> = {}) {}

	async connect(mode: SourceMode, address: string): Promise<ConnectResult> {
		this.connections.push({ mode, address });
		return this.connectResult;
	}

	async fetch(nodeId: string): Promise<TelemetryReading> {
		this.fetched.push(nodeId);
		if (this.failingNodes.has(nodeId)) {
			throw new Error(`radio error for ${nodeId}`);
		}
		return this.readings[nodeId] ?? {};
	}

	async close(): Promise<void> {
		this.closeCalls++;
	}
}

/**
 * Sleep that returns immediately and records each requested duration
 */
export function recordingSleep(onSleep: (ms: number) => void = () => undefined): { sleep: Sleep; calls: number[] } {
	const calls: number[] = [];
	const sleep: Sleep = async (ms) => {
		calls.push(ms);
		onSleep(ms);
	};
	return { sleep, calls };
}

/**
 * Logger that keeps its JSON lines in memory
 */
export function capturingLogger(): { logger: Logger; lines: string[] } {
	const lines: string[] = [];
	return { logger: new Logger({ level: 'debug', sink: line => lines.push(line) }), lines };
}
