// ─── Telemetry Source ────────────────────────────────────────────────────────

import { SourceMode } from '../daemon/config';
import { TelemetryReading } from '../metrics/types';

export type ConnectResult = { ok: true } | { ok: false; error: string };

/**
 * Transport to the mesh. fetch() never rejects: any failure yields an empty reading.
 */
export interface TelemetrySource {
	connect(mode: SourceMode, address: string): Promise<ConnectResult>;
	fetch(nodeId: string, timeoutSeconds: number): Promise<TelemetryReading>;
	close(): Promise<void>;
}
