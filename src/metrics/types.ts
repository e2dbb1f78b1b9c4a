// ─── Metric Types ────────────────────────────────────────────────────────────

/**
 * A roster entry; only nodeId is guaranteed to be non-empty
 */
export interface Device {
	readonly nodeId: string;
	readonly contactName: string;
	readonly location: string;
	readonly latitude: string;
	readonly longitude: string;
}

/**
 * Telemetry of one node for one cycle, keyed by reading name in arrival order
 */
export type TelemetryReading = Readonly<Record<string, number | string>>;

export interface MetricLine {
	readonly name: string;
	/** Insertion-ordered; `node` always comes first */
	readonly labels: Readonly<Record<string, string>>;
	/** Sample value, already formatted for the exposition format */
	readonly value: string;
}

export interface NodeMetrics {
	readonly nodeId: string;
	readonly lines: readonly MetricLine[];
}

/**
 * Complete rendered output of one poll cycle, in roster order
 */
export interface Snapshot {
	readonly takenAt: string;
	readonly nodes: readonly NodeMetrics[];
}

export function snapshotLines(snapshot: Snapshot): MetricLine[] {
	return snapshot.nodes.flatMap(node => node.lines);
}
