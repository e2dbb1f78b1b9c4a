// ─── Metric Rendering ────────────────────────────────────────────────────────

import { NodeIdFormat } from '../daemon/config';
import { VERSION } from '../version';
import { Device, MetricLine, TelemetryReading } from './types';

export interface RenderOptions {
	prefix: string;
	nodeIdFormat: NodeIdFormat;
	/** Build identifier carried on the `up` metric */
	version: string;
}

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
	prefix: 'meshtastic',
	nodeIdFormat: 'default',
	version: VERSION,
};

export type ClassifiedValue =
	| { kind: 'numeric'; text: string }
	| { kind: 'text'; text: string };

const NUMERIC_PATTERN = /^[+-]?[0-9]+(\.[0-9]*)?$/;

/**
 * Decide whether a reading is emitted as a sample value or as a `str` label.
 * Strings count as numeric when they look like a signed decimal (`73`, `-1.5`, `+4.`).
 */
export function classifyValue(value: number | string): ClassifiedValue {
	if (typeof value === 'number') {
		if (Number.isFinite(value)) {
			return { kind: 'numeric', text: String(value) };
		}
		return { kind: 'text', text: String(value) };
	}

	const trimmed = value.trim();
	if (NUMERIC_PATTERN.test(trimmed)) {
		return { kind: 'numeric', text: trimmed };
	}
	return { kind: 'text', text: value };
}

export function formatNodeId(nodeId: string, format: NodeIdFormat): string {
	return format === 'clean' ? nodeId.replace(/!/g, '') : nodeId;
}

export function metricName(prefix: string, key: string): string {
	return `${prefix}_${key.toLowerCase().replace(/ /g, '_')}`;
}

/**
 * Render one device's readings and metadata. Order: readings, contact, location,
 * latitude, longitude, then the `up` metric.
 */
export function renderNodeMetrics(
	device: Device,
	reading: TelemetryReading,
	options: RenderOptions = DEFAULT_RENDER_OPTIONS
): MetricLine[] {
	const node = formatNodeId(device.nodeId, options.nodeIdFormat);
	const lines: MetricLine[] = [];

	const keys = Object.keys(reading);
	for (const key of keys) {
		const name = metricName(options.prefix, key);
		const classified = classifyValue(reading[key]);
		if (classified.kind === 'numeric') {
			lines.push({ name, labels: { node }, value: classified.text });
		} else {
			lines.push({ name, labels: { node, str: classified.text }, value: '1' });
		}
	}

	if (device.contactName) {
		lines.push({
			name: `${options.prefix}_contact`,
			labels: { node, contact: device.contactName },
			value: '1',
		});
	}
	if (device.location) {
		lines.push({
			name: `${options.prefix}_location`,
			labels: { node, location: device.location },
			value: '1',
		});
	}
	if (device.latitude) {
		lines.push({ name: `${options.prefix}_latitude`, labels: { node }, value: device.latitude });
	}
	if (device.longitude) {
		lines.push({ name: `${options.prefix}_longitude`, labels: { node }, value: device.longitude });
	}

	lines.push({
		name: `${options.prefix}_up`,
		labels: { node, version: options.version },
		value: keys.length > 0 ? '1' : '0',
	});

	return lines;
}
