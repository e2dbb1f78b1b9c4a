// ─── Exposition Format ───────────────────────────────────────────────────────

import { MetricLine } from './types';

export const EXPOSITION_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';

export function escapeLabelValue(value: string): string {
	return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

/**
 * Format one line as `name{k1="v1",k2="v2"} value`
 */
export function formatMetricLine(line: MetricLine): string {
	const labels = Object.entries(line.labels)
		.map(([key, value]) => `${key}="${escapeLabelValue(value)}"`)
		.join(',');
	return labels ? `${line.name}{${labels}} ${line.value}` : `${line.name} ${line.value}`;
}

/**
 * Newline-terminated exposition text; empty input renders as ''
 */
export function renderExposition(lines: readonly MetricLine[]): string {
	if (lines.length === 0) {
		return '';
	}
	return lines.map(formatMetricLine).join('\n') + '\n';
}
