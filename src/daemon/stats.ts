// ─── Daemon Statistics ───────────────────────────────────────────────────────

import * as fs from 'fs';
import * as path from 'path';
import { writeFileAtomic } from '../sinks/atomicWrite';

export interface DaemonStats {
	startTime: string | null;
	lastPollTime: string | null;
	totalPolls: number;
	successfulPolls: number;
	failedPolls: number;
	nodesProcessed: number;
	nodesSuccessful: number;
	pushSuccessful: number;
	pushFailed: number;
}

export function emptyStats(): DaemonStats {
	return {
		startTime: null,
		lastPollTime: null,
		totalPolls: 0,
		successfulPolls: 0,
		failedPolls: 0,
		nodesProcessed: 0,
		nodesSuccessful: 0,
		pushSuccessful: 0,
		pushFailed: 0,
	};
}

/**
 * StatsTracker - Counters for the poll loop; only the loop mutates them
 */
export class StatsTracker {
	private stats: DaemonStats = emptyStats();

	constructor(private readonly now: () => Date = () => new Date()) {}

	markStarted(): void {
		this.stats.startTime = this.now().toISOString();
	}

	recordCycle(nodesProcessed: number, nodesSuccessful: number): void {
		this.stats.lastPollTime = this.now().toISOString();
		this.stats.totalPolls++;
		this.stats.nodesProcessed += nodesProcessed;
		this.stats.nodesSuccessful += nodesSuccessful;

		if (nodesSuccessful > 0) {
			this.stats.successfulPolls++;
		} else {
			this.stats.failedPolls++;
		}
	}

	recordPush(ok: boolean): void {
		if (ok) {
			this.stats.pushSuccessful++;
		} else {
			this.stats.pushFailed++;
		}
	}

	snapshot(): DaemonStats {
		return { ...this.stats };
	}

	/**
	 * Rewrite the stats file wholesale
	 */
	async persist(statsFile: string): Promise<void> {
		await fs.promises.mkdir(path.dirname(statsFile), { recursive: true });
		await writeFileAtomic(statsFile, JSON.stringify(this.stats, null, 2) + '\n');
	}
}

/**
 * Read a stats file written by a running daemon; null when absent
 */
export function readStatsFile(statsFile: string): DaemonStats | null {
	if (!fs.existsSync(statsFile)) {
		return null;
	}
	const parsed: unknown = JSON.parse(fs.readFileSync(statsFile, 'utf-8'));
	const stats = emptyStats();
	if (parsed === null || typeof parsed !== 'object') {
		return stats;
	}
	for (const [key, value] of Object.entries(parsed)) {
		if (key === 'startTime' || key === 'lastPollTime') {
			stats[key] = typeof value === 'string' ? value : null;
		} else if (isCounterKey(key) && typeof value === 'number') {
			stats[key] = value;
		}
	}
	return stats;
}

type CounterKey = Exclude<keyof DaemonStats, 'startTime' | 'lastPollTime'>;

const COUNTER_KEYS: readonly string[] = [
	'totalPolls', 'successfulPolls', 'failedPolls', 'nodesProcessed',
	'nodesSuccessful', 'pushSuccessful', 'pushFailed',
] satisfies readonly CounterKey[];

function isCounterKey(key: string): key is CounterKey {
	return COUNTER_KEYS.includes(key);
}
