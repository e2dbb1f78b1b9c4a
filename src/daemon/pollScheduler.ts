// ─── Poll Scheduler ──────────────────────────────────────────────────────────

import { errorMessage } from '../errors';
import { renderNodeMetrics, RenderOptions } from '../metrics/renderer';
import { Device, NodeMetrics, Snapshot, TelemetryReading } from '../metrics/types';
import { TelemetrySource } from '../telemetry/source';
import { VERSION } from '../version';
import { DaemonConfig } from './config';
import { DeliveryCoordinator, DeliveryResult } from './deliveryCoordinator';
import { Logger } from './log';
import { RunFlag, Sleep, realSleep, sleepWhileRunning } from './runFlag';
import { StatsTracker } from './stats';

export type PollState =
	| 'idle'
	| 'polling'
	| 'dwell'
	| 'delivering'
	| 'sleeping'
	| 'cooldown'
	| 'stopping'
	| 'stopped';

export interface PollSchedulerDeps {
	roster: readonly Device[];
	source: TelemetrySource;
	coordinator: DeliveryCoordinator;
	stats: StatsTracker;
	runFlag: RunFlag;
	/** Read once per cycle, so a reload applies from the next cycle on */
	getConfig: () => DaemonConfig;
	logger: Logger;
	sleep?: Sleep;
	version?: string;
}

export interface CycleResult {
	/** False when a stop interrupted the cycle before the roster was exhausted */
	completed: boolean;
	nodesProcessed: number;
	nodesSuccessful: number;
	snapshot?: Snapshot;
	delivery?: DeliveryResult;
}

/**
 * PollScheduler - Sequential poll loop over the roster
 *
 * One device at a time: fetch, render, dwell. After the last device the
 * snapshot is delivered and the loop sleeps until the next cycle.
 */
export class PollScheduler {
	private state: PollState = 'idle';
	private readonly sleep: Sleep;
	private readonly version: string;

	constructor(private readonly deps: PollSchedulerDeps) {
		this.sleep = deps.sleep ?? realSleep;
		this.version = deps.version ?? VERSION;
	}

	/**
	 * Reports 'stopping' as soon as the run flag is cleared, including while
	 * a fetch or delivery is still in flight
	 */
	getState(): PollState {
		if (this.state !== 'idle' && this.state !== 'stopped' && !this.deps.runFlag.isSet()) {
			return 'stopping';
		}
		return this.state;
	}

	/**
	 * Run cycles until the run flag is cleared. Cycle errors are logged and
	 * retried after a cooldown; this never rejects because of them.
	 */
	async run(): Promise<void> {
		const { runFlag, logger } = this.deps;
		logger.info('scheduler', `Starting polling loop with ${this.deps.getConfig().daemon.pollInterval}s interval`, {
			devices: this.deps.roster.length,
		});

		while (runFlag.isSet()) {
			try {
				await this.runCycle();
				if (!runFlag.isSet()) {
					break;
				}
				this.state = 'sleeping';
				await sleepWhileRunning(this.deps.getConfig().daemon.pollInterval, runFlag, this.sleep);
			} catch (error) {
				logger.error('scheduler', 'Error during polling', { error: errorMessage(error) });
				if (runFlag.isSet()) {
					this.state = 'cooldown';
					await sleepWhileRunning(this.deps.getConfig().daemon.errorCooldown, runFlag, this.sleep);
				}
			}
		}

		this.state = 'stopping';
		logger.info('scheduler', 'Polling loop stopped');
		this.state = 'stopped';
	}

	/**
	 * Poll every device once and deliver the result
	 */
	async runCycle(): Promise<CycleResult> {
		const { roster, runFlag, logger, stats, coordinator } = this.deps;
		const config = this.deps.getConfig();
		const renderOptions: RenderOptions = {
			prefix: 'meshtastic',
			nodeIdFormat: config.output.nodeIdFormat,
			version: this.version,
		};
		const dwellTime = config.meshtastic.dwellTime;

		logger.info('scheduler', `Starting poll of ${roster.length} devices`);

		const nodes: NodeMetrics[] = [];
		let nodesSuccessful = 0;

		for (let i = 0; i < roster.length; i++) {
			if (!runFlag.isSet()) {
				this.state = 'stopping';
				break;
			}

			const device = roster[i];
			this.state = 'polling';
			logger.debug('scheduler', `Processing node: ${device.nodeId}`);

			const reading = await this.fetchReading(device.nodeId, config.meshtastic.fetchTimeout);
			if (Object.keys(reading).length > 0) {
				nodesSuccessful++;
				logger.debug('scheduler', `Collected telemetry from ${device.nodeId}`);
			} else {
				logger.warn('scheduler', `No telemetry data from ${device.nodeId}`);
			}

			nodes.push({ nodeId: device.nodeId, lines: renderNodeMetrics(device, reading, renderOptions) });

			if (i < roster.length - 1 && dwellTime > 0 && runFlag.isSet()) {
				this.state = 'dwell';
				await sleepWhileRunning(dwellTime, runFlag, this.sleep);
			}
		}

		if (nodes.length < roster.length) {
			logger.info('scheduler', `Poll interrupted after ${nodes.length}/${roster.length} nodes, snapshot discarded`);
			return { completed: false, nodesProcessed: nodes.length, nodesSuccessful };
		}

		const snapshot: Snapshot = { takenAt: new Date().toISOString(), nodes };

		this.state = 'delivering';
		const delivery = await coordinator.deliver(snapshot);

		stats.recordCycle(nodes.length, nodesSuccessful);
		await this.persistStats(config);

		logger.info('scheduler', `Poll completed: ${nodesSuccessful}/${nodes.length} nodes successful`, {
			fileOk: delivery.fileOk,
			pushOk: delivery.pushOk,
		});

		return { completed: true, nodesProcessed: nodes.length, nodesSuccessful, snapshot, delivery };
	}

	private async fetchReading(nodeId: string, timeoutSeconds: number): Promise<TelemetryReading> {
		try {
			return await this.deps.source.fetch(nodeId, timeoutSeconds);
		} catch (error) {
			this.deps.logger.warn('scheduler', `Telemetry fetch failed for ${nodeId}`, { error: errorMessage(error) });
			return {};
		}
	}

	private async persistStats(config: DaemonConfig): Promise<void> {
		if (!config.monitoring.enableStats || !config.monitoring.statsFile) {
			return;
		}
		try {
			await this.deps.stats.persist(config.monitoring.statsFile);
		} catch (error) {
			this.deps.logger.warn('scheduler', 'Failed to write stats file', { error: errorMessage(error) });
		}
	}
}
