// ─── Delivery Coordinator ────────────────────────────────────────────────────

import { errorMessage } from '../errors';
import { Snapshot, snapshotLines } from '../metrics/types';
import { PushClient } from '../sinks/pushClient';
import { SnapshotPublisher } from '../sinks/snapshotPublisher';
import { DaemonConfig } from './config';
import { Logger } from './log';
import { StatsTracker } from './stats';

export interface DeliveryResult {
	fileOk: boolean;
	pushOk: boolean;
	/** Failure reasons joined with "; ", empty when both sinks succeeded */
	error: string;
}

export interface Sinks {
	readonly publisher: SnapshotPublisher;
	readonly push: PushClient;
}

export function createSinks(config: DaemonConfig): Sinks {
	return Object.freeze({
		publisher: SnapshotPublisher.fromConfig(config.output),
		push: PushClient.fromConfig(config.push),
	});
}

/**
 * DeliveryCoordinator - Fans a snapshot out to the file and push sinks
 *
 * Both sinks are always attempted. The sink pair is swapped as a whole on
 * reload; a delivery already in progress keeps the pair it started with.
 */
export class DeliveryCoordinator {
	private sinks: Sinks;

	constructor(
		config: DaemonConfig,
		private readonly stats: StatsTracker,
		private readonly logger: Logger,
		sinks?: Sinks
	) {
		this.sinks = sinks ?? createSinks(config);
	}

	/**
	 * Replace the sinks; takes effect on the next delivery
	 */
	reload(config: DaemonConfig, sinks: Sinks = createSinks(config)): void {
		this.sinks = sinks;
		this.logger.info('delivery', 'Sinks reloaded', {
			outputDirectory: config.output.directory || null,
			pushEnabled: sinks.push.enabled,
		});
	}

	currentSinks(): Sinks {
		return this.sinks;
	}

	async deliver(snapshot: Snapshot): Promise<DeliveryResult> {
		const { publisher, push } = this.sinks;
		const lines = snapshotLines(snapshot);
		const errors: string[] = [];

		let fileOk = true;
		try {
			const result = await publisher.publish(snapshot);
			if (!result.skipped) {
				this.logger.debug('delivery', `Wrote ${lines.length} metrics`, { files: result.written });
			}
		} catch (error) {
			fileOk = false;
			const msg = `File write failed: ${errorMessage(error)}`;
			errors.push(msg);
			this.logger.error('delivery', msg);
		}

		let pushOk = true;
		try {
			const result = await push.push(lines);
			pushOk = result.ok;
			if (!result.ok) {
				const msg = `Push failed: ${result.error ?? 'unknown error'}`;
				errors.push(msg);
				this.logger.error('delivery', msg);
			} else if (!result.skipped) {
				this.logger.debug('delivery', `Pushed ${lines.length} metrics to gateway`);
			}
		} catch (error) {
			pushOk = false;
			const msg = `Push gateway error: ${errorMessage(error)}`;
			errors.push(msg);
			this.logger.error('delivery', msg);
		}

		if (push.enabled) {
			this.stats.recordPush(pushOk);
		}

		return { fileOk, pushOk, error: errors.join('; ') };
	}
}
