// ─── Snapshot Publisher (textfile collector) ─────────────────────────────────

import * as fs from 'fs';
import * as path from 'path';
import { OutputSection } from '../daemon/config';
import { SnapshotPublishError, errorMessage } from '../errors';
import { renderExposition } from '../metrics/exposition';
import { Snapshot, snapshotLines } from '../metrics/types';
import { writeFileAtomic } from './atomicWrite';

export interface PublishResult {
	skipped: boolean;
	written: string[];
}

export interface SnapshotPublisherOptions {
	directory: string;
	individualFiles: boolean;
	filePrefix: string;
}

/**
 * Turn a node id into a safe file name fragment (`!a1b2/x` → `a1b2_x`)
 */
export function sanitizeNodeId(nodeId: string): string {
	const cleaned = nodeId.replace(/!/g, '').replace(/[^A-Za-z0-9._-]/g, '_');
	if (cleaned === '' || cleaned === '.' || cleaned === '..') {
		return '_';
	}
	return cleaned;
}

export interface FileNameCollision {
	fileName: string;
	nodeIds: string[];
}

/**
 * Node ids that would share a per-node file (`!a1b2` and `a1b2`, `a/b` and `a_b`)
 */
export function nodeFileCollisions(nodeIds: readonly string[]): FileNameCollision[] {
	const byName = new Map<string, string[]>();
	for (const nodeId of nodeIds) {
		const fileName = sanitizeNodeId(nodeId);
		const ids = byName.get(fileName);
		if (ids) {
			ids.push(nodeId);
		} else {
			byName.set(fileName, [nodeId]);
		}
	}
	return [...byName]
		.filter(([, ids]) => ids.length > 1)
		.map(([fileName, ids]) => ({ fileName, nodeIds: ids }));
}

export function describeCollisions(collisions: readonly FileNameCollision[]): string {
	return collisions.map(c => `${c.nodeIds.join(', ')} → ${c.fileName}`).join('; ');
}

/**
 * SnapshotPublisher - Writes each cycle's metrics as .prom files for
 * node_exporter, either one combined file or one file per node
 */
export class SnapshotPublisher {
	constructor(private readonly options: SnapshotPublisherOptions) {}

	static fromConfig(output: OutputSection): SnapshotPublisher {
		return new SnapshotPublisher({
			directory: output.directory,
			individualFiles: output.individualFiles,
			filePrefix: output.filePrefix,
		});
	}

	get enabled(): boolean {
		return this.options.directory !== '';
	}

	/**
	 * Path of the combined file, or of one node's file in per-node mode
	 */
	targetPath(nodeId?: string): string {
		const name = nodeId === undefined
			? `${this.options.filePrefix}.prom`
			: `${this.options.filePrefix}-${sanitizeNodeId(nodeId)}.prom`;
		return path.join(this.options.directory, name);
	}

	async publish(snapshot: Snapshot): Promise<PublishResult> {
		if (!this.enabled) {
			return { skipped: true, written: [] };
		}

		try {
			await fs.promises.mkdir(this.options.directory, { recursive: true });
		} catch (error) {
			throw new SnapshotPublishError(
				`Cannot create output directory ${this.options.directory}: ${errorMessage(error)}`
			);
		}

		if (!this.options.individualFiles) {
			const target = this.targetPath();
			try {
				await writeFileAtomic(target, renderExposition(snapshotLines(snapshot)));
			} catch (error) {
				throw new SnapshotPublishError(`Failed to write ${target}: ${errorMessage(error)}`, [target]);
			}
			return { skipped: false, written: [target] };
		}

		const written: string[] = [];
		const failures: string[] = [];
		const failedPaths: string[] = [];
		const clashing = new Set<string>();
		for (const collision of nodeFileCollisions(snapshot.nodes.map(node => node.nodeId))) {
			collision.nodeIds.forEach(nodeId => clashing.add(nodeId));
		}

		for (const node of snapshot.nodes) {
			const target = this.targetPath(node.nodeId);
			if (clashing.has(node.nodeId)) {
				if (!failedPaths.includes(target)) {
					failedPaths.push(target);
				}
				failures.push(`${node.nodeId}: ${path.basename(target)} is shared with another node`);
				continue;
			}
			try {
				await writeFileAtomic(target, renderExposition(node.lines));
				written.push(target);
			} catch (error) {
				failedPaths.push(target);
				failures.push(`${node.nodeId}: ${errorMessage(error)}`);
			}
		}

		if (failures.length > 0) {
			throw new SnapshotPublishError(
				`Failed to write ${failures.length} of ${snapshot.nodes.length} node files (${failures.join('; ')})`,
				failedPaths
			);
		}
		return { skipped: false, written };
	}
}
