// ─── Atomic File Replacement ─────────────────────────────────────────────────

import * as fs from 'fs';
import * as path from 'path';
import * as crypto from 'crypto';
import type { FileHandle } from 'fs/promises';

/**
 * Replace `target` with `content` so that readers only ever see the old or the
 * new file. The temp file lives beside the target so rename stays on one volume.
 */
export async function writeFileAtomic(target: string, content: string, mode: number = 0o644): Promise<void> {
	const dir = path.dirname(target);
	const tempPath = path.join(
		dir,
		`.${path.basename(target)}.${crypto.randomBytes(6).toString('hex')}.tmp`
	);

	let handle: FileHandle | undefined;
	let renamed = false;
	try {
		handle = await fs.promises.open(tempPath, 'wx', mode);
		await handle.writeFile(content, 'utf-8');
		await handle.sync();
		await handle.close();
		handle = undefined;

		await fs.promises.rename(tempPath, target);
		renamed = true;
	} finally {
		if (!renamed) {
			if (handle) {
				await handle.close().catch(() => undefined);
			}
			await fs.promises.rm(tempPath, { force: true });
		}
	}
}
