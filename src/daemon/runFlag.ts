// ─── Run Flag & Cooperative Sleep ────────────────────────────────────────────

export type Sleep = (ms: number) => Promise<void>;

export const realSleep: Sleep = (ms) => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Cleared once by a stop signal; the poll loop checks it at every suspension point
 */
export class RunFlag {
	private running = true;

	isSet(): boolean {
		return this.running;
	}

	clear(): void {
		this.running = false;
	}
}

/**
 * Sleep in ticks of at most one second, stopping early once the flag is cleared.
 * Returns true if the full duration elapsed.
 */
export async function sleepWhileRunning(seconds: number, flag: RunFlag, sleep: Sleep = realSleep): Promise<boolean> {
	let remaining = seconds;
	while (remaining > 0) {
		if (!flag.isSet()) {
			return false;
		}
		const tick = Math.min(1, remaining);
		await sleep(tick * 1000);
		remaining -= tick;
	}
	return flag.isSet();
}
