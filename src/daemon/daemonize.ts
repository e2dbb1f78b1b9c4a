// ─── Daemonization ───────────────────────────────────────────────────────────

import * as cp from 'child_process';

export const DETACHED_ENV = 'MESH_TELEMETRYD_DETACHED';

/**
 * True in the background copy started by spawnDetached()
 */
export function isDetachedChild(env: NodeJS.ProcessEnv = process.env): boolean {
	return env[DETACHED_ENV] === '1';
}

/**
 * Daemonize: re-exec this command in a new session without a terminal.
 * The caller (the foreground parent) is expected to exit afterwards.
 */
export function spawnDetached(argv: readonly string[] = process.argv, env: NodeJS.ProcessEnv = process.env): number | undefined {
	const child = cp.spawn(argv[0], argv.slice(1), {
		detached: true,
		stdio: 'ignore',
		env: {
			...env,
			[DETACHED_ENV]: '1',
		},
	});

	child.unref();
	return child.pid;
}
