// ─── Public API ──────────────────────────────────────────────────────────────

export * from '../errors';
export { VERSION } from '../version';
export * from './config';
export * from './log';
export * from './stats';
export * from './runFlag';
export * from './deliveryCoordinator';
export * from './pollScheduler';
export * from './lifecycle';
export { getRunningPid, isProcessRunning, readPid, removePidFile, signalDaemon, writePidFile } from './pidFile';
export { dropPrivileges, processIdentity } from './privileges';
export type { PrivilegeTarget, ProcessIdentity } from './privileges';
export * from '../metrics/types';
export * from '../metrics/renderer';
export * from '../metrics/exposition';
export * from '../sinks/atomicWrite';
export * from '../sinks/snapshotPublisher';
export * from '../sinks/pushClient';
export * from '../telemetry/source';
export * from '../telemetry/meshtasticCli';
export * from '../roster/crypto';
export * from '../roster/rosterLoader';
