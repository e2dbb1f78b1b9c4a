/**
 * Build identifier, reported on every `up` metric and by `--version`
 */
export const VERSION = 'mesh-telemetryd-1.0.0';
