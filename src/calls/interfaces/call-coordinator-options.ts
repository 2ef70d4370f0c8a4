export interface CallCoordinatorOptions {
  ringTimeoutMs: number;
  connectTimeoutMs: number;
  endGraceMs: number;
}

export const DEFAULT_CALL_COORDINATOR_OPTIONS: CallCoordinatorOptions = {
  ringTimeoutMs: 45_000,
  connectTimeoutMs: 30_000,
  endGraceMs: 500,
};
