export * from '@stackplan/core';
export * from './config';
export * from './orchestrator';
export * from './template-loader';
export * from './executor/executor';
export * from './executor/retry';
export * from './executor/worker-pool';
export * from './state/state-store';
export * from './state/file-state-store';
export * from './state/memory-state-store';
export * from './providers/adapter';
export * from './providers/local-control-plane';
export * from './providers/load-adapters';
export type { CliOptions, Command } from './cli/cli-runner';
export { parseArguments, runCli } from './cli/cli-runner';
