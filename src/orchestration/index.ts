export * from './types';
export * from './pipeline';
export * from './stages';
export * from './teardown';
export * from './inspection';
export * from './chain-orchestrator';
