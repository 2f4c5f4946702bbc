// Library entry point for stack-chain
export * from './types';
export * from './logging';
export * from './config';
export * from './provisioning';
export * from './orchestration';
export * from './templates';
export * from './reporting';
