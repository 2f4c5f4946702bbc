export * from './types';
export * from './cloudformation-generator';
export * from './template-engine';
