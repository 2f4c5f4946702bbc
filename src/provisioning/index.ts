export * from './types';
export * from './errors';
export * from './poller';
export * from './stack-status';
export * from './stack-manager';
export * from './artifact-stager';
export { S3Manager } from './s3-manager';
export { CloudFormationManager } from './cloudformation-manager';
export { APIGatewayManager } from './api-gateway-manager';
export { LambdaManager } from './lambda-manager';
export type { S3ManagerOptions } from './s3-manager';
export type { CloudFormationManagerOptions } from './cloudformation-manager';
export type { APIGatewayManagerOptions } from './api-gateway-manager';
export type { LambdaManagerOptions } from './lambda-manager';
