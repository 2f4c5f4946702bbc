// Provisioning-specific types: the capabilities the core consumes
import { StackCapability, TemplateSource } from '../types';

export interface CreateStackRequest {
  stackName: string;
  template: TemplateSource;
  capabilities?: StackCapability[];
  parameters?: Record<string, string>;
  tags?: Record<string, string>;
}

export interface StackDescription {
  stackName: string;
  stackId?: string;
  status: string;
  statusReason?: string;
}

export interface StackResourceDescription {
  logicalResourceId: string;
  physicalResourceId: string;
  resourceType: string;
  resourceStatus?: string;
}

export interface OrchestrationService {
  createStack(request: CreateStackRequest): Promise<{ stackId?: string }>;
  /** Succeeds without error when the stack does not exist. */
  deleteStack(stackName: string): Promise<void>;
  /** Resolves to null when the stack does not exist. */
  describeStack(stackName: string): Promise<StackDescription | null>;
  describeStackResource(stackName: string, logicalResourceId: string): Promise<StackResourceDescription>;
}

export interface ObjectStore {
  upload(bucketName: string, key: string, localPath: string): Promise<{ etag?: string }>;
  /** Every key in the bucket; a bucket that does not exist lists as empty. */
  listKeys(bucketName: string): Promise<string[]>;
  deleteKeys(bucketName: string, keys: string[]): Promise<void>;
  objectUrl(bucketName: string, key: string): string;
}

export interface RestApiInfo {
  id: string;
  name?: string;
  description?: string;
}

export interface ApiResourceInfo {
  id: string;
  path?: string;
  methods: string[];
}

export interface ApiMethodInfo {
  httpMethod: string;
  authorizationType?: string;
  integrationType?: string;
}

export interface ApiDeploymentInfo {
  id: string;
  createdDate?: Date;
}

export interface ApiStageInfo {
  name: string;
  deploymentId?: string;
}

export interface GatewayInspector {
  getRestApi(restApiId: string): Promise<RestApiInfo>;
  getResource(restApiId: string, resourceId: string): Promise<ApiResourceInfo>;
  getMethod(restApiId: string, resourceId: string, httpMethod: string): Promise<ApiMethodInfo>;
  getDeployment(restApiId: string, deploymentId: string): Promise<ApiDeploymentInfo>;
  getStages(restApiId: string, deploymentId: string): Promise<ApiStageInfo[]>;
}

export interface FunctionInfo {
  name: string;
  arn?: string;
  runtime?: string;
  handler?: string;
  state?: string;
}

export interface FunctionInspector {
  getFunction(functionName: string): Promise<FunctionInfo>;
}
