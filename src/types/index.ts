// Core type definitions for stack-chain
import type {
  ApiDeploymentInfo,
  ApiMethodInfo,
  ApiResourceInfo,
  ApiStageInfo,
  FunctionInfo,
  RestApiInfo
} from '../provisioning/types';

export interface ProjectConfig {
  name: string;
  environment?: string;
}

export interface AWSConfig {
  region: string;
  profile?: string;
}

export interface BucketNames {
  bootstrap?: string;
  artifacts?: string;
}

export interface StackNames {
  bootstrap?: string;
  build?: string;
  deploy?: string;
}

export interface ArtifactPaths {
  /** Defaults to the template shipped with the package */
  bucket_template?: string;
  /** Defaults to the template shipped with the package */
  function_template?: string;
  function_code: string;
}

export interface FunctionSettings {
  handler: string;
  runtime: string;
}

export interface PollBudget {
  delaySeconds: number;
  maxAttempts: number;
}

export interface PollSettings {
  delay_seconds: number;
  max_attempts: number;
}

export interface PollingConfig {
  storage: PollSettings;
  deploy: PollSettings;
}

export interface ChainConfig {
  project: ProjectConfig;
  aws: AWSConfig;
  buckets: BucketNames;
  stacks: StackNames;
  artifacts: ArtifactPaths;
  function: FunctionSettings;
  polling: PollingConfig;
  tags?: Record<string, string>;
}

/**
 * Fully resolved settings the orchestrator runs with: names derived,
 * file paths absolute, poll settings converted to budgets.
 */
export interface ChainSettings {
  region: string;
  profile?: string;
  buckets: {
    bootstrap: string;
    artifacts: string;
  };
  stacks: {
    bootstrap: string;
    build: string;
    deploy: string;
  };
  files: {
    bucketTemplate: string;
    functionTemplate: string;
    functionCode: string;
  };
  function: FunctionSettings;
  polling: {
    storage: PollBudget;
    deploy: PollBudget;
  };
  tags: Record<string, string>;
}

export type StageName = 'bootstrap' | 'build' | 'deploy';

export type StackState =
  | 'absent'
  | 'creating'
  | 'created'
  | 'create_failed'
  | 'deleting'
  | 'deleted'
  | 'delete_failed';

export interface StackHandle {
  stackName: string;
  state: StackState;
  stackId?: string;
  statusReason?: string;
}

export type TemplateSource =
  | { kind: 'body'; body: string }
  | { kind: 'url'; url: string };

export type StackCapability = 'CAPABILITY_IAM' | 'CAPABILITY_NAMED_IAM' | 'CAPABILITY_AUTO_EXPAND';

export interface UploadJob {
  localPath: string;
  bucketName: string;
  key: string;
}

export interface StagedArtifact {
  bucket: string;
  key: string;
  url: string;
  etag?: string;
}

export type ErrorCode =
  | 'ALREADY_EXISTS'
  | 'CREATE_FAILED'
  | 'DELETE_FAILED'
  | 'TIMEOUT'
  | 'UPLOAD_FAILED'
  | 'EMPTY_FAILED'
  | 'STAGE_FAILED'
  | 'TEARDOWN_FAILED'
  | 'INSPECTION_FAILED';

export interface ProvisioningError {
  code: ErrorCode;
  message: string;
  stage?: StageName;
  stackName?: string;
  details?: Record<string, unknown>;
  cause?: ProvisioningError;
  remediation?: string;
}

export type Result<T, E = ProvisioningError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export interface RunMetadata {
  runId: string;
  timestamp: Date;
  duration?: number;
  region: string;
}

export interface StageFailure {
  stage: StageName;
  stackName: string;
  error: ProvisioningError;
}

export interface ProvisioningReport {
  success: boolean;
  completed: StageName[];
  failed?: StageFailure;
  skipped: StageName[];
  stacks: StackHandle[];
  metadata: RunMetadata;
}

export interface EmptiedBucket {
  bucket: string;
  removed: number;
}

export interface TeardownReport {
  success: boolean;
  emptied: EmptiedBucket[];
  deleted: StageName[];
  failed?: StageFailure;
  untouched: StageName[];
  stacks: StackHandle[];
  metadata: RunMetadata;
}

export interface Endpoint {
  type: 'api';
  url: string;
  description: string;
}

export interface DeploymentSummary {
  restApi: RestApiInfo;
  resource: ApiResourceInfo;
  method: ApiMethodInfo;
  deployment: ApiDeploymentInfo;
  stages: ApiStageInfo[];
  function: FunctionInfo;
  endpoints: Endpoint[];
}
