// Orchestration-specific types
import { PollBudget, Result, StageFailure, StageName, StagedArtifact, UploadJob } from '../types';
import { Logger } from '../logging';
import {
  FunctionInspector,
  GatewayInspector,
  ObjectStore,
  OrchestrationService,
  Sleep
} from '../provisioning';

/**
 * One link of the provisioning chain. `dependsOn` must name a stage that
 * appears earlier in the pipeline.
 */
export interface StageDescriptor {
  name: StageName;
  dependsOn: StageName | null;
  stackName: string;
  /** Bucket created by this stage's stack, emptied before the stack is deleted */
  bucketName: string | null;
  pollBudget: PollBudget;
  /** Where the stack's template comes from, for plans and logs */
  templateOrigin: string;
  uploads: UploadJob[];
  run(): Promise<Result<void>>;
}

export type ArtifactRole = 'bucketTemplate' | 'functionTemplate' | 'functionCode';

/**
 * Shared between the stages of one run: what earlier stages staged.
 */
export interface StageContext {
  staged: Partial<Record<ArtifactRole, StagedArtifact>>;
}

export interface PipelineOutcome {
  completed: StageName[];
  failed?: StageFailure;
  skipped: StageName[];
}

export interface TeardownOutcome {
  emptied: Array<{ bucket: string; removed: number }>;
  deleted: StageName[];
  failed?: StageFailure;
  untouched: StageName[];
}

export interface ChainServices {
  orchestration: OrchestrationService;
  objectStore: ObjectStore;
  gateway: GatewayInspector;
  functions: FunctionInspector;
  logger?: Logger;
  sleep?: Sleep;
}

export interface PlannedStage {
  stage: StageName;
  dependsOn: StageName | null;
  stackName: string;
  template: string;
  uploads: UploadJob[];
}
