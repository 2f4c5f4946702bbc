// In-process stand-ins for the AWS-backed capabilities
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ChainSettings } from '../types';
import {
  CreateStackRequest,
  FunctionInfo,
  FunctionInspector,
  GatewayInspector,
  ObjectStore,
  OrchestrationService,
  ProviderError,
  StackDescription,
  StackResourceDescription
} from '../provisioning';
import { Logger } from '../logging';

interface FakeStack {
  request: CreateStackRequest;
  statuses: string[];
  reason?: string;
}

/**
 * CloudFormation stand-in. Each stack reports the statuses scripted for it
 * one per describe call; the last one sticks.
 */
export class FakeOrchestration implements OrchestrationService {
  readonly stacks = new Map<string, FakeStack>();
  readonly createScripts = new Map<string, string[]>();
  readonly deleteScripts = new Map<string, string[]>();
  readonly createRejections = new Map<string, Error>();
  readonly deleteRejections = new Map<string, Error>();
  readonly resources = new Map<string, Record<string, string>>();
  readonly requests: CreateStackRequest[] = [];

  constructor(readonly log: string[] = []) {}

  async createStack(request: CreateStackRequest): Promise<{ stackId?: string }> {
    this.log.push(`create-stack ${request.stackName}`);
    this.requests.push(request);

    if (this.stacks.has(request.stackName)) {
      throw new ProviderError('AlreadyExistsException', `Stack [${request.stackName}] already exists`);
    }
    const rejection = this.createRejections.get(request.stackName);
    if (rejection) {
      throw rejection;
    }

    this.stacks.set(request.stackName, {
      request,
      statuses: [...(this.createScripts.get(request.stackName) ?? ['CREATE_COMPLETE'])]
    });
    return { stackId: `arn:aws:cloudformation:us-east-1:000000000000:stack/${request.stackName}/1` };
  }

  async deleteStack(stackName: string): Promise<void> {
    this.log.push(`delete-stack ${stackName}`);

    const rejection = this.deleteRejections.get(stackName);
    if (rejection) {
      throw rejection;
    }

    const stack = this.stacks.get(stackName);
    if (stack) {
      stack.statuses = [...(this.deleteScripts.get(stackName) ?? ['DELETE_COMPLETE'])];
    }
  }

  async describeStack(stackName: string): Promise<StackDescription | null> {
    const stack = this.stacks.get(stackName);
    if (!stack) {
      return null;
    }

    const status = stack.statuses.length > 1 ? stack.statuses.shift() ?? '' : stack.statuses[0];
    if (status === 'DELETE_COMPLETE') {
      this.stacks.delete(stackName);
    }
    return { stackName, status, statusReason: stack.reason };
  }

  async describeStackResource(stackName: string, logicalResourceId: string): Promise<StackResourceDescription> {
    const physicalResourceId = this.resources.get(stackName)?.[logicalResourceId];
    if (!physicalResourceId) {
      throw new ProviderError('ValidationError', `Resource ${logicalResourceId} does not exist for stack ${stackName}`);
    }
    return { logicalResourceId, physicalResourceId, resourceType: 'AWS::Fake::Resource' };
  }
}

/**
 * S3 stand-in keeping object bodies in memory.
 */
export class FakeObjectStore implements ObjectStore {
  readonly buckets = new Map<string, Map<string, string>>();
  readonly uploadRejections = new Map<string, Error>();
  /** Keys that survive deleteKeys */
  readonly pinned = new Set<string>();

  constructor(readonly log: string[] = []) {}

  async upload(bucketName: string, key: string, localPath: string): Promise<{ etag?: string }> {
    this.log.push(`upload ${bucketName}/${key}`);

    const rejection = this.uploadRejections.get(key);
    if (rejection) {
      throw rejection;
    }

    const objects = this.buckets.get(bucketName) ?? new Map<string, string>();
    objects.set(key, readFileSync(localPath, 'utf-8'));
    this.buckets.set(bucketName, objects);
    return { etag: `"etag-${key}"` };
  }

  async listKeys(bucketName: string): Promise<string[]> {
    this.log.push(`list ${bucketName}`);
    return Array.from(this.buckets.get(bucketName)?.keys() ?? []);
  }

  async deleteKeys(bucketName: string, keys: string[]): Promise<void> {
    this.log.push(`delete-objects ${bucketName}`);
    const objects = this.buckets.get(bucketName);
    for (const key of keys) {
      if (!this.pinned.has(key)) {
        objects?.delete(key);
      }
    }
  }

  objectUrl(bucketName: string, key: string): string {
    return `https://${bucketName}.s3.us-east-1.amazonaws.com/${key}`;
  }

  put(bucketName: string, key: string, body = ''): void {
    const objects = this.buckets.get(bucketName) ?? new Map<string, string>();
    objects.set(key, body);
    this.buckets.set(bucketName, objects);
  }
}

export class FakeGateway implements GatewayInspector {
  async getRestApi(restApiId: string) {
    return { id: restApiId, name: 'demo-function-api' };
  }

  async getResource(_restApiId: string, resourceId: string) {
    return { id: resourceId, path: '/items', methods: ['GET'] };
  }

  async getMethod(_restApiId: string, _resourceId: string, httpMethod: string) {
    return { httpMethod, authorizationType: 'NONE', integrationType: 'AWS' };
  }

  async getDeployment(_restApiId: string, deploymentId: string) {
    return { id: deploymentId };
  }

  async getStages(_restApiId: string, deploymentId: string) {
    return [{ name: 'v1', deploymentId }];
  }
}

export class FakeFunctions implements FunctionInspector {
  async getFunction(functionName: string): Promise<FunctionInfo> {
    return { name: functionName, runtime: 'nodejs20.x', handler: 'index.handler', state: 'Active' };
  }
}

export interface RecordingLogger extends Logger {
  lines: string[];
}

export function createRecordingLogger(): RecordingLogger {
  const lines: string[] = [];
  return {
    lines,
    debug: message => lines.push(`debug: ${message}`),
    info: message => lines.push(`info: ${message}`),
    warn: message => lines.push(`warn: ${message}`),
    error: message => lines.push(`error: ${message}`)
  };
}

export const noSleep = async (): Promise<void> => undefined;

export interface TestWorkspace {
  dir: string;
  settings: ChainSettings;
  cleanup(): void;
}

/**
 * Temp directory holding the three staged files, with settings pointing at it.
 */
export function createTestWorkspace(): TestWorkspace {
  const dir = mkdtempSync(join(tmpdir(), 'stack-chain-'));
  const files = {
    bucketTemplate: join(dir, 'artifact-bucket.yaml'),
    functionTemplate: join(dir, 'function-api.yaml'),
    functionCode: join(dir, 'function.zip')
  };
  writeFileSync(files.bucketTemplate, 'Resources:\n  ArtifactBucket:\n    Type: AWS::S3::Bucket\n');
  writeFileSync(files.functionTemplate, 'Resources:\n  ItemsFunction:\n    Type: AWS::Lambda::Function\n');
  writeFileSync(files.functionCode, 'placeholder-zip');

  return {
    dir,
    settings: {
      region: 'us-east-1',
      buckets: { bootstrap: 'demo-bootstrap', artifacts: 'demo-artifacts' },
      stacks: { bootstrap: 'demo-bootstrap-bucket', build: 'demo-artifact-bucket', deploy: 'demo-function' },
      files,
      function: { handler: 'index.handler', runtime: 'nodejs20.x' },
      polling: {
        storage: { delaySeconds: 1, maxAttempts: 3 },
        deploy: { delaySeconds: 2, maxAttempts: 4 }
      },
      tags: { Project: 'demo' }
    },
    cleanup: () => rmSync(dir, { recursive: true, force: true })
  };
}
