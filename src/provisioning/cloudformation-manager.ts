import {
  CloudFormationClient,
  CreateStackCommand,
  DeleteStackCommand,
  DescribeStacksCommand,
  DescribeStackResourceCommand,
  StackResourceDetail
} from '@aws-sdk/client-cloudformation';
import {
  CreateStackRequest,
  OrchestrationService,
  StackDescription,
  StackResourceDescription
} from './types';
import { ProviderError, toProviderError } from './errors';

export interface CloudFormationManagerOptions {
  region?: string;
  profile?: string;
}

export class CloudFormationManager implements OrchestrationService {
  private client: CloudFormationClient;

  constructor(options: CloudFormationManagerOptions = {}) {
    this.client = new CloudFormationClient({
      region: options.region || 'us-east-1',
      ...(options.profile ? { profile: options.profile } : {})
    });
  }

  async createStack(request: CreateStackRequest): Promise<{ stackId?: string }> {
    const template = request.template.kind === 'body'
      ? { TemplateBody: request.template.body }
      : { TemplateURL: request.template.url };

    try {
      const result = await this.client.send(new CreateStackCommand({
        StackName: request.stackName,
        ...template,
        Capabilities: request.capabilities,
        Parameters: request.parameters
          ? Object.entries(request.parameters).map(([ParameterKey, ParameterValue]) => ({ ParameterKey, ParameterValue }))
          : undefined,
        Tags: request.tags
          ? Object.entries(request.tags).map(([Key, Value]) => ({ Key, Value }))
          : undefined
      }));

      return { stackId: result.StackId };
    } catch (error) {
      throw toProviderError(error);
    }
  }

  async deleteStack(stackName: string): Promise<void> {
    try {
      // CloudFormation returns normally when the stack does not exist
      await this.client.send(new DeleteStackCommand({ StackName: stackName }));
    } catch (error) {
      throw toProviderError(error);
    }
  }

  async describeStack(stackName: string): Promise<StackDescription | null> {
    try {
      const result = await this.client.send(new DescribeStacksCommand({ StackName: stackName }));
      const stack = result.Stacks?.[0];
      if (!stack) {
        return null;
      }
      return {
        stackName: stack.StackName ?? stackName,
        stackId: stack.StackId,
        status: stack.StackStatus ?? 'UNKNOWN',
        statusReason: stack.StackStatusReason
      };
    } catch (error) {
      const providerError = toProviderError(error);
      if (providerError.code === 'ValidationError' && providerError.message.includes('does not exist')) {
        return null;
      }
      throw providerError;
    }
  }

  async describeStackResource(stackName: string, logicalResourceId: string): Promise<StackResourceDescription> {
    let detail: StackResourceDetail | undefined;
    try {
      const result = await this.client.send(new DescribeStackResourceCommand({
        StackName: stackName,
        LogicalResourceId: logicalResourceId
      }));
      detail = result.StackResourceDetail;
    } catch (error) {
      throw toProviderError(error);
    }

    if (!detail?.PhysicalResourceId) {
      throw new ProviderError(
        'ResourceNotReady',
        `Resource ${logicalResourceId} in stack ${stackName} has no physical id`
      );
    }

    return {
      logicalResourceId,
      physicalResourceId: detail.PhysicalResourceId,
      resourceType: detail.ResourceType ?? 'Unknown',
      resourceStatus: detail.ResourceStatus
    };
  }
}
