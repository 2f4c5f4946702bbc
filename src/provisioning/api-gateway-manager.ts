import {
  APIGatewayClient,
  GetRestApiCommand,
  GetResourceCommand,
  GetMethodCommand,
  GetDeploymentCommand,
  GetStagesCommand
} from '@aws-sdk/client-api-gateway';
import {
  ApiDeploymentInfo,
  ApiMethodInfo,
  ApiResourceInfo,
  ApiStageInfo,
  GatewayInspector,
  RestApiInfo
} from './types';
import { toProviderError } from './errors';

export interface APIGatewayManagerOptions {
  region?: string;
  profile?: string;
}

/**
 * Read-only queries against a REST API provisioned by the deploy stack.
 */
export class APIGatewayManager implements GatewayInspector {
  private client: APIGatewayClient;

  constructor(options: APIGatewayManagerOptions = {}) {
    this.client = new APIGatewayClient({
      region: options.region || 'us-east-1',
      ...(options.profile ? { profile: options.profile } : {})
    });
  }

  async getRestApi(restApiId: string): Promise<RestApiInfo> {
    try {
      const result = await this.client.send(new GetRestApiCommand({ restApiId }));
      return {
        id: result.id ?? restApiId,
        name: result.name,
        description: result.description
      };
    } catch (error) {
      throw toProviderError(error);
    }
  }

  async getResource(restApiId: string, resourceId: string): Promise<ApiResourceInfo> {
    try {
      const result = await this.client.send(new GetResourceCommand({
        restApiId,
        resourceId,
        embed: ['methods']
      }));
      return {
        id: result.id ?? resourceId,
        path: result.path,
        methods: Object.keys(result.resourceMethods ?? {}).sort()
      };
    } catch (error) {
      throw toProviderError(error);
    }
  }

  async getMethod(restApiId: string, resourceId: string, httpMethod: string): Promise<ApiMethodInfo> {
    try {
      const result = await this.client.send(new GetMethodCommand({ restApiId, resourceId, httpMethod }));
      return {
        httpMethod: result.httpMethod ?? httpMethod,
        authorizationType: result.authorizationType,
        integrationType: result.methodIntegration?.type
      };
    } catch (error) {
      throw toProviderError(error);
    }
  }

  async getDeployment(restApiId: string, deploymentId: string): Promise<ApiDeploymentInfo> {
    try {
      const result = await this.client.send(new GetDeploymentCommand({
        restApiId,
        deploymentId,
        embed: ['apisummary']
      }));
      return {
        id: result.id ?? deploymentId,
        createdDate: result.createdDate
      };
    } catch (error) {
      throw toProviderError(error);
    }
  }

  async getStages(restApiId: string, deploymentId: string): Promise<ApiStageInfo[]> {
    try {
      const result = await this.client.send(new GetStagesCommand({ restApiId, deploymentId }));
      return (result.item ?? [])
        .filter(stage => stage.stageName)
        .map(stage => ({
          name: stage.stageName ?? '',
          deploymentId: stage.deploymentId
        }));
    } catch (error) {
      throw toProviderError(error);
    }
  }
}
