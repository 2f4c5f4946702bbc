import { DeploymentSummary, Endpoint, Result } from '../types';
import {
  FunctionInspector,
  GatewayInspector,
  OrchestrationService,
  errorMessage,
  provisioningError
} from '../provisioning';

// Logical ids declared in cloudformation/function-api.yaml
export const FUNCTION_API_LOGICAL_IDS = {
  restApi: 'RestApi',
  resource: 'ItemsResource',
  deployment: 'RestApiDeployment',
  function: 'ItemsFunction'
} as const;

export const INSPECTED_HTTP_METHOD = 'GET';

export function invokeUrl(restApiId: string, region: string, stageName: string, path = ''): string {
  return `https://${restApiId}.execute-api.${region}.amazonaws.com/${stageName}${path}`;
}

/**
 * Read-only description of what the deploy stack produced.
 */
export class DeploymentInspector {
  constructor(
    private readonly orchestration: OrchestrationService,
    private readonly gateway: GatewayInspector,
    private readonly functions: FunctionInspector,
    private readonly region: string
  ) {}

  async inspect(stackName: string): Promise<Result<DeploymentSummary>> {
    try {
      const physicalId = async (logicalId: string): Promise<string> =>
        (await this.orchestration.describeStackResource(stackName, logicalId)).physicalResourceId;

      const restApiId = await physicalId(FUNCTION_API_LOGICAL_IDS.restApi);
      const resourceId = await physicalId(FUNCTION_API_LOGICAL_IDS.resource);
      const deploymentId = await physicalId(FUNCTION_API_LOGICAL_IDS.deployment);
      const functionName = await physicalId(FUNCTION_API_LOGICAL_IDS.function);

      const restApi = await this.gateway.getRestApi(restApiId);
      const resource = await this.gateway.getResource(restApiId, resourceId);
      const method = await this.gateway.getMethod(restApiId, resourceId, INSPECTED_HTTP_METHOD);
      const deployment = await this.gateway.getDeployment(restApiId, deploymentId);
      const stages = await this.gateway.getStages(restApiId, deploymentId);
      const fn = await this.functions.getFunction(functionName);

      const endpoints: Endpoint[] = stages.map(stage => ({
        type: 'api',
        url: invokeUrl(restApiId, this.region, stage.name, resource.path),
        description: `${method.httpMethod} ${resource.path ?? '/'} on stage ${stage.name}`
      }));

      return {
        ok: true,
        value: {
          restApi,
          resource,
          method,
          deployment,
          stages,
          function: fn,
          endpoints
        }
      };
    } catch (error) {
      return {
        ok: false,
        error: provisioningError('INSPECTION_FAILED', `Failed to inspect stack ${stackName}: ${errorMessage(error)}`, {
          stackName
        })
      };
    }
  }
}
