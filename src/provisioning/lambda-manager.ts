import { LambdaClient, GetFunctionConfigurationCommand } from '@aws-sdk/client-lambda';
import { FunctionInfo, FunctionInspector } from './types';
import { toProviderError } from './errors';

export interface LambdaManagerOptions {
  region?: string;
  profile?: string;
}

export class LambdaManager implements FunctionInspector {
  private client: LambdaClient;

  constructor(options: LambdaManagerOptions = {}) {
    this.client = new LambdaClient({
      region: options.region || 'us-east-1',
      ...(options.profile ? { profile: options.profile } : {})
    });
  }

  async getFunction(functionName: string): Promise<FunctionInfo> {
    try {
      const result = await this.client.send(new GetFunctionConfigurationCommand({ FunctionName: functionName }));
      return {
        name: result.FunctionName ?? functionName,
        arn: result.FunctionArn,
        runtime: result.Runtime,
        handler: result.Handler,
        state: result.State
      };
    } catch (error) {
      throw toProviderError(error);
    }
  }
}
