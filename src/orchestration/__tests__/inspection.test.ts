import { describe, it, expect } from 'vitest';
import { DeploymentInspector, invokeUrl } from '../inspection';
import { FakeFunctions, FakeGateway, FakeOrchestration } from '../../__tests__/fakes';

describe('invokeUrl', () => {
  it('should build the execute-api URL for a stage and path', () => {
    expect(invokeUrl('api123', 'eu-west-1', 'v1', '/items')).toBe('https://api123.execute-api.eu-west-1.amazonaws.com/v1/items');
  });

  it('should point at the stage root without a path', () => {
    expect(invokeUrl('api123', 'eu-west-1', 'v1')).toBe('https://api123.execute-api.eu-west-1.amazonaws.com/v1');
  });
});

describe('DeploymentInspector', () => {
  it('should describe every resource of the deploy stack', async () => {
    const orchestration = new FakeOrchestration();
    orchestration.resources.set('demo-function', {
      RestApi: 'api123',
      ItemsResource: 'res456',
      RestApiDeployment: 'dep789',
      ItemsFunction: 'demo-function-ItemsFunction'
    });
    const inspector = new DeploymentInspector(orchestration, new FakeGateway(), new FakeFunctions(), 'us-east-1');

    const result = await inspector.inspect('demo-function');

    expect(result).toEqual({
      ok: true,
      value: {
        restApi: { id: 'api123', name: 'demo-function-api' },
        resource: { id: 'res456', path: '/items', methods: ['GET'] },
        method: { httpMethod: 'GET', authorizationType: 'NONE', integrationType: 'AWS' },
        deployment: { id: 'dep789' },
        stages: [{ name: 'v1', deploymentId: 'dep789' }],
        function: { name: 'demo-function-ItemsFunction', runtime: 'nodejs20.x', handler: 'index.handler', state: 'Active' },
        endpoints: [{
          type: 'api',
          url: 'https://api123.execute-api.us-east-1.amazonaws.com/v1/items',
          description: 'GET /items on stage v1'
        }]
      }
    });
  });

  it('should report INSPECTION_FAILED when a resource is missing', async () => {
    const inspector = new DeploymentInspector(new FakeOrchestration(), new FakeGateway(), new FakeFunctions(), 'us-east-1');

    const result = await inspector.inspect('demo-function');

    expect(result).toEqual({
      ok: false,
      error: {
        code: 'INSPECTION_FAILED',
        message: 'Failed to inspect stack demo-function: Resource RestApi does not exist for stack demo-function',
        stackName: 'demo-function'
      }
    });
  });
});
