import { CloudFormationGenerator } from './cloudformation-generator';
import { BootstrapTemplateInput } from './types';

export interface TemplateOptions {
  minify?: boolean;
  validate?: boolean;
}

export class TemplateEngine {
  private generator = new CloudFormationGenerator();

  async renderBootstrapTemplate(
    input: BootstrapTemplateInput,
    options: TemplateOptions = { validate: true }
  ): Promise<string> {
    let template = await this.generator.generate(input);

    if (options.minify) {
      template = JSON.stringify(JSON.parse(template));
    }

    if (options.validate) {
      this.validateTemplate(template);
    }

    return template;
  }

  /**
   * Structural check of a JSON CloudFormation template; throws on the first problem.
   */
  validateTemplate(template: string): true {
    try {
      const parsed: unknown = JSON.parse(template);
      if (!isRecord(parsed)) {
        throw new Error('Template must be a JSON object');
      }

      if (!parsed.AWSTemplateFormatVersion) {
        throw new Error('Missing AWSTemplateFormatVersion');
      }

      const resources = parsed.Resources;
      if (!isRecord(resources) || Object.keys(resources).length === 0) {
        throw new Error('Template must contain at least one resource');
      }

      for (const [resourceName, resource] of Object.entries(resources)) {
        if (!isRecord(resource)) {
          throw new Error(`Invalid resource definition: ${resourceName}`);
        }
        if (typeof resource.Type !== 'string' || !resource.Type) {
          throw new Error(`Resource ${resourceName} missing Type property`);
        }
      }

      return true;
    } catch (error) {
      throw new Error(`CloudFormation template validation failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
