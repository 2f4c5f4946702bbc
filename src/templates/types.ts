// Template-specific types
export interface TemplateGenerator<TInput> {
  generate(input: TInput): Promise<string>;
}

export interface CloudFormationResource {
  Type: string;
  Properties?: Record<string, unknown>;
  DependsOn?: string | string[];
  DeletionPolicy?: 'Delete' | 'Retain' | 'Snapshot';
}

export interface CloudFormationTemplate {
  AWSTemplateFormatVersion: string;
  Description: string;
  Parameters?: Record<string, { Type: string; Default?: string; Description?: string }>;
  Resources: Record<string, CloudFormationResource>;
  Outputs?: Record<string, { Description?: string; Value: unknown }>;
}

export interface BootstrapTemplateInput {
  bucketName: string;
  tags?: Record<string, string>;
}
