import { BootstrapTemplateInput, CloudFormationTemplate, TemplateGenerator } from './types';

/**
 * Builds the bootstrap bucket template. It is passed inline as a template
 * body because no bucket exists yet to host a template file.
 */
export class CloudFormationGenerator implements TemplateGenerator<BootstrapTemplateInput> {
  async generate(input: BootstrapTemplateInput): Promise<string> {
    return JSON.stringify(this.createBootstrapTemplate(input), null, 2);
  }

  createBootstrapTemplate(input: BootstrapTemplateInput): CloudFormationTemplate {
    return {
      AWSTemplateFormatVersion: '2010-09-09',
      Description: `Bootstrap bucket ${input.bucketName} hosting stack-chain templates`,
      Resources: {
        BootstrapBucket: {
          Type: 'AWS::S3::Bucket',
          Properties: {
            BucketName: input.bucketName,
            Tags: this.createTags(input.tags)
          }
        },
        // CloudFormation reads staged templates from this bucket
        BootstrapBucketPolicy: {
          Type: 'AWS::S3::BucketPolicy',
          Properties: {
            Bucket: { Ref: 'BootstrapBucket' },
            PolicyDocument: {
              Version: '2012-10-17',
              Statement: [
                {
                  Effect: 'Allow',
                  Principal: { Service: ['cloudformation.amazonaws.com'] },
                  Action: '*',
                  Resource: { 'Fn::Join': ['', ['arn:aws:s3:::', { Ref: 'BootstrapBucket' }, '/*']] }
                }
              ]
            }
          }
        }
      },
      Outputs: {
        BucketName: {
          Description: 'Name of the bootstrap bucket',
          Value: { Ref: 'BootstrapBucket' }
        }
      }
    };
  }

  private createTags(tags: Record<string, string> = {}): Array<{ Key: string; Value: string }> {
    const baseTags = [{ Key: 'ManagedBy', Value: 'stack-chain' }];

    Object.entries(tags).forEach(([key, value]) => {
      if (key !== 'ManagedBy') {
        baseTags.push({ Key: key, Value: value });
      }
    });

    return baseTags;
  }
}
