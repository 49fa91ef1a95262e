/**
 * State Backend Stack CloudFormation Template Generator
 *
 * Creates the bucket that holds the provisioning state record:
 * versioned, AES256-encrypted, public access blocked, TLS only.
 * The bucket is retained when the stack is deleted.
 */

import type { CloudFormationTemplate } from '../types/aws.js';
import { createBaseTemplate, createS3BucketResource } from './common.js';
import { getBackendStackName } from '../naming/index.js';

export const STATE_BUCKET_LOGICAL_ID = 'StateBucket';

export interface BackendStackOptions {
  bucketName: string;
}

/**
 * Generate the CloudFormation template for the state backend stack
 */
export function generateBackendStackTemplate(options: BackendStackOptions): CloudFormationTemplate {
  const { bucketName } = options;

  const template = createBaseTemplate(`keybridge state backend (${bucketName})`);

  template.Resources[STATE_BUCKET_LOGICAL_ID] = createS3BucketResource(bucketName, [
    { Key: 'Purpose', Value: 'provisioning-state' },
  ]);

  template.Resources.StateBucketPolicy = {
    Type: 'AWS::S3::BucketPolicy',
    Properties: {
      Bucket: { Ref: STATE_BUCKET_LOGICAL_ID },
      PolicyDocument: {
        Version: '2012-10-17',
        Statement: [
          {
            Sid: 'DenyInsecureTransport',
            Effect: 'Deny',
            Principal: '*',
            Action: 's3:*',
            Resource: [
              { 'Fn::Sub': `arn:\${AWS::Partition}:s3:::${bucketName}` },
              { 'Fn::Sub': `arn:\${AWS::Partition}:s3:::${bucketName}/*` },
            ],
            Condition: { Bool: { 'aws:SecureTransport': 'false' } },
          },
        ],
      },
    },
  };

  template.Outputs = {
    StateBucketName: {
      Description: 'Bucket holding the state record',
      Value: { Ref: STATE_BUCKET_LOGICAL_ID },
    },
  };

  return template;
}

export { getBackendStackName };
