import type { AWS } from '@serverless/typescript';

import * as functions from '@functions/index';
import { s3Buckets } from '@resources/s3';

const serverlessConfiguration: AWS = {
  service: 'pagesmith-api',
  frameworkVersion: '3',
  plugins: [
    'serverless-esbuild',
    'serverless-offline'
  ],
  provider: {
    name: 'aws',
    runtime: 'nodejs20.x',
    stage: '${opt:stage, "dev"}',
    region: 'us-east-1',
    // Use AWS_PROFILE for local deploys
    environment: {
      AWS_NODEJS_CONNECTION_REUSE_ENABLED: '1',
      NODE_OPTIONS: '--enable-source-maps --stack-trace-limit=1000',
      STAGE: '${self:provider.stage}',
      REGION: '${self:provider.region}',
      SERVICE_NAME: '${self:service}',

      // Generated pages
      OUTPUT_BUCKET_NAME: 'pagesmith-${self:provider.stage}-output',

      // Text generation
      BEDROCK_MODEL_ID: '${env:BEDROCK_MODEL_ID, "anthropic.claude-3-haiku-20240307-v1:0"}',
    },
    iam: {
      role: {
        statements: [
          {
            Effect: 'Allow',
            Action: [
              's3:PutObject'
            ],
            Resource: [
              'arn:aws:s3:::pagesmith-${self:provider.stage}-output/output/*'
            ]
          },
          {
            Effect: 'Allow',
            Action: [
              'bedrock:InvokeModel'
            ],
            Resource: [
              'arn:aws:bedrock:${self:provider.region}::foundation-model/anthropic.claude-3-haiku-*'
            ]
          }
        ]
      }
    }
  },
  functions,
  package: {
    individually: true
  },
  custom: {
    esbuild: {
      bundle: true,
      minify: false,
      sourcemap: true,
      exclude: ['aws-sdk'],
      target: 'node20',
      define: { 'require.resolve': undefined },
      platform: 'node',
      concurrency: 10,
    },
    'serverless-offline': {
      httpPort: 4001,
      lambdaPort: 4002,
    }
  },
  resources: {
    Resources: {
      ...s3Buckets,
    },
    Outputs: {
      OutputBucketName: {
        Value: { Ref: 'OutputBucket' },
        Export: {
          Name: 'pagesmith-${self:provider.stage}-output-bucket'
        }
      },
      ApiUrl: {
        Value: {
          'Fn::Join': [
            '',
            [
              'https://',
              { Ref: 'ApiGatewayRestApi' },
              '.execute-api.',
              { Ref: 'AWS::Region' },
              '.amazonaws.com/',
              '${self:provider.stage}'
            ]
          ]
        },
        Export: {
          Name: 'pagesmith-${self:provider.stage}-api-url'
        }
      }
    }
  }
};

module.exports = serverlessConfiguration;
