import { createEnvReader } from '@shipyard/env-parser';
import {
  awsAccountIdSchema,
  awsRegionSchema,
  ecrRepositoryNameSchema,
  imageTagSchema,
} from '@shipyard/shared';
import { z } from 'zod';

type Env = Record<string, string | undefined>;

const appConfigSchema = z.object({
  deployEnv: z.enum(['dev', 'prod']),
  project: z.string(),
  usePrivateSubnets: z.boolean(),
  performanceMode: z.boolean(),
  repositoryName: ecrRepositoryNameSchema,
  imageTag: imageTagSchema,
  containerPort: z.number().int().min(1).max(65535),
  healthCheckPath: z.string().startsWith('/'),
  certificateArn: z.string().startsWith('arn:').optional(),
  github: z
    .object({
      repository: z.string().regex(/^[\w.-]+\/[\w.-]+$/, 'must look like owner/repo'),
      branch: z.string().min(1),
    })
    .optional(),
});

const stackEnvConfigSchema = z.object({
  account: awsAccountIdSchema,
  region: awsRegionSchema,
});

export type StackEnvConfig = z.infer<typeof stackEnvConfigSchema>;

export type AppConfig = z.infer<typeof appConfigSchema>;

export const getAppConfig = (env: Env = process.env): AppConfig => {
  const { readOptionalBool, readOptionalNumber, readOptionalString, readRequiredString } =
    createEnvReader(env);
  const githubRepository = readOptionalString('GITHUB_REPOSITORY');

  return appConfigSchema.parse({
    deployEnv: readRequiredString('DEPLOY_ENV'),
    project: 'shipyard',
    usePrivateSubnets: readOptionalBool('USE_PRIVATE_SUBNETS', true),
    performanceMode: readOptionalBool('PERFORMANCE_MODE', false),
    repositoryName: readOptionalString('REPOSITORY_NAME', 'web'),
    imageTag: readOptionalString('IMAGE_TAG', 'latest'),
    containerPort: readOptionalNumber('CONTAINER_PORT', 80),
    healthCheckPath: readOptionalString('HEALTH_CHECK_PATH', '/'),
    certificateArn: readOptionalString('CERTIFICATE_ARN'),
    github: githubRepository
      ? {
          repository: githubRepository,
          branch: readOptionalString('DEPLOY_BRANCH', 'main'),
        }
      : undefined,
  });
};

export const getStackEnvConfig = (env: Env = process.env): StackEnvConfig => {
  const { readRequiredString } = createEnvReader(env);

  return stackEnvConfigSchema.parse({
    account: readRequiredString('CDK_DEFAULT_ACCOUNT'),
    region: readRequiredString('CDK_DEFAULT_REGION'),
  });
};
