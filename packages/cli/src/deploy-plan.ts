import {
  awsAccountIdSchema,
  Logger,
  awsRegionSchema,
  ecrRepositoryNameSchema,
  ecsResourceNameSchema,
  imageTagSchema,
  imageUri,
  registryHost,
  ValidationError,
} from '@shipyard/shared';
import { z } from 'zod';

import { CommandRunner, CommandStep, executeSteps, formatSteps } from './commands';

export const deployTargetSchema = z
  .object({
    account: awsAccountIdSchema,
    region: awsRegionSchema,
    repository: ecrRepositoryNameSchema,
    tag: imageTagSchema.default('latest'),
    context: z.string().min(1).default('.'),
    dockerfile: z.string().min(1).optional(),
    createRepository: z.boolean().default(false),
    ecsCluster: ecsResourceNameSchema.optional(),
    ecsService: ecsResourceNameSchema.optional(),
  })
  .refine((target) => (target.ecsCluster === undefined) === (target.ecsService === undefined), {
    message: 'ecsCluster and ecsService must be given together',
    path: ['ecsService'],
  });

export type DeployTargetInput = z.input<typeof deployTargetSchema>;
export type DeployTarget = z.output<typeof deployTargetSchema>;

export interface DeployPlan {
  target: DeployTarget;
  registry: string;
  image: string;
  steps: CommandStep[];
}

export const parseDeployTarget = (input: Partial<DeployTargetInput>): DeployTarget => {
  const result = deployTargetSchema.safeParse(input);
  if (!result.success) {
    throw ValidationError.fromZod('deploy target', result.error);
  }
  return result.data;
};

/**
 * Steps that take a local build context to an image in ECR, optionally
 * creating the repository first and rolling the ECS service afterwards.
 */
export const buildDeployPlan = (input: Partial<DeployTargetInput>): DeployPlan => {
  const target = parseDeployTarget(input);
  const { account, region, repository, tag } = target;

  const registry = registryHost(account, region);
  const localImage = `${repository}:${tag}`;
  const image = imageUri({ account, region, repository, tag });
  const steps: CommandStep[] = [];

  if (target.createRepository) {
    steps.push({
      id: 'create-repository',
      description: `Create ECR repository ${repository}`,
      program: 'aws',
      args: [
        'ecr',
        'create-repository',
        '--repository-name',
        repository,
        '--region',
        region,
        '--image-scanning-configuration',
        'scanOnPush=true',
      ],
    });
  }

  steps.push(
    {
      id: 'login-password',
      description: `Fetch an ECR login token for ${region}`,
      program: 'aws',
      args: ['ecr', 'get-login-password', '--region', region],
      captureOutput: true,
      secretOutput: true,
    },
    {
      id: 'docker-login',
      description: `Log docker in to ${registry}`,
      program: 'docker',
      args: ['login', '--username', 'AWS', '--password-stdin', registry],
      stdinFrom: 'login-password',
    },
    {
      id: 'docker-build',
      description: `Build ${localImage} from ${target.context}`,
      program: 'docker',
      args: [
        'build',
        '-t',
        localImage,
        ...(target.dockerfile ? ['-f', target.dockerfile] : []),
        target.context,
      ],
    },
    {
      id: 'docker-tag',
      description: `Tag ${localImage} as ${image}`,
      program: 'docker',
      args: ['tag', localImage, image],
    },
    {
      id: 'docker-push',
      description: `Push ${image}`,
      program: 'docker',
      args: ['push', image],
    }
  );

  if (target.ecsCluster !== undefined && target.ecsService !== undefined) {
    steps.push({
      id: 'update-service',
      description: `Roll out ${target.ecsService} on ${target.ecsCluster}`,
      program: 'aws',
      args: [
        'ecs',
        'update-service',
        '--cluster',
        target.ecsCluster,
        '--service',
        target.ecsService,
        '--force-new-deployment',
        '--region',
        region,
      ],
    });
  }

  return { target, registry, image, steps };
};

export const formatPlan = (plan: DeployPlan) => formatSteps(plan.steps);

/**
 * Runs the plan in order and stops at the first failing step.
 */
export const executePlan = (plan: DeployPlan, runner: CommandRunner, logger: Logger) =>
  executeSteps(plan.steps, runner, logger);
