import * as fs from 'fs/promises';
import * as path from 'path';

import {
  awsRegionSchema,
  ecrRepositoryNameSchema,
  ecsResourceNameSchema,
  Logger,
  ScaffoldConflictError,
  ValidationError,
} from '@shipyard/shared';
import { z } from 'zod';

import { ArtifactContext, GeneratedFile, renderArtifacts } from './artifacts';
import { CommandRunner, CommandStep, executeSteps } from './commands';

export const scaffoldOptionsSchema = z
  .object({
    name: z
      .string()
      .max(214)
      .regex(/^[a-z0-9][a-z0-9._-]*$/, 'must be a lowercase npm package name'),
    nodeVersion: z.string().regex(/^\d+$/, 'must be a Node.js major version').default('20'),
    branch: z
      .string()
      .regex(/^[A-Za-z0-9._/-]+$/, 'must be a plain branch name')
      .default('main'),
    backendPort: z.number().int().min(1).max(65535).default(5000),
    region: awsRegionSchema.default('us-east-1'),
    repository: ecrRepositoryNameSchema.optional(),
    ecsCluster: ecsResourceNameSchema.optional(),
    ecsService: ecsResourceNameSchema.optional(),
  })
  .refine((options) => (options.ecsCluster === undefined) === (options.ecsService === undefined), {
    message: 'ecsCluster and ecsService must be given together',
    path: ['ecsService'],
  });

export type ScaffoldOptionsInput = z.input<typeof scaffoldOptionsSchema>;

export interface ScaffoldFlags {
  force?: boolean;
  install?: boolean;
}

export interface ScaffoldDeps {
  runner: CommandRunner;
  logger: Logger;
}

/**
 * Directory basename turned into something npm accepts as a package name.
 */
export const defaultProjectName = (targetDir: string) =>
  path
    .basename(path.resolve(targetDir))
    .toLowerCase()
    .replace(/[^a-z0-9._-]+/g, '-')
    .replace(/^[._-]+/, '');

export const resolveArtifactContext = (input: ScaffoldOptionsInput): ArtifactContext => {
  const result = scaffoldOptionsSchema.safeParse(input);
  if (!result.success) {
    throw ValidationError.fromZod('scaffold options', result.error);
  }
  const { ecsCluster, ecsService, ...options } = result.data;

  const repository = ecrRepositoryNameSchema.safeParse(options.repository ?? options.name);
  if (!repository.success) {
    throw ValidationError.fromZod('repository', repository.error);
  }

  return {
    ...options,
    repository: repository.data,
    ecs:
      ecsCluster !== undefined && ecsService !== undefined
        ? { cluster: ecsCluster, service: ecsService }
        : undefined,
  };
};

const exists = async (file: string) => {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
};

const installSteps = (targetDir: string): CommandStep[] =>
  ['backend', 'frontend'].map((project) => ({
    id: `install-${project}`,
    description: `Install ${project} dependencies`,
    program: 'npm',
    args: ['install'],
    cwd: path.join(targetDir, project),
  }));

/**
 * Writes the backend, frontend, container and pipeline files into targetDir.
 * Nothing is written when any of them already exists, unless forced.
 */
export const scaffold = async (
  targetDir: string,
  input: ScaffoldOptionsInput,
  { force = false, install = false }: ScaffoldFlags,
  { runner, logger }: ScaffoldDeps
): Promise<GeneratedFile[]> => {
  const files = renderArtifacts(resolveArtifactContext(input));

  if (!force) {
    const existing: string[] = [];
    for (const file of files) {
      if (await exists(path.join(targetDir, file.path))) {
        existing.push(file.path);
      }
    }
    if (existing.length > 0) {
      throw new ScaffoldConflictError(existing);
    }
  }

  for (const file of files) {
    const destination = path.join(targetDir, file.path);
    await fs.mkdir(path.dirname(destination), { recursive: true });
    await fs.writeFile(destination, file.contents, 'utf8');
    logger.debug(`wrote ${file.path}`);
  }
  logger.info(`Scaffolded ${files.length} files in ${targetDir}`);

  if (install) {
    await executeSteps(installSteps(targetDir), runner, logger);
  }

  return files;
};
