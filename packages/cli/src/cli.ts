import * as path from 'path';
import { parseArgs } from 'util';

import { createEnvReader, EnvParseError } from '@shipyard/env-parser';
import { Logger, LogSink, ShipyardError, UsageError } from '@shipyard/shared';

import { CommandRunner } from './commands';
import { buildDeployPlan, DeployTargetInput, executePlan, formatPlan } from './deploy-plan';
import { defaultProjectName, scaffold } from './scaffold';

export interface CliDeps {
  env: Record<string, string | undefined>;
  cwd: string;
  stdout: LogSink;
  logger: Logger;
  runner: CommandRunner;
}

export const usage = `Usage: shipyard <command> [options]

Commands:
  init <dir>   Write an Express backend, a React frontend, a Dockerfile,
               a .dockerignore and a GitHub Actions deploy workflow
  plan         Print the docker and aws commands that push the image to ECR
  deploy       Run those commands, stopping at the first failure
  help         Show this message

init options:
  --name <name>            npm package name (default: directory name)
  --node-version <major>   Node.js version for the build image (default: 20)
  --branch <branch>        branch that triggers the deploy workflow (default: main)
  --port <port>            backend port (default: 5000)
  --region <region>        AWS region used by the workflow (default: $AWS_REGION or us-east-1)
  --repository <name>      ECR repository used by the workflow (default: package name)
  --ecs-cluster <name>     roll this ECS cluster's service after each push
  --ecs-service <name>     the ECS service to roll
  --force                  overwrite existing files
  --install                run npm install in backend/ and frontend/

plan and deploy options:
  --account <id>           12 digit AWS account id (default: $AWS_ACCOUNT_ID)
  --region <region>        AWS region (default: $AWS_REGION or us-east-1)
  --repository <name>      ECR repository (default: $SHIPYARD_REPOSITORY)
  --tag <tag>              image tag (default: latest)
  --context <dir>          docker build context (default: .)
  --dockerfile <file>      Dockerfile path passed to docker build -f
  --create-repository      create the ECR repository first
  --ecs-cluster <name>     force a new deployment of this cluster's service
  --ecs-service <name>     the ECS service to roll
  --dry-run                (deploy) print the commands instead of running them
`;

const initOptions = {
  name: { type: 'string' },
  'node-version': { type: 'string' },
  branch: { type: 'string' },
  port: { type: 'string' },
  region: { type: 'string' },
  repository: { type: 'string' },
  'ecs-cluster': { type: 'string' },
  'ecs-service': { type: 'string' },
  force: { type: 'boolean' },
  install: { type: 'boolean' },
} as const;

const deployOptions = {
  account: { type: 'string' },
  region: { type: 'string' },
  repository: { type: 'string' },
  tag: { type: 'string' },
  context: { type: 'string' },
  dockerfile: { type: 'string' },
  'create-repository': { type: 'boolean' },
  'ecs-cluster': { type: 'string' },
  'ecs-service': { type: 'string' },
  'dry-run': { type: 'boolean' },
} as const;

const asUsageError = <T>(parse: () => T): T => {
  try {
    return parse();
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
};

const parseInitArgs = (args: string[]) =>
  asUsageError(() => parseArgs({ args, options: initOptions, allowPositionals: true }));

const parseDeployArgs = (args: string[]) =>
  asUsageError(() => parseArgs({ args, options: deployOptions, allowPositionals: false }));

type DeployValues = ReturnType<typeof parseDeployArgs>['values'];

const writeLines = (stdout: LogSink, lines: string[]) => {
  for (const line of lines) {
    stdout.write(`${line}\n`);
  }
};

const runInit = async (args: string[], deps: CliDeps) => {
  const { values, positionals } = parseInitArgs(args);
  const [dir, ...extra] = positionals;
  if (dir === undefined || extra.length > 0) {
    throw new UsageError('init takes exactly one target directory');
  }

  const targetDir = path.resolve(deps.cwd, dir);
  const { readOptionalString } = createEnvReader(deps.env);

  const files = await scaffold(
    targetDir,
    {
      name: values.name ?? defaultProjectName(targetDir),
      nodeVersion: values['node-version'],
      branch: values.branch,
      backendPort: values.port === undefined ? undefined : Number(values.port),
      region: values.region ?? readOptionalString('AWS_REGION'),
      repository: values.repository,
      ecsCluster: values['ecs-cluster'],
      ecsService: values['ecs-service'],
    },
    { force: values.force, install: values.install },
    deps
  );

  writeLines(
    deps.stdout,
    files.map((file) => path.join(dir, file.path))
  );
};

const readDeployTarget = (values: DeployValues, deps: CliDeps): Partial<DeployTargetInput> => {
  const { readOptionalString } = createEnvReader(deps.env);

  return {
    account: values.account ?? readOptionalString('AWS_ACCOUNT_ID'),
    region: values.region ?? readOptionalString('AWS_REGION', 'us-east-1'),
    repository: values.repository ?? readOptionalString('SHIPYARD_REPOSITORY'),
    tag: values.tag,
    context: values.context,
    dockerfile: values.dockerfile,
    createRepository: values['create-repository'],
    ecsCluster: values['ecs-cluster'],
    ecsService: values['ecs-service'],
  };
};

const runPlan = (args: string[], deps: CliDeps) => {
  const { values } = parseDeployArgs(args);
  if (values['dry-run'] !== undefined) {
    throw new UsageError('--dry-run only applies to deploy');
  }
  const plan = buildDeployPlan(readDeployTarget(values, deps));
  writeLines(deps.stdout, formatPlan(plan));
};

const runDeploy = async (args: string[], deps: CliDeps) => {
  const { values } = parseDeployArgs(args);
  const plan = buildDeployPlan(readDeployTarget(values, deps));

  if (values['dry-run']) {
    writeLines(deps.stdout, formatPlan(plan));
    return;
  }

  await executePlan(plan, deps.runner, deps.logger);
  deps.logger.info(`Pushed ${plan.image}`);
  deps.stdout.write(`${plan.image}\n`);
};

/**
 * Runs one CLI command and resolves to the process exit code.
 */
export const main = async (argv: string[], deps: CliDeps): Promise<number> => {
  const [command, ...args] = argv;

  try {
    switch (command) {
      case 'init':
        await runInit(args, deps);
        return 0;
      case 'plan':
        runPlan(args, deps);
        return 0;
      case 'deploy':
        await runDeploy(args, deps);
        return 0;
      case undefined:
      case 'help':
      case '--help':
      case '-h':
        deps.stdout.write(usage);
        return 0;
      default:
        throw new UsageError(`Unknown command "${command}"`);
    }
  } catch (error) {
    if (error instanceof UsageError) {
      deps.logger.error(error.message);
      deps.stdout.write(usage);
      return error.exitCode;
    }
    if (error instanceof ShipyardError) {
      deps.logger.error(error.message);
      return error.exitCode;
    }
    if (error instanceof EnvParseError) {
      deps.logger.error(error.message);
      return 1;
    }
    deps.logger.error(
      `Unexpected failure: ${error instanceof Error ? (error.stack ?? error.message) : String(error)}`
    );
    return 1;
  }
};
