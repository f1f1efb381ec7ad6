import { CommandFailedError, Logger, ShipyardError } from '@shipyard/shared';

export interface CommandStep {
  id: string;
  description: string;
  program: string;
  args: string[];
  cwd?: string;
  /** id of an earlier step whose stdout is piped into this one */
  stdinFrom?: string;
  captureOutput?: boolean;
  /** output is passed on to dependants but never returned or logged */
  secretOutput?: boolean;
}

export interface CommandInvocation {
  program: string;
  args: string[];
  cwd?: string;
  input?: string;
  captureOutput: boolean;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  run(invocation: CommandInvocation): Promise<CommandResult>;
}

export interface StepOutcome {
  stepId: string;
  exitCode: number;
  stdout: string;
}

const SAFE_ARG = /^[A-Za-z0-9_./:=@%+,-]+$/;

export const quoteArg = (arg: string) =>
  SAFE_ARG.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`;

export const formatCommand = (step: Pick<CommandStep, 'program' | 'args' | 'cwd'>) => {
  const command = [step.program, ...step.args].map(quoteArg).join(' ');
  return step.cwd ? `(cd ${quoteArg(step.cwd)} && ${command})` : command;
};

/**
 * Renders steps as shell lines. A step reading the previous step's output is
 * joined to it with a pipe.
 */
export const formatSteps = (steps: CommandStep[]): string[] => {
  const lines: string[] = [];

  steps.forEach((step, index) => {
    const previous = steps[index - 1];
    const command = formatCommand(step);

    if (previous && step.stdinFrom === previous.id && lines.length > 0) {
      lines[lines.length - 1] = `${lines[lines.length - 1]} | ${command}`;
    } else {
      lines.push(command);
    }
  });

  return lines;
};

/**
 * Runs steps one after another and stops at the first non-zero exit code.
 */
export const executeSteps = async (
  steps: CommandStep[],
  runner: CommandRunner,
  logger: Logger
): Promise<StepOutcome[]> => {
  const outputs = new Map<string, string>();
  const outcomes: StepOutcome[] = [];

  for (const step of steps) {
    const commandLine = formatCommand(step);
    logger.info(step.description);
    logger.debug(`$ ${commandLine}`);

    let input: string | undefined;
    if (step.stdinFrom !== undefined) {
      input = outputs.get(step.stdinFrom);
      if (input === undefined) {
        throw new ShipyardError(
          `Step "${step.id}" reads from "${step.stdinFrom}", which has not produced output`
        );
      }
    }

    const result = await runner.run({
      program: step.program,
      args: step.args,
      cwd: step.cwd,
      input,
      captureOutput: step.captureOutput ?? false,
    });

    if (result.exitCode !== 0) {
      throw new CommandFailedError(step.id, commandLine, result.exitCode, result.stderr);
    }

    outputs.set(step.id, result.stdout);
    outcomes.push({
      stepId: step.id,
      exitCode: result.exitCode,
      stdout: step.secretOutput ? '' : result.stdout,
    });
  }

  return outcomes;
};
