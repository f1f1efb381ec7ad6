import { CommandFailedError, createLogger, ShipyardError } from '@shipyard/shared';

import { CommandStep, executeSteps, formatCommand, formatSteps, quoteArg } from '../src';

import { FakeRunner } from './fake-runner';

const logger = createLogger({ level: 'silent' });

const steps: CommandStep[] = [
  {
    id: 'token',
    description: 'Fetch token',
    program: 'aws',
    args: ['ecr', 'get-login-password'],
    captureOutput: true,
    secretOutput: true,
  },
  {
    id: 'login',
    description: 'Log in',
    program: 'docker',
    args: ['login', '--password-stdin', 'registry.test'],
    stdinFrom: 'token',
  },
  {
    id: 'push',
    description: 'Push',
    program: 'docker',
    args: ['push', 'registry.test/web:latest'],
  },
];

describe('quoteArg', () => {
  test('should leave plain arguments alone', () => {
    expect(quoteArg('--region')).toBe('--region');
    expect(quoteArg('scanOnPush=true')).toBe('scanOnPush=true');
    expect(quoteArg('registry.test/web:v1')).toBe('registry.test/web:v1');
  });

  test('should single-quote arguments the shell would split', () => {
    expect(quoteArg('my app')).toBe("'my app'");
    expect(quoteArg('')).toBe("''");
    expect(quoteArg("it's")).toBe("'it'\\''s'");
  });
});

describe('formatSteps', () => {
  test('should pipe a step into the one that reads its output', () => {
    expect(formatSteps(steps)).toEqual([
      'aws ecr get-login-password | docker login --password-stdin registry.test',
      'docker push registry.test/web:latest',
    ]);
  });

  test('should show the working directory', () => {
    expect(formatCommand({ program: 'npm', args: ['install'], cwd: '/tmp/my app/backend' })).toBe(
      "(cd '/tmp/my app/backend' && npm install)"
    );
  });
});

describe('executeSteps', () => {
  test('should run steps in order and feed captured output forward', async () => {
    const runner = new FakeRunner((invocation) =>
      invocation.args[1] === 'get-login-password' ? { stdout: 'test-secret' } : undefined
    );

    await executeSteps(steps, runner, logger);

    expect(runner.commandLines()).toEqual([
      'aws ecr get-login-password',
      'docker login --password-stdin registry.test',
      'docker push registry.test/web:latest',
    ]);
    expect(runner.invocations[0].captureOutput).toBe(true);
    expect(runner.invocations[1].input).toBe('test-secret');
    expect(runner.invocations[2].input).toBeUndefined();
  });

  test('should not return secret output', async () => {
    const runner = new FakeRunner(() => ({ stdout: 'test-secret' }));

    const outcomes = await executeSteps(steps, runner, logger);

    expect(outcomes.map((outcome) => outcome.stdout)).toEqual(['', 'test-secret', 'test-secret']);
  });

  test('should stop at the first failing step', async () => {
    const runner = new FakeRunner((invocation) =>
      invocation.program === 'docker' && invocation.args[0] === 'login'
        ? { exitCode: 1, stderr: 'Error: Cannot perform an interactive login' }
        : undefined
    );

    const run = executeSteps(steps, runner, logger);

    await expect(run).rejects.toThrow(CommandFailedError);
    await expect(run).rejects.toThrow(
      'Step "login" failed with exit code 1: docker login --password-stdin registry.test\nError: Cannot perform an interactive login'
    );
    expect(runner.invocations).toHaveLength(2);
  });

  test('should refuse to run a step whose input never ran', async () => {
    const runner = new FakeRunner();

    await expect(executeSteps(steps.slice(1), runner, logger)).rejects.toThrow(ShipyardError);
    expect(runner.invocations).toHaveLength(0);
  });

  test('should log descriptions but never the secret', async () => {
    const lines: string[] = [];
    const verbose = createLogger({
      level: 'debug',
      stream: { write: (chunk: string) => lines.push(chunk) },
    });
    const runner = new FakeRunner(() => ({ stdout: 'test-secret' }));

    await executeSteps(steps, runner, verbose);

    expect(lines).toEqual([
      'info: Fetch token\n',
      'debug: $ aws ecr get-login-password\n',
      'info: Log in\n',
      'debug: $ docker login --password-stdin registry.test\n',
      'info: Push\n',
      'debug: $ docker push registry.test/web:latest\n',
    ]);
  });
});
