import { spawn } from 'child_process';

import { LogSink } from '@shipyard/shared';

import { CommandInvocation, CommandResult, CommandRunner } from './commands';

const MISSING_COMMAND_EXIT_CODE = 127;

/**
 * Spawns the program directly (no shell). Stderr is echoed to the sink and
 * kept for error reporting; stdout is only collected when asked for.
 */
export class ProcessRunner implements CommandRunner {
  constructor(private readonly stderrSink: LogSink = process.stderr) {}

  run(invocation: CommandInvocation): Promise<CommandResult> {
    return new Promise((resolve) => {
      let stdout = '';
      let stderr = '';

      const child = spawn(invocation.program, invocation.args, {
        cwd: invocation.cwd,
        stdio: [
          invocation.input === undefined ? 'inherit' : 'pipe',
          invocation.captureOutput ? 'pipe' : 'inherit',
          'pipe',
        ],
      });

      child.stdout?.on('data', (chunk: Buffer) => {
        stdout += chunk.toString();
      });

      child.stderr?.on('data', (chunk: Buffer) => {
        const text = chunk.toString();
        stderr += text;
        this.stderrSink.write(text);
      });

      child.on('error', (error) => {
        resolve({
          exitCode: MISSING_COMMAND_EXIT_CODE,
          stdout,
          stderr: `${stderr}${error.message}`,
        });
      });

      child.on('close', (code) => {
        resolve({ exitCode: code ?? 1, stdout, stderr });
      });

      // EPIPE when the program exits without reading; the exit code decides
      child.stdin?.on('error', (error) => {
        stderr += error.message;
      });

      if (invocation.input !== undefined) {
        child.stdin?.end(invocation.input);
      }
    });
  }
}
