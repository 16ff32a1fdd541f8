import execa from 'execa';
import { BuildError, BuildErrorCode, errorMessage } from './errors.js';
import { logger } from './logger.js';

export interface CommandSpec {
  program: string;
  args: string[];
  cwd: string;
}

export interface ExecutionResult {
  success: boolean;
  // null when the process was terminated by a signal
  exitCode: number | null;
  signal?: string;
}

/** Runs an external program to completion. */
export interface ProcessRunner {
  run(spec: CommandSpec): Promise<ExecutionResult>;
}

export function describeCommand(spec: CommandSpec): string {
  return [spec.program, ...spec.args].join(' ');
}

/**
 * Default runner. stdio is inherited so the toolchain's progress output reaches
 * the terminal live; only the exit status is inspected. No timeout is applied.
 */
export class ExecaRunner implements ProcessRunner {
  async run(spec: CommandSpec): Promise<ExecutionResult> {
    logger.debug({ command: describeCommand(spec), cwd: spec.cwd }, 'spawning');
    try {
      await execa(spec.program, spec.args, { cwd: spec.cwd, stdio: 'inherit' });
      return { success: true, exitCode: 0 };
    } catch (err) {
      const exitCode = numberField(err, 'exitCode');
      const signal = stringField(err, 'signal');
      // execa leaves both unset when the process never started (ENOENT, EACCES)
      if (exitCode === undefined && signal === undefined) {
        throw new BuildError(
          BuildErrorCode.SPAWN_FAILED,
          `Failed to start '${describeCommand(spec)}': ${errorMessage(err)}`,
          { program: spec.program, cause: errorMessage(err) }
        );
      }
      return { success: false, exitCode: exitCode ?? null, signal };
    }
  }
}

export async function runOrThrow(runner: ProcessRunner, spec: CommandSpec): Promise<ExecutionResult> {
  const result = await runner.run(spec);
  if (!result.success) {
    const status = result.signal ? `signal ${result.signal}` : `exit code ${result.exitCode}`;
    throw new BuildError(
      BuildErrorCode.EXECUTION_FAILED,
      `'${describeCommand(spec)}' exited unsuccessfully (${status})`,
      { exitCode: result.exitCode, signal: result.signal }
    );
  }
  return result;
}

function numberField(err: unknown, key: string): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  const value: unknown = Reflect.get(err, key);
  return typeof value === 'number' ? value : undefined;
}

function stringField(err: unknown, key: string): string | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  const value: unknown = Reflect.get(err, key);
  return typeof value === 'string' ? value : undefined;
}
