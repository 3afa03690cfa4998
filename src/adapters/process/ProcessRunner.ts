import { spawn } from 'child_process';
import { constants } from 'os';
import type {
  ICommandRunner,
  ExecutionOptions,
  ExecutionResult,
} from '../../core/interfaces/ICommandRunner.js';
import { logger } from '../../utils/logger.js';

const EXIT_NOT_FOUND = 127;

function signalExitCode(signal: NodeJS.Signals): number {
  const entry = Object.entries(constants.signals).find(([name]) => name === signal);
  return 128 + (entry ? entry[1] : 0);
}

/**
 * ProcessRunner - runs commands as child processes
 *
 * In 'pipe' mode output is captured for parsing; in 'inherit' mode the child
 * shares the terminal, so long benchmark runs stream live and a Ctrl-C
 * reaches the child directly.
 */
export class ProcessRunner implements ICommandRunner {
  private log = logger.child('exec');

  async execute(options: ExecutionOptions): Promise<ExecutionResult> {
    const startTime = performance.now();
    const args = options.args ?? [];
    const stdio = options.stdio ?? 'pipe';

    this.log.debug(`$ ${[options.command, ...args].join(' ')}`);

    return new Promise(resolve => {
      const proc = spawn(options.command, args, {
        cwd: options.workingDir ?? process.cwd(),
        env: { ...process.env, ...options.env },
        stdio: stdio === 'inherit' ? 'inherit' : ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      let settled = false;

      proc.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      proc.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      proc.on('close', (code, signal) => {
        // A negative code is a spawn errno; the 'error' handler reports it
        if (settled || (code !== null && code < 0)) return;
        settled = true;

        resolve({
          exitCode: code ?? (signal ? signalExitCode(signal) : 1),
          stdout,
          stderr,
          signal,
          durationMs: performance.now() - startTime,
        });
      });

      proc.on('error', (error: NodeJS.ErrnoException) => {
        if (settled) return;
        settled = true;

        resolve({
          exitCode: error.code === 'ENOENT' ? EXIT_NOT_FOUND : 1,
          stdout,
          stderr: stderr + (stderr ? '\n' : '') + error.message,
          signal: null,
          durationMs: performance.now() - startTime,
        });
      });
    });
  }
}
