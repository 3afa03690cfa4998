/**
 * Result of running an external command
 */
export interface ExecutionResult {
  /** Exit code (0 = success, 127 = not found, 128+n = killed by signal n) */
  exitCode: number;
  /** Standard output (empty when stdio is inherited) */
  stdout: string;
  /** Standard error (empty when stdio is inherited) */
  stderr: string;
  /** Signal that terminated the command, if any */
  signal: NodeJS.Signals | null;
  /** Execution duration in ms */
  durationMs: number;
}

/**
 * Options for running an external command
 */
export interface ExecutionOptions {
  /** Command to execute */
  command: string;
  /** Arguments for the command */
  args?: string[];
  /** Working directory */
  workingDir?: string;
  /** Extra environment variables */
  env?: Record<string, string>;
  /**
   * 'pipe' captures output for parsing; 'inherit' streams it to the user's
   * terminal live (default: 'pipe')
   */
  stdio?: 'pipe' | 'inherit';
}

/**
 * ICommandRunner - the only way the core reaches external processes.
 *
 * Every call blocks the pipeline until the child exits; nothing runs
 * concurrently.
 */
export interface ICommandRunner {
  execute(options: ExecutionOptions): Promise<ExecutionResult>;
}
