/**
 * Error taxonomy and exit codes.
 *
 * Every failure the tool reports is a NixHyperfineError carrying the exit
 * code the process ends with. Per-target failures (target resolution and
 * pre-build) also carry the label of the target they belong to so a run over
 * several targets stays attributable.
 *
 * Exit Codes:
 * - 0: Success
 * - 1: General error (including a failed build-tool command)
 * - 2: Misuse (invalid arguments or derivation specification)
 * - 3: Revision could not be resolved
 * - 4: Target could not be resolved
 * - 5: Dependency pre-build failed
 * - 10: Configuration error
 * - 127: Benchmark tool not found
 * - 130: Interrupted
 *
 * When hyperfine itself fails, its own exit code is propagated unchanged.
 */

export const ExitCode = {
  SUCCESS: 0,
  ERROR: 1,
  MISUSE: 2,
  REVISION_ERROR: 3,
  RESOLUTION_ERROR: 4,
  PREBUILD_ERROR: 5,
  CONFIG_ERROR: 10,
  TOOL_NOT_FOUND: 127,
  INTERRUPTED: 130,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

export const ErrorCode = {
  UNKNOWN: 'unknown_error',
  INVALID_ARGUMENT: 'invalid_argument',
  MALFORMED_SPEC: 'malformed_spec',
  REVISION_UNRESOLVED: 'revision_unresolved',
  TARGET_UNRESOLVED: 'target_unresolved',
  PREBUILD_FAILED: 'prebuild_failed',
  COMMAND_FAILED: 'command_failed',
  CONFIG_INVALID: 'config_invalid',
  TOOL_NOT_FOUND: 'tool_not_found',
  INTERRUPTED: 'interrupted',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface StructuredError {
  error: {
    code: ErrorCodeValue;
    message: string;
    exitCode: ExitCodeValue;
    label?: string;
    hint?: string;
    cause?: string;
  };
}

export interface NixHyperfineErrorOptions {
  code?: ErrorCodeValue;
  exitCode?: ExitCodeValue;
  label?: string;
  hint?: string;
  cause?: unknown;
}

/**
 * Base class for all errors the tool reports.
 */
export class NixHyperfineError extends Error {
  readonly code: ErrorCodeValue;
  readonly exitCode: ExitCodeValue;
  readonly label?: string;
  readonly hint?: string;

  constructor(message: string, options: NixHyperfineErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'NixHyperfineError';
    this.code = options.code ?? ErrorCode.UNKNOWN;
    this.exitCode = options.exitCode ?? ExitCode.ERROR;
    this.label = options.label;
    this.hint = options.hint;
  }

  toJSON(): StructuredError {
    return {
      error: {
        code: this.code,
        message: this.message,
        exitCode: this.exitCode,
        ...(this.label !== undefined && { label: this.label }),
        ...(this.hint !== undefined && { hint: this.hint }),
        ...(this.cause instanceof Error && { cause: this.cause.message }),
      },
    };
  }

  /**
   * Format error for human-readable CLI output
   */
  format(useColors = true): string {
    const red = useColors ? '\x1b[31m' : '';
    const dim = useColors ? '\x1b[2m' : '';
    const reset = useColors ? '\x1b[0m' : '';

    const where = this.label !== undefined ? ` [${this.label}]` : '';
    let output = `${red}Error${where}:${reset} ${this.message}`;

    if (this.hint) {
      output += `\n${dim}Hint: ${this.hint}${reset}`;
    }

    return output;
  }
}

export class UsageError extends NixHyperfineError {
  constructor(message: string, options: NixHyperfineErrorOptions = {}) {
    super(message, {
      ...options,
      code: ErrorCode.INVALID_ARGUMENT,
      exitCode: ExitCode.MISUSE,
      hint: options.hint ?? 'Run `nix-hyperfine --help` for usage.',
    });
    this.name = 'UsageError';
  }
}

/**
 * A derivation specification token that cannot be classified.
 */
export class MalformedSpecError extends NixHyperfineError {
  readonly token: string;

  constructor(token: string, reason: string) {
    super(`Malformed derivation specification '${token}': ${reason}`, {
      code: ErrorCode.MALFORMED_SPEC,
      exitCode: ExitCode.MISUSE,
      hint: 'Use "flake#attr", "-f file.nix -A attr" or "attr", optionally followed by "@rev1,rev2".',
    });
    this.name = 'MalformedSpecError';
    this.token = token;
  }
}

export class RevisionResolutionError extends NixHyperfineError {
  readonly revision: string;

  constructor(revision: string, message: string, options: { label?: string; cause?: unknown } = {}) {
    super(message, {
      ...options,
      code: ErrorCode.REVISION_UNRESOLVED,
      exitCode: ExitCode.REVISION_ERROR,
    });
    this.name = 'RevisionResolutionError';
    this.revision = revision;
  }
}

export interface ResolutionAttempt {
  reference: string;
  reason: string;
}

export class TargetResolutionError extends NixHyperfineError {
  readonly attempts: ResolutionAttempt[];

  constructor(label: string, attempts: ResolutionAttempt[]) {
    const tried = attempts.map(a => `${a.reference} (${a.reason})`).join('; ');
    super(`Could not resolve '${label}'. Tried: ${tried}`, {
      code: ErrorCode.TARGET_UNRESOLVED,
      exitCode: ExitCode.RESOLUTION_ERROR,
      label,
    });
    this.name = 'TargetResolutionError';
    this.attempts = attempts;
  }
}

export type PrebuildStep = 'instantiate' | 'enumerate' | 'realize' | 'warm-build';

export class PrebuildError extends NixHyperfineError {
  readonly step: PrebuildStep;
  readonly failedDependency?: string;

  constructor(
    label: string,
    step: PrebuildStep,
    options: { failedDependency?: string; cause?: unknown } = {}
  ) {
    const detail = options.cause instanceof Error ? `: ${options.cause.message}` : '';
    const dependency =
      options.failedDependency !== undefined ? ` (dependency ${options.failedDependency})` : '';
    super(`Pre-build step '${step}' failed${dependency}${detail}`, {
      code: ErrorCode.PREBUILD_FAILED,
      exitCode: ExitCode.PREBUILD_ERROR,
      label,
      cause: options.cause,
    });
    this.name = 'PrebuildError';
    this.step = step;
    this.failedDependency = options.failedDependency;
  }
}

/**
 * An external command exited unsuccessfully.
 */
export class CommandError extends NixHyperfineError {
  readonly argv: string[];
  readonly commandExitCode: number;
  readonly stderr: string;
  /** Artifact the command was working on when it failed, when it can be told. */
  readonly artifact?: string;

  constructor(
    argv: string[],
    commandExitCode: number,
    stderr: string,
    options: { artifact?: string; display?: string } = {}
  ) {
    const trimmed = stderr.trim();
    const display = options.display ?? argv.join(' ');
    super(`Command failed (exit ${commandExitCode}): ${display}${trimmed ? `\n${trimmed}` : ''}`, {
      code: ErrorCode.COMMAND_FAILED,
      exitCode: ExitCode.ERROR,
    });
    this.name = 'CommandError';
    this.argv = argv;
    this.commandExitCode = commandExitCode;
    this.stderr = stderr;
    this.artifact = options.artifact;
  }
}

export class ConfigError extends NixHyperfineError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: ErrorCode.CONFIG_INVALID, exitCode: ExitCode.CONFIG_ERROR, cause });
    this.name = 'ConfigError';
  }
}

export class BenchmarkToolError extends NixHyperfineError {
  constructor(command: string) {
    super(`${command} not found in PATH`, {
      code: ErrorCode.TOOL_NOT_FOUND,
      exitCode: ExitCode.TOOL_NOT_FOUND,
      hint: 'Install it with: nix-env -iA nixpkgs.hyperfine (or set HYPERFINE_CMD)',
    });
    this.name = 'BenchmarkToolError';
  }
}

export class InterruptedError extends NixHyperfineError {
  constructor() {
    super('Interrupted', { code: ErrorCode.INTERRUPTED, exitCode: ExitCode.INTERRUPTED });
    this.name = 'InterruptedError';
  }
}

/**
 * Whether terminal colours should be used on the given stream.
 */
export function supportsColor(stream: { isTTY?: boolean } = process.stderr): boolean {
  if (process.env.NO_COLOR) {
    return false;
  }
  if (!stream.isTTY) {
    return false;
  }
  const term = process.env.TERM ?? '';
  return term !== '' && term !== 'dumb';
}
