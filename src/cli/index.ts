/**
 * nix-hyperfine CLI
 *
 * Wires the real adapters (child processes, Nix, git, hyperfine) into the
 * benchmark pipeline and maps its outcome to an exit code.
 */

import type { ICommandRunner } from '../core/interfaces/ICommandRunner.js';
import { ExitCode, NixHyperfineError, supportsColor } from '../core/errors.js';
import { BenchmarkPipeline, type BenchmarkSummary } from '../core/usecases/BenchmarkPipeline.js';
import { RevisionResolver, PinCache } from '../core/usecases/RevisionResolver.js';
import { TargetResolver } from '../core/usecases/TargetResolver.js';
import { DependencyPrebuilder } from '../core/usecases/DependencyPrebuilder.js';
import { BenchmarkInvoker } from '../core/usecases/BenchmarkInvoker.js';
import { ProcessRunner } from '../adapters/process/ProcessRunner.js';
import { NixBuildTool } from '../adapters/nix/NixBuildTool.js';
import { GitRevisionFetcher } from '../adapters/nix/GitRevisionFetcher.js';
import { HyperfineTool } from '../adapters/hyperfine/HyperfineTool.js';
import { loadConfig, type Config } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import { parseArgs, USAGE } from './args.js';

export const VERSION = '0.1.0';

export interface CliOptions {
  /** Defaults to a ProcessRunner spawning real commands */
  runner?: ICommandRunner;
  /** Overrides applied on top of defaults and environment */
  config?: Partial<Config>;
  /** Where help, version and error text go */
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  /** Aborts the run; the CLI creates one wired to SIGINT when omitted */
  signal?: AbortSignal;
}

export function createPipeline(config: Config, runner: ICommandRunner): BenchmarkPipeline {
  const buildTool = new NixBuildTool(runner, config);
  const benchmarkTool = new HyperfineTool(runner, config.hyperfineCommand, config.projectRoot);

  return new BenchmarkPipeline({
    revisionResolver: new RevisionResolver(
      new GitRevisionFetcher(runner, config),
      new PinCache(),
      config.projectRoot
    ),
    targetResolver: new TargetResolver(buildTool),
    prebuilder: new DependencyPrebuilder(buildTool, config.realiseBatchSize),
    invoker: new BenchmarkInvoker(buildTool, benchmarkTool),
    benchmarkTool,
    benchmarkCommand: config.hyperfineCommand,
  });
}

function reportFailures(summary: BenchmarkSummary, useColors: boolean, write: (text: string) => void) {
  if (summary.failures.length === 0) {
    return;
  }
  write(`\n❌ ${summary.failures.length} target(s) failed:`);
  for (const failure of summary.failures) {
    write(failure.error.format(useColors));
  }
}

/**
 * Run the CLI with `argv` (without node and script path); resolves to the
 * process exit code.
 */
export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const stdout = options.stdout ?? ((text: string) => console.log(text));
  const stderr = options.stderr ?? ((text: string) => console.error(text));
  const useColors = options.stderr ? false : supportsColor(process.stderr);

  let controller: AbortController | null = null;
  const onSigint = () => {
    logger.warn('Interrupted, stopping after the current command...');
    controller?.abort();
  };

  try {
    const args = parseArgs(argv);

    if (args.help) {
      stdout(USAGE);
      return ExitCode.SUCCESS;
    }
    if (args.version) {
      stdout(`nix-hyperfine ${VERSION}`);
      return ExitCode.SUCCESS;
    }

    const config = loadConfig(options.config);
    logger.setLevel(args.verbose ? 'debug' : config.logLevel);

    let signal = options.signal;
    if (!signal) {
      controller = new AbortController();
      signal = controller.signal;
      process.on('SIGINT', onSigint);
    }

    const pipeline = createPipeline(config, options.runner ?? new ProcessRunner());
    const summary = await pipeline.run({
      tokens: args.specs,
      mode: args.mode,
      passthrough: args.passthrough,
      signal,
    });

    reportFailures(summary, useColors, stderr);
    return summary.exitCode;
  } catch (error) {
    if (error instanceof NixHyperfineError) {
      stderr(error.format(useColors));
      return error.exitCode;
    }
    stderr(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`);
    return ExitCode.ERROR;
  } finally {
    if (controller) {
      process.off('SIGINT', onSigint);
    }
  }
}
