import type { BenchmarkMode, DerivationSpec, ResolvedTarget } from '../entities/DerivationSpec.js';
import type { IBenchmarkTool } from '../interfaces/IBenchmarkTool.js';
import {
  BenchmarkToolError,
  ExitCode,
  InterruptedError,
  PrebuildError,
  TargetResolutionError,
} from '../errors.js';
import { parseDerivationSpecs } from './SpecParser.js';
import { LabelRegistry } from './LabelRegistry.js';
import type { RevisionResolver } from './RevisionResolver.js';
import type { TargetResolver } from './TargetResolver.js';
import type { DependencyPrebuilder, PrebuildReport } from './DependencyPrebuilder.js';
import type { BenchmarkInvoker } from './BenchmarkInvoker.js';
import { logger } from '../../utils/logger.js';

export interface BenchmarkRequest {
  /** Positional derivation specification tokens, in order */
  tokens: string[];
  mode: BenchmarkMode;
  /** Arguments after `--`, handed to the benchmark tool untouched */
  passthrough: string[];
  /** Aborted on SIGINT; checked between stages */
  signal?: AbortSignal;
}

export interface TargetFailure {
  label: string;
  error: TargetResolutionError | PrebuildError;
}

export interface BenchmarkSummary {
  exitCode: number;
  benchmarked: ResolvedTarget[];
  prebuilds: PrebuildReport[];
  failures: TargetFailure[];
  /** Undefined when the benchmark tool never ran */
  benchmarkExitCode?: number;
}

export interface PipelineComponents {
  revisionResolver: RevisionResolver;
  targetResolver: TargetResolver;
  prebuilder: DependencyPrebuilder;
  invoker: BenchmarkInvoker;
  benchmarkTool: IBenchmarkTool;
  benchmarkCommand: string;
}

/**
 * BenchmarkPipeline - parse → pin revisions → resolve → pre-build → benchmark
 *
 * Malformed input and unresolvable revisions abort the run before any build.
 * Target resolution and pre-build failures only drop that target; the rest
 * are still benchmarked and the first failure decides the exit code.
 */
export class BenchmarkPipeline {
  private log = logger.child('pipeline');

  constructor(private readonly components: PipelineComponents) {}

  async run(request: BenchmarkRequest): Promise<BenchmarkSummary> {
    const { revisionResolver, targetResolver, prebuilder, invoker, benchmarkTool } =
      this.components;
    const specs = parseDerivationSpecs(request.tokens);

    this.checkAborted(request.signal);
    if (!(await benchmarkTool.isAvailable())) {
      throw new BenchmarkToolError(this.components.benchmarkCommand);
    }

    const labels = new LabelRegistry();
    const concrete: DerivationSpec[] = [];
    for (const spec of specs) {
      this.checkAborted(request.signal);
      if (spec.revisions.length > 0) {
        concrete.push(...(await revisionResolver.resolve(spec, labels)));
      } else {
        concrete.push({ ...spec, label: labels.claim(spec.label) });
      }
    }

    const benchmarked: ResolvedTarget[] = [];
    const prebuilds: PrebuildReport[] = [];
    const failures: TargetFailure[] = [];

    for (const spec of concrete) {
      this.checkAborted(request.signal);
      try {
        const target = await targetResolver.resolve(spec, request.mode);
        this.checkAborted(request.signal);
        prebuilds.push(await prebuilder.prebuild(target));
        benchmarked.push(target);
      } catch (error) {
        if (!(error instanceof TargetResolutionError || error instanceof PrebuildError)) {
          throw error;
        }
        this.checkAborted(request.signal);
        this.log.error(`${spec.label}: ${error.message}`);
        failures.push({ label: spec.label, error });
      }
    }

    const firstFailure = failures.length > 0 ? failures[0].error.exitCode : undefined;

    if (benchmarked.length === 0) {
      this.log.error('No target could be prepared; skipping benchmark');
      return {
        exitCode: firstFailure ?? ExitCode.ERROR,
        benchmarked,
        prebuilds,
        failures,
      };
    }
    if (failures.length > 0) {
      this.log.warn(
        `Benchmarking ${benchmarked.length} of ${concrete.length} targets; ` +
          `failed: ${failures.map(f => f.label).join(', ')}`
      );
    }

    this.checkAborted(request.signal);
    const benchmarkExitCode = await invoker.invoke(benchmarked, request.passthrough);

    return {
      exitCode: firstFailure ?? benchmarkExitCode,
      benchmarked,
      prebuilds,
      failures,
      benchmarkExitCode,
    };
  }

  private checkAborted(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      throw new InterruptedError();
    }
  }
}
