import type { ResolvedTarget } from '../entities/DerivationSpec.js';
import type { IBuildTool } from '../interfaces/IBuildTool.js';
import { CommandError, PrebuildError, type PrebuildStep } from '../errors.js';
import { logger } from '../../utils/logger.js';

export interface PrebuildReport {
  label: string;
  /** Derivation path the target instantiated to */
  derivation: string;
  /** Dependencies realised before measurement */
  dependencyCount: number;
  durationMs: number;
}

const seconds = (ms: number): string => `${(ms / 1000).toFixed(2)}s`;

/**
 * DependencyPrebuilder - makes sure the benchmark only times the target
 *
 * Instantiates the target, realises its whole dependency closure, and in
 * build mode builds the target once so the timed `--rebuild` runs find
 * everything they depend on already in the store. Steps are strictly
 * sequential and never retried.
 */
export class DependencyPrebuilder {
  private log = logger.child('prebuild');

  constructor(
    private readonly buildTool: IBuildTool,
    private readonly batchSize: number = 100
  ) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
    }
  }

  async prebuild(target: ResolvedTarget): Promise<PrebuildReport> {
    const start = performance.now();
    this.log.info(`Pre-building ${target.label}...`);

    const derivation = await this.step(target, 'instantiate', () =>
      this.buildTool.instantiate(target.reference)
    );
    this.log.debug(`${target.label} instantiated to ${derivation}`);

    const queryStart = performance.now();
    const closure = await this.step(target, 'enumerate', () =>
      this.buildTool.enumerateDependencies(derivation)
    );
    this.log.info(`  Dependency query took ${seconds(performance.now() - queryStart)}`);

    const dependencies = closure.filter(path => path !== derivation);
    await this.realizeAll(target, dependencies);

    if (target.mode === 'build') {
      const buildStart = performance.now();
      await this.step(target, 'warm-build', () =>
        this.buildTool.build(target.reference, { forceRebuild: false })
      );
      this.log.info(`  Warm build took ${seconds(performance.now() - buildStart)}`);
    }

    const durationMs = performance.now() - start;
    this.log.info(`  Pre-build completed in ${seconds(durationMs)}`);

    return {
      label: target.label,
      derivation,
      dependencyCount: dependencies.length,
      durationMs,
    };
  }

  private async realizeAll(target: ResolvedTarget, dependencies: string[]): Promise<void> {
    if (dependencies.length === 0) {
      return;
    }

    const start = performance.now();
    const totalBatches = Math.ceil(dependencies.length / this.batchSize);
    this.log.info(`Building ${dependencies.length} dependencies...`);

    for (let i = 0; i < dependencies.length; i += this.batchSize) {
      const batch = dependencies.slice(i, i + this.batchSize);
      const batchNum = i / this.batchSize + 1;
      this.log.info(
        `  Building batch ${batchNum}/${totalBatches} (${batch.length} dependencies)...`
      );

      const batchStart = performance.now();
      try {
        await this.buildTool.realize(batch);
      } catch (error) {
        throw new PrebuildError(target.label, 'realize', {
          failedDependency: error instanceof CommandError ? error.artifact : undefined,
          cause: error,
        });
      }
      this.log.debug(`  Batch ${batchNum} completed in ${seconds(performance.now() - batchStart)}`);
    }

    this.log.info(`Total dependency building took ${seconds(performance.now() - start)}`);
  }

  private async step<T>(target: ResolvedTarget, step: PrebuildStep, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      throw new PrebuildError(target.label, step, { cause: error });
    }
  }
}
