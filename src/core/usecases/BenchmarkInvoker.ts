import type { ResolvedTarget } from '../entities/DerivationSpec.js';
import type { IBuildTool } from '../interfaces/IBuildTool.js';
import type { BenchmarkArm, IBenchmarkTool } from '../interfaces/IBenchmarkTool.js';
import { shellJoin } from '../../utils/shell.js';
import { logger } from '../../utils/logger.js';

export class BenchmarkInvoker {
  private log = logger.child('benchmark');

  constructor(
    private readonly buildTool: IBuildTool,
    private readonly benchmarkTool: IBenchmarkTool
  ) {}

  /**
   * The timed command for each target: a forced rebuild in build mode, a
   * fresh evaluation in eval mode.
   */
  arms(targets: readonly ResolvedTarget[]): BenchmarkArm[] {
    return targets.map(target => ({
      label: target.label,
      command: shellJoin(
        target.mode === 'build'
          ? this.buildTool.buildCommand(target.reference, { forceRebuild: true })
          : this.buildTool.evaluateCommand(target.reference)
      ),
    }));
  }

  /**
   * Run every target as one comparison; resolves to the benchmark tool's
   * exit code.
   */
  async invoke(targets: readonly ResolvedTarget[], passthrough: string[]): Promise<number> {
    const arms = this.arms(targets);
    this.log.info(`Running: ${shellJoin(this.benchmarkTool.commandLine(arms, passthrough))}`);
    return this.benchmarkTool.run(arms, passthrough);
  }
}
