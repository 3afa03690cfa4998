import type { BenchmarkArm, IBenchmarkTool } from '../../core/interfaces/IBenchmarkTool.js';
import type { ICommandRunner } from '../../core/interfaces/ICommandRunner.js';

/**
 * HyperfineTool - runs hyperfine with one named command per arm
 *
 * Names are passed as `--command-name=<label>` so a label that starts with a
 * dash is never taken for an option.
 */
export class HyperfineTool implements IBenchmarkTool {
  constructor(
    private readonly runner: ICommandRunner,
    private readonly command: string = 'hyperfine',
    private readonly workingDir?: string
  ) {}

  async isAvailable(): Promise<boolean> {
    const result = await this.runner.execute({ command: this.command, args: ['--version'] });
    return result.exitCode === 0;
  }

  commandLine(arms: BenchmarkArm[], passthrough: string[]): string[] {
    const argv = [this.command, ...passthrough];
    for (const arm of arms) {
      argv.push(`--command-name=${arm.label}`, arm.command);
    }
    return argv;
  }

  async run(arms: BenchmarkArm[], passthrough: string[]): Promise<number> {
    const [command, ...args] = this.commandLine(arms, passthrough);
    const result = await this.runner.execute({
      command,
      args,
      workingDir: this.workingDir,
      stdio: 'inherit',
    });
    return result.exitCode;
  }
}
