/**
 * One compared command in a benchmark run
 */
export interface BenchmarkArm {
  /** Display name shown in the benchmark report */
  label: string;
  /** Shell command line to time */
  command: string;
}

/**
 * IBenchmarkTool - The external benchmarking program
 *
 * It owns warmup, statistics and report rendering; the core only hands it
 * the arms and the user's pass-through flags.
 */
export interface IBenchmarkTool {
  isAvailable(): Promise<boolean>;

  /**
   * Full argv of the invocation that `run` performs.
   */
  commandLine(arms: BenchmarkArm[], passthrough: string[]): string[];

  /**
   * Run all arms in one invocation with live output; resolves to its exit code.
   */
  run(arms: BenchmarkArm[], passthrough: string[]): Promise<number>;
}
