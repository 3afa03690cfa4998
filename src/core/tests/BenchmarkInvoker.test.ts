import { describe, it, expect, beforeEach } from 'vitest';
import { BenchmarkInvoker } from '../usecases/BenchmarkInvoker.js';
import type { ResolvedTarget } from '../entities/DerivationSpec.js';
import { FakeBenchmarkTool, FakeBuildTool } from './fakes.js';

const flake: ResolvedTarget = {
  label: 'nixpkgs#hello',
  reference: { kind: 'flake', installable: 'nixpkgs#hello' },
  mode: 'build',
};
const file: ResolvedTarget = {
  label: '-f default.nix -A hello',
  reference: { kind: 'file', filePath: 'default.nix', attribute: 'hello' },
  mode: 'build',
};

describe('BenchmarkInvoker', () => {
  let buildTool: FakeBuildTool;
  let benchmarkTool: FakeBenchmarkTool;
  let invoker: BenchmarkInvoker;

  beforeEach(() => {
    buildTool = new FakeBuildTool();
    benchmarkTool = new FakeBenchmarkTool();
    invoker = new BenchmarkInvoker(buildTool, benchmarkTool);
  });

  it('times a forced rebuild in build mode', () => {
    expect(invoker.arms([flake])).toEqual([
      { label: 'nixpkgs#hello', command: "nix build 'nixpkgs#hello' --rebuild" },
    ]);
    expect(buildTool.calls).toEqual([
      { op: 'buildCommand', subject: 'nixpkgs#hello', forceRebuild: true },
    ]);
  });

  it('times evaluation only in eval mode', () => {
    invoker.arms([{ ...flake, mode: 'eval' }]);

    expect(buildTool.ops()).toEqual(['evaluateCommand']);
  });

  it('quotes commands for the shell', () => {
    const [arm] = invoker.arms([file]);

    expect(arm).toEqual({
      label: '-f default.nix -A hello',
      command: "nix build '-f default.nix -A hello' --rebuild",
    });
  });

  it('runs every arm in one invocation, in order, with passthrough', async () => {
    benchmarkTool.exitCode = 0;

    const exitCode = await invoker.invoke([flake, file], ['--runs', '3']);

    expect(exitCode).toBe(0);
    expect(benchmarkTool.runs).toHaveLength(1);
    expect(benchmarkTool.runs[0].arms.map(arm => arm.label)).toEqual([
      'nixpkgs#hello',
      '-f default.nix -A hello',
    ]);
    expect(benchmarkTool.runs[0].passthrough).toEqual(['--runs', '3']);
  });

  it('returns the benchmark tool exit code', async () => {
    benchmarkTool.exitCode = 7;

    await expect(invoker.invoke([flake], [])).resolves.toBe(7);
  });
});
