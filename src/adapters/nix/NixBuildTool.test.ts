import { describe, it, expect } from 'vitest';
import { NixBuildTool, identifyFailedDerivation, nixArgv, type NixToolConfig } from './NixBuildTool.js';
import { CommandError } from '../../core/errors.js';
import type { BuildReference } from '../../core/entities/DerivationSpec.js';
import { FakeCommandRunner, type Responder } from '../../core/tests/fakes.js';

const config: NixToolConfig = {
  projectRoot: '/work',
  nixCommand: 'nix',
  nixBuildCommand: 'nix-build',
  nixInstantiateCommand: 'nix-instantiate',
  nixStoreCommand: 'nix-store',
  experimentalFeatures: 'nix-command flakes',
};

const flake: BuildReference = { kind: 'flake', installable: 'nixpkgs#hello' };
const file: BuildReference = { kind: 'file', filePath: 'default.nix', attribute: 'hello' };

function setup(respond?: Responder) {
  const runner = new FakeCommandRunner(respond);
  return { runner, tool: new NixBuildTool(runner, config) };
}

describe('nixArgv', () => {
  it('enables the experimental features before the subcommand', () => {
    expect(nixArgv(config, ['build', 'x'])).toEqual([
      'nix',
      '--extra-experimental-features',
      'nix-command flakes',
      'build',
      'x',
    ]);
  });

  it('leaves the flag out when no features are configured', () => {
    expect(nixArgv({ nixCommand: 'nix', experimentalFeatures: ' ' }, ['build'])).toEqual([
      'nix',
      'build',
    ]);
  });
});

describe('identifyFailedDerivation', () => {
  const batch = ['/nix/store/aaa-foo.drv', '/nix/store/bbb-bar.drv'];

  it('reads the failing builder', () => {
    expect(
      identifyFailedDerivation("error: builder for '/nix/store/bbb-bar.drv' failed with exit code 2", batch)
    ).toBe('/nix/store/bbb-bar.drv');
  });

  it('falls back to a batch member mentioned in the output', () => {
    expect(
      identifyFailedDerivation('error: 1 dependencies of /nix/store/aaa-foo.drv failed', batch)
    ).toBe('/nix/store/aaa-foo.drv');
  });

  it('blames the only member of a single-item batch', () => {
    expect(identifyFailedDerivation('error: out of disk', ['/nix/store/ccc.drv'])).toBe(
      '/nix/store/ccc.drv'
    );
  });

  it('gives up when it cannot tell', () => {
    expect(identifyFailedDerivation('error: out of disk', batch)).toBeUndefined();
  });
});

describe('NixBuildTool', () => {
  describe('canInstantiate', () => {
    it('evaluates the flake drvPath', async () => {
      const { runner, tool } = setup();

      await expect(tool.canInstantiate(flake)).resolves.toEqual({ ok: true });
      expect(runner.commandLines()).toEqual([
        'nix --extra-experimental-features nix-command flakes eval --raw nixpkgs#hello.drvPath',
      ]);
      expect(runner.executed[0].workingDir).toBe('/work');
    });

    it('evaluates the file attribute drvPath', async () => {
      const { runner, tool } = setup();

      await tool.canInstantiate(file);

      expect(runner.commandLines()).toEqual([
        'nix-instantiate --eval default.nix -A hello.drvPath',
      ]);
    });

    it('reports the last error line as the reason', async () => {
      const { tool } = setup(() => ({
        exitCode: 1,
        stderr: "warning: something\nerror: flake 'path:/work' does not provide attribute 'hello'\n",
      }));

      await expect(tool.canInstantiate(flake)).resolves.toEqual({
        ok: false,
        reason: "error: flake 'path:/work' does not provide attribute 'hello'",
      });
    });

    it('falls back to the exit code when there is no error output', async () => {
      const { tool } = setup(() => ({ exitCode: 3 }));

      await expect(tool.canInstantiate(file)).resolves.toEqual({ ok: false, reason: 'exit 3' });
    });
  });

  describe('instantiate', () => {
    it('reads the derivation path of a flake', async () => {
      const { runner, tool } = setup(() => ({ stdout: '/nix/store/abc-hello.drv\n' }));

      await expect(tool.instantiate(flake)).resolves.toBe('/nix/store/abc-hello.drv');
      expect(runner.commandLines()).toEqual([
        'nix --extra-experimental-features nix-command flakes path-info --derivation nixpkgs#hello',
      ]);
    });

    it('skips warnings before the derivation path of a file attribute', async () => {
      const { runner, tool } = setup(() => ({
        stdout: 'warning: you did not specify --add-root\n/nix/store/abc-hello.drv\n',
      }));

      await expect(tool.instantiate(file)).resolves.toBe('/nix/store/abc-hello.drv');
      expect(runner.commandLines()).toEqual(['nix-instantiate default.nix -A hello']);
    });

    it('fails when no derivation path is printed', async () => {
      const { tool } = setup(() => ({ stdout: 'nothing\n' }));

      await expect(tool.instantiate(file)).rejects.toThrow('no derivation path in output: nothing');
    });

    it('raises CommandError on a non-zero exit', async () => {
      const { tool } = setup(() => ({ exitCode: 1, stderr: 'error: attribute missing' }));

      const error = await tool.instantiate(file).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CommandError);
      if (error instanceof CommandError) {
        expect(error.commandExitCode).toBe(1);
        expect(error.message).toBe(
          'Command failed (exit 1): nix-instantiate default.nix -A hello\nerror: attribute missing'
        );
      }
    });
  });

  describe('enumerateDependencies', () => {
    it('keeps only derivations from the closure', async () => {
      const { runner, tool } = setup(() => ({
        stdout: '/nix/store/a-src.tar.gz\n/nix/store/b-glibc.drv\n/nix/store/c-hello.drv\n',
      }));

      await expect(tool.enumerateDependencies('/nix/store/c-hello.drv')).resolves.toEqual([
        '/nix/store/b-glibc.drv',
        '/nix/store/c-hello.drv',
      ]);
      expect(runner.commandLines()).toEqual([
        'nix-store --query --requisites /nix/store/c-hello.drv',
      ]);
    });
  });

  describe('realize', () => {
    it('realises a batch in one call', async () => {
      const { runner, tool } = setup();

      await tool.realize(['/nix/store/a.drv', '/nix/store/b.drv']);

      expect(runner.commandLines()).toEqual(['nix-store --realise /nix/store/a.drv /nix/store/b.drv']);
    });

    it('does nothing for an empty batch', async () => {
      const { runner, tool } = setup();

      await tool.realize([]);

      expect(runner.executed).toEqual([]);
    });

    it('names the failing derivation', async () => {
      const { tool } = setup(() => ({
        exitCode: 1,
        stderr: "error: builder for '/nix/store/b.drv' failed with exit code 1",
      }));

      const error = await tool.realize(['/nix/store/a.drv', '/nix/store/b.drv']).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CommandError);
      if (error instanceof CommandError) {
        expect(error.artifact).toBe('/nix/store/b.drv');
        expect(error.message).toBe(
          "Command failed (exit 1): nix-store --realise <2 derivations>\n" +
            "error: builder for '/nix/store/b.drv' failed with exit code 1"
        );
      }
    });
  });

  describe('buildCommand', () => {
    it('forces a flake rebuild with --rebuild', () => {
      const { tool } = setup();

      expect(tool.buildCommand(flake, { forceRebuild: true })).toEqual([
        'nix',
        '--extra-experimental-features',
        'nix-command flakes',
        'build',
        'nixpkgs#hello',
        '--no-link',
        '--rebuild',
      ]);
    });

    it('forces a file attribute rebuild with --check', () => {
      const { tool } = setup();

      expect(tool.buildCommand(file, { forceRebuild: true })).toEqual([
        'nix-build',
        'default.nix',
        '-A',
        'hello',
        '--no-out-link',
        '--check',
      ]);
      expect(tool.buildCommand(file, { forceRebuild: false })).toEqual([
        'nix-build',
        'default.nix',
        '-A',
        'hello',
        '--no-out-link',
      ]);
    });
  });

  describe('build', () => {
    it('runs a plain build for the warm-up', async () => {
      const { runner, tool } = setup();

      await tool.build(flake, { forceRebuild: false });

      expect(runner.commandLines()).toEqual([
        'nix --extra-experimental-features nix-command flakes build nixpkgs#hello --no-link',
      ]);
    });
  });

  describe('evaluateCommand', () => {
    it('evaluates a flake without the eval cache', () => {
      const { tool } = setup();

      expect(tool.evaluateCommand(flake).slice(3)).toEqual([
        'eval',
        '--raw',
        '--no-eval-cache',
        'nixpkgs#hello.drvPath',
      ]);
    });

    it('instantiates a file attribute', () => {
      const { tool } = setup();

      expect(tool.evaluateCommand(file)).toEqual(['nix-instantiate', 'default.nix', '-A', 'hello']);
    });
  });
});
