import type { BuildReference } from '../../core/entities/DerivationSpec.js';
import type {
  BuildOptions,
  IBuildTool,
  InstantiationCheck,
} from '../../core/interfaces/IBuildTool.js';
import type { ICommandRunner } from '../../core/interfaces/ICommandRunner.js';
import { CommandError } from '../../core/errors.js';
import type { Config } from '../../utils/config.js';
import { shellJoin } from '../../utils/shell.js';

export type NixToolConfig = Pick<
  Config,
  | 'projectRoot'
  | 'nixCommand'
  | 'nixBuildCommand'
  | 'nixInstantiateCommand'
  | 'nixStoreCommand'
  | 'experimentalFeatures'
>;

const DRV_PATTERN = /\/nix\/store\/[^\s'"`]+\.drv/g;
const FAILED_BUILDER = /builder for '([^']+\.drv)' failed/;

function lines(output: string): string[] {
  return output
    .split('\n')
    .map(line => line.trim())
    .filter(Boolean);
}

/**
 * argv for a `nix` subcommand, with --extra-experimental-features inserted
 * before the subcommand unless no features are configured.
 */
export function nixArgv(
  config: Pick<Config, 'nixCommand' | 'experimentalFeatures'>,
  args: string[]
): string[] {
  const features = config.experimentalFeatures.trim();
  return features
    ? [config.nixCommand, '--extra-experimental-features', features, ...args]
    : [config.nixCommand, ...args];
}

/**
 * Pick out which member of `batch` a failed `nix-store --realise` was
 * building, from its error output.
 */
export function identifyFailedDerivation(stderr: string, batch: string[]): string | undefined {
  const builder = FAILED_BUILDER.exec(stderr);
  if (builder) {
    return builder[1];
  }
  const mentioned = stderr.match(DRV_PATTERN) ?? [];
  const inBatch = mentioned.find(path => batch.includes(path));
  if (inBatch) {
    return inBatch;
  }
  return batch.length === 1 ? batch[0] : undefined;
}

/**
 * NixBuildTool - IBuildTool on top of the Nix command-line tools
 *
 * Flake references go through `nix` (with the experimental features enabled),
 * file/attribute references through `nix-instantiate` and `nix-build`.
 */
export class NixBuildTool implements IBuildTool {
  constructor(
    private readonly runner: ICommandRunner,
    private readonly config: NixToolConfig
  ) {}

  private nix(...args: string[]): string[] {
    return nixArgv(this.config, args);
  }

  async canInstantiate(reference: BuildReference): Promise<InstantiationCheck> {
    const argv =
      reference.kind === 'flake'
        ? this.nix('eval', '--raw', `${reference.installable}.drvPath`)
        : [
            this.config.nixInstantiateCommand,
            '--eval',
            reference.filePath,
            '-A',
            `${reference.attribute}.drvPath`,
          ];

    const result = await this.exec(argv);
    if (result.exitCode === 0) {
      return { ok: true };
    }
    const errorLines = lines(result.stderr);
    return {
      ok: false,
      reason: errorLines.length > 0 ? errorLines[errorLines.length - 1] : `exit ${result.exitCode}`,
    };
  }

  async instantiate(reference: BuildReference): Promise<string> {
    const argv =
      reference.kind === 'flake'
        ? this.nix('path-info', '--derivation', reference.installable)
        : [this.config.nixInstantiateCommand, reference.filePath, '-A', reference.attribute];

    const stdout = await this.check(argv);
    const derivation = lines(stdout).find(line => line.endsWith('.drv'));
    if (!derivation) {
      throw new CommandError(argv, 0, `no derivation path in output: ${stdout.trim()}`, {
        display: shellJoin(argv),
      });
    }
    return derivation;
  }

  async enumerateDependencies(derivation: string): Promise<string[]> {
    const stdout = await this.check([
      this.config.nixStoreCommand,
      '--query',
      '--requisites',
      derivation,
    ]);
    return lines(stdout).filter(path => path.endsWith('.drv'));
  }

  async realize(derivations: string[]): Promise<void> {
    if (derivations.length === 0) {
      return;
    }
    const argv = [this.config.nixStoreCommand, '--realise', ...derivations];
    const result = await this.exec(argv);
    if (result.exitCode !== 0) {
      throw new CommandError(argv, result.exitCode, result.stderr, {
        artifact: identifyFailedDerivation(result.stderr, derivations),
        display: `${this.config.nixStoreCommand} --realise <${derivations.length} derivations>`,
      });
    }
  }

  async build(reference: BuildReference, options: BuildOptions): Promise<void> {
    await this.check(this.buildCommand(reference, options));
  }

  buildCommand(reference: BuildReference, options: BuildOptions): string[] {
    if (reference.kind === 'flake') {
      return this.nix(
        'build',
        reference.installable,
        '--no-link',
        ...(options.forceRebuild ? ['--rebuild'] : [])
      );
    }
    return [
      this.config.nixBuildCommand,
      reference.filePath,
      '-A',
      reference.attribute,
      '--no-out-link',
      ...(options.forceRebuild ? ['--check'] : []),
    ];
  }

  evaluateCommand(reference: BuildReference): string[] {
    if (reference.kind === 'flake') {
      return this.nix('eval', '--raw', '--no-eval-cache', `${reference.installable}.drvPath`);
    }
    return [this.config.nixInstantiateCommand, reference.filePath, '-A', reference.attribute];
  }

  private exec(argv: string[]) {
    const [command, ...args] = argv;
    return this.runner.execute({ command, args, workingDir: this.config.projectRoot });
  }

  private async check(argv: string[]): Promise<string> {
    const result = await this.exec(argv);
    if (result.exitCode !== 0) {
      throw new CommandError(argv, result.exitCode, result.stderr, { display: shellJoin(argv) });
    }
    return result.stdout;
  }
}
