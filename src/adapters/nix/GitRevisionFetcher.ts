import type { PinnedRevision } from '../../core/entities/DerivationSpec.js';
import type { ICommandRunner } from '../../core/interfaces/ICommandRunner.js';
import type { IRevisionFetcher } from '../../core/interfaces/IRevisionFetcher.js';
import { CommandError, RevisionResolutionError } from '../../core/errors.js';
import type { Config } from '../../utils/config.js';
import { shellJoin } from '../../utils/shell.js';
import { nixArgv } from './NixBuildTool.js';

export type GitFetcherConfig = Pick<Config, 'gitCommand' | 'nixCommand' | 'experimentalFeatures'>;

/**
 * Render `value` as a Nix string literal.
 */
export function nixString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\$\{/g, '\\${')}"`;
}

export function fetchGitExpression(repositoryRoot: string, commit: string): string {
  return [
    'builtins.fetchGit {',
    `  url = ${nixString(repositoryRoot)};`,
    `  rev = ${nixString(commit)};`,
    '  allRefs = true;',
    '}',
  ].join('\n');
}

/**
 * GitRevisionFetcher - pins git revisions of the local repository
 *
 * `git rev-parse` turns the revision into a commit hash; `builtins.fetchGit`
 * copies that commit's tree into the Nix store, the same way Nix itself
 * fetches git sources, so the snapshot is content-addressed and immutable.
 * Uncommitted changes are never part of a snapshot.
 */
export class GitRevisionFetcher implements IRevisionFetcher {
  constructor(
    private readonly runner: ICommandRunner,
    private readonly config: GitFetcherConfig
  ) {}

  async findRepositoryRoot(directory: string): Promise<string> {
    const argv = [this.config.gitCommand, '-C', directory, 'rev-parse', '--show-toplevel'];
    return (await this.check(argv)).trim();
  }

  async fetch(repositoryRoot: string, revision: string): Promise<PinnedRevision> {
    const revParse = [
      this.config.gitCommand,
      '-C',
      repositoryRoot,
      'rev-parse',
      '--verify',
      '--quiet',
      `${revision}^{commit}`,
    ];
    const parsed = await this.run(revParse);
    const commit = parsed.stdout.trim();
    if (parsed.exitCode !== 0 || commit === '') {
      throw new RevisionResolutionError(
        revision,
        `Unknown revision '${revision}' in ${repositoryRoot}`
      );
    }

    const evalArgv = nixArgv(this.config, [
      'eval',
      '--impure',
      '--raw',
      '--expr',
      fetchGitExpression(repositoryRoot, commit),
    ]);
    const storePath = (await this.check(evalArgv)).trim();
    if (!storePath.startsWith('/')) {
      throw new RevisionResolutionError(
        revision,
        `Fetching ${revision} (${commit}) produced no store path`
      );
    }

    return { repositoryRoot, revision, commit, storePath };
  }

  private run(argv: string[]) {
    const [command, ...args] = argv;
    return this.runner.execute({ command, args });
  }

  private async check(argv: string[]): Promise<string> {
    const result = await this.run(argv);
    if (result.exitCode !== 0) {
      throw new CommandError(argv, result.exitCode, result.stderr, { display: shellJoin(argv) });
    }
    return result.stdout;
  }
}
