import { isAbsolute, join, relative } from 'path';
import type { DerivationSpec, Locator, PinnedRevision } from '../entities/DerivationSpec.js';
import type { IRevisionFetcher } from '../interfaces/IRevisionFetcher.js';
import { NixHyperfineError, RevisionResolutionError } from '../errors.js';
import type { LabelRegistry } from './LabelRegistry.js';
import { logger } from '../../utils/logger.js';

/**
 * Pinned revisions for the lifetime of one invocation, keyed by
 * (repository root, revision identifier). Append-only.
 */
export class PinCache {
  private pins = new Map<string, PinnedRevision>();

  private static key(repositoryRoot: string, revision: string): string {
    return `${repositoryRoot}\0${revision}`;
  }

  get(repositoryRoot: string, revision: string): PinnedRevision | undefined {
    return this.pins.get(PinCache.key(repositoryRoot, revision));
  }

  set(pin: PinnedRevision): void {
    this.pins.set(PinCache.key(pin.repositoryRoot, pin.revision), pin);
  }

  get size(): number {
    return this.pins.size;
  }
}

function escapesRoot(path: string): boolean {
  return path === '..' || path.startsWith('../') || isAbsolute(path);
}

/**
 * RevisionResolver - fans a spec with `@rev1,rev2` out into one spec per
 * revision, each pointing into a pinned snapshot of the repository.
 */
export class RevisionResolver {
  private log = logger.child('revisions');
  private repositoryRoot: Promise<string> | null = null;

  constructor(
    private readonly fetcher: IRevisionFetcher,
    private readonly cache: PinCache,
    private readonly workingDir: string
  ) {}

  async resolve(spec: DerivationSpec, labels: LabelRegistry): Promise<DerivationSpec[]> {
    const root = await this.findRoot(spec);
    const subdir = relative(root, this.workingDir);
    if (escapesRoot(subdir)) {
      throw new RevisionResolutionError(
        spec.revisions[0] ?? '',
        `Working directory ${this.workingDir} is outside repository ${root}`,
        { label: spec.label }
      );
    }

    const resolved: DerivationSpec[] = [];
    for (const revision of spec.revisions) {
      const pin = await this.pin(root, revision, spec.label);
      const snapshot = subdir === '' ? pin.storePath : join(pin.storePath, subdir);
      const label = labels.claim(`${spec.label}@${revision}`);

      resolved.push({
        label,
        locator: this.rewrite(spec, revision, root, pin.storePath, snapshot),
        revisions: [],
      });
      this.log.debug(`${label} -> ${snapshot}`);
    }
    return resolved;
  }

  private findRoot(spec: DerivationSpec): Promise<string> {
    if (this.repositoryRoot === null) {
      this.repositoryRoot = this.fetcher.findRepositoryRoot(this.workingDir);
    }
    return this.repositoryRoot.catch((error: unknown) => {
      throw this.wrap(error, spec.revisions[0] ?? '', spec.label, 'Cannot locate git repository');
    });
  }

  private async pin(root: string, revision: string, label: string): Promise<PinnedRevision> {
    const cached = this.cache.get(root, revision);
    if (cached) {
      this.log.debug(`Reusing pinned ${revision} (${cached.commit})`);
      return cached;
    }

    this.log.info(`Fetching revision ${revision}...`);
    try {
      const pin = await this.fetcher.fetch(root, revision);
      this.cache.set(pin);
      this.log.info(`Pinned ${revision} at ${pin.commit} -> ${pin.storePath}`);
      return pin;
    } catch (error) {
      throw this.wrap(error, revision, label, `Failed to resolve revision '${revision}'`);
    }
  }

  private rewrite(
    spec: DerivationSpec,
    revision: string,
    root: string,
    storePath: string,
    snapshot: string
  ): Locator {
    const locator = spec.locator;
    switch (locator.mode) {
      case 'flake':
        return { ...locator, source: snapshot };
      case 'simple_attribute':
        return { ...locator, root: snapshot };
      case 'file_attribute': {
        const absolute = isAbsolute(locator.filePath)
          ? locator.filePath
          : join(this.workingDir, locator.filePath);
        const inRepo = relative(root, absolute);
        if (escapesRoot(inRepo)) {
          throw new RevisionResolutionError(
            revision,
            `File ${locator.filePath} is outside repository ${root}`,
            { label: spec.label }
          );
        }
        return { ...locator, filePath: join(storePath, inRepo) };
      }
    }
  }

  private wrap(error: unknown, revision: string, label: string, context: string): NixHyperfineError {
    if (error instanceof RevisionResolutionError) {
      return error.label !== undefined
        ? error
        : new RevisionResolutionError(error.revision, error.message, { label, cause: error.cause });
    }
    const detail = error instanceof Error ? `: ${error.message}` : '';
    return new RevisionResolutionError(revision, `${context}${detail}`, { label, cause: error });
  }
}
