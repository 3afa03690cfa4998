import type {
  BenchmarkMode,
  BuildReference,
  DerivationSpec,
  ResolvedTarget,
  SimpleAttributeLocator,
} from '../entities/DerivationSpec.js';
import { describeReference, flakeInstallable } from '../entities/DerivationSpec.js';
import type { IBuildTool } from '../interfaces/IBuildTool.js';
import { TargetResolutionError, type ResolutionAttempt } from '../errors.js';
import { logger } from '../../utils/logger.js';

export interface ResolutionStrategy {
  name: string;
  candidate(locator: SimpleAttributeLocator): BuildReference;
}

/**
 * Tried in order for a bare attribute name; the first reference the build
 * tool can instantiate wins. Flake first, then the legacy default.nix layout.
 */
export const SIMPLE_ATTRIBUTE_STRATEGIES: readonly ResolutionStrategy[] = [
  {
    name: 'local flake output',
    candidate: locator => ({ kind: 'flake', installable: `${locator.root}#${locator.attribute}` }),
  },
  {
    name: 'default.nix attribute',
    candidate: locator => ({
      kind: 'file',
      filePath: `${locator.root}/default.nix`,
      attribute: locator.attribute,
    }),
  },
];

export class TargetResolver {
  private log = logger.child('resolve');

  constructor(
    private readonly buildTool: IBuildTool,
    private readonly strategies: readonly ResolutionStrategy[] = SIMPLE_ATTRIBUTE_STRATEGIES
  ) {}

  async resolve(spec: DerivationSpec, mode: BenchmarkMode): Promise<ResolvedTarget> {
    if (spec.revisions.length > 0) {
      throw new TypeError(`'${spec.label}' still has revisions; resolve them first`);
    }

    const reference = await this.referenceFor(spec);
    return { label: spec.label, reference, mode };
  }

  private async referenceFor(spec: DerivationSpec): Promise<BuildReference> {
    const locator = spec.locator;
    switch (locator.mode) {
      case 'flake':
        return { kind: 'flake', installable: flakeInstallable(locator) };
      case 'file_attribute':
        return { kind: 'file', filePath: locator.filePath, attribute: locator.attribute };
      case 'simple_attribute':
        return this.resolveSimpleAttribute(spec.label, locator);
    }
  }

  private async resolveSimpleAttribute(
    label: string,
    locator: SimpleAttributeLocator
  ): Promise<BuildReference> {
    const attempts: ResolutionAttempt[] = [];

    for (const strategy of this.strategies) {
      const reference = strategy.candidate(locator);
      const check = await this.buildTool.canInstantiate(reference);
      if (check.ok) {
        this.log.debug(`${label}: using ${strategy.name} ${describeReference(reference)}`);
        return reference;
      }
      this.log.debug(`${label}: ${strategy.name} rejected: ${check.reason}`);
      attempts.push({ reference: describeReference(reference), reason: check.reason });
    }

    throw new TargetResolutionError(label, attempts);
  }
}
