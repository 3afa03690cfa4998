import type { BuildReference } from '../entities/DerivationSpec.js';

export type InstantiationCheck = { ok: true } | { ok: false; reason: string };

export interface BuildOptions {
  /** Rebuild even when the outputs are already valid */
  forceRebuild: boolean;
}

/**
 * IBuildTool - Operations the core needs from the Nix toolchain
 *
 * Executing methods throw CommandError when the underlying command fails.
 */
export interface IBuildTool {
  /**
   * Dry check that the reference evaluates to a derivation.
   */
  canInstantiate(reference: BuildReference): Promise<InstantiationCheck>;

  /**
   * Instantiate the reference, returning its derivation path.
   */
  instantiate(reference: BuildReference): Promise<string>;

  /**
   * Buildable members of the derivation's transitive closure, the derivation
   * itself included.
   */
  enumerateDependencies(derivation: string): Promise<string[]>;

  /**
   * Realise a batch of derivations. A thrown CommandError names the failing
   * derivation in `artifact` when it can be identified.
   */
  realize(derivations: string[]): Promise<void>;

  /**
   * Build the reference, discarding the result.
   */
  build(reference: BuildReference, options: BuildOptions): Promise<void>;

  /**
   * argv that builds the reference, for the benchmark tool to time.
   */
  buildCommand(reference: BuildReference, options: BuildOptions): string[];

  /**
   * argv that evaluates the reference, for the benchmark tool to time.
   */
  evaluateCommand(reference: BuildReference): string[];
}
