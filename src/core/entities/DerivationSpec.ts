export type AddressingMode = 'flake' | 'file_attribute' | 'simple_attribute';

export type BenchmarkMode = 'build' | 'eval';

/** `source#attributePath`, e.g. `nixpkgs#hello` or `.#packages.x86_64-linux.default` */
export interface FlakeLocator {
  readonly mode: 'flake';
  readonly source: string;
  readonly attributePath: string;
}

/** `-f <filePath> -A <attribute>` */
export interface FileAttributeLocator {
  readonly mode: 'file_attribute';
  readonly filePath: string;
  readonly attribute: string;
}

/**
 * A bare attribute name. `root` is the directory the default flake and the
 * default file are looked up in: `.` for the working tree, a snapshot path
 * once a revision has been pinned.
 */
export interface SimpleAttributeLocator {
  readonly mode: 'simple_attribute';
  readonly attribute: string;
  readonly root: string;
}

export type Locator = FlakeLocator | FileAttributeLocator | SimpleAttributeLocator;

/**
 * The parsed form of one positional token.
 */
export interface DerivationSpec {
  /** Display name; the token without its revision part until fanned out */
  readonly label: string;
  readonly locator: Locator;
  /** Empty unless the token used the `@rev1,rev2` syntax */
  readonly revisions: readonly string[];
}

export type BuildReference =
  | { readonly kind: 'flake'; readonly installable: string }
  | { readonly kind: 'file'; readonly filePath: string; readonly attribute: string };

export interface ResolvedTarget {
  readonly label: string;
  readonly reference: BuildReference;
  readonly mode: BenchmarkMode;
}

/**
 * A content-addressed snapshot of the repository at one revision.
 */
export interface PinnedRevision {
  readonly repositoryRoot: string;
  /** Revision identifier as the user wrote it */
  readonly revision: string;
  readonly commit: string;
  readonly storePath: string;
}

export function flakeInstallable(locator: FlakeLocator): string {
  return `${locator.source}#${locator.attributePath}`;
}

export function describeReference(reference: BuildReference): string {
  return reference.kind === 'flake'
    ? reference.installable
    : `-f ${reference.filePath} -A ${reference.attribute}`;
}
