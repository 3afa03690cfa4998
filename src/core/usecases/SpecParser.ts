import type { DerivationSpec, Locator } from '../entities/DerivationSpec.js';
import { MalformedSpecError } from '../errors.js';
import { tokenize, TokenizeError } from '../../utils/shell.js';

const REVISION_SEPARATOR = '@';
const FILE_FLAGS = new Set(['-f', '--file']);
const ATTR_FLAGS = new Set(['-A', '--attr']);

/**
 * Split `token` into its base and revision list.
 *
 * The last `@` separates revisions, except when what follows it contains a
 * `#`: then the `@` is part of a flake URL (`git+ssh://git@host/repo#pkg`).
 */
export function splitRevisions(token: string): { base: string; revisions: string[] } {
  const at = token.lastIndexOf(REVISION_SEPARATOR);
  if (at === -1) {
    return { base: token.trim(), revisions: [] };
  }

  const revisionPart = token.slice(at + 1);
  if (revisionPart.includes('#')) {
    return { base: token.trim(), revisions: [] };
  }

  const revisions = revisionPart.split(',').map(rev => rev.trim());
  if (revisions.some(rev => rev === '')) {
    throw new MalformedSpecError(token, 'empty revision identifier');
  }

  return { base: token.slice(0, at).trim(), revisions };
}

function parseFlake(token: string, base: string): Locator {
  const hash = base.indexOf('#');
  const source = base.slice(0, hash);
  const attributePath = base.slice(hash + 1);

  if (attributePath === '') {
    throw new MalformedSpecError(token, 'flake reference has an empty attribute path');
  }

  return { mode: 'flake', source: source === '' ? '.' : source, attributePath };
}

function parseFileAttribute(token: string, words: string[]): Locator {
  let filePath: string | undefined;
  let attribute: string | undefined;

  for (let i = 0; i < words.length; i++) {
    const flag = words[i];
    const isFile = FILE_FLAGS.has(flag);
    if (!isFile && !ATTR_FLAGS.has(flag)) {
      throw new MalformedSpecError(token, `unexpected '${flag}'`);
    }

    const value = words[i + 1];
    if (value === undefined || value === '') {
      throw new MalformedSpecError(token, `${flag} requires a value`);
    }
    i++;

    if (isFile) {
      if (filePath !== undefined) {
        throw new MalformedSpecError(token, 'file given more than once');
      }
      filePath = value;
    } else {
      if (attribute !== undefined) {
        throw new MalformedSpecError(token, 'attribute given more than once');
      }
      attribute = value;
    }
  }

  if (filePath === undefined) {
    throw new MalformedSpecError(token, 'missing file path');
  }
  if (attribute === undefined) {
    throw new MalformedSpecError(token, 'missing attribute selector (-A <attr>)');
  }

  return { mode: 'file_attribute', filePath, attribute };
}

function classify(token: string, base: string): Locator {
  if (base.includes('#')) {
    return parseFlake(token, base);
  }

  let words: string[];
  try {
    words = tokenize(base);
  } catch (error) {
    if (error instanceof TokenizeError) {
      throw new MalformedSpecError(token, error.message);
    }
    throw error;
  }

  if (words.length > 0 && (FILE_FLAGS.has(words[0]) || ATTR_FLAGS.has(words[0]))) {
    return parseFileAttribute(token, words);
  }

  if (base.endsWith('.nix') || base.includes('/')) {
    throw new MalformedSpecError(
      token,
      `missing attribute selector for file '${base}' (use "-f <file> -A <attr>")`
    );
  }

  if (words.length !== 1 || words[0] !== base) {
    throw new MalformedSpecError(token, 'attribute names cannot contain whitespace or quotes');
  }
  if (base.startsWith('-')) {
    throw new MalformedSpecError(token, `unexpected '${words[0]}'`);
  }

  return { mode: 'simple_attribute', attribute: base, root: '.' };
}

/**
 * Parse one positional token into a DerivationSpec.
 *
 * @example
 * parseDerivationSpec('nixpkgs#hello@v1,v2')
 * // { label: 'nixpkgs#hello', locator: { mode: 'flake', ... }, revisions: ['v1', 'v2'] }
 */
export function parseDerivationSpec(token: string): DerivationSpec {
  const { base, revisions } = splitRevisions(token);

  if (base === '') {
    throw new MalformedSpecError(token, 'missing derivation before the revision list');
  }

  return { label: base, locator: classify(token, base), revisions };
}

/**
 * Parse every token up front, so a bad one aborts before any external work.
 */
export function parseDerivationSpecs(tokens: readonly string[]): DerivationSpec[] {
  return tokens.map(parseDerivationSpec);
}
