import type { BenchmarkMode } from '../core/entities/DerivationSpec.js';
import { UsageError } from '../core/errors.js';

export interface ParsedArgs {
  mode: BenchmarkMode;
  /** Derivation specification tokens, unparsed */
  specs: string[];
  /** Everything after `--`, for hyperfine */
  passthrough: string[];
  verbose: boolean;
  help: boolean;
  version: boolean;
}

export const USAGE = `Usage: nix-hyperfine [--build | --eval] [-v] <spec>... [-- <hyperfine args>...]

Benchmark Nix derivation builds or evaluations with hyperfine.
Dependencies are built first so only the derivation itself is measured.

Specifications:
  nixpkgs#hello              flake reference
  "-f default.nix -A hello"  file and attribute (quote it as one argument)
  hello                      attribute of ./flake.nix, else of ./default.nix
  hello@HEAD~1,main          any of the above at git revisions of this repository

Options:
  --build          Benchmark building derivations (default)
  --eval           Benchmark evaluating derivations
  -v, --verbose    Show debug output
  -h, --help       Show this help
  -V, --version    Show the version

Any arguments after -- are passed directly to hyperfine, e.g.
  nix-hyperfine .#fast .#slow -- --runs 5 --export-json results.json`;

/**
 * Split our own options from specification tokens and hyperfine arguments.
 *
 * A token that starts with `-` but contains whitespace is a file/attribute
 * specification (`"-f default.nix -A hello"`), not an option.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const separator = argv.indexOf('--');
  const ours = separator === -1 ? argv : argv.slice(0, separator);
  const passthrough = separator === -1 ? [] : argv.slice(separator + 1);

  let build = false;
  let evaluate = false;
  const parsed: ParsedArgs = {
    mode: 'build',
    specs: [],
    passthrough,
    verbose: false,
    help: false,
    version: false,
  };

  for (const arg of ours) {
    if (!arg.startsWith('-') || /\s/.test(arg)) {
      parsed.specs.push(arg);
      continue;
    }

    switch (arg) {
      case '--build':
        build = true;
        break;
      case '--eval':
        evaluate = true;
        break;
      case '-v':
      case '--verbose':
        parsed.verbose = true;
        break;
      case '-h':
      case '--help':
        parsed.help = true;
        break;
      case '-V':
      case '--version':
        parsed.version = true;
        break;
      default:
        throw new UsageError(`Unknown option: ${arg}`, {
          hint: 'Options for hyperfine go after --, e.g. nix-hyperfine hello -- --runs 3',
        });
    }
  }

  if (build && evaluate) {
    throw new UsageError('--build and --eval are mutually exclusive');
  }
  parsed.mode = evaluate ? 'eval' : 'build';

  if (!parsed.help && !parsed.version && parsed.specs.length === 0) {
    throw new UsageError('At least one derivation specification is required');
  }

  return parsed;
}
