import { describe, it, expect } from 'vitest';
import { parseArgs } from '../args.js';
import { UsageError, ExitCode } from '../../core/errors.js';

describe('parseArgs', () => {
  it('defaults to build mode', () => {
    expect(parseArgs(['nixpkgs#hello'])).toEqual({
      mode: 'build',
      specs: ['nixpkgs#hello'],
      passthrough: [],
      verbose: false,
      help: false,
      version: false,
    });
  });

  it('selects eval mode', () => {
    expect(parseArgs(['--eval', 'hello']).mode).toBe('eval');
  });

  it('keeps everything after -- for hyperfine', () => {
    const args = parseArgs(['hello', '--', '--runs', '3', '--', 'x']);

    expect(args.specs).toEqual(['hello']);
    expect(args.passthrough).toEqual(['--runs', '3', '--', 'x']);
  });

  it('treats a dash token with whitespace as a specification', () => {
    expect(parseArgs(['-f default.nix -A hello', '-v']).specs).toEqual(['-f default.nix -A hello']);
  });

  it('accepts short and long flags', () => {
    const args = parseArgs(['-v', 'hello']);
    expect(args.verbose).toBe(true);
    expect(parseArgs(['--help']).help).toBe(true);
    expect(parseArgs(['-V']).version).toBe(true);
  });

  it('rejects unknown options with a hint', () => {
    try {
      parseArgs(['--runs', 'hello']);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(UsageError);
      if (error instanceof UsageError) {
        expect(error.message).toBe('Unknown option: --runs');
        expect(error.exitCode).toBe(ExitCode.MISUSE);
        expect(error.hint).toBe(
          'Options for hyperfine go after --, e.g. nix-hyperfine hello -- --runs 3'
        );
      }
    }
  });

  it('rejects --build with --eval', () => {
    expect(() => parseArgs(['--build', '--eval', 'hello'])).toThrow(
      '--build and --eval are mutually exclusive'
    );
  });

  it('requires at least one specification', () => {
    expect(() => parseArgs(['--', '--runs', '3'])).toThrow(
      'At least one derivation specification is required'
    );
  });
});
