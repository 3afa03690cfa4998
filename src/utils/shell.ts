/**
 * POSIX shell quoting and a small quote-aware tokenizer.
 *
 * hyperfine runs each benchmarked command through `sh -c`, so argv built for
 * the build tool has to be rendered as one safely quoted string.
 */

const SAFE_WORD = /^[A-Za-z0-9_\-+=/.,:@%]+$/;

export function shellQuote(word: string): string {
  if (word === '') {
    return "''";
  }
  if (SAFE_WORD.test(word)) {
    return word;
  }
  return `'${word.replace(/'/g, `'\\''`)}'`;
}

export function shellJoin(argv: readonly string[]): string {
  return argv.map(shellQuote).join(' ');
}

export class TokenizeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TokenizeError';
  }
}

/**
 * Split `input` into words on unquoted whitespace. Single quotes are literal,
 * double quotes allow `\"` and `\\`. No expansion of any kind happens.
 */
export function tokenize(input: string): string[] {
  const words: string[] = [];
  let current = '';
  let inWord = false;
  let quote: "'" | '"' | null = null;

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (quote === "'") {
      if (ch === "'") {
        quote = null;
      } else {
        current += ch;
      }
      continue;
    }

    if (quote === '"') {
      if (ch === '"') {
        quote = null;
      } else if (ch === '\\' && (input[i + 1] === '"' || input[i + 1] === '\\')) {
        current += input[i + 1];
        i++;
      } else {
        current += ch;
      }
      continue;
    }

    if (/\s/.test(ch)) {
      if (inWord) {
        words.push(current);
        current = '';
        inWord = false;
      }
      continue;
    }

    inWord = true;
    if (ch === "'" || ch === '"') {
      quote = ch;
    } else {
      current += ch;
    }
  }

  if (quote !== null) {
    throw new TokenizeError(`unterminated ${quote === "'" ? 'single' : 'double'} quote`);
  }
  if (inWord) {
    words.push(current);
  }
  return words;
}
