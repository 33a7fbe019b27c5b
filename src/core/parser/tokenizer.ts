import { ParseError } from '../errors';

export type TokenType = 'word' | 'string' | 'lparen' | 'rparen' | 'comma' | 'equals';

export interface Token {
  type: TokenType;
  value: string;
  position: number;
}

const PUNCTUATION: Record<string, TokenType> = {
  '(': 'lparen',
  ')': 'rparen',
  ',': 'comma',
  '=': 'equals'
};

const QUOTES = new Set(['"', "'"]);

function isWhitespace(char: string): boolean {
  return /\s/.test(char);
}

/**
 * Splits a command line into words, quoted strings and the punctuation
 * the grammar cares about. Quoted strings keep inner whitespace; a
 * backslash inside quotes takes the next character literally.
 */
export function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < input.length) {
    const char = input[i];

    if (isWhitespace(char)) {
      i++;
      continue;
    }

    const punctuation = PUNCTUATION[char];
    if (punctuation) {
      tokens.push({ type: punctuation, value: char, position: i });
      i++;
      continue;
    }

    if (QUOTES.has(char)) {
      const start = i;
      let value = '';
      i++;
      while (i < input.length && input[i] !== char) {
        if (input[i] === '\\' && i + 1 < input.length) {
          i++;
        }
        value += input[i];
        i++;
      }
      if (i >= input.length) {
        throw new ParseError(input, `unterminated string starting at position ${start}`);
      }
      i++;
      tokens.push({ type: 'string', value, position: start });
      continue;
    }

    const start = i;
    while (
      i < input.length &&
      !isWhitespace(input[i]) &&
      !Object.hasOwn(PUNCTUATION, input[i]) &&
      !QUOTES.has(input[i])
    ) {
      i++;
    }
    tokens.push({ type: 'word', value: input.slice(start, i), position: start });
  }

  return tokens;
}
