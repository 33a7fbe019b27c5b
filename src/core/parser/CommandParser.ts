import { Token, TokenType, tokenize } from './tokenizer';
import { ParseError } from '../errors';
import { isIdentifier } from '../storage/TableStorage';
import { ColumnSpec, Command, Condition, Literal } from '../../types/database';

const COLUMN_SPEC_PATTERN = /^([^:]*):(.*)$/;

function describeToken(token: Token | undefined): string {
  if (!token) return 'end of input';
  return token.type === 'string' ? JSON.stringify(token.value) : `"${token.value}"`;
}

/**
 * Turns one input line into a Command. Knows nothing about schemas:
 * literals are passed through raw and typed later by the engine.
 */
export class CommandParser {
  private readonly tokens: Token[];
  private pos = 0;

  constructor(private readonly input: string) {
    this.tokens = tokenize(input);
  }

  parse(): Command {
    const head = this.next();
    if (!head) {
      return this.fail('empty command');
    }
    if (head.type !== 'word') {
      return this.fail(`expected a command, found ${describeToken(head)}`);
    }

    const command = this.parseCommand(head.value.toLowerCase(), head);
    const rest = this.peek();
    if (rest) {
      this.fail(`unexpected ${describeToken(rest)} at position ${rest.position}`);
    }
    return command;
  }

  private parseCommand(keyword: string, head: Token): Command {
    switch (keyword) {
      case 'create_table': {
        const table = this.identifier('table name');
        const columns: ColumnSpec[] = [];
        while (this.peek()) {
          columns.push(this.columnSpec());
        }
        return { kind: 'create_table', table, columns };
      }
      case 'list_tables':
        return { kind: 'list_tables' };
      case 'drop_table':
        return { kind: 'drop_table', table: this.identifier('table name') };
      case 'info':
        return { kind: 'info', table: this.identifier('table name') };
      case 'insert': {
        this.keyword('into');
        const table = this.identifier('table name');
        this.keyword('values');
        return { kind: 'insert', table, values: this.literalList() };
      }
      case 'select': {
        this.keyword('from');
        const table = this.identifier('table name');
        if (!this.peek()) {
          return { kind: 'select', table };
        }
        this.keyword('where');
        return { kind: 'select', table, where: this.condition() };
      }
      case 'update': {
        const table = this.identifier('table name');
        this.keyword('set');
        const set = this.condition();
        this.keyword('where');
        return { kind: 'update', table, set, where: this.condition() };
      }
      case 'delete': {
        this.keyword('from');
        const table = this.identifier('table name');
        this.keyword('where');
        return { kind: 'delete', table, where: this.condition() };
      }
      case 'help':
        return { kind: 'help' };
      case 'exit':
        return { kind: 'exit' };
      default:
        return this.fail(`unknown command "${head.value}"`);
    }
  }

  private columnSpec(): ColumnSpec {
    const token = this.next();
    const match = token?.type === 'word' ? COLUMN_SPEC_PATTERN.exec(token.value) : null;
    if (!match) {
      return this.fail(`expected a column definition <name>:<type>, found ${describeToken(token)}`);
    }

    const [, name, type] = match;
    if (!isIdentifier(name)) {
      return this.fail(`invalid column name "${name}"`);
    }
    return { name, type };
  }

  private literalList(): Literal[] {
    this.expect('lparen', '"("');
    const values: Literal[] = [];
    if (this.peek()?.type === 'rparen') {
      this.next();
      return values;
    }

    for (;;) {
      values.push(this.literal());
      const separator = this.next();
      if (separator?.type === 'rparen') {
        return values;
      }
      if (separator?.type !== 'comma') {
        return this.fail(`expected "," or ")", found ${describeToken(separator)}`);
      }
    }
  }

  private condition(): Condition {
    const column = this.identifier('column name');
    this.expect('equals', '"="');
    return { column, value: this.literal() };
  }

  private literal(): Literal {
    const token = this.next();
    if (token?.type === 'word') {
      return { text: token.value, quoted: false };
    }
    if (token?.type === 'string') {
      return { text: token.value, quoted: true };
    }
    return this.fail(`expected a value, found ${describeToken(token)}`);
  }

  private identifier(what: string): string {
    const token = this.next();
    if (token?.type !== 'word' || !isIdentifier(token.value)) {
      return this.fail(`expected ${what}, found ${describeToken(token)}`);
    }
    return token.value;
  }

  private keyword(word: string): void {
    const token = this.next();
    if (token?.type !== 'word' || token.value.toLowerCase() !== word) {
      this.fail(`expected "${word}", found ${describeToken(token)}`);
    }
  }

  private expect(type: TokenType, what: string): Token {
    const token = this.next();
    if (token?.type !== type) {
      return this.fail(`expected ${what}, found ${describeToken(token)}`);
    }
    return token;
  }

  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  private next(): Token | undefined {
    const token = this.tokens[this.pos];
    if (token) this.pos++;
    return token;
  }

  private fail(reason: string): never {
    throw new ParseError(this.input, reason);
  }
}

export function parseCommand(input: string): Command {
  return new CommandParser(input).parse();
}
