import { CommandExecutor } from '../core/executor/CommandExecutor';
import { HELP_TEXT } from '../core/executor/help';
import { CommandKind } from '../types/database';
import { formatResult, formatTiming } from './format';

export const PROMPT = '>>> Enter command: ';

export interface ShellIO {
  /** Resolves to undefined once input has ended */
  ask(question: string): Promise<string | undefined>;
  print(text: string): void;
}

export interface ShellOptions {
  confirmDestructive?: boolean;
  logTiming?: boolean;
}

const CONFIRM_ACTIONS: Partial<Record<CommandKind, string>> = {
  drop_table: 'drop table',
  delete: 'delete record'
};

export class Shell {
  private readonly confirmDestructive: boolean;
  private readonly logTiming: boolean;

  constructor(
    private readonly executor: CommandExecutor,
    private readonly io: ShellIO,
    options: ShellOptions = {}
  ) {
    this.confirmDestructive = options.confirmDestructive ?? true;
    this.logTiming = options.logTiming ?? false;
  }

  async run(): Promise<void> {
    this.io.print('***Database***');
    this.io.print(HELP_TEXT);

    for (;;) {
      const line = await this.io.ask(PROMPT);
      if (line === undefined) {
        this.io.print('Goodbye!');
        return;
      }
      if (!line.trim()) continue;

      const keepGoing = await this.handle(line);
      if (!keepGoing) return;
    }
  }

  // Returns false once the user asked to leave
  async handle(line: string): Promise<boolean> {
    const parsed = this.executor.parse(line);
    if (!parsed.ok) {
      this.io.print(formatResult(parsed.result));
      return true;
    }

    const { command } = parsed;
    if (command.kind === 'exit') {
      this.io.print('Goodbye!');
      return false;
    }

    // A command on a missing table can only fail, so there is nothing to confirm
    const action = CONFIRM_ACTIONS[command.kind];
    const target = 'table' in command ? command.table : undefined;
    if (this.confirmDestructive && action && target !== undefined && this.executor.hasTable(target)) {
      const answer = await this.io.ask(`Are you sure you want to perform "${action}"? [y/n]: `);
      if (answer?.trim().toLowerCase() !== 'y') {
        this.io.print('Operation cancelled.');
        return true;
      }
    }

    const result = this.executor.execute(command);
    this.io.print(formatResult(result));

    const timing = this.logTiming ? formatTiming(result) : undefined;
    if (timing) {
      this.io.print(timing);
    }
    return true;
  }
}
