import { CellValue, ColumnDefinition, QueryResult, RowData } from '../types/database';

function cell(value: CellValue | undefined): string {
  return value === undefined ? '' : String(value);
}

/**
 * Bordered text table, columns in schema order:
 *
 *   +----+------+
 *   | ID | name |
 *   +----+------+
 *   | 1  | John |
 *   +----+------+
 */
export function formatTable(columns: ColumnDefinition[], rows: RowData[]): string {
  const names = columns.map(col => col.name);
  const body = rows.map(row => names.map(name => cell(row[name])));
  const widths = names.map((name, i) =>
    Math.max(name.length, ...body.map(cells => cells[i].length))
  );

  const border = `+${widths.map(width => '-'.repeat(width + 2)).join('+')}+`;
  const line = (cells: string[]) =>
    `| ${cells.map((text, i) => text.padEnd(widths[i])).join(' | ')} |`;

  return [border, line(names), border, ...body.map(line), border].join('\n');
}

export function formatColumns(columns: ColumnDefinition[]): string {
  return columns.map(col => `${col.name}:${col.type}`).join(', ');
}

export function formatTiming(result: QueryResult): string | undefined {
  if (!result.command || result.executionTime === undefined) return undefined;
  return `Command ${result.command} executed in ${(result.executionTime / 1000).toFixed(3)} seconds.`;
}

export function formatResult(result: QueryResult): string {
  if (!result.success) {
    return `Error: ${result.message ?? 'unknown error'}`;
  }

  switch (result.command) {
    case 'list_tables': {
      const tables = result.tables ?? [];
      return tables.length > 0 ? tables.map(name => `- ${name}`).join('\n') : 'No tables found.';
    }
    case 'info': {
      if (!result.info) break;
      return [
        `Table: ${result.info.name}`,
        `Columns: ${formatColumns(result.info.columns)}`,
        `Record count: ${result.info.rowCount}`
      ].join('\n');
    }
    case 'select': {
      const rows = result.data ?? [];
      if (rows.length === 0 || !result.columns) return 'No records to display.';
      return formatTable(result.columns, rows);
    }
  }

  return result.message ?? '';
}
