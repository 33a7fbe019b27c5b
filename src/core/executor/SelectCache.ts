import { ColumnDefinition, Condition, RowData } from '../../types/database';

export interface SelectResult {
  rows: RowData[];
  columns: ColumnDefinition[];
}

function copy(result: SelectResult): SelectResult {
  return {
    rows: result.rows.map(row => ({ ...row })),
    columns: result.columns.map(col => ({ ...col }))
  };
}

/**
 * Memoized select results, grouped by table so a write to one table
 * drops only that table's entries.
 */
export class SelectCache {
  private entries: Map<string, Map<string, SelectResult>> = new Map();

  static key(where?: Condition): string {
    if (!where) return '*';
    return JSON.stringify([where.column, where.value.quoted, where.value.text]);
  }

  get(table: string, where?: Condition): SelectResult | undefined {
    const hit = this.entries.get(table)?.get(SelectCache.key(where));
    return hit && copy(hit);
  }

  set(table: string, where: Condition | undefined, result: SelectResult): void {
    let byFilter = this.entries.get(table);
    if (!byFilter) {
      byFilter = new Map();
      this.entries.set(table, byFilter);
    }
    byFilter.set(SelectCache.key(where), copy(result));
  }

  invalidate(table: string): void {
    this.entries.delete(table);
  }

  get size(): number {
    let total = 0;
    this.entries.forEach(byFilter => {
      total += byFilter.size;
    });
    return total;
  }
}
