import { DuplicateKeyError, type EntityName } from "../../utils/errors.js";

export interface Row {
  id: string;
}

/** Committed rows of one entity, plus the fields whose non-null values are unique. */
export class MemoryTable<T extends Row> {
  readonly rows = new Map<string, T>();

  constructor(
    readonly entity: EntityName,
    readonly uniqueFields: ReadonlyArray<keyof T & string> = [],
  ) {}
}

/**
 * A unit of work's window on a table. Writes are staged (null marks a
 * delete) and become visible to other units only on `apply()`.
 */
export class TableView<T extends Row> {
  private readonly staged = new Map<string, T | null>();

  constructor(private readonly table: MemoryTable<T>) {}

  get entity(): EntityName {
    return this.table.entity;
  }

  get hasChanges(): boolean {
    return this.staged.size > 0;
  }

  get(id: string): T | null {
    const row = this.staged.has(id) ? this.staged.get(id) : this.table.rows.get(id);
    return row ? { ...row } : null;
  }

  all(): T[] {
    const out: T[] = [];
    for (const [id, row] of this.table.rows) {
      if (this.staged.has(id)) continue;
      out.push({ ...row });
    }
    for (const row of this.staged.values()) {
      if (row) out.push({ ...row });
    }
    return out;
  }

  filter(predicate: (row: T) => boolean): T[] {
    return this.all().filter(predicate);
  }

  put(row: T): void {
    this.assertUnique(row, this.all());
    this.staged.set(row.id, { ...row });
  }

  remove(id: string): void {
    this.staged.set(id, null);
  }

  /** Re-check unique fields against rows committed since this unit started. */
  validate(): void {
    const committed = [...this.table.rows.values()].filter((row) => !this.staged.has(row.id));
    for (const row of this.staged.values()) {
      if (row) this.assertUnique(row, committed);
    }
  }

  apply(): void {
    for (const [id, row] of this.staged) {
      if (row) this.table.rows.set(id, row);
      else this.table.rows.delete(id);
    }
    this.staged.clear();
  }

  private assertUnique(row: T, against: T[]): void {
    for (const field of this.table.uniqueFields) {
      const value = row[field];
      if (value === null || value === undefined) continue;
      const clash = against.find((other) => other.id !== row.id && other[field] === value);
      if (clash) throw new DuplicateKeyError(this.table.entity, field, String(value));
    }
  }
}
