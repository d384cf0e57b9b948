import { RecordTooLargeError } from "../errors";
import { all, Database, get, run, SqlValue } from "./database";
import { RowCodec } from "./codecs";

/**
 * Ordered id -> record table for one entity type.
 * Lookups miss with `null`; turning that into an error is up to the caller.
 */
export class RecordStore<T extends { id: number }, C extends string = string> {
  private readonly selectList: string;

  constructor(
    private readonly db: Database,
    private readonly codec: RowCodec<T, C>,
    private readonly maxRowBytes: number
  ) {
    this.selectList = codec.columns.join(", ");
  }

  get table(): string {
    return this.codec.table;
  }

  async getAll(): Promise<T[]> {
    const rows = all(this.db, `SELECT ${this.selectList} FROM ${this.table} ORDER BY id`);
    return rows.map((row) => this.codec.fromRow(row));
  }

  async get(id: number): Promise<T | null> {
    return this.find(id);
  }

  async insert(record: T): Promise<void> {
    const values = this.encode(record);
    const placeholders = values.map(() => "?").join(", ");

    run(
      this.db,
      `INSERT OR REPLACE INTO ${this.table} (${this.selectList}) VALUES (${placeholders})`,
      values
    );
  }

  /**
   * Overwrites an existing row. Returns the previous record, or null if there was none.
   * The read and the write happen in one synchronous step, so a concurrent
   * remove lands either before (null) or after (the update is what gets removed).
   */
  async replace(record: T): Promise<T | null> {
    const row = this.codec.toRow(record);
    this.checkSize(this.codec.columns.map((column) => row[column]));

    const previous = this.find(record.id);
    if (!previous) {
      return null;
    }

    const columns = this.codec.columns.filter((column) => column !== "id");
    const assignments = columns.map((column) => `${column} = ?`).join(", ");

    const { changes } = run(
      this.db,
      `UPDATE ${this.table} SET ${assignments} WHERE id = ?`,
      [...columns.map((column) => row[column]), record.id]
    );

    return changes === 0 ? null : previous;
  }

  async remove(id: number): Promise<T | null> {
    const row = get(
      this.db,
      `DELETE FROM ${this.table} WHERE id = ? RETURNING ${this.selectList}`,
      [id]
    );
    return row === undefined ? null : this.codec.fromRow(row);
  }

  private find(id: number): T | null {
    const row = get(this.db, `SELECT ${this.selectList} FROM ${this.table} WHERE id = ?`, [id]);
    return row === undefined ? null : this.codec.fromRow(row);
  }

  private encode(record: T): SqlValue[] {
    const row = this.codec.toRow(record);
    const values = this.codec.columns.map((column) => row[column]);
    this.checkSize(values);
    return values;
  }

  private checkSize(values: SqlValue[]) {
    const size = Buffer.byteLength(JSON.stringify(values), "utf8");
    if (size > this.maxRowBytes) {
      throw new RecordTooLargeError(this.table, size, this.maxRowBytes);
    }
  }
}
