import { createReadStream, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { parse, type CastingContext } from "csv-parse";
import type { SqliteLoaderConfig } from "../../core/domain/entities/config.entity.js";
import { errorMessage } from "../../core/domain/errors.js";
import type {
  ChunkLoadOptions,
  ChunkLoadOutcome,
  IChunkLoader,
} from "../../core/domain/services/chunk-loader.service.js";
import { quoteIdentifier } from "./identifiers.js";

type Row = (string | null)[];

/** Unquoted empty fields are NULL, as with COPY ... (FORMAT csv). */
function castField(value: string, context: CastingContext): string | null {
  return value === "" && !context.quoting ? null : value;
}

function toRow(record: unknown): Row {
  if (!Array.isArray(record)) {
    throw new Error("Unexpected CSV record shape");
  }
  return record.map((v: unknown) => (typeof v === "string" ? v : null));
}

/**
 * Loads chunks into a local SQLite database. A whole chunk goes in one
 * transaction, so a bad row leaves the table as it was.
 */
export class SqliteLoader implements IChunkLoader {
  readonly name = "sqlite";
  private db: Database.Database;

  constructor(
    config: SqliteLoaderConfig,
    private delimiter: string,
  ) {
    if (config.path !== ":memory:") {
      mkdirSync(dirname(config.path), { recursive: true });
    }
    this.db = new Database(config.path);
    this.db.pragma("journal_mode = WAL");
  }

  async load(
    chunkFilePath: string,
    destination: string,
    options: ChunkLoadOptions = {},
  ): Promise<ChunkLoadOutcome> {
    try {
      const rows = await this.readRows(chunkFilePath);
      options.signal?.throwIfAborted();
      const rowsLoaded = this.insertRows(destination, rows);
      return { exitCode: 0, stderr: "", rowsLoaded };
    } catch (e) {
      return { exitCode: 1, stderr: errorMessage(e) };
    }
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private async readRows(path: string): Promise<Row[]> {
    const input = createReadStream(path);
    const parser = input.pipe(
      parse({ delimiter: this.delimiter, cast: castField }),
    );
    input.on("error", (err) => parser.destroy(err));
    const rows: Row[] = [];
    for await (const record of parser) {
      rows.push(toRow(record));
    }
    return rows;
  }

  private insertRows(destination: string, rows: Row[]): number {
    if (rows.length === 0) return 0;
    const placeholders = rows[0].map(() => "?").join(", ");
    const insert = this.db.prepare(
      `INSERT INTO ${quoteIdentifier(destination)} VALUES (${placeholders})`,
    );
    const insertAll = this.db.transaction((batch: Row[]) => {
      for (const row of batch) insert.run(...row);
    });
    insertAll(rows);
    return rows.length;
  }
}
