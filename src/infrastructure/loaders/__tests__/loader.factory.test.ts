import { describe, it } from "node:test";
import assert from "node:assert/strict";
import type { LoaderConfig } from "../../../core/domain/entities/config.entity.js";
import { createChunkLoader } from "../loader.factory.js";
import { PgCopyLoader } from "../pg-copy.loader.js";
import { PsqlCommandLoader } from "../psql-command.loader.js";
import { SqliteLoader } from "../sqlite.loader.js";

const base: LoaderConfig = {
  kind: "psql",
  table: "taq_trades",
  delimiter: "|",
  psql: { command: "psql", database: "postgres" },
  pg: { connectionString: "postgres://test@localhost:5432/test", maxConnections: 2 },
  sqlite: { path: ":memory:" },
};

void describe("createChunkLoader", () => {
  void it("builds the loader named by the config", async () => {
    const psql = createChunkLoader(base);
    const pgCopy = createChunkLoader({ ...base, kind: "pg-copy" });
    const sqlite = createChunkLoader({ ...base, kind: "sqlite" });
    try {
      assert.ok(psql instanceof PsqlCommandLoader);
      assert.ok(pgCopy instanceof PgCopyLoader);
      assert.ok(sqlite instanceof SqliteLoader);
      assert.deepEqual(
        [psql.name, pgCopy.name, sqlite.name],
        ["psql", "pg-copy", "sqlite"],
      );
    } finally {
      await psql.close();
      await pgCopy.close();
      await sqlite.close();
    }
  });
});
