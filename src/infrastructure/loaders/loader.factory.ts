import type { LoaderConfig } from "../../core/domain/entities/config.entity.js";
import type { IChunkLoader } from "../../core/domain/services/chunk-loader.service.js";
import { PgCopyLoader } from "./pg-copy.loader.js";
import { PsqlCommandLoader } from "./psql-command.loader.js";
import { SqliteLoader } from "./sqlite.loader.js";

export function createChunkLoader(config: LoaderConfig): IChunkLoader {
  switch (config.kind) {
    case "psql":
      return new PsqlCommandLoader(config.psql, config.delimiter);
    case "pg-copy":
      return new PgCopyLoader(config.pg, config.delimiter);
    case "sqlite":
      return new SqliteLoader(config.sqlite, config.delimiter);
  }
}
