import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import type { Config } from "../../core/domain/entities/config.entity.js";
import { ConfigError, errorMessage } from "../../core/domain/errors.js";

const ConfigSchema = z.object({
  loader: z
    .object({
      kind: z.enum(["psql", "pg-copy", "sqlite"]).default("psql"),
      table: z.string().min(1).default("taq_trades"),
      delimiter: z.string().length(1).default("|"),
      psql: z
        .object({
          command: z.string().min(1).default("psql"),
          database: z.string().min(1).default("postgres"),
        })
        .default({}),
      pg: z
        .object({
          connectionString: z.string().min(1).optional(),
          maxConnections: z.number().int().min(1).default(16),
        })
        .default({}),
      sqlite: z
        .object({
          path: z.string().min(1).default("output/taq.db"),
        })
        .default({}),
    })
    .default({}),
  run: z
    .object({
      chunks: z.number().int().min(1).default(8),
      maxConcurrency: z.number().int().min(1).default(16),
      concurrency: z.number().int().min(1).optional(),
      chunkTimeoutMs: z.number().int().min(0).default(0),
      workDir: z.string().default(""),
      cleanup: z.enum(["on-success", "never"]).default("on-success"),
      failOnChunkError: z.boolean().default(false),
    })
    .default({}),
  logging: z
    .object({
      dir: z.string().min(1).default("output/logs"),
      runLog: z.string().min(1).default("import-run.jsonl"),
    })
    .default({}),
  report: z
    .object({
      enabled: z.boolean().default(true),
      outputDir: z.string().min(1).default("output/reports"),
      retainCount: z.number().int().min(0).default(20),
    })
    .default({}),
});

export const DEFAULT_CONFIG_PATH = resolve(process.cwd(), "config", "config.yaml");

function substituteEnv(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === "string" && value.startsWith("${") && value.endsWith("}")) {
    const key = value.slice(2, -1);
    return env[key] ?? value;
  }
  if (Array.isArray(value)) return value.map((v) => substituteEnv(v, env));
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = substituteEnv(v, env);
    return out;
  }
  return value;
}

/** Drops `${VAR}` placeholders that had no value so schema defaults apply. */
function dropUnresolved(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(dropUnresolved);
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      if (typeof v === "string" && v.startsWith("${") && v.endsWith("}")) continue;
      out[k] = dropUnresolved(v);
    }
    return out;
  }
  return value;
}

export function parseConfig(
  raw: unknown,
  source: string,
  env: NodeJS.ProcessEnv = process.env,
): Config {
  const withEnv = dropUnresolved(substituteEnv(raw ?? {}, env));
  const result = ConfigSchema.safeParse(withEnv);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config at ${source}. ${issues}`);
  }
  const config: Config = result.data;
  if (env.DATABASE_URL) config.loader.pg.connectionString = env.DATABASE_URL;
  if (env.TAQ_IMPORT_TABLE) config.loader.table = env.TAQ_IMPORT_TABLE;
  return config;
}

export class ConfigService {
  private config: Config;

  /**
   * An explicit path (argument or CONFIG_PATH) must exist; the default
   * `config/config.yaml` is optional and built-in defaults are used without it.
   */
  constructor(configPath?: string, env: NodeJS.ProcessEnv = process.env) {
    const explicit = configPath || env.CONFIG_PATH;
    const path = explicit ? resolve(explicit) : DEFAULT_CONFIG_PATH;
    if (!explicit && !existsSync(path)) {
      this.config = parseConfig({}, "built-in defaults", env);
      return;
    }
    this.config = this.loadConfig(path, env);
  }

  private loadConfig(path: string, env: NodeJS.ProcessEnv): Config {
    let raw: string;
    try {
      raw = readFileSync(path, "utf-8");
    } catch (e) {
      throw new ConfigError(`Failed to load config from ${path}. ${errorMessage(e)}`, {
        cause: e,
      });
    }
    let parsed: unknown;
    try {
      parsed = yaml.load(raw);
    } catch (e) {
      throw new ConfigError(`Invalid YAML in ${path}. ${errorMessage(e)}`, {
        cause: e,
      });
    }
    if (parsed !== undefined && (parsed === null || typeof parsed !== "object")) {
      throw new ConfigError(`Config at ${path} must be a YAML object.`);
    }
    return parseConfig(parsed, path, env);
  }

  getConfig(): Config {
    return this.config;
  }
}
