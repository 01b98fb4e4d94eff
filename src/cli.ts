#!/usr/bin/env node
/**
 * CLI entrypoint for hepc.
 *
 * Usage:
 *   hepc collect --source ~/mirror --max-dbs 17 --query-pack codeql-all
 *   hepc serve --port 8070
 */
import { parseArgs } from "node:util";

import { configFromEnv, parseConfig, type RawConfig } from "./config.js";
import { logError, logInfo } from "./core/logger.js";
import { Hepc } from "./index.js";
import { close, listen } from "./server/http.js";
import type { ArchiveFilter } from "./store/metadata.js";
import { defaultDestination, migrateStore } from "./store/migrate.js";

const USAGE = `
hepc: HTTP endpoint for CodeQL databases

Usage:
  hepc collect --source <dir> [--max-dbs <n>] [--query-pack <name>]
  hepc ingest <manifest.json>
  hepc serve [--host <host>] [--port <port>] [--cutover-path <file>]
  hepc migrate --old-prefix <url> --new-prefix <url> [--source <db>] [--destination <file>] [--force]
  hepc select [--where <column>=<value>]...
  hepc packs

Options:
  --db-path <file>       Metadata Store      (env HEPC_DB_PATH,   default: ./metadata.sql)
  --store-dir <dir>      Archive Store       (env HEPC_STORE_DIR, default: ./values)
  --base-url <url>       External base URL   (env HEPC_BASE_URL,  default: http://127.0.0.1:8070)
  --help                 Show this help

migrate reads --source (default: --db-path) and writes a rewritten copy
(default: <db>-adjust<ext>).
On SIGHUP, serve switches to --cutover-path (default: the live store's
<db>-adjust<ext>, where migrate writes). Leave the live file in place; a copy
moved over it is refused.
`.trim();

const DRAIN_MS = 5000;

function parse(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      source: { type: "string" },
      "max-dbs": { type: "string" },
      "query-pack": { type: "string" },
      host: { type: "string" },
      port: { type: "string" },
      "old-prefix": { type: "string" },
      "new-prefix": { type: "string" },
      destination: { type: "string" },
      "cutover-path": { type: "string" },
      force: { type: "boolean", default: false },
      where: { type: "string", multiple: true },
      "db-path": { type: "string" },
      "store-dir": { type: "string" },
      "base-url": { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
  });
}

type Values = ReturnType<typeof parse>["values"];

function rawConfig(values: Values): RawConfig {
  const env = configFromEnv();
  return {
    baseUrl: values["base-url"] ?? env.baseUrl,
    storage: { config: { basePath: values["store-dir"] ?? env.storage?.config?.basePath } },
    db: { config: { path: values["db-path"] ?? env.db?.config?.path } },
    server: {
      host: values.host ?? env.server?.host,
      port: values.port ?? env.server?.port,
    },
    collector: {
      ...env.collector,
      maxDbs: values["max-dbs"] ?? env.collector?.maxDbs,
      queryPack: values["query-pack"] ?? env.collector?.queryPack,
    },
  };
}

function parseWhere(clauses: string[] = []): ArchiveFilter {
  const filter: Record<string, string> = {};
  for (const clause of clauses) {
    const eq = clause.indexOf("=");
    if (eq <= 0) throw new Error(`--where expects <column>=<value>, got: ${clause}`);
    filter[clause.slice(0, eq)] = clause.slice(eq + 1);
  }
  return filter;
}

function pad(value: string | number | null, width: number): string {
  return String(value ?? "").padEnd(width);
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

async function collect(hepc: Hepc, values: Values): Promise<number> {
  if (!values.source) {
    console.error(USAGE);
    return 1;
  }
  const report = await hepc.collect({ startingPath: values.source });
  const count = (status: string) => report.archives.filter((a) => a.status === status).length;

  console.log(`Collected ${report.archives.length} database(s) into ${report.destination}`);
  console.log(
    `  copied: ${count("copied")}, existing: ${count("existing")}, restored: ${count("restored")}`,
  );
  console.log(`  skipped: ${report.skipped.length}, errors: ${report.errors.length}`);
  if (report.limitReached) console.log(`  stopped at --max-dbs ${report.maxDbs}`);
  for (const error of report.errors) {
    console.log(`  ! ${error.path}: ${error.message}`);
  }
  return 0;
}

async function ingest(hepc: Hepc, positionals: string[]): Promise<number> {
  const manifest = positionals[1];
  if (!manifest) {
    console.error(USAGE);
    return 1;
  }
  const report = await hepc.ingestResults(manifest);
  console.log(`Ingested ${report.accepted} result(s), rejected ${report.rejected}`);
  for (const error of report.errors) console.log(`  ! ${error}`);
  return 0;
}

async function serve(
  hepc: Hepc,
  host: string,
  port: number,
  cutoverPath: string | undefined,
): Promise<number> {
  const server = hepc.createServer();
  const address = await listen(server, host, port);
  logInfo(`Serving on http://${address.address}:${address.port}`);

  process.on("SIGHUP", () => {
    const live = hepc.dbPath;
    const dbPath = cutoverPath ?? (live === undefined ? undefined : defaultDestination(live));
    if (dbPath === undefined) {
      logError("Cutover failed; no store file to switch to");
      return;
    }
    hepc
      .cutover(dbPath)
      .then((previous) => {
        logInfo("Switched to migrated metadata store", { dbPath });
        setTimeout(() => {
          previous.close().catch((err: unknown) => {
            logError("Failed to close previous store", { error: String(err) });
          });
        }, DRAIN_MS).unref();
      })
      .catch((err: unknown) => {
        logError("Cutover failed; still serving the previous store", { error: String(err) });
      });
  });

  const shutdown = () => {
    close(server)
      .then(() => hepc.close())
      .catch((err: unknown) => {
        logError("Shutdown failed", { error: String(err) });
        process.exitCode = 1;
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
  return 0;
}

async function migrate(source: string, values: Values): Promise<number> {
  const oldPrefix = values["old-prefix"];
  const newPrefix = values["new-prefix"];
  if (oldPrefix === undefined || newPrefix === undefined) {
    console.error(USAGE);
    return 1;
  }
  const result = await migrateStore({
    source,
    oldPrefix,
    newPrefix,
    destination: values.destination,
    force: values.force,
  });
  console.log(`Rewrote ${result.rewritten} result URL(s). Written adjusted DB to:`);
  console.log(`  ${result.destination}`);
  return 0;
}

async function select(hepc: Hepc, values: Values): Promise<number> {
  const archives = await hepc.store.listArchives(parseWhere(values.where));
  if (archives.length === 0) {
    console.log("No matching databases found.");
    return 0;
  }
  console.log(
    `${pad("Owner", 15)} ${pad("Repo", 20)} ${pad("Language", 10)} ${pad("Tool Ver", 10)} ${pad("Size (MB)", 10)} Path`,
  );
  console.log("-".repeat(120));
  for (const a of archives) {
    const sizeMb = Math.round((a.size / (1024 * 1024)) * 10) / 10;
    console.log(
      `${pad(a.gitOwner, 15)} ${pad(a.gitRepo, 20)} ${pad(a.primaryLanguage, 10)} ${pad(a.toolVersion, 10)} ${pad(sizeMb, 10)} ${a.filePath}`,
    );
  }
  console.log(`\nFound ${archives.length} matching databases`);
  return 0;
}

async function packs(hepc: Hepc): Promise<number> {
  for (const result of await hepc.allLatestResults()) {
    console.log(`${result.queryPack}\t${result.producedAt}\t${result.resultUrl}`);
  }
  return 0;
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(argv: string[]): Promise<number> {
  const { values, positionals } = parse(argv);
  const command = positionals[0];
  if (values.help || !command) {
    console.log(USAGE);
    return values.help ? 0 : 1;
  }

  const config = parseConfig(rawConfig(values));
  // Never opens the source store for writing, so it must not go through Hepc.
  if (command === "migrate") return migrate(values.source ?? config.db.config.path, values);

  const hepc = await Hepc.fromConfig(config);

  if (command === "serve") {
    return serve(hepc, config.server.host, config.server.port, values["cutover-path"]);
  }
  try {
    switch (command) {
      case "collect":
        return await collect(hepc, values);
      case "ingest":
        return await ingest(hepc, positionals);
      case "select":
        return await select(hepc, values);
      case "packs":
        return await packs(hepc);
      default:
        console.error(`Unknown command: ${command}\n\n${USAGE}`);
        return 1;
    }
  } finally {
    await hepc.close();
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err instanceof Error ? `${err.name}: ${err.message}` : String(err));
    process.exitCode = 1;
  },
);
