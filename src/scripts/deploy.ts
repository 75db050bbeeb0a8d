import path from "node:path";
import process from "node:process";
import { fileURLToPath } from "node:url";
import { pathExists, readdir, readFile } from "fs-extra";
import { loadConfig } from "../config";
import { createLogger, type AppLogger } from "../logging";
import { errorMessage } from "../services/errors";

export interface DeployOptions {
  host: string;
  port: number;
  schemaDir: string;
  schemaOnly: boolean;
  queriesOnly: boolean;
  showHelp: boolean;
}

export interface DeploySources {
  schema?: string;
  queries?: string;
}

export interface DeployStep {
  endpoint: "/schema" | "/queries";
  status: "deployed" | "skipped";
}

type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

const DEFINITION_PATTERN = /^\s*(N|E|V)::/m;

export interface DeployDefaults {
  cwd?: string;
  host?: string;
  port?: number;
}

export function parseDeployArgs(argv: string[], defaults: DeployDefaults = {}): DeployOptions {
  const cwd = defaults.cwd ?? process.cwd();
  const options: DeployOptions = {
    host: defaults.host ?? "localhost",
    port: defaults.port ?? 6969,
    schemaDir: path.resolve(cwd, "schema"),
    schemaOnly: false,
    queriesOnly: false,
    showHelp: false,
  };

  const valueOf = (flag: string, index: number): string => {
    const value = argv[index + 1];
    if (!value || value.startsWith("--")) {
      throw new Error(`Missing value for ${flag}`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case "-h":
      case "--host":
        options.host = valueOf(arg, i);
        i += 1;
        break;
      case "-p":
      case "--port": {
        const port = Number.parseInt(valueOf(arg, i), 10);
        if (!Number.isInteger(port) || port <= 0 || port > 65535) {
          throw new Error(`Invalid port: ${argv[i + 1]}`);
        }
        options.port = port;
        i += 1;
        break;
      }
      case "-d":
      case "--schema-dir":
        options.schemaDir = path.resolve(cwd, valueOf(arg, i));
        i += 1;
        break;
      case "--schema-only":
        options.schemaOnly = true;
        break;
      case "--queries-only":
        options.queriesOnly = true;
        break;
      case "--help":
        options.showHelp = true;
        return options;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  if (options.schemaOnly && options.queriesOnly) {
    throw new Error("--schema-only and --queries-only cannot be combined");
  }
  return options;
}

/**
 * `schema.hx` wins when present; otherwise every `.hx` file holding node,
 * edge or vector definitions is schema and the rest are queries.
 */
export async function collectSources(schemaDir: string): Promise<DeploySources> {
  if (!(await pathExists(schemaDir))) {
    throw new Error(`Schema directory not found: ${schemaDir}`);
  }

  const files = (await readdir(schemaDir)).filter((name) => name.endsWith(".hx")).sort();
  const schemaParts: string[] = [];
  const queryParts: string[] = [];
  const hasSchemaFile = files.includes("schema.hx");

  for (const name of files) {
    const text = await readFile(path.join(schemaDir, name), "utf8");
    const isSchema = hasSchemaFile ? name === "schema.hx" : DEFINITION_PATTERN.test(text);
    (isSchema ? schemaParts : queryParts).push(text.trimEnd());
  }

  return {
    schema: schemaParts.length > 0 ? `${schemaParts.join("\n\n")}\n` : undefined,
    queries: queryParts.length > 0 ? `${queryParts.join("\n\n")}\n` : undefined,
  };
}

export async function deploy(
  options: DeployOptions,
  deps: { logger: AppLogger; fetch?: FetchLike },
): Promise<DeployStep[]> {
  const { logger } = deps;
  const send = deps.fetch ?? fetch;
  const baseUrl = `http://${options.host}:${options.port}`;
  const sources = await collectSources(options.schemaDir);
  const steps: DeployStep[] = [];

  const post = async (endpoint: DeployStep["endpoint"], body: Record<string, string>) => {
    const response = await send(`${baseUrl}${endpoint}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
    if (!response.ok) {
      const text = await response.text();
      throw new Error(`${endpoint} rejected with HTTP ${response.status}: ${text}`);
    }
  };

  if (!options.queriesOnly) {
    if (sources.schema === undefined) {
      logger.warn({ schemaDir: options.schemaDir }, "No schema definitions found; skipping");
      steps.push({ endpoint: "/schema", status: "skipped" });
    } else {
      await post("/schema", { schema: sources.schema });
      logger.info({ baseUrl }, "Schema deployed");
      steps.push({ endpoint: "/schema", status: "deployed" });
    }
  }

  if (!options.schemaOnly) {
    if (sources.queries === undefined) {
      logger.warn({ schemaDir: options.schemaDir }, "No query files found; skipping");
      steps.push({ endpoint: "/queries", status: "skipped" });
    } else {
      await post("/queries", { queries: sources.queries });
      logger.info({ baseUrl }, "Queries deployed");
      steps.push({ endpoint: "/queries", status: "deployed" });
    }
  }

  return steps;
}

function printHelp(): void {
  const lines = [
    "Usage: npm run deploy -- [options]",
    "",
    "Options:",
    "  -h, --host <host>         Store host (default: HELIX_HOST or localhost)",
    "  -p, --port <port>         Store port (default: HELIX_PORT or 6969)",
    "  -d, --schema-dir <dir>    Directory holding the .hx files (default: ./schema)",
    "      --schema-only         Deploy the schema only",
    "      --queries-only        Deploy the queries only",
    "      --help                Show this help message",
  ];
  console.error(lines.join("\n"));
}

export async function main(argv = process.argv.slice(2)): Promise<number> {
  const config = loadConfig();
  const logger = createLogger(config);

  let options: DeployOptions;
  try {
    options = parseDeployArgs(argv, { host: config.store.host, port: config.store.port });
  } catch (error) {
    console.error(errorMessage(error));
    printHelp();
    return 1;
  }

  if (options.showHelp) {
    printHelp();
    return 0;
  }

  try {
    await deploy(options, { logger });
    return 0;
  } catch (error) {
    logger.error({ err: errorMessage(error) }, "Deployment failed");
    return 1;
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().then(
    (code) => process.exit(code),
    (error: unknown) => {
      console.error("Deployment script failed:", error);
      process.exit(1);
    },
  );
}
