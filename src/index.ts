import path from "node:path";
import process from "node:process";
import { fileURLToPath } from "node:url";
import { type Config, loadConfig, resetConfigCache } from "./config";
import { createAppContainer } from "./container";
import { buildScheduledJobs } from "./jobs/definitions";
import { JobScheduler } from "./jobs/scheduler";
import { createLogger } from "./logging";
import { type McpServerHandle, startMcpServer } from "./server/mcp";

export interface BootstrapResult {
  readonly config: Config;
}

export interface BootstrapOptions {
  readonly envFile?: string | false;
  readonly envVars?: Record<string, string | undefined>;
}

export async function bootstrap(options: BootstrapOptions = {}): Promise<BootstrapResult> {
  const { envFile, envVars } = options;
  const config = loadConfig({}, { envFile, envVars });
  const logger = createLogger(config);
  const version = process.env.npm_package_version ?? "0.1.0";

  console.error(renderBanner({ appName: "Ontological Memory Core", version, config }));

  logger.info(
    {
      store: `${config.store.host}:${config.store.port}`,
      llm: `${config.llm.provider}/${config.llm.model}`,
      embedding: `${config.embedding.provider}/${config.embedding.model}`,
      chunking: config.chunking.enabled,
    },
    "Configuration resolved",
  );

  const container = await createAppContainer({ config, logger });
  logger.info("Running health check of services...");
  const status = await container.services.system.status();
  if (status.store.ok) {
    logger.info("Health check passed.");
  } else {
    logger.warn({ store: status.store.baseUrl }, "Backing store unreachable; continuing");
  }
  await container.services.ontology.ensureLoaded();

  const scheduler = new JobScheduler(logger, container.jobStatuses);
  for (const job of buildScheduledJobs(container)) {
    scheduler.register(job);
  }
  scheduler.startAll();

  let shuttingDown = false;
  let transportHandle: McpServerHandle["transport"] | undefined;

  function handleStdinEnd(): void {
    logger.info("STDIN ended; initiating shutdown.");
    void shutdown("stdio-stdin-end");
  }

  function handleStdinError(error: unknown): void {
    logger.warn({ err: error }, "STDIN error detected; initiating shutdown.");
    void shutdown("stdio-stdin-error");
  }

  const shutdown = async (reason: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    process.stdin.off("end", handleStdinEnd);
    process.stdin.off("error", handleStdinError);
    logger.info({ reason }, "Shutting down...");

    let exitCode = 0;

    try {
      scheduler.stopAll();
    } catch (error) {
      exitCode = 1;
      logger.error({ err: error }, "Failed to stop scheduled jobs");
    }

    if (transportHandle && reason !== "stdio-transport-closed") {
      try {
        await transportHandle.close();
      } catch (error) {
        logger.warn({ err: error }, "Failed to close MCP stdio transport gracefully; continuing");
      }
    }

    try {
      await container.shutdown();
    } catch (error) {
      exitCode = 1;
      logger.error({ err: error }, "Error during container shutdown");
    }

    process.exit(exitCode);
  };

  const handleSignal = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "Received termination signal");
    void shutdown(`signal:${signal}`);
  };

  process.once("SIGINT", handleSignal);
  process.once("SIGTERM", handleSignal);

  process.stdin.on("end", handleStdinEnd);
  process.stdin.on("error", handleStdinError);

  const { transport } = await startMcpServer(container);
  transportHandle = transport;
  transport.onclose = () => {
    logger.info("MCP stdio transport closed; shutting down.");
    void shutdown("stdio-transport-closed");
  };
  transport.onerror = (error) => {
    logger.error({ err: error }, "MCP stdio transport error");
  };

  logger.info("Server is ready.");

  return { config };
}

interface BannerOptions {
  appName: string;
  version: string;
  config: Config;
}

function renderBanner({ appName, version, config }: BannerOptions): string {
  const lines = [
    "===============================================",
    `  ${appName} v${version}`,
    `  Store: ${config.store.host}:${config.store.port}`,
    `  LLM: ${config.llm.provider} (${config.llm.model})`,
    "  Status: listening on stdio",
    "===============================================",
  ];

  return `\n${lines.join("\n")}\n`;
}

export interface CliParseResult {
  envFile?: string | false;
  envVars: Record<string, string | undefined>;
  showHelp: boolean;
}

export function parseCliArgs(argv: string[], cwd = process.cwd()): CliParseResult {
  const result: CliParseResult = {
    envVars: {},
    showHelp: false,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case "--":
        return result;
      case "-h":
      case "--help":
        result.showHelp = true;
        return result;
      case "-c":
      case "--config": {
        const value = argv[i + 1];
        if (!value) {
          throw new Error("Missing value for --config");
        }
        result.envFile = value.toLowerCase() === "false" ? false : path.resolve(cwd, value);
        i += 1;
        break;
      }
      case "-e":
      case "--env": {
        const value = argv[i + 1];
        const separator = value?.indexOf("=") ?? -1;
        if (!value || separator <= 0) {
          throw new Error("Expected KEY=VALUE after --env");
        }
        result.envVars[value.slice(0, separator)] = value.slice(separator + 1);
        i += 1;
        break;
      }
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return result;
}

function printHelp(): void {
  const lines = [
    "Usage: omc [options]",
    "",
    "Options:",
    "  -c, --config <path>      Load environment variables from the specified .env file",
    "  -e, --env KEY=VALUE      Inject additional environment variables (repeatable)",
    "  -h, --help               Show this help message",
    "",
    "Examples:",
    "  omc --config ./prod.env --env LOG_LEVEL=debug",
    "  omc --env HELIX_PORT=6970",
  ];

  console.error(lines.join("\n"));
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  let cli: CliParseResult;
  try {
    cli = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    printHelp();
    process.exit(1);
  }

  if (cli.showHelp) {
    printHelp();
    process.exit(0);
  }

  for (const [key, value] of Object.entries(cli.envVars)) {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }

  resetConfigCache();

  bootstrap({
    envFile: cli.envFile,
    envVars: cli.envVars,
  }).catch((error: unknown) => {
    console.error("Fatal bootstrap error:", error);
    process.exit(1);
  });
}
