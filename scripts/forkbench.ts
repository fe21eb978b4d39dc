import { serve } from "@hono/node-server";
import { createClient } from "@libsql/client";
import { Command, InvalidArgumentError } from "commander";
import type { Hono } from "hono";
import { createGroundtruthAgent } from "@/lib/agents/groundtruth";
import { createMessenger } from "@/lib/agents/messenger";
import {
  buildServerConfig,
  buildValidatorConfig,
  getEnv,
  readRpcEndpoints,
} from "@/lib/config/env";
import { configureCorpusRpcEndpoints } from "@/lib/corpus/foundry-config";
import { ensureSqliteDirectory } from "@/lib/db/client";
import { runMigrations } from "@/lib/db/migrate";
import { createLogger } from "@/lib/logging/logger";
import { createAssessorApp, createGroundtruthApp } from "@/lib/server/app";
import { createExploitValidator } from "@/lib/validation/validator";

const logger = createLogger("cli");

const DEFAULT_GROUNDTRUTH_PORT = 9010;

interface ServerOptions {
  host?: string;
  port?: number;
  cardUrl?: string;
  corpus?: string;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError("Port must be an integer between 1 and 65535.");
  }
  return port;
}

function parseTimeout(value: string): number {
  const timeout = Number(value);
  if (!Number.isInteger(timeout) || timeout < 1000) {
    throw new InvalidArgumentError("Timeout must be an integer of at least 1000 ms.");
  }
  return timeout;
}

function listen(app: Hono, host: string, port: number, name: string): void {
  serve({ fetch: app.fetch, hostname: host, port }, (info) => {
    logger.info(`${name} listening`, { host, port: info.port });
  });
}

const program = new Command();

program.name("forkbench").description("DeFi exploit reproduction benchmark").version("0.1.0");

program
  .command("serve")
  .description("Start the assessor agent")
  .option("--host <host>", "host to bind")
  .option("--port <port>", "port to bind", parsePort)
  .option("--card-url <url>", "URL advertised in the agent card")
  .option("--corpus <path>", "path to the exploit corpus checkout")
  .option("--validation-timeout <ms>", "forge test timeout in milliseconds", parseTimeout)
  .action((options: ServerOptions & { validationTimeout?: number }) => {
    const server = buildServerConfig({ host: options.host, port: options.port, cardUrl: options.cardUrl });
    const validatorConfig = buildValidatorConfig({
      ...(options.corpus ? { corpusRepoPath: options.corpus } : {}),
      ...(options.validationTimeout ? { timeoutMs: options.validationTimeout } : {}),
    });

    const app = createAssessorApp({
      cardUrl: server.cardUrl,
      messenger: createMessenger(),
      validator: createExploitValidator(validatorConfig),
      agentTimeoutMs: server.agentTimeoutMs,
    });

    logger.info("Starting assessor", { corpus: validatorConfig.corpusRepoPath, cardUrl: server.cardUrl });
    listen(app, server.host, server.port, "Assessor");
  });

program
  .command("groundtruth")
  .description("Start the baseline agent that answers with the corpus exploit")
  .option("--host <host>", "host to bind")
  .option("--port <port>", "port to bind", parsePort, DEFAULT_GROUNDTRUTH_PORT)
  .option("--card-url <url>", "URL advertised in the agent card")
  .option("--corpus <path>", "path to the exploit corpus checkout")
  .action((options: ServerOptions) => {
    const server = buildServerConfig({ host: options.host, port: options.port, cardUrl: options.cardUrl });
    const corpus = options.corpus ?? getEnv().CORPUS_REPO_PATH;

    const app = createGroundtruthApp({
      cardUrl: server.cardUrl,
      agent: createGroundtruthAgent(corpus),
    });

    logger.info("Starting groundtruth agent", { corpus, cardUrl: server.cardUrl });
    listen(app, server.host, server.port, "Groundtruth agent");
  });

program
  .command("configure-corpus")
  .description("Write RPC endpoints from the environment into the corpus foundry.toml")
  .option("--corpus <path>", "path to the exploit corpus checkout")
  .action(async (options: { corpus?: string }) => {
    const env = getEnv();
    const corpus = options.corpus ?? env.CORPUS_REPO_PATH;
    const updated = await configureCorpusRpcEndpoints(corpus, readRpcEndpoints(env));

    if (updated.length === 0) {
      logger.warn("No RPC endpoints updated; set network RPC URLs such as ETH_RPC_URL", { corpus });
      return;
    }
    logger.info("Updated RPC endpoints", { corpus, networks: updated });
  });

program
  .command("migrate")
  .description("Apply pending database migrations")
  .action(async () => {
    const env = getEnv();
    ensureSqliteDirectory(env.DATABASE_URL);

    const client = createClient({ url: env.DATABASE_URL });
    try {
      const applied = await runMigrations(client);
      logger.info("Migrations applied successfully.", { applied });
    } finally {
      client.close();
    }
  });

// Plain stderr: an invalid environment also breaks the logger.
void program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
