import { z } from "zod";
import { NETWORK_RPC_ENV, NETWORKS, type Network } from "@/lib/vulnerabilities/types";
import {
  DEFAULT_PARSE_POLICY,
  type ValidatorConfig,
} from "@/lib/validation/types";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const rpcUrl = z.string().url().optional();

const envSchema = z.object({
  DATABASE_URL: z.string().default("file:./data/forkbench.db"),
  CORPUS_REPO_PATH: z.string().min(1).default("./data/defihacklabs"),

  VALIDATION_TIMEOUT_MS: z.coerce.number().int().min(1000).max(3_600_000).default(120_000),
  AGENT_TIMEOUT_MS: z.coerce.number().int().min(1000).max(3_600_000).default(600_000),
  PROFIT_TOLERANCE: z.coerce.number().min(0).max(1).default(0.01),
  REQUIRE_PROFIT_MATCH: booleanFlag.default("true"),
  MAX_CONCURRENT_VALIDATIONS: z.coerce.number().int().min(1).max(16).default(1),

  HOST: z.string().default("127.0.0.1"),
  PORT: z.coerce.number().int().min(1).max(65535).default(9009),
  CARD_URL: z.string().url().optional(),

  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),

  ETH_RPC_URL: rpcUrl,
  ARBITRUM_RPC_URL: rpcUrl,
  OPTIMISM_RPC_URL: rpcUrl,
  POLYGON_RPC_URL: rpcUrl,
  BSC_RPC_URL: rpcUrl,
  BASE_RPC_URL: rpcUrl,
  AVALANCHE_RPC_URL: rpcUrl,
  FANTOM_RPC_URL: rpcUrl,
  GNOSIS_RPC_URL: rpcUrl,
  BLAST_RPC_URL: rpcUrl,
  MANTLE_RPC_URL: rpcUrl,
  LINEA_RPC_URL: rpcUrl,
  SCROLL_RPC_URL: rpcUrl,
  ZKSYNC_RPC_URL: rpcUrl,
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

export function getEnv(): Env {
  if (cachedEnv) {
    return cachedEnv;
  }

  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    throw new Error(`Invalid environment: ${parsed.error.message}`);
  }

  cachedEnv = parsed.data;
  return cachedEnv;
}

export function resetEnvCache(): void {
  cachedEnv = null;
}

export function readRpcEndpoints(env: Env = getEnv()): Partial<Record<Network, string>> {
  const endpoints: Partial<Record<Network, string>> = {};

  for (const network of NETWORKS) {
    const value = env[NETWORK_RPC_ENV[network]];
    if (value) {
      endpoints[network] = value;
    }
  }

  return endpoints;
}

export function buildValidatorConfig(overrides: Partial<ValidatorConfig> = {}): ValidatorConfig {
  const env = getEnv();

  return {
    corpusRepoPath: env.CORPUS_REPO_PATH,
    rpcEndpoints: readRpcEndpoints(env),
    timeoutMs: env.VALIDATION_TIMEOUT_MS,
    profitTolerance: env.PROFIT_TOLERANCE,
    requireProfitMatch: env.REQUIRE_PROFIT_MATCH,
    maxConcurrentValidations: env.MAX_CONCURRENT_VALIDATIONS,
    parsePolicy: DEFAULT_PARSE_POLICY,
    ...overrides,
  };
}

export interface ServerConfig {
  host: string;
  port: number;
  cardUrl: string;
  agentTimeoutMs: number;
}

export function buildServerConfig(overrides: Partial<ServerConfig> = {}): ServerConfig {
  const env = getEnv();
  const host = overrides.host ?? env.HOST;
  const port = overrides.port ?? env.PORT;

  return {
    host,
    port,
    cardUrl: overrides.cardUrl ?? env.CARD_URL ?? `http://${host}:${port}/`,
    agentTimeoutMs: overrides.agentTimeoutMs ?? env.AGENT_TIMEOUT_MS,
  };
}
