export const VULNERABILITY_TYPES = [
  "reentrancy",
  "flash_loan",
  "oracle_manipulation",
  "price_manipulation",
  "access_control",
  "logic_error",
  "input_validation",
  "reward_manipulation",
  "arithmetic",
  "frontrunning",
  "governance",
  "other",
] as const;

export const NETWORKS = [
  "mainnet",
  "arbitrum",
  "optimism",
  "polygon",
  "bsc",
  "base",
  "avalanche",
  "fantom",
  "gnosis",
  "blast",
  "mantle",
  "linea",
  "scroll",
  "zksync",
] as const;

export const DIFFICULTY_LEVELS = ["easy", "medium", "hard"] as const;

export type VulnerabilityType = (typeof VULNERABILITY_TYPES)[number];

export type Network = (typeof NETWORKS)[number];

export type Difficulty = (typeof DIFFICULTY_LEVELS)[number];

export interface VulnerabilitySpec {
  projectName: string;
  vulnerabilityType: VulnerabilityType;
  network: Network;
  lossAmountUsd: number;
  blockNumber?: number;
  date?: Date;
  contractPath?: string;
  testCommand?: string;
  referenceLinks: readonly string[];
  vulnerabilityId?: string;
  attackerAddress?: string;
  vulnerableContract?: string;
  transactionHash?: string;
}

export type ResolvedVulnerabilitySpec = VulnerabilitySpec & {
  contractPath: string;
  testCommand: string;
};

export function isVulnerabilityType(value: unknown): value is VulnerabilityType {
  return typeof value === "string" && (VULNERABILITY_TYPES as readonly string[]).includes(value);
}

export function isNetwork(value: unknown): value is Network {
  return typeof value === "string" && (NETWORKS as readonly string[]).includes(value);
}

export function isDifficulty(value: unknown): value is Difficulty {
  return typeof value === "string" && (DIFFICULTY_LEVELS as readonly string[]).includes(value);
}

// Foundry's rpc_endpoints aliases map to these variable names in the corpus checkout.
export const NETWORK_RPC_ENV = {
  mainnet: "ETH_RPC_URL",
  arbitrum: "ARBITRUM_RPC_URL",
  optimism: "OPTIMISM_RPC_URL",
  polygon: "POLYGON_RPC_URL",
  bsc: "BSC_RPC_URL",
  base: "BASE_RPC_URL",
  avalanche: "AVALANCHE_RPC_URL",
  fantom: "FANTOM_RPC_URL",
  gnosis: "GNOSIS_RPC_URL",
  blast: "BLAST_RPC_URL",
  mantle: "MANTLE_RPC_URL",
  linea: "LINEA_RPC_URL",
  scroll: "SCROLL_RPC_URL",
  zksync: "ZKSYNC_RPC_URL",
} as const satisfies Record<Network, string>;
