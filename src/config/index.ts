import { z } from 'zod';
import dotenv from 'dotenv';
import { getAddress, isAddress, type Address } from 'viem';
import { MARKET_CONSTANTS, ZERO_ADDRESS } from './market.js';

dotenv.config();

const uintString = z
  .union([z.string().regex(/^\d+$/, 'must be an unsigned integer'), z.number().int().nonnegative()])
  .transform((value) => BigInt(value));

// "<address>:<amount>" funding entry for the in-memory ledger
const balanceEntry = z
  .string()
  .regex(/^0x[0-9a-fA-F]{40}:\d+$/, 'must be <address>:<amount>')
  .transform((entry): [Address, bigint] => {
    const [account, amount] = entry.split(':');
    return [getAddress(account), BigInt(amount)];
  });

// Configuration schema validation
const ConfigSchema = z.object({
  // Network
  network: z.enum(['base-sepolia', 'base-mainnet']).default('base-sepolia'),

  // RPC URLs
  baseSepoliaRpc: z.string().default('https://sepolia.base.org'),
  baseMainnetRpc: z.string().default('https://mainnet.base.org'),

  // Block height source
  clockMode: z.enum(['manual', 'chain']).default('manual'),

  // Protocol
  ownerAddress: z
    .string()
    .refine((value): value is Address => isAddress(value), 'must be an address')
    .default(ZERO_ADDRESS),
  minStake: uintString
    .default(MARKET_CONSTANTS.DEFAULT_MIN_STAKE.toString())
    .refine((value) => value > 0n, 'must be positive'),
  protocolFeePercent: uintString
    .default(MARKET_CONSTANTS.DEFAULT_FEE_PERCENT.toString())
    .refine((value) => value <= MARKET_CONSTANTS.MAX_FEE_PERCENT, 'must be between 0 and 100'),

  // Starting balances of the in-memory stake ledger
  initialBalances: z
    .string()
    .default('')
    .transform((value) =>
      value
        .split(',')
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0)
    )
    .pipe(z.array(balanceEntry)),

  // API
  apiPort: z.coerce.number().int().min(0).max(65535).default(3000),

  // Persistence
  persistState: z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform((value) => value === 'true' || value === '1'),
  stateFile: z.string().default('market-state.json'),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const config = ConfigSchema.parse({
    network: env.NETWORK_ID,
    baseSepoliaRpc: env.BASE_SEPOLIA_RPC,
    baseMainnetRpc: env.BASE_MAINNET_RPC,
    clockMode: env.CLOCK_MODE,
    ownerAddress: env.OWNER_ADDRESS,
    minStake: env.MIN_STAKE,
    protocolFeePercent: env.PROTOCOL_FEE_PERCENT,
    initialBalances: env.INITIAL_BALANCES,
    apiPort: env.API_PORT,
    persistState: env.PERSIST_STATE,
    stateFile: env.STATE_FILE,
  });

  return config;
}

/**
 * Get current configuration
 */
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reload configuration
 */
export function reloadConfig(): Config {
  configInstance = loadConfig();
  return configInstance;
}

/**
 * RPC URL for a network, taken from the given configuration
 */
export function getRpcUrl(config: Config = getConfig(), network: Config['network'] = config.network): string {
  return network === 'base-mainnet' ? config.baseMainnetRpc : config.baseSepoliaRpc;
}
