import { vi } from 'vitest';
import { baseSepolia } from 'viem/chains';

/**
 * Mock Base Sepolia public client exposing only what the block clock reads
 */
export function createMockPublicClient(blockNumber: bigint = 1000n) {
  let current = blockNumber;

  return {
    chain: baseSepolia,
    getBlockNumber: vi.fn(async (_args?: { cacheTime?: number }) => current),
    mine(blocks: bigint = 1n): void {
      current += blocks;
    },
  };
}

/**
 * Public client whose RPC calls fail
 */
export function createFailingPublicClient(message: string = 'Network error: Failed to connect to Base Sepolia') {
  return {
    chain: baseSepolia,
    getBlockNumber: vi.fn(async (_args?: { cacheTime?: number }): Promise<bigint> => {
      throw new Error(message);
    }),
  };
}
