/**
 * Block height sources
 *
 * Round windows are measured in blocks. The manual clock drives local runs
 * and tests; the chain clock follows the head of a Base network.
 */

import { createPublicClient, http, type PublicClient } from 'viem';
import { base, baseSepolia } from 'viem/chains';

export interface BlockClock {
  getBlockHeight(): Promise<bigint>;
}

export class ManualBlockClock implements BlockClock {
  private height: bigint;

  constructor(startHeight: bigint = 0n) {
    this.height = startHeight;
  }

  async getBlockHeight(): Promise<bigint> {
    return this.height;
  }

  /**
   * Mine `blocks` empty blocks
   */
  advance(blocks: bigint = 1n): bigint {
    if (blocks < 0n) {
      throw new RangeError('cannot move the clock backwards');
    }
    this.height += blocks;
    return this.height;
  }

  setHeight(height: bigint): void {
    if (height < this.height) {
      throw new RangeError(`height ${height} is behind current height ${this.height}`);
    }
    this.height = height;
  }
}

export class ChainBlockClock implements BlockClock {
  constructor(private readonly client: Pick<PublicClient, 'getBlockNumber'>) {}

  static forNetwork(network: 'base-sepolia' | 'base-mainnet', rpcUrl: string): ChainBlockClock {
    const chain = network === 'base-mainnet' ? base : baseSepolia;
    const client = createPublicClient({
      chain,
      transport: http(rpcUrl),
    });
    return new ChainBlockClock(client);
  }

  async getBlockHeight(): Promise<bigint> {
    return this.client.getBlockNumber({ cacheTime: 0 });
  }
}
