/**
 * Market State Store
 *
 * Ordered key/value maps keyed by composite keys, plus the global counters
 * and protocol settings. Every state-changing operation runs through
 * `transaction()`:
 * - operations are serialized on one queue, in call order
 * - writes are staged in an overlay and committed only on an ok result
 * - a failed result or a thrown error discards the overlay
 */

import { isAddress, type Address } from 'viem';
import { MARKET_CONSTANTS, ZERO_ADDRESS } from '../config/market.js';
import type { Result } from './errors.js';
import type {
  MarketSettings,
  Prediction,
  PredictionKey,
  Reputation,
  Round,
  RoundKey,
  SentimentAggregate,
} from './types.js';

export interface MarketCounters {
  /** Number of rounds created; also the last allocated round id */
  totalRounds: bigint;
  totalVolume: bigint;
}

/**
 * Serializable copy of the whole store
 */
export interface MarketSnapshot {
  rounds: Array<[string, Round]>;
  predictions: Array<[string, Prediction]>;
  aggregates: Array<[string, SentimentAggregate]>;
  reputations: Array<[string, Reputation]>;
  counters: MarketCounters;
  settings: MarketSettings;
}

export interface MarketReader {
  getRound(key: RoundKey): Round | undefined;
  getPrediction(key: PredictionKey): Prediction | undefined;
  getAggregate(key: RoundKey): SentimentAggregate | undefined;
  getReputation(predictor: Address): Reputation | undefined;
  listPredictions(key: RoundKey): Array<[Address, Prediction]>;
  getCounters(): MarketCounters;
  getSettings(): MarketSettings;
}

export interface MarketWriter extends MarketReader {
  putRound(key: RoundKey, round: Round): void;
  putPrediction(key: PredictionKey, prediction: Prediction): void;
  putAggregate(key: RoundKey, aggregate: SentimentAggregate): void;
  putReputation(predictor: Address, reputation: Reputation): void;
  setCounters(counters: MarketCounters): void;
  setSettings(settings: MarketSettings): void;
}

// Keys are JSON tuples so no asset id can collide with another key's prefix
export function roundKeyOf(key: RoundKey): string {
  return JSON.stringify([key.assetId, key.roundId.toString()]);
}

export function predictionKeyOf(key: PredictionKey): string {
  return JSON.stringify([key.assetId, key.roundId.toString(), key.predictor.toLowerCase()]);
}

function predictionPrefixOf(key: RoundKey): string {
  return `${roundKeyOf(key).slice(0, -1)},`;
}

function identityKeyOf(predictor: Address): string {
  return predictor.toLowerCase();
}

function sortedEntries<V>(map: Map<string, V>): Array<[string, V]> {
  return [...map.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Staged writes over a base map; reads fall through to the base
 */
class Overlay<V> {
  private staged = new Map<string, V>();

  constructor(private readonly base: Map<string, V>) {}

  get(key: string): V | undefined {
    return this.staged.get(key) ?? this.base.get(key);
  }

  set(key: string, value: V): void {
    this.staged.set(key, value);
  }

  entriesWithPrefix(prefix: string): Array<[string, V]> {
    const merged = new Map<string, V>();
    for (const [key, value] of this.base) {
      if (key.startsWith(prefix)) merged.set(key, value);
    }
    for (const [key, value] of this.staged) {
      if (key.startsWith(prefix)) merged.set(key, value);
    }
    return sortedEntries(merged);
  }

  commit(): void {
    for (const [key, value] of this.staged) {
      this.base.set(key, value);
    }
    this.staged.clear();
  }
}

class StoreTransaction implements MarketWriter {
  private rounds: Overlay<Round>;
  private predictions: Overlay<Prediction>;
  private aggregates: Overlay<SentimentAggregate>;
  private reputations: Overlay<Reputation>;
  private counters: MarketCounters;
  private settings: MarketSettings;

  constructor(private readonly store: StateStore) {
    const tables = store.tables();
    this.rounds = new Overlay(tables.rounds);
    this.predictions = new Overlay(tables.predictions);
    this.aggregates = new Overlay(tables.aggregates);
    this.reputations = new Overlay(tables.reputations);
    this.counters = store.getCounters();
    this.settings = store.getSettings();
  }

  getRound(key: RoundKey): Round | undefined {
    return copy(this.rounds.get(roundKeyOf(key)));
  }

  getPrediction(key: PredictionKey): Prediction | undefined {
    return copy(this.predictions.get(predictionKeyOf(key)));
  }

  getAggregate(key: RoundKey): SentimentAggregate | undefined {
    return copy(this.aggregates.get(roundKeyOf(key)));
  }

  getReputation(predictor: Address): Reputation | undefined {
    return copy(this.reputations.get(identityKeyOf(predictor)));
  }

  listPredictions(key: RoundKey): Array<[Address, Prediction]> {
    return toPredictionList(this.predictions.entriesWithPrefix(predictionPrefixOf(key)));
  }

  getCounters(): MarketCounters {
    return { ...this.counters };
  }

  getSettings(): MarketSettings {
    return { ...this.settings };
  }

  putRound(key: RoundKey, round: Round): void {
    this.rounds.set(roundKeyOf(key), { ...round });
  }

  putPrediction(key: PredictionKey, prediction: Prediction): void {
    this.predictions.set(predictionKeyOf(key), { ...prediction });
  }

  putAggregate(key: RoundKey, aggregate: SentimentAggregate): void {
    this.aggregates.set(roundKeyOf(key), { ...aggregate });
  }

  putReputation(predictor: Address, reputation: Reputation): void {
    this.reputations.set(identityKeyOf(predictor), { ...reputation });
  }

  setCounters(counters: MarketCounters): void {
    this.counters = { ...counters };
  }

  setSettings(settings: MarketSettings): void {
    this.settings = { ...settings };
  }

  commit(): void {
    this.rounds.commit();
    this.predictions.commit();
    this.aggregates.commit();
    this.reputations.commit();
    this.store.replaceGlobals(this.counters, this.settings);
  }
}

function copy<V extends object>(value: V | undefined): V | undefined {
  return value === undefined ? undefined : { ...value };
}

function toPredictionList(entries: Array<[string, Prediction]>): Array<[Address, Prediction]> {
  return entries.flatMap<[Address, Prediction]>(([key, prediction]) => {
    const parts: unknown = JSON.parse(key);
    const predictor = Array.isArray(parts) ? parts[2] : undefined;
    return typeof predictor === 'string' && isAddress(predictor) ? [[predictor, { ...prediction }]] : [];
  });
}

export type CommitListener = (snapshot: MarketSnapshot) => void;

export class StateStore implements MarketReader {
  private rounds = new Map<string, Round>();
  private predictions = new Map<string, Prediction>();
  private aggregates = new Map<string, SentimentAggregate>();
  private reputations = new Map<string, Reputation>();
  private counters: MarketCounters = { totalRounds: 0n, totalVolume: 0n };
  private settings: MarketSettings;
  private queue: Promise<unknown> = Promise.resolve();
  private listeners: CommitListener[] = [];

  constructor(settings?: Partial<MarketSettings>) {
    this.settings = {
      owner: settings?.owner ?? ZERO_ADDRESS,
      minStake: settings?.minStake ?? MARKET_CONSTANTS.DEFAULT_MIN_STAKE,
      protocolFeePercent: settings?.protocolFeePercent ?? MARKET_CONSTANTS.DEFAULT_FEE_PERCENT,
    };
  }

  /**
   * Rebuild a store from a snapshot
   */
  static fromSnapshot(snapshot: MarketSnapshot): StateStore {
    const store = new StateStore(snapshot.settings);
    store.rounds = new Map(snapshot.rounds);
    store.predictions = new Map(snapshot.predictions);
    store.aggregates = new Map(snapshot.aggregates);
    store.reputations = new Map(snapshot.reputations);
    store.counters = { ...snapshot.counters };
    return store;
  }

  /**
   * Run one atomic, serialized state transition
   */
  transaction<T>(operation: (tx: MarketWriter) => Promise<Result<T>> | Result<T>): Promise<Result<T>> {
    const run = async (): Promise<Result<T>> => {
      const tx = new StoreTransaction(this);
      const result = await operation(tx);
      if (result.ok) {
        tx.commit();
        this.notify();
      }
      return result;
    };

    const next = this.queue.then(run, run);
    // Keep the queue alive after a rejected transition
    this.queue = next.catch(() => undefined);
    return next;
  }

  onCommit(listener: CommitListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  getRound(key: RoundKey): Round | undefined {
    return copy(this.rounds.get(roundKeyOf(key)));
  }

  getPrediction(key: PredictionKey): Prediction | undefined {
    return copy(this.predictions.get(predictionKeyOf(key)));
  }

  getAggregate(key: RoundKey): SentimentAggregate | undefined {
    return copy(this.aggregates.get(roundKeyOf(key)));
  }

  getReputation(predictor: Address): Reputation | undefined {
    return copy(this.reputations.get(identityKeyOf(predictor)));
  }

  listPredictions(key: RoundKey): Array<[Address, Prediction]> {
    const prefix = predictionPrefixOf(key);
    return toPredictionList(sortedEntries(this.predictions).filter(([k]) => k.startsWith(prefix)));
  }

  getCounters(): MarketCounters {
    return { ...this.counters };
  }

  getSettings(): MarketSettings {
    return { ...this.settings };
  }

  toSnapshot(): MarketSnapshot {
    return {
      rounds: sortedEntries(this.rounds),
      predictions: sortedEntries(this.predictions),
      aggregates: sortedEntries(this.aggregates),
      reputations: sortedEntries(this.reputations),
      counters: this.getCounters(),
      settings: this.getSettings(),
    };
  }

  /** @internal */
  tables(): {
    rounds: Map<string, Round>;
    predictions: Map<string, Prediction>;
    aggregates: Map<string, SentimentAggregate>;
    reputations: Map<string, Reputation>;
  } {
    return {
      rounds: this.rounds,
      predictions: this.predictions,
      aggregates: this.aggregates,
      reputations: this.reputations,
    };
  }

  /** @internal */
  replaceGlobals(counters: MarketCounters, settings: MarketSettings): void {
    this.counters = { ...counters };
    this.settings = { ...settings };
  }

  private notify(): void {
    if (this.listeners.length === 0) return;
    const snapshot = this.toSnapshot();
    // The transition is already committed; a listener cannot undo it
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (error) {
        console.error('Commit listener failed:', error);
      }
    }
  }
}
