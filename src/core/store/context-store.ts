/**
 * ContextStore - shared key/value space flowing through all pipeline stages.
 *
 * Current values plus an append-only history of every write. A key's current
 * value is always its most recent history entry; history is never pruned
 * within a run. Values are copied and deep-frozen on write, so nothing read
 * back from the store can change what it holds.
 */

import { ContextOwnershipError } from "../errors/pipeline-errors";
import { JsonValue, freezeJson } from "../models/json";

/** Producer name used for writes made by the pipeline itself. */
export const PIPELINE_PRODUCER = "pipeline";

/** Key under which the run's initial input is written. */
export const INPUT_KEY = "input";

export type ContextWriteOperation = "set" | "append";

export interface ContextEntry {
  key: string;
  value: JsonValue;
  producer: string;
  sequence: number;
  operation: ContextWriteOperation;
  recordedAt: Date;
}

/**
 * Read-only view handed to stages.
 */
export interface ContextReader {
  get(key: string): JsonValue | undefined;
  has(key: string): boolean;
  allKeys(): Set<string>;
}

/**
 * Frozen point-in-time view of the current values.
 */
export class ContextSnapshot implements ContextReader {
  private readonly values: ReadonlyMap<string, JsonValue>;

  constructor(values: Map<string, JsonValue>, readonly sequence: number) {
    this.values = new Map(values);
  }

  get(key: string): JsonValue | undefined {
    return this.values.get(key);
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  allKeys(): Set<string> {
    return new Set(this.values.keys());
  }
}

export class ContextStore implements ContextReader {
  private current = new Map<string, JsonValue>();
  private history = new Map<string, ContextEntry[]>();
  private owners = new Map<string, string>();
  private sequence = 0;

  get(key: string): JsonValue | undefined {
    return this.current.get(key);
  }

  has(key: string): boolean {
    return this.current.has(key);
  }

  allKeys(): Set<string> {
    return new Set(this.current.keys());
  }

  set(key: string, value: JsonValue, producer: string = PIPELINE_PRODUCER): void {
    this.assertWritable(key, producer);
    this.record(key, value, producer, "set");
  }

  /**
   * Record an accumulating write. Updates the current value like `set`; the
   * entry is marked so history readers can tell the two apart.
   */
  append(key: string, value: JsonValue, producer: string = PIPELINE_PRODUCER): void {
    this.assertWritable(key, producer);
    this.record(key, value, producer, "append");
  }

  /**
   * Write several keys as one unit: either every write lands or none does.
   */
  commit(producer: string, writes: Record<string, JsonValue>): string[] {
    const keys = Object.keys(writes);
    for (const key of keys) {
      this.assertWritable(key, producer);
    }
    for (const key of keys) {
      this.record(key, writes[key], producer, "set");
    }
    return keys;
  }

  historyOf(key: string): JsonValue[] {
    return this.entriesOf(key).map((e) => e.value);
  }

  entriesOf(key: string): ContextEntry[] {
    return (this.history.get(key) ?? []).map((e) => ({ ...e }));
  }

  /**
   * Every history entry across all keys, in write order.
   */
  log(): ContextEntry[] {
    return Array.from(this.history.values())
      .flat()
      .sort((a, b) => a.sequence - b.sequence);
  }

  /**
   * Declare the single stage allowed to write a key.
   */
  declareOwner(key: string, stageName: string): void {
    const existing = this.owners.get(key);
    if (existing && existing !== stageName) {
      throw new ContextOwnershipError(key, existing, stageName);
    }
    this.owners.set(key, stageName);
  }

  ownerOf(key: string): string | undefined {
    return this.owners.get(key);
  }

  snapshot(): ContextSnapshot {
    return new ContextSnapshot(this.current, this.sequence);
  }

  toJSON(): Record<string, JsonValue> {
    return Object.fromEntries(this.current);
  }

  private assertWritable(key: string, producer: string): void {
    const owner = this.owners.get(key);
    if (owner !== undefined && owner !== producer) {
      throw new ContextOwnershipError(key, owner, producer);
    }
  }

  private record(
    key: string,
    value: JsonValue,
    producer: string,
    operation: ContextWriteOperation
  ): void {
    const stored = freezeJson(value);
    const entry: ContextEntry = {
      key,
      value: stored,
      producer,
      sequence: ++this.sequence,
      operation,
      recordedAt: new Date(),
    };
    const entries = this.history.get(key) ?? [];
    entries.push(entry);
    this.history.set(key, entries);
    this.current.set(key, stored);
  }
}
