/**
 * Append-only record of every healing attempt.
 *
 * Persisted as a JSON array that is rewritten atomically on each append. An
 * append that cannot be written is logged and otherwise ignored.
 */

import { z } from "zod";
import { healLog, errorMessage } from "./logger";
import { HealingRecord, type HealingSource } from "./types";
import { readJson, round, writeAtomic } from "./utils";

const HealingRecords = z.array(HealingRecord);

export interface HealingStats {
  totalHealings: number;
  bySource: Record<HealingSource, number>;
  successRate: number;
  avgLatencyMs: number;
  cacheHitRate: number;
}

export class HealingLog {
  private entries: HealingRecord[] = [];
  private loading: Promise<void> | null = null;
  private writes: Promise<void> = Promise.resolve();

  /** @param file JSON file to persist to; omit to keep records in memory only */
  constructor(readonly file?: string) {}

  private ensureLoaded(): Promise<void> {
    this.loading ??= this.load();
    return this.loading;
  }

  private async load(): Promise<void> {
    if (!this.file) return;
    const result = await readJson(this.file, HealingRecords);
    if (result.status === "ok") {
      this.entries = result.value;
    } else if (result.status === "invalid") {
      healLog.storeFailed(this.file, "read", `${result.error}; starting a new log`);
    }
  }

  async append(record: HealingRecord): Promise<void> {
    await this.ensureLoaded();
    this.entries.push(Object.freeze({ ...record }));
    const file = this.file;
    if (!file) return;
    const snapshot = [...this.entries];
    this.writes = this.writes.then(() =>
      writeAtomic(file, snapshot).catch((err: unknown) => {
        healLog.storeFailed(file, "write", errorMessage(err));
      }),
    );
    await this.writes;
  }

  async records(): Promise<HealingRecord[]> {
    await this.ensureLoaded();
    return [...this.entries];
  }

  async recent(limit = 5): Promise<HealingRecord[]> {
    const all = await this.records();
    return limit > 0 ? all.slice(-limit) : [];
  }

  async stats(): Promise<HealingStats> {
    const all = await this.records();
    const bySource: Record<HealingSource, number> = { cache: 0, ai: 0, fallback: 0, vision: 0, none: 0 };
    if (all.length === 0) {
      return { totalHealings: 0, bySource, successRate: 0, avgLatencyMs: 0, cacheHitRate: 0 };
    }

    let successes = 0;
    let totalLatency = 0;
    for (const r of all) {
      bySource[r.healingSource]++;
      if (r.success) successes++;
      totalLatency += r.latencyMs;
    }

    const total = all.length;
    return {
      totalHealings: total,
      bySource,
      successRate: round((successes / total) * 100, 2),
      avgLatencyMs: round(totalLatency / total, 2),
      cacheHitRate: round((bySource.cache / total) * 100, 2),
    };
  }
}
