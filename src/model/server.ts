/**
 * Server aggregate: one config plus its stat and user-test series.
 * Merged and persisted as a unit, looked up by `config.name`.
 */

import { createLogger, type Logger } from "../lib/logger";
import {
  conflictingStatError,
  conflictingTestError,
  isContextError,
  redundantStatError,
} from "../utils/errors";
import type { ColumnIndex } from "./columns";
import { CONFIG_COLUMNS, ServerConfig } from "./config";
import { PeriodicStat, STAT_COLUMNS } from "./stat";
import { Timeline } from "./timeline";
import type { UserTest } from "./user-test";

const defaultLog = createLogger("model");

interface ServerSnapshot {
  config: ServerConfig;
  stats: Timeline<PeriodicStat>;
  tests: Timeline<UserTest>;
}

export class Server {
  config: ServerConfig;
  stats: Timeline<PeriodicStat>;
  tests: Timeline<UserTest>;

  constructor(config: ServerConfig, stats: Iterable<PeriodicStat> = [], tests: Iterable<UserTest> = []) {
    this.config = config;
    this.stats = new Timeline(stats);
    this.tests = new Timeline(tests);
  }

  get name(): string {
    return this.config.name;
  }

  /** Every heading a snapshot must carry, and nothing else */
  static requiredColumns(): Set<string> {
    return new Set([...Object.keys(CONFIG_COLUMNS), ...Object.keys(STAT_COLUMNS)]);
  }

  /** One config and a single stat keyed at `savedAt` */
  static fromRow(columns: ColumnIndex, row: readonly string[], savedAt: Date): Server {
    return new Server(ServerConfig.fromRow(columns, row), [PeriodicStat.fromRow(columns, row, savedAt)]);
  }

  lastStat(): PeriodicStat | undefined {
    return this.stats.last();
  }

  lastTest(): UserTest | undefined {
    return this.tests.last();
  }

  /**
   * Adds a stat to the series. Returns false when an equal stat already
   * sits at the same timestamp.
   *
   * @throws CONFLICTING_STAT when a different stat sits at the same timestamp
   * @throws REDUNDANT_STAT when the chronological neighbour on either side has the same metrics
   */
  addStat(stat: PeriodicStat): boolean {
    const existing = this.stats.get(stat.savedAt);
    if (existing) {
      if (!existing.sameMetrics(stat)) {
        throw conflictingStatError(this.name, stat.savedAt);
      }
      return false;
    }

    const { previous, next } = this.stats.neighbours(stat.savedAt);
    if (previous?.sameMetrics(stat) || next?.sameMetrics(stat)) {
      throw redundantStatError(this.name, stat.savedAt);
    }

    this.stats.set(stat);
    return true;
  }

  /**
   * Adds a user test. Every distinct probe is kept.
   *
   * @throws CONFLICTING_TEST when a different test sits at the same timestamp
   */
  addTest(test: UserTest): boolean {
    const existing = this.tests.get(test.savedAt);
    if (existing) {
      if (!existing.sameResult(test)) {
        throw conflictingTestError(this.name, test.savedAt);
      }
      return false;
    }
    this.tests.set(test);
    return true;
  }

  /**
   * Merges config, stats and tests from `other`. Config and stat errors
   * restore the whole aggregate before rethrowing; a conflicting test is
   * logged and skipped.
   */
  mergeFrom(other: Server, log: Logger = defaultLog): boolean {
    const snapshot = this.snapshot();

    let changed: boolean;
    try {
      changed = this.config.mergeFrom(other.config);
      for (const stat of other.stats) {
        if (this.addStat(stat)) changed = true;
      }
    } catch (error) {
      this.restore(snapshot);
      throw error;
    }

    for (const test of other.tests) {
      try {
        if (this.addTest(test)) changed = true;
      } catch (error) {
        if (!isContextError(error, "CONFLICTING_TEST")) {
          this.restore(snapshot);
          throw error;
        }
        log.warn("Skipping conflicting user test", { server: this.name, ...error.context });
      }
    }

    return changed;
  }

  clone(): Server {
    return new Server(this.config.clone(), this.stats, this.tests);
  }

  private snapshot(): ServerSnapshot {
    return {
      config: this.config.clone(),
      stats: this.stats.clone(),
      tests: this.tests.clone(),
    };
  }

  private restore(snapshot: ServerSnapshot): void {
    this.config = snapshot.config;
    this.stats = snapshot.stats;
    this.tests = snapshot.tests;
  }
}
