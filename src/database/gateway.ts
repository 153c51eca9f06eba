/**
 * Persistence Gateway
 *
 * Durable storage for server aggregates, keyed by server name. Surrogate
 * ids are assigned by the store on first insert and written back onto the
 * config, stat and test objects.
 */

import type { Server } from "../model";

export interface PersistenceGateway {
  /**
   * Full load: every server with its stats and tests, ids populated
   */
  readAll(): Promise<Server[]>;

  /**
   * One server by name, or null
   */
  readByName(name: string): Promise<Server | null>;

  /**
   * Insert the config when it has no id, update it by id otherwise.
   * Stats and tests without an id are inserted; ones with an id are left
   * alone. All-or-nothing per server.
   */
  upsert(server: Server): Promise<void>;

  /**
   * Remove a server and all of its stats and tests. Unknown names are a no-op.
   */
  deleteByName(name: string): Promise<void>;
}
