import Loki from "lokijs";
import { createLogger, type Logger } from "@dockyard/resolver";

/**
 * The persisted enablement state of one plugin for one extension point.
 */
export type ManifestEntry = {
  ownerId: string;
  point: string;
  enabled: boolean;
  /** System entries are always enabled and cannot be disabled. */
  system: boolean;
};

/** A plugin/point pair seen during discovery. */
export type DiscoveredEntry = {
  ownerId: string;
  point: string;
  system?: boolean;
};

/**
 * Where the host reads and writes plugin enablement state. The resolver never
 * sees this; the host uses it to decide which providers to collect from.
 */
export interface ManifestStore {
  /**
   * Reconciles the manifest with what discovery found. New entries start
   * disabled unless they are system entries; entries that were not
   * discovered and are disabled are dropped.
   * @returns `true` if anything changed.
   */
  sync(discovered: Iterable<DiscoveredEntry>): boolean;
  /** `false` for unknown entries. */
  isEnabled(ownerId: string, point: string): boolean;
  /**
   * @returns `true` if the stored state changed.
   */
  setEnabled(ownerId: string, point: string, enabled: boolean): boolean;
  entries(): ManifestEntry[];
  save(): Promise<void>;
}

type ManifestRecord = ManifestEntry & { key: string };

function keyOf(ownerId: string, point: string): string {
  return `${ownerId.toLowerCase()}:${point}`;
}

function toEntry(record: ManifestRecord): ManifestEntry {
  return {
    ownerId: record.ownerId,
    point: record.point,
    enabled: record.enabled,
    system: record.system,
  };
}

/**
 * A `ManifestStore` kept in a LokiJS database, either in memory or in a file
 * that is loaded on open and autosaved.
 */
export class LokiManifestStore implements ManifestStore {
  private db: Loki;
  private records: Collection<ManifestRecord>;
  private readonly logger: Logger;

  // Use `createMemory()` or `createPersistent()`. The database must be loaded.
  private constructor(db: Loki, logger?: Logger) {
    this.db = db;
    this.logger = logger ?? createLogger("Manifest");
    this.records =
      db.getCollection<ManifestRecord>("manifest") ||
      db.addCollection<ManifestRecord>("manifest", {
        unique: ["key"],
        indices: ["ownerId"],
      });
  }

  /**
   * Creates a store that lives only as long as the process.
   */
  public static async createMemory(logger?: Logger): Promise<LokiManifestStore> {
    const db = new Loki("dockyard-manifest.db", { persistenceMethod: "memory" });
    return new LokiManifestStore(db, logger);
  }

  /**
   * Opens (or creates) a manifest file. The file is loaded before the promise
   * resolves and autosaved while the store is open.
   * @param filePath Path of the database file. Its directory must exist.
   */
  public static async createPersistent(
    filePath: string,
    logger?: Logger
  ): Promise<LokiManifestStore> {
    return new Promise((resolve, reject) => {
      const db = new Loki(filePath, {
        adapter: new Loki.LokiFsAdapter(),
        autoload: true,
        autosave: true,
        autosaveInterval: 4000,
        autoloadCallback: (err) => {
          if (err) return reject(err);

          resolve(new LokiManifestStore(db, logger));
        },
      });
    });
  }

  public sync(discovered: Iterable<DiscoveredEntry>): boolean {
    let changed = false;
    const seen = new Set<string>();

    for (const entry of discovered) {
      const key = keyOf(entry.ownerId, entry.point);
      if (seen.has(key)) continue;
      seen.add(key);

      const system = entry.system ?? false;
      const existing = this.records.findOne({ key });
      if (!existing) {
        this.records.insert({
          key,
          ownerId: entry.ownerId,
          point: entry.point,
          enabled: system,
          system,
        });
        this.logger.info(`Added manifest entry for ${key}.`);
        changed = true;
      } else if (existing.system !== system || (system && !existing.enabled)) {
        existing.system = system;
        existing.enabled = existing.enabled || system;
        this.records.update(existing);
        changed = true;
      }
    }

    const stale = this.records
      .find()
      .filter((record) => !seen.has(record.key) && !record.enabled);
    for (const record of stale) {
      this.records.remove(record);
      this.logger.info(`Removed stale manifest entry for ${record.key}.`);
      changed = true;
    }

    return changed;
  }

  public isEnabled(ownerId: string, point: string): boolean {
    return this.records.findOne({ key: keyOf(ownerId, point) })?.enabled ?? false;
  }

  public setEnabled(ownerId: string, point: string, enabled: boolean): boolean {
    const key = keyOf(ownerId, point);
    const record = this.records.findOne({ key });

    if (!record) {
      this.logger.warn(`No manifest entry for ${key}; nothing to change.`);
      return false;
    }
    if (record.system && !enabled) {
      this.logger.warn(`Manifest entry ${key} belongs to a system plugin and cannot be disabled.`);
      return false;
    }
    if (record.enabled === enabled) return false;

    record.enabled = enabled;
    this.records.update(record);
    this.logger.info(`Set enabled=${enabled} for ${key}.`);
    return true;
  }

  public entries(): ManifestEntry[] {
    return this.records.find().map(toEntry);
  }

  /**
   * Writes the database to its file. Does nothing for in-memory stores.
   */
  public async save(): Promise<void> {
    if (this.db.persistenceMethod === "memory" || !this.db.persistenceAdapter)
      return;

    return new Promise((resolve, reject) => {
      this.db.saveDatabase((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /**
   * Saves pending changes and stops the autosave timer.
   */
  public async close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}
