import { copyFileSync, existsSync, mkdirSync, readFileSync, renameSync, unlinkSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { logger } from "../logger.js";
import { StoreDocument, TrackingRecord } from "../types.js";
import { CURRENT_VERSION, emptyDocument, parseDocument } from "./schema.js";

export interface TrackingStore {
  loadAll(): StoreDocument;
  saveAll(document: StoreDocument): void;
  // Synchronous read-modify-write of the latest document.
  update<T>(mutate: (document: StoreDocument) => T): T;
}

export type JsonTrackingStoreOptions = {
  legacyOwnerId: string;
  now?: () => Date;
};

export type OwnedRecord = {
  ownerId: string;
  record: TrackingRecord;
};

export class JsonTrackingStore implements TrackingStore {
  readonly filePath: string;
  private readonly now: () => Date;

  constructor(
    filePath: string,
    private readonly options: JsonTrackingStoreOptions
  ) {
    this.now = options.now ?? (() => new Date());
    this.filePath = this.resolveWritablePath(filePath);
    mkdirSync(dirname(this.filePath), { recursive: true });
    if (!existsSync(this.filePath)) {
      this.saveAll(emptyDocument());
    }
  }

  loadAll(): StoreDocument {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.filePath, "utf8"));
    } catch (error) {
      if (isMissingFile(error)) {
        return emptyDocument();
      }
      logger.warn({ err: error, filePath: this.filePath }, "tracking store unreadable, resetting");
      return this.resetCorruptFile();
    }

    const parsed = parseDocument(raw, { ownerId: this.options.legacyOwnerId, now: this.now() });
    if (parsed.shape === "invalid") {
      logger.warn({ filePath: this.filePath, issue: parsed.issue }, "tracking store schema invalid, resetting");
      return this.resetCorruptFile();
    }

    if (parsed.shape === "legacy-flat") {
      logger.info({ filePath: this.filePath, ownerId: this.options.legacyOwnerId }, "upgrading legacy tracking store");
      if (parsed.skipped.length > 0) {
        logger.warn({ filePath: this.filePath, skipped: parsed.skipped }, "dropping unreadable legacy entries");
      }
    }
    return parsed.document;
  }

  saveAll(document: StoreDocument): void {
    const data: StoreDocument = { ...document, version: CURRENT_VERSION };
    const tempPath = `${this.filePath}.tmp`;
    writeFileSync(tempPath, JSON.stringify(data, null, 2), "utf8");
    renameSync(tempPath, this.filePath);
  }

  update<T>(mutate: (document: StoreDocument) => T): T {
    const document = this.loadAll();
    const result = mutate(document);
    this.saveAll(document);
    return result;
  }

  private resolveWritablePath(targetPath: string): string {
    if (this.canWriteTo(targetPath)) {
      return targetPath;
    }

    const fallbackPath = "/tmp/tracks.json";
    if (this.canWriteTo(fallbackPath)) {
      logger.warn(
        { requestedPath: targetPath, fallbackPath },
        "configured STATE_PATH is not writable; falling back to /tmp (non-persistent)"
      );
      return fallbackPath;
    }

    throw new Error(`STATE_PATH is not writable and fallback failed: requested=${targetPath}, fallback=${fallbackPath}`);
  }

  private canWriteTo(targetPath: string): boolean {
    try {
      mkdirSync(dirname(targetPath), { recursive: true });
      const probe = `${targetPath}.probe-${process.pid}-${Date.now()}`;
      writeFileSync(probe, "ok", "utf8");
      unlinkSync(probe);
      return true;
    } catch {
      return false;
    }
  }

  // Backs the bad file up once and replaces it with an empty document.
  private resetCorruptFile(): StoreDocument {
    const document = emptyDocument();
    if (!existsSync(this.filePath)) {
      return document;
    }
    try {
      const backupPath = `${this.filePath}.corrupt-${Date.now()}`;
      copyFileSync(this.filePath, backupPath);
      logger.warn({ backupPath }, "backed up corrupt tracking store");
      this.saveAll(document);
    } catch (error) {
      logger.warn({ err: error, filePath: this.filePath }, "failed to back up corrupt tracking store");
    }
    return document;
  }
}

export function listOwnerRecords(document: StoreDocument, ownerId: string): TrackingRecord[] {
  return Object.values(document.tracking[ownerId] ?? {});
}

export function listAllRecords(document: StoreDocument): OwnedRecord[] {
  return Object.entries(document.tracking).flatMap(([ownerId, records]) =>
    Object.values(records).map((record) => ({ ownerId, record }))
  );
}

export function findRecord(document: StoreDocument, ownerId: string, trackingNumber: string): TrackingRecord | undefined {
  return document.tracking[ownerId]?.[trackingNumber];
}

function isMissingFile(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}
