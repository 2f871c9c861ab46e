import * as fs from "node:fs";
import * as path from "node:path";
import { gunzipSync, gzipSync } from "node:zlib";
import type Database from "better-sqlite3";
import { contentDigest, isDigest } from "./digest.js";
import { errorMessage, StoreError } from "./errors.js";
import { openDb } from "./schema.js";
import type {
  CaptureReference,
  ContentStore,
  DigestMismatch,
  Logger,
  StoreStats,
  StoredCapture,
} from "./types.js";

const DB_FILE = "store.db";
const DATA_DIR = "data";
const FILE_SUFFIX = ".gz";

export interface RecoveryReport {
  /** File rows dropped because their bytes were missing or unreadable. */
  missingFiles: number;
  /** Byte files with no row. */
  orphanFiles: number;
  /** Leftover temp files from interrupted writes. */
  tempFiles: number;
}

interface FileRow {
  id: number;
  digest: string;
  path: string;
}

interface CaptureRow {
  post_id: string;
  capture_timestamp: string;
  capture_url: string;
  user_screen_name: string | null;
  digest: string;
  path: string;
}

/**
 * Digest-addressed store of captured bytes plus the links from posts to
 * those bytes. Every method body runs synchronously, so a digest's existence
 * check and its insertion cannot interleave with another caller's.
 *
 * Bytes are written to a temp file, synced and renamed into place before
 * their row is inserted: a row always has its bytes. An interrupted write
 * leaves at most a temp or orphan file, which `open` removes along with rows
 * whose file is empty or does not decompress.
 */
export class SqliteContentStore implements ContentStore {
  readonly dir: string;
  private readonly dataDir: string;
  private readonly db: Database.Database;
  private readonly logger: Logger;
  private closed = false;

  private constructor(dir: string, db: Database.Database, logger: Logger) {
    this.dir = dir;
    this.dataDir = path.join(dir, DATA_DIR);
    this.db = db;
    this.logger = logger;
  }

  static open(dir: string, logger: Logger): SqliteContentStore {
    let db: Database.Database;
    try {
      fs.mkdirSync(path.join(dir, DATA_DIR), { recursive: true });
      db = openDb(path.join(dir, DB_FILE));
    } catch (err) {
      throw new StoreError(
        `Cannot open content store at ${dir}: ${errorMessage(err)}`,
        err,
      );
    }
    const store = new SqliteContentStore(dir, db, logger);
    const report = store.recover();
    if (report.missingFiles + report.orphanFiles + report.tempFiles > 0) {
      logger.warn("Recovered content store", { ...report });
    }
    return store;
  }

  pathFor(digest: string): string {
    return path.join(this.dataDir, `${digest}${FILE_SUFFIX}`);
  }

  async lookup(postId: string, timestamp: string): Promise<string | undefined> {
    return this.guard("lookup", () => {
      const row = this.db
        .prepare<[string, string], { digest: string }>(
          `SELECT f.digest FROM post_file pf
             JOIN post p ON p.id = pf.post_id
             JOIN file f ON f.id = pf.file_id
           WHERE p.post_id = ? AND pf.capture_timestamp = ?`,
        )
        .get(postId, timestamp);
      return row?.digest;
    });
  }

  async has(digest: string): Promise<boolean> {
    return this.guard("has", () => this.findFile(digest) !== undefined);
  }

  async put(
    digest: string,
    bytes: Buffer,
    discoveredBy?: string,
  ): Promise<string> {
    return this.guard("put", () => {
      if (!isDigest(digest)) {
        throw new StoreError(`Not a content digest: ${digest}`);
      }
      const existing = this.findFile(digest);
      if (existing) return this.pathFor(existing.digest);

      const target = this.pathFor(digest);
      const tmp = `${target}.${process.pid}.tmp`;
      writeSynced(tmp, gzipSync(bytes));
      fs.renameSync(tmp, target);
      this.db
        .prepare<[string, string, number, string | null]>(
          `INSERT INTO file (digest, path, size, primary_post_id)
           VALUES (?, ?, ?, ?)`,
        )
        .run(
          digest,
          path.join(DATA_DIR, `${digest}${FILE_SUFFIX}`),
          bytes.length,
          discoveredBy ?? null,
        );
      this.logger.debug("Stored content", { digest, size: bytes.length });
      return target;
    });
  }

  async record(
    postId: string,
    capture: Pick<CaptureReference, "timestamp" | "captureUrl" | "screenName">,
    digest: string,
  ): Promise<void> {
    this.guard("record", () => {
      const link = this.db.transaction(() => {
        const file = this.findFile(digest);
        if (!file) {
          throw new StoreError(
            `Cannot link ${postId} to unknown digest ${digest}`,
          );
        }
        this.db
          .prepare<[string]>("INSERT OR IGNORE INTO post (post_id) VALUES (?)")
          .run(postId);
        this.db
          .prepare<[number, string, string, string | null, string]>(
            `INSERT OR IGNORE INTO post_file (post_id, file_id,
               capture_timestamp, capture_url, user_screen_name)
             SELECT id, ?, ?, ?, ? FROM post WHERE post_id = ?`,
          )
          .run(
            file.id,
            capture.timestamp,
            capture.captureUrl,
            capture.screenName ?? null,
            postId,
          );
      });
      link();
    });
  }

  async read(digest: string): Promise<Buffer | undefined> {
    return this.guard("read", () => {
      if (!this.findFile(digest)) return undefined;
      return gunzipSync(fs.readFileSync(this.pathFor(digest)));
    });
  }

  async lookupPost(postId: string): Promise<StoredCapture[]> {
    return this.guard("lookupPost", () =>
      this.db
        .prepare<[string], CaptureRow>(
          `SELECT p.post_id, pf.capture_timestamp, pf.capture_url,
                  pf.user_screen_name, f.digest, f.path
             FROM post_file pf
             JOIN post p ON p.id = pf.post_id
             JOIN file f ON f.id = pf.file_id
           WHERE p.post_id = ?
           ORDER BY pf.capture_timestamp`,
        )
        .all(postId)
        .map((row) => this.toStoredCapture(row)),
    );
  }

  /** Every post-to-content link, ordered by post and capture time. */
  async captures(): Promise<StoredCapture[]> {
    return this.guard("captures", () =>
      this.db
        .prepare<[], CaptureRow>(
          `SELECT p.post_id, pf.capture_timestamp, pf.capture_url,
                  pf.user_screen_name, f.digest, f.path
             FROM post_file pf
             JOIN post p ON p.id = pf.post_id
             JOIN file f ON f.id = pf.file_id
           ORDER BY p.post_id, pf.capture_timestamp`,
        )
        .all()
        .map((row) => this.toStoredCapture(row)),
    );
  }

  async stats(): Promise<StoreStats> {
    return this.guard("stats", () => {
      const files = this.db
        .prepare<[], { n: number; bytes: number | null }>(
          "SELECT COUNT(*) AS n, SUM(size) AS bytes FROM file",
        )
        .get();
      const posts = this.db
        .prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM post")
        .get();
      const links = this.db
        .prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM post_file")
        .get();
      return {
        files: files?.n ?? 0,
        posts: posts?.n ?? 0,
        links: links?.n ?? 0,
        bytes: files?.bytes ?? 0,
      };
    });
  }

  /** Recomputes the digest of every stored file. */
  async verify(): Promise<DigestMismatch[]> {
    return this.guard("verify", () => {
      const mismatches: DigestMismatch[] = [];
      const rows = this.db
        .prepare<[], FileRow>(
          "SELECT id, digest, path FROM file ORDER BY digest",
        )
        .all();
      for (const row of rows) {
        const actual = this.digestOnDisk(row.digest);
        if (actual !== row.digest) {
          mismatches.push({ digest: row.digest, actual });
        }
      }
      return mismatches;
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.db.close();
  }

  /**
   * Removes rows whose bytes are missing or unreadable, bytes without rows
   * and temp files. An unreadable file is deleted so a later put rewrites it.
   */
  recover(): RecoveryReport {
    return this.guard("recover", () => {
      const report: RecoveryReport = {
        missingFiles: 0,
        orphanFiles: 0,
        tempFiles: 0,
      };

      const rows = this.db
        .prepare<[], FileRow>("SELECT id, digest, path FROM file")
        .all();
      const known = new Set<string>();
      const dropLinks = this.db.prepare<[number]>(
        "DELETE FROM post_file WHERE file_id = ?",
      );
      const dropFile = this.db.prepare<[number]>(
        "DELETE FROM file WHERE id = ?",
      );
      const dropMissing = this.db.transaction((ids: number[]) => {
        for (const id of ids) {
          dropLinks.run(id);
          dropFile.run(id);
        }
      });

      const missing: number[] = [];
      for (const row of rows) {
        const filePath = this.pathFor(row.digest);
        if (isReadable(filePath)) {
          known.add(row.digest);
          continue;
        }
        fs.rmSync(filePath, { force: true });
        missing.push(row.id);
      }
      dropMissing(missing);
      report.missingFiles = missing.length;

      for (const name of fs.readdirSync(this.dataDir)) {
        const full = path.join(this.dataDir, name);
        if (name.endsWith(".tmp")) {
          fs.rmSync(full, { force: true });
          report.tempFiles++;
        } else if (name.endsWith(FILE_SUFFIX)) {
          const digest = name.slice(0, -FILE_SUFFIX.length);
          if (!known.has(digest)) {
            fs.rmSync(full, { force: true });
            report.orphanFiles++;
          }
        }
      }
      return report;
    });
  }

  private digestOnDisk(digest: string): string | null {
    const filePath = this.pathFor(digest);
    if (!fs.existsSync(filePath)) return null;
    try {
      return contentDigest(gunzipSync(fs.readFileSync(filePath)));
    } catch (err) {
      this.logger.warn("Unreadable content file", {
        digest,
        error: errorMessage(err),
      });
      return null;
    }
  }

  private findFile(digest: string): FileRow | undefined {
    return this.db
      .prepare<[string], FileRow>(
        "SELECT id, digest, path FROM file WHERE digest = ?",
      )
      .get(digest);
  }

  private toStoredCapture(row: CaptureRow): StoredCapture {
    return {
      postId: row.post_id,
      timestamp: row.capture_timestamp,
      captureUrl: row.capture_url,
      digest: row.digest,
      path: this.pathFor(row.digest),
      screenName: row.user_screen_name,
    };
  }

  private guard<T>(operation: string, fn: () => T): T {
    if (this.closed) {
      throw new StoreError(`Content store is closed (${operation})`);
    }
    try {
      return fn();
    } catch (err) {
      if (err instanceof StoreError) throw err;
      throw new StoreError(
        `Content store ${operation} failed: ${errorMessage(err)}`,
        err,
      );
    }
  }
}

function writeSynced(filePath: string, data: Buffer): void {
  const fd = fs.openSync(filePath, "w");
  try {
    fs.writeSync(fd, data);
    fs.fsyncSync(fd);
  } finally {
    fs.closeSync(fd);
  }
}

/** True when the file exists, is non-empty and decompresses. */
function isReadable(filePath: string): boolean {
  if (!fs.existsSync(filePath) || fs.statSync(filePath).size === 0) {
    return false;
  }
  try {
    gunzipSync(fs.readFileSync(filePath));
    return true;
  } catch {
    return false;
  }
}
