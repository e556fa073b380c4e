// ---------------------------------------------------------------------------
// PostgreSQL implementation of the aggregate store.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";
import { z } from "zod";
import { StoreError, StoreUnavailableError, errorMessage } from "../core/errors.js";
import type { ManuscriptRecord, RepositoryDefinition } from "../core/types.js";
import { withRetry } from "../orchestrator/retry.js";
import type {
  CatalogueReader,
  ManuscriptListItem,
  ManuscriptListQuery,
  ManuscriptPage,
  ManuscriptRef,
  ManuscriptStore,
  RepositoryDetail,
  RepositorySummary,
  ThumbnailRef,
  UpsertResult,
} from "./manuscript-store.js";
import {
  isConnectionFailure,
  isConstraintViolation,
  type SqlExecutor,
  type SqlPool,
} from "./pg.js";

// ── Row schemas ─────────────────────────────────────────────────────────────

// COUNT(*) and BIGINT arrive as strings from pg.
const int = z.coerce.number().int();
const nullableInt = z.coerce.number().int().nullable();

const IdRow = z.object({ id: int });
const CountRow = z.object({ count: int });
const UpsertRow = z.object({ id: int, inserted: z.boolean() });

const RefRow = z.object({
  id: int,
  shelfmark: z.string(),
  iiif_manifest_url: z.string(),
});

const ThumbnailRow = RefRow.extend({
  thumbnail_url: z.string().nullable(),
});

const RepositoryRow = z.object({
  id: int,
  name: z.string(),
  short_name: z.string(),
  logo_url: z.string().nullable(),
  catalogue_url: z.string().nullable(),
  manuscript_count: int,
});

const CollectionRow = z.object({ name: z.string(), count: int });

const ManuscriptRow = z.object({
  id: int,
  repository_id: int,
  shelfmark: z.string(),
  collection: z.string().nullable(),
  date_display: z.string().nullable(),
  date_start: nullableInt,
  date_end: nullableInt,
  contents: z.string().nullable(),
  provenance: z.string().nullable(),
  language: z.string().nullable(),
  folios: z.string().nullable(),
  iiif_manifest_url: z.string(),
  thumbnail_url: z.string().nullable(),
  source_url: z.string().nullable(),
  image_count: nullableInt,
  repository_name: z.string(),
  repository_short_name: z.string(),
});

function toRef(row: z.infer<typeof RefRow>): ManuscriptRef {
  return { id: row.id, shelfmark: row.shelfmark, iiifManifestUrl: row.iiif_manifest_url };
}

function toRepository(row: z.infer<typeof RepositoryRow>): RepositorySummary {
  return {
    id: row.id,
    name: row.name,
    shortName: row.short_name,
    logoUrl: row.logo_url,
    catalogueUrl: row.catalogue_url,
    manuscriptCount: row.manuscript_count,
  };
}

function toManuscript(row: z.infer<typeof ManuscriptRow>): ManuscriptListItem {
  return {
    id: row.id,
    repositoryId: row.repository_id,
    shelfmark: row.shelfmark,
    collection: row.collection,
    dateDisplay: row.date_display,
    dateStart: row.date_start,
    dateEnd: row.date_end,
    contents: row.contents,
    provenance: row.provenance,
    language: row.language,
    folios: row.folios,
    iiifManifestUrl: row.iiif_manifest_url,
    thumbnailUrl: row.thumbnail_url,
    sourceUrl: row.source_url,
    imageCount: row.image_count,
    repositoryName: row.repository_name,
    repositoryShortName: row.repository_short_name,
  };
}

// ── SQL ─────────────────────────────────────────────────────────────────────

const REPOSITORY_SELECT = `
  SELECT r.id, r.name, r.short_name, r.logo_url, r.catalogue_url,
         COUNT(m.id) AS manuscript_count
    FROM repositories r
    LEFT JOIN manuscripts m ON m.repository_id = r.id`;

const MANUSCRIPT_SELECT = `
  SELECT m.id, m.repository_id, m.shelfmark, m.collection, m.date_display,
         m.date_start, m.date_end, m.contents, m.provenance, m.language,
         m.folios, m.iiif_manifest_url, m.thumbnail_url, m.source_url,
         m.image_count, r.name AS repository_name,
         r.short_name AS repository_short_name
    FROM manuscripts m
    JOIN repositories r ON r.id = m.repository_id`;

const UPSERT_MANUSCRIPT = `
  INSERT INTO manuscripts (
    repository_id, shelfmark, collection, date_display, date_start, date_end,
    contents, provenance, language, folios, iiif_manifest_url, thumbnail_url,
    source_url, image_count
  )
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14)
  ON CONFLICT (repository_id, shelfmark) DO UPDATE SET
    collection = EXCLUDED.collection,
    date_display = EXCLUDED.date_display,
    date_start = EXCLUDED.date_start,
    date_end = EXCLUDED.date_end,
    contents = EXCLUDED.contents,
    provenance = EXCLUDED.provenance,
    language = EXCLUDED.language,
    folios = EXCLUDED.folios,
    iiif_manifest_url = EXCLUDED.iiif_manifest_url,
    thumbnail_url = EXCLUDED.thumbnail_url,
    source_url = EXCLUDED.source_url,
    image_count = EXCLUDED.image_count,
    updated_at = NOW()
  RETURNING id, (xmax = 0) AS inserted`;

// ── Store ───────────────────────────────────────────────────────────────────

export interface PgManuscriptStoreOptions {
  /** Retries after the first failed write. */
  writeRetries?: number;
  retryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export class PgManuscriptStore implements ManuscriptStore, CatalogueReader {
  private readonly pool: SqlPool;
  private readonly logger: Logger;
  private readonly writeRetries: number;
  private readonly retryDelayMs: number;
  private readonly sleep: ((ms: number) => Promise<void>) | undefined;

  constructor(pool: SqlPool, logger: Logger, options: PgManuscriptStoreOptions = {}) {
    this.pool = pool;
    this.logger = logger.child({ module: "pg-store" });
    this.writeRetries = options.writeRetries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.sleep = options.sleep;
  }

  // ── Write side ──────────────────────────────────────────────────────────

  async ensureRepository(definition: RepositoryDefinition): Promise<number> {
    const rows = await this.write("ensureRepository", async () => {
      const result = await this.pool.query(
        `INSERT INTO repositories (name, short_name, logo_url, catalogue_url)
         VALUES ($1, $2, $3, $4)
         ON CONFLICT (short_name) DO UPDATE SET
           name = EXCLUDED.name,
           logo_url = COALESCE(EXCLUDED.logo_url, repositories.logo_url),
           catalogue_url = COALESCE(EXCLUDED.catalogue_url, repositories.catalogue_url)
         RETURNING id`,
        [
          definition.name,
          definition.shortName,
          definition.logoUrl,
          definition.catalogueUrl,
        ],
      );
      return result.rows;
    });
    return IdRow.parse(rows[0]).id;
  }

  async findRepositoryId(shortName: string): Promise<number | null> {
    const rows = await this.read(
      "SELECT id FROM repositories WHERE short_name = $1",
      [shortName],
    );
    return rows.length > 0 ? IdRow.parse(rows[0]).id : null;
  }

  async findManuscript(repositoryId: number, shelfmark: string): Promise<number | null> {
    const rows = await this.read(
      "SELECT id FROM manuscripts WHERE repository_id = $1 AND shelfmark = $2",
      [repositoryId, shelfmark],
    );
    return rows.length > 0 ? IdRow.parse(rows[0]).id : null;
  }

  async findByManifestUrl(repositoryId: number, manifestUrl: string): Promise<ManuscriptRef[]> {
    const rows = await this.read(
      `SELECT id, shelfmark, iiif_manifest_url FROM manuscripts
        WHERE repository_id = $1 AND iiif_manifest_url = $2 ORDER BY id`,
      [repositoryId, manifestUrl],
    );
    return rows.map((row) => toRef(RefRow.parse(row)));
  }

  async findByShelfmarkPattern(repositoryId: number, pattern: string): Promise<ManuscriptRef[]> {
    const rows = await this.read(
      `SELECT id, shelfmark, iiif_manifest_url FROM manuscripts
        WHERE repository_id = $1 AND shelfmark ~ $2 ORDER BY id`,
      [repositoryId, pattern],
    );
    return rows.map((row) => toRef(RefRow.parse(row)));
  }

  /** One transaction per item: a crash never leaves half a row visible. */
  async upsertManuscript(record: ManuscriptRecord): Promise<UpsertResult> {
    const rows = await this.write("upsertManuscript", () =>
      this.transaction(async (client) => {
        const result = await client.query(UPSERT_MANUSCRIPT, [
          record.repositoryId,
          record.shelfmark,
          record.collection,
          record.dateDisplay,
          record.dateStart,
          record.dateEnd,
          record.contents,
          record.provenance,
          record.language,
          record.folios,
          record.iiifManifestUrl,
          record.thumbnailUrl,
          record.sourceUrl,
          record.imageCount,
        ]);
        return result.rows;
      }),
    );
    const row = UpsertRow.parse(rows[0]);
    return { id: row.id, action: row.inserted ? "insert" : "update" };
  }

  async renameShelfmark(id: number, shelfmark: string, collection: string | null): Promise<void> {
    await this.write("renameShelfmark", () =>
      this.pool.query(
        `UPDATE manuscripts SET shelfmark = $2, collection = $3, updated_at = NOW()
          WHERE id = $1`,
        [id, shelfmark, collection],
      ),
    );
  }

  async deleteManuscript(id: number): Promise<void> {
    await this.write("deleteManuscript", () =>
      this.pool.query("DELETE FROM manuscripts WHERE id = $1", [id]),
    );
  }

  async listThumbnails(repositoryId: number, missingOnly = false): Promise<ThumbnailRef[]> {
    const missing = missingOnly ? " AND (thumbnail_url IS NULL OR thumbnail_url = '')" : "";
    const rows = await this.read(
      `SELECT id, shelfmark, iiif_manifest_url, thumbnail_url FROM manuscripts
        WHERE repository_id = $1${missing} ORDER BY id`,
      [repositoryId],
    );
    return rows.map((row) => {
      const parsed = ThumbnailRow.parse(row);
      return { ...toRef(parsed), thumbnailUrl: parsed.thumbnail_url };
    });
  }

  async updateThumbnail(id: number, thumbnailUrl: string): Promise<void> {
    await this.write("updateThumbnail", () =>
      this.pool.query("UPDATE manuscripts SET thumbnail_url = $2, updated_at = NOW() WHERE id = $1", [
        id,
        thumbnailUrl,
      ]),
    );
  }

  async countManuscripts(repositoryId?: number): Promise<number> {
    const rows =
      repositoryId === undefined
        ? await this.read("SELECT COUNT(*) AS count FROM manuscripts")
        : await this.read(
            "SELECT COUNT(*) AS count FROM manuscripts WHERE repository_id = $1",
            [repositoryId],
          );
    return CountRow.parse(rows[0]).count;
  }

  // ── Read side ───────────────────────────────────────────────────────────

  async listRepositories(): Promise<RepositorySummary[]> {
    const rows = await this.read(`${REPOSITORY_SELECT} GROUP BY r.id ORDER BY r.name`);
    return rows.map((row) => toRepository(RepositoryRow.parse(row)));
  }

  async getRepository(id: number): Promise<RepositoryDetail | null> {
    const rows = await this.read(
      `${REPOSITORY_SELECT} WHERE r.id = $1 GROUP BY r.id`,
      [id],
    );
    if (rows.length === 0) return null;

    const collections = await this.read(
      `SELECT collection AS name, COUNT(*) AS count FROM manuscripts
        WHERE repository_id = $1 AND collection IS NOT NULL
        GROUP BY collection ORDER BY collection`,
      [id],
    );
    return {
      ...toRepository(RepositoryRow.parse(rows[0])),
      collections: collections.map((row) => CollectionRow.parse(row)),
    };
  }

  async listManuscripts(query: ManuscriptListQuery): Promise<ManuscriptPage> {
    const conditions: string[] = [];
    const values: unknown[] = [];
    if (query.repositoryId !== undefined) {
      values.push(query.repositoryId);
      conditions.push(`m.repository_id = $${values.length}`);
    }
    if (query.collection !== undefined) {
      values.push(query.collection);
      conditions.push(`m.collection = $${values.length}`);
    }
    const where = conditions.length > 0 ? ` WHERE ${conditions.join(" AND ")}` : "";

    const countRows = await this.read(
      `SELECT COUNT(*) AS count FROM manuscripts m${where}`,
      values,
    );
    const rows = await this.read(
      `${MANUSCRIPT_SELECT}${where} ORDER BY r.name, m.shelfmark, m.id
        LIMIT $${values.length + 1} OFFSET $${values.length + 2}`,
      [...values, query.limit, query.offset],
    );
    return {
      total: CountRow.parse(countRows[0]).count,
      limit: query.limit,
      offset: query.offset,
      items: rows.map((row) => toManuscript(ManuscriptRow.parse(row))),
    };
  }

  async getManuscript(id: number): Promise<ManuscriptListItem | null> {
    const rows = await this.read(`${MANUSCRIPT_SELECT} WHERE m.id = $1`, [id]);
    return rows.length > 0 ? toManuscript(ManuscriptRow.parse(rows[0])) : null;
  }

  async getFeatured(): Promise<ManuscriptListItem | null> {
    const rows = await this.read(
      `${MANUSCRIPT_SELECT} WHERE m.thumbnail_url IS NOT NULL ORDER BY random() LIMIT 1`,
    );
    return rows.length > 0 ? toManuscript(ManuscriptRow.parse(rows[0])) : null;
  }

  // ── Internals ───────────────────────────────────────────────────────────

  private async read(text: string, values?: unknown[]): Promise<unknown[]> {
    try {
      const result = await this.pool.query(text, values);
      return result.rows;
    } catch (err) {
      throw this.wrap(err, "query");
    }
  }

  /** Run a write with bounded retries; constraint violations fail at once. */
  private async write<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withRetry(fn, {
        maxRetries: this.writeRetries,
        baseDelayMs: this.retryDelayMs,
        shouldRetry: (err) => !isConstraintViolation(err),
        onRetry: (err, attempt) =>
          this.logger.warn({ operation, attempt, error: errorMessage(err) }, "Retrying store write"),
        ...(this.sleep ? { sleep: this.sleep } : {}),
      });
    } catch (err) {
      throw this.wrap(err, operation);
    }
  }

  private async transaction<T>(fn: (client: SqlExecutor) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const result = await fn(client);
      await client.query("COMMIT");
      return result;
    } catch (err) {
      await client.query("ROLLBACK").catch((rollbackErr: unknown) => {
        this.logger.warn({ error: errorMessage(rollbackErr) }, "Rollback failed");
      });
      throw err;
    } finally {
      client.release();
    }
  }

  private wrap(err: unknown, operation: string): StoreError {
    if (err instanceof StoreError) return err;
    const message = `${operation} failed: ${errorMessage(err)}`;
    return isConnectionFailure(err)
      ? new StoreUnavailableError(message, { cause: err })
      : new StoreError(message, { cause: err });
  }
}
