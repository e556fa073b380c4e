// ---------------------------------------------------------------------------
// Aggregate store contracts.
//
// `ManuscriptStore` is the write side used by importers; `CatalogueReader`
// is the read side behind the HTTP API.  `PgManuscriptStore` implements
// both.
// ---------------------------------------------------------------------------

import type {
  Manuscript,
  ManuscriptRecord,
  Repository,
  RepositoryDefinition,
} from "../core/types.js";

export type UpsertAction = "insert" | "update";

export interface UpsertResult {
  id: number;
  action: UpsertAction;
}

/** Just enough of a row to reconcile against. */
export interface ManuscriptRef {
  id: number;
  shelfmark: string;
  iiifManifestUrl: string;
}

/** A row as the thumbnail repair pass sees it. */
export interface ThumbnailRef extends ManuscriptRef {
  thumbnailUrl: string | null;
}

export interface ManuscriptLookup {
  findManuscript(repositoryId: number, shelfmark: string): Promise<number | null>;
  /** Rows in the repository that point at `manifestUrl`. */
  findByManifestUrl(repositoryId: number, manifestUrl: string): Promise<ManuscriptRef[]>;
}

export interface ManuscriptStore extends ManuscriptLookup {
  /** Create-or-get by short name.  Never changes an existing row's key. */
  ensureRepository(definition: RepositoryDefinition): Promise<number>;
  findRepositoryId(shortName: string): Promise<number | null>;
  /** Insert, or overwrite every mutable field of the row with the same natural key. */
  upsertManuscript(record: ManuscriptRecord): Promise<UpsertResult>;
  /** Rows whose shelfmark matches a POSIX regular expression. */
  findByShelfmarkPattern(repositoryId: number, pattern: string): Promise<ManuscriptRef[]>;
  renameShelfmark(id: number, shelfmark: string, collection: string | null): Promise<void>;
  deleteManuscript(id: number): Promise<void>;
  /** Every row of the repository in id order; `missingOnly` keeps rows without a thumbnail. */
  listThumbnails(repositoryId: number, missingOnly?: boolean): Promise<ThumbnailRef[]>;
  updateThumbnail(id: number, thumbnailUrl: string): Promise<void>;
  countManuscripts(repositoryId?: number): Promise<number>;
}

// ── Read side ───────────────────────────────────────────────────────────────

export interface RepositorySummary extends Repository {
  manuscriptCount: number;
}

export interface CollectionSummary {
  name: string;
  count: number;
}

export interface RepositoryDetail extends RepositorySummary {
  collections: CollectionSummary[];
}

export interface ManuscriptListQuery {
  repositoryId?: number;
  collection?: string;
  limit: number;
  offset: number;
}

export interface ManuscriptListItem extends Manuscript {
  repositoryName: string;
  repositoryShortName: string;
}

export interface ManuscriptPage {
  total: number;
  limit: number;
  offset: number;
  items: ManuscriptListItem[];
}

export interface CatalogueReader {
  listRepositories(): Promise<RepositorySummary[]>;
  getRepository(id: number): Promise<RepositoryDetail | null>;
  listManuscripts(query: ManuscriptListQuery): Promise<ManuscriptPage>;
  getManuscript(id: number): Promise<ManuscriptListItem | null>;
  /** One random manuscript that has a thumbnail. */
  getFeatured(): Promise<ManuscriptListItem | null>;
}
