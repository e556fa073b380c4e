import { z } from "zod";
import { InvalidRequestError } from "../../core/errors.js";

export const MAX_PAGE_SIZE = 200;
export const DEFAULT_PAGE_SIZE = 50;

const ID_RE = /^\d+$/;
/** Row ids are SERIAL (int4) columns. */
const MAX_ROW_ID = 2_147_483_647;

/** A positive integer path parameter. */
export function parseId(raw: string, name = "id"): number {
  const id = ID_RE.test(raw) ? Number(raw) : Number.NaN;
  if (!Number.isSafeInteger(id) || id < 1 || id > MAX_ROW_ID) {
    throw new InvalidRequestError(name, `Invalid ${name}: ${raw.slice(0, 40)}`);
  }
  return id;
}

const ListQuerySchema = z.object({
  repository_id: z
    .string()
    .regex(ID_RE)
    .transform(Number)
    .refine((v) => v <= MAX_ROW_ID, "repository_id out of range")
    .optional(),
  collection: z.string().min(1).optional(),
  // Larger pages are clamped rather than rejected.
  limit: z
    .string()
    .regex(ID_RE)
    .transform((v) => Math.min(Number(v), MAX_PAGE_SIZE))
    .refine((v) => v > 0, "limit must be positive")
    .optional(),
  offset: z
    .string()
    .regex(ID_RE)
    .transform(Number)
    .refine(Number.isSafeInteger, "offset out of range")
    .optional(),
});

export interface ListParams {
  repositoryId?: number;
  collection?: string;
  limit: number;
  offset: number;
}

export function parseListQuery(query: Record<string, string>): ListParams {
  const parsed = ListQuerySchema.safeParse(query);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const name = String(issue?.path[0] ?? "query");
    throw new InvalidRequestError(name, `Invalid query parameter: ${name}`);
  }
  const { repository_id, collection, limit, offset } = parsed.data;
  const params: ListParams = {
    limit: limit ?? DEFAULT_PAGE_SIZE,
    offset: offset ?? 0,
  };
  if (repository_id !== undefined) params.repositoryId = repository_id;
  if (collection !== undefined) params.collection = collection;
  return params;
}
