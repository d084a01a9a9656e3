import { z } from 'zod'
import { EvidenceLoaderError } from '../errors'

/**
 * Wire shapes returned by the subgraph service. Field names follow the
 * service's JSON; unknown fields pass through so a payload can be cached as
 * it was received.
 */

// 64-bit hashes arrive as bigint when they exceed the double range
export const HashSchema = z.union([z.number().int(), z.bigint(), z.string().min(1)])

export const StatementSchema = z
  .object({
    stmt_hash: HashSchema,
    stmt_type: z.string(),
    // non-numeric counts are tolerated here and skipped when totalling
    evidence_count: z.union([z.number(), z.string()]),
    source_counts: z.record(z.number()),
    english: z.string(),
    belief: z.number().nullish(),
    db_url_hash: z.string().nullish()
  })
  .passthrough()

export const EntitySchema = z
  .object({
    name: z.string()
  })
  .passthrough()

export const EdgeEvidenceSchema = z
  .object({
    edge: z.array(EntitySchema).min(1),
    stmts: z.record(StatementSchema)
  })
  .passthrough()

export const EvidencePayloadSchema = z
  .object({
    edges: z.array(EdgeEvidenceSchema)
  })
  .passthrough()

export const CurationSchema = z
  .object({
    pa_hash: HashSchema,
    tag: z.string()
  })
  .passthrough()

export const CurationListSchema = z.array(CurationSchema)

export type Statement = z.infer<typeof StatementSchema>
export type Entity = z.infer<typeof EntitySchema>
export type EdgeEvidence = z.infer<typeof EdgeEvidenceSchema>
export type EvidencePayload = z.infer<typeof EvidencePayloadSchema>
export type Curation = z.infer<typeof CurationSchema>

export function formatIssues(err: z.ZodError): string {
  return err.issues
    .slice(0, 5)
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ')
}

export function parseEvidencePayload(raw: unknown): EvidencePayload {
  const res = EvidencePayloadSchema.safeParse(raw)
  if (!res.success) {
    throw new EvidenceLoaderError(`Malformed evidence payload: ${formatIssues(res.error)}`)
  }
  return res.data
}

export function parseCurationList(raw: unknown): Curation[] {
  const res = CurationListSchema.safeParse(raw)
  if (!res.success) {
    throw new EvidenceLoaderError(`Malformed curation list: ${formatIssues(res.error)}`)
  }
  return res.data
}

/**
 * Normalized identity for a statement or curation hash: the exact decimal
 * form of an integer, whether it came as a number, a bigint or a string.
 * Non-integer strings compare trimmed.
 */
export function hashKey(value: number | bigint | string): string {
  if (typeof value !== 'string') return Number.isInteger(value) ? BigInt(value).toString() : String(value)
  const trimmed = value.trim()
  return /^[+-]?\d+$/.test(trimmed) ? BigInt(trimmed).toString() : trimmed
}
