/**
 * Raised for contract violations: a malformed evidence payload, CX document or
 * curation list, a failed subgraph query, or unusable loader input.
 *
 * Per-entry anomalies inside a well-formed payload are logged and skipped
 * instead of raising this.
 */
export class EvidenceLoaderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'EvidenceLoaderError'
  }
}
