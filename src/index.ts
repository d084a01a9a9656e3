export { configFromEnv, defaultConfig, mergeConfig, readPackageVersion } from './config'
export type { AnnotatorConfig, ConfigOverrides, EdgeAttributeNames, NetworkAttributeNames } from './config'
export { EvidenceLoaderError } from './errors'
export { addSourceToExistingEdges, annotateNetwork, applyEvidence, removeOriginalEdges } from './evidence/annotate'
export type { AnnotateOptions, AnnotateResult, ApplyOptions } from './evidence/annotate'
export { buildSubgraphQuery, querySubgraph } from './evidence/client'
export type { QueryOptions, SubgraphQuery, SubgraphResponse } from './evidence/client'
export { dedupeByHash, mergeByEnglish, normalizeStatements, numericEvidenceCount, stripTrailingPeriod } from './evidence/dedupe'
export { addPairEdge, canonicalPairKey, poolStatements, summarizeStatements } from './evidence/edges'
export {
  applyFilterChain,
  curationFilter,
  defaultFilterChain,
  isSelfLoopSentence,
  lowQualityComplexSourceFilter,
  privateSourceOnlyFilter,
  selfLoopFilter,
  singleReadingSourceFilter
} from './evidence/filters'
export { allEvidenceLink, escapeHtml, statementEvidenceLink } from './evidence/links'
export { leadingToken, orderEvidenceEntries } from './evidence/ordering'
export { hashKey, parseCurationList, parseEvidencePayload } from './evidence/schema'
export type * from './evidence/types'
export { runLoader } from './loader'
export type { LoaderOptions, LoaderSummary } from './loader'
export { CxNetwork } from './network/cxNetwork'
export { getFamilyMembers, isFamilyNode, nodeIdToNameMap, nodeNameToIdMap, removeEdgeWithAttributes } from './network/lookup'
export type * from './network/types'
