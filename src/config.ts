import appRootPath from 'app-root-path'
import fs from 'node:fs'
import path from 'node:path'

export interface EdgeAttributeNames {
  relationships: string
  source: string
  directed: string
  reverseDirected: string
  relationshipScore: string
}

export interface NetworkAttributeNames {
  queryTime: string
  parameters: string
  description: string
}

export interface AnnotatorConfig {
  subgraphEndpoint: string
  statementUrl: string
  serviceUrl: string
  serviceLabel: string
  browserTarget: string // value of the target attribute on generated links
  timeoutSeconds: number
  interaction: string
  edgeSourceValue: string
  nonDirectionalTypes: string[]
  netPrefix: string
  toolName: string
  version: string
  edgeAttributes: EdgeAttributeNames
  networkAttributes: NetworkAttributeNames
}

export function readPackageVersion(root = appRootPath.path): string {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(path.join(root, 'package.json'), 'utf8'))
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') return pkg.version
  } catch {
    // no package.json beside the app root, e.g. when bundled
  }
  return '0.0.0'
}

export const defaultConfig: AnnotatorConfig = {
  subgraphEndpoint: 'https://network.indra.bio/api/subgraph',
  statementUrl: 'https://db.indra.bio/statements',
  serviceUrl: 'https://www.indra.bio',
  serviceLabel: 'INDRA service',
  browserTarget: 'INDRA_Evidence',
  timeoutSeconds: 600,
  interaction: 'interacts with',
  edgeSourceValue: 'INDRA',
  // source/target order of these statement types carries no causal meaning
  nonDirectionalTypes: ['ActiveForm', 'Association', 'Complex', 'Migration'],
  netPrefix: 'INDRA annotated - ',
  toolName: 'evidence-annotator',
  version: readPackageVersion(),
  edgeAttributes: {
    relationships: 'Relationships',
    source: '__edge_source',
    directed: '__directed',
    reverseDirected: '__reverse_directed',
    relationshipScore: '__relationship_score'
  },
  networkAttributes: {
    queryTime: '__INDRA query time in seconds',
    parameters: 'INDRA parameters',
    description: 'description'
  }
}

export type ConfigOverrides = Partial<Omit<AnnotatorConfig, 'edgeAttributes' | 'networkAttributes'>> & {
  edgeAttributes?: Partial<EdgeAttributeNames>
  networkAttributes?: Partial<NetworkAttributeNames>
}

export function mergeConfig(partial?: ConfigOverrides, base: AnnotatorConfig = defaultConfig): AnnotatorConfig {
  if (!partial) return base
  return {
    ...base,
    ...partial,
    nonDirectionalTypes: partial.nonDirectionalTypes || base.nonDirectionalTypes,
    edgeAttributes: partial.edgeAttributes ? { ...base.edgeAttributes, ...partial.edgeAttributes } : base.edgeAttributes,
    networkAttributes: partial.networkAttributes
      ? { ...base.networkAttributes, ...partial.networkAttributes }
      : base.networkAttributes
  }
}

/**
 * Overrides taken from the environment. Unset or empty variables are ignored.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  const overrides: ConfigOverrides = {}
  if (env.EVIDENCE_SUBGRAPH_ENDPOINT) overrides.subgraphEndpoint = env.EVIDENCE_SUBGRAPH_ENDPOINT
  if (env.EVIDENCE_STATEMENT_URL) overrides.statementUrl = env.EVIDENCE_STATEMENT_URL
  if (env.EVIDENCE_BROWSER_TARGET) overrides.browserTarget = env.EVIDENCE_BROWSER_TARGET
  if (env.EVIDENCE_TIMEOUT_SECONDS) {
    const timeout = Number(env.EVIDENCE_TIMEOUT_SECONDS)
    if (Number.isFinite(timeout) && timeout > 0) overrides.timeoutSeconds = timeout
  }
  return overrides
}

export default defaultConfig
