import fs from 'node:fs'
import fsp from 'node:fs/promises'
import path from 'node:path'
import defaultConfig from './config'
import type { AnnotatorConfig } from './config'
import { EvidenceLoaderError } from './errors'
import { annotateNetwork } from './evidence/annotate'
import type { AnnotateOptions } from './evidence/annotate'
import { defaultFilterChain } from './evidence/filters'
import { parseCurationList } from './evidence/schema'
import type { Curation } from './evidence/types'
import { atomicWriteJson } from './interfaces/atomicWrite'
import { parseJson } from './interfaces/json'
import { debug, error, info } from './logger'
import { CxNetwork } from './network/cxNetwork'

export interface LoaderOptions {
  input: string
  cacheDir?: string
  curationsPath?: string
  outDir?: string
  netPrefix?: string
  maxNetworkSize?: number
  removeOriginalEdges?: boolean
  sourceValue?: string
  config?: AnnotatorConfig
  query?: AnnotateOptions['query']
  onProgress?: (message: string) => void
}

export interface LoaderSummary {
  processed: string[]
  skipped: string[]
}

export interface NetworkInput {
  path: string
  name: string // file name without the .cx extension
}

export const DEFAULT_MAX_NETWORK_SIZE = 100

export async function readJsonFile(filePath: string): Promise<unknown> {
  const text = await fsp.readFile(filePath, 'utf8')
  try {
    return parseJson(text)
  } catch (err) {
    throw new EvidenceLoaderError(`Unable to parse JSON in ${filePath}: ${String(err)}`, { cause: err })
  }
}

/**
 * A `.cx` file, or a text file listing `.cx` files one per line. Blank lines
 * and `#` comments are ignored; relative entries resolve against the list's
 * directory.
 */
export async function listNetworkInputs(input: string): Promise<NetworkInput[]> {
  if (!fs.existsSync(input) || !fs.statSync(input).isFile()) {
    throw new EvidenceLoaderError(
      `Input must be a CX file ending with .cx or a file listing CX files one per line: ${input}`
    )
  }
  const toInput = (p: string): NetworkInput => ({ path: p, name: path.basename(p).replace(/\.cx$/i, '') })
  if (input.toLowerCase().endsWith('.cx')) return [toInput(input)]

  const base = path.dirname(path.resolve(input))
  const lines = (await fsp.readFile(input, 'utf8')).split(/\r?\n/)
  return lines
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'))
    .map((line) => toInput(path.resolve(base, line)))
}

export async function loadCurations(curationsPath?: string): Promise<Curation[]> {
  if (!curationsPath) return []
  return parseCurationList(await readJsonFile(curationsPath))
}

// keyed by the full file name, so network.cx caches as network.cx.json
export function cachePathFor(cacheDir: string, fileName: string) {
  return path.join(cacheDir, `${fileName}.json`)
}

/**
 * Annotates every input network in turn. Curations are loaded and validated
 * before the first network is read, so a bad curation file changes nothing.
 */
export async function runLoader(opts: LoaderOptions): Promise<LoaderSummary> {
  const cfg = opts.config ?? defaultConfig
  const progress = opts.onProgress ?? ((m: string) => info(m))
  const maxNetworkSize = opts.maxNetworkSize ?? DEFAULT_MAX_NETWORK_SIZE

  const filters = defaultFilterChain(await loadCurations(opts.curationsPath))
  const cacheDir = opts.cacheDir ? path.resolve(opts.cacheDir) : undefined
  const outDir = opts.outDir ? path.resolve(opts.outDir) : undefined
  if (cacheDir) await fsp.mkdir(cacheDir, { recursive: true })
  if (outDir) await fsp.mkdir(outDir, { recursive: true })

  const inputs = await listNetworkInputs(opts.input)
  const summary: LoaderSummary = { processed: [], skipped: [] }

  for (const [idx, input] of inputs.entries()) {
    const network = CxNetwork.fromCx(await readJsonFile(input.path))
    debug('Processing: ' + network.getName())

    const numNodes = network.getNodes().length
    if (numNodes > maxNetworkSize) {
      error(`Network ${input.name} has ${numNodes} nodes which exceeds ${maxNetworkSize}. To increase set --maxnetworksize flag. skipping`)
      summary.skipped.push(input.name)
      continue
    }

    const cacheFile = cacheDir ? cachePathFor(cacheDir, path.basename(input.path)) : undefined
    let cached: unknown
    if (cacheFile && fs.existsSync(cacheFile)) {
      info('Using cached evidence: ' + cacheFile)
      cached = await readJsonFile(cacheFile)
    }

    const result = await annotateNetwork(network, {
      payload: cached,
      filters,
      config: cfg,
      netPrefix: opts.netPrefix,
      removeOriginalEdges: opts.removeOriginalEdges,
      sourceValue: opts.sourceValue,
      query: opts.query
    })

    if (outDir) {
      const outFile = path.join(outDir, `${input.name}.cx`)
      debug('Saving network to file: ' + outFile)
      await atomicWriteJson(outFile, network.toCx())
    }
    if (cacheFile && cached === undefined) {
      debug('Saving evidence json to file: ' + cacheFile)
      await atomicWriteJson(cacheFile, result.payload)
    }

    summary.processed.push(input.name)
    progress(`[${idx + 1}/${inputs.length}] ${input.name}: ${result.edgesAdded} evidence edges`)
  }
  return summary
}
