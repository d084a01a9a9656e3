import { configFromEnv, defaultConfig, mergeConfig } from './config'
import type { ConfigOverrides } from './config'
import { defaultFilterChain } from './evidence/filters'
import { DEFAULT_MAX_NETWORK_SIZE, runLoader } from './loader'
import type { LoaderSummary } from './loader'
import { levelFromVerbosity, setLogLevel } from './logger'

export interface AnnotateArgs {
  input: string
  cacheDir?: string
  curations?: string
  outDir?: string
  netPrefix?: string
  maxNetworkSize: number
  removeOrigEdges: boolean
  sourceValue?: string
  endpoint?: string
  timeoutSeconds?: number
  verbose: number // 1 plus the number of -v flags
}

const VALUE_FLAGS = new Set([
  '--cachedir',
  '--curations',
  '--outdir',
  '--netprefix',
  '--maxnetworksize',
  '--sourcevalue',
  '--endpoint',
  '--timeout'
])

function positiveNumber(flag: string, value: string) {
  const n = Number(value)
  if (!Number.isFinite(n) || n <= 0) throw new Error(`${flag} expects a positive number, got: ${value}`)
  return n
}

export function parseAnnotateArgs(args: string[]): AnnotateArgs {
  const parsed: AnnotateArgs = {
    input: '',
    maxNetworkSize: DEFAULT_MAX_NETWORK_SIZE,
    removeOrigEdges: false,
    verbose: 1
  }
  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    if (/^-v+$/.test(arg)) {
      parsed.verbose += arg.length - 1
      continue
    }
    if (arg === '--verbose') {
      parsed.verbose++
      continue
    }
    if (arg === '--remove-orig-edges' || arg === '--remove_orig_edges') {
      parsed.removeOrigEdges = true
      continue
    }
    if (VALUE_FLAGS.has(arg)) {
      const value = args[++i]
      if (value === undefined) throw new Error(`${arg} requires a value`)
      if (arg === '--cachedir') parsed.cacheDir = value
      else if (arg === '--curations') parsed.curations = value
      else if (arg === '--outdir') parsed.outDir = value
      else if (arg === '--netprefix') parsed.netPrefix = value
      else if (arg === '--maxnetworksize') parsed.maxNetworkSize = Math.floor(positiveNumber(arg, value))
      else if (arg === '--sourcevalue') parsed.sourceValue = value
      else if (arg === '--endpoint') parsed.endpoint = value
      else parsed.timeoutSeconds = positiveNumber(arg, value)
      continue
    }
    if (arg.startsWith('-')) throw new Error(`Unknown option: ${arg}`)
    if (parsed.input) throw new Error(`Unexpected argument: ${arg}`)
    parsed.input = arg
  }
  if (!parsed.input) throw new Error('Usage: annotate <network.cx|list.txt> [options]')
  return parsed
}

export async function cmdAnnotate(args: string[]): Promise<LoaderSummary> {
  const parsed = parseAnnotateArgs(args)
  if (parsed.verbose > 1) setLogLevel(levelFromVerbosity(parsed.verbose))

  const overrides: ConfigOverrides = configFromEnv()
  if (parsed.endpoint) overrides.subgraphEndpoint = parsed.endpoint
  if (parsed.timeoutSeconds) overrides.timeoutSeconds = parsed.timeoutSeconds
  const config = mergeConfig(overrides)

  const summary = await runLoader({
    input: parsed.input,
    cacheDir: parsed.cacheDir,
    curationsPath: parsed.curations,
    outDir: parsed.outDir,
    netPrefix: parsed.netPrefix,
    maxNetworkSize: parsed.maxNetworkSize,
    removeOriginalEdges: parsed.removeOrigEdges,
    sourceValue: parsed.sourceValue,
    config,
    onProgress: (m) => console.log(m)
  })
  console.log(`Annotated ${summary.processed.length} network(s), skipped ${summary.skipped.length}`)
  return summary
}

export function cmdFilters() {
  for (const filter of defaultFilterChain()) console.log(filter.describe())
}

function printUsage() {
  console.log(`Usage: ${defaultConfig.toolName} <command> [args]`)
  console.log('Commands:')
  console.log('  annotate <network.cx|list.txt> [options]')
  console.log('      --cachedir DIR         reuse or store evidence payloads as DIR/<file>.cx.json')
  console.log('      --curations FILE       JSON list of statement curations')
  console.log('      --outdir DIR           write annotated networks as DIR/<name>.cx')
  console.log(`      --netprefix TEXT       prepended to network names (default "${defaultConfig.netPrefix}")`)
  console.log(`      --maxnetworksize N     skip networks with more nodes (default ${DEFAULT_MAX_NETWORK_SIZE})`)
  console.log('      --remove-orig-edges    drop the network\'s own edges first')
  console.log('      --sourcevalue TEXT     edge source for pre-existing edges')
  console.log('      --endpoint URL         subgraph service endpoint')
  console.log('      --timeout SECONDS      subgraph request timeout')
  console.log('      -v, -vv, -vvv          warn, info, debug logging')
  console.log('  filters                    list the default statement filters')
  console.log('  version                    print the version')
}

export async function main(argv: string[]): Promise<number> {
  const cmd = argv[0]
  try {
    if (cmd === 'annotate') await cmdAnnotate(argv.slice(1))
    else if (cmd === 'filters') cmdFilters()
    else if (cmd === 'version' || cmd === '--version') console.log(`${defaultConfig.toolName} ${defaultConfig.version}`)
    else {
      printUsage()
      return 1
    }
    return 0
  } catch (err) {
    console.error('Error:', err instanceof Error ? err.message : err)
    return 2
  }
}
