#!/usr/bin/env node
import appRootPath from 'app-root-path'
import { config as loadEnv } from 'dotenv-flow'
import path from 'node:path'

loadEnv({ path: path.resolve(appRootPath.path), silent: true })

import { main } from './cli'

main(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error('Error:', err)
    process.exit(2)
  }
)
