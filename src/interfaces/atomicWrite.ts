import fsp from 'node:fs/promises'
import path from 'node:path'
import { stringifyJson } from './json'

/**
 * Writes through a hidden `.partial` sibling and renames it into place, so a
 * reader never sees a half-written file.
 */
export async function atomicWrite(filePath: string, data: string) {
  const dir = path.dirname(filePath)
  await fsp.mkdir(dir, { recursive: true })
  const tmp = path.join(dir, `.${path.basename(filePath)}.${process.pid}.partial`)
  await fsp.writeFile(tmp, data, 'utf8')
  await fsp.rename(tmp, filePath)
}

export async function atomicWriteJson(filePath: string, value: unknown) {
  await atomicWrite(filePath, stringifyJson(value))
}
