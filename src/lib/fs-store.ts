/**
 * Deckhand Filesystem Store
 *
 * Text file reads and atomic writes shared by the inventory and config stores.
 * A write goes to a sibling temp file first and is renamed over the target,
 * so readers see either the old content or the new one.
 */

import { randomBytes } from 'node:crypto'
import { chmod, mkdir, readFile, rename, stat, unlink, writeFile } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'
import { PersistFailureError, toError } from './errors.js'

/**
 * Read a UTF-8 file, or null when it does not exist
 */
export async function readTextFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf-8')
  } catch (err) {
    if (isNodeError(err) && err.code === 'ENOENT') {
      return null
    }
    throw err
  }
}

/**
 * Temp file path beside the target (same directory, so rename stays atomic)
 */
export function tempPathFor(filePath: string): string {
  const suffix = `${process.pid}.${randomBytes(4).toString('hex')}`
  return join(dirname(filePath), `.${basename(filePath)}.${suffix}.tmp`)
}

/**
 * Permission bits of an existing file, or undefined when there is none
 */
async function existingMode(filePath: string): Promise<number | undefined> {
  try {
    return (await stat(filePath)).mode & 0o7777
  } catch (err) {
    if (isNodeError(err) && err.code === 'ENOENT') {
      return undefined
    }
    throw err
  }
}

/**
 * Write content atomically: temp file + rename. An existing target keeps
 * its permission bits (a 0600 vars file stays 0600).
 *
 * @throws PersistFailureError when any step fails; the target is untouched
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tempPath = tempPathFor(filePath)
  let tempWritten = false

  try {
    const mode = await existingMode(filePath)
    await mkdir(dirname(filePath), { recursive: true })
    await writeFile(tempPath, content, { encoding: 'utf-8', flag: 'wx', mode: mode ?? 0o666 })
    tempWritten = true
    if (mode !== undefined) {
      // creation mode is filtered by the umask
      await chmod(tempPath, mode)
    }
    await rename(tempPath, filePath)
  } catch (err) {
    const error = toError(err)
    if (tempWritten) {
      await unlink(tempPath).catch((cleanupErr: unknown) => {
        throw new PersistFailureError(
          filePath,
          new AggregateError([error, toError(cleanupErr)], `${error.message} (temp file ${tempPath} left behind)`)
        )
      })
    }
    throw new PersistFailureError(filePath, error)
  }
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err
}
