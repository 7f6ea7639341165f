// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { randomUUID } from 'node:crypto'
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises'
import { dirname, join } from 'node:path'

export interface ImageCache {
  get(key: string): Promise<Buffer | null>
  /** Atomic: readers see either nothing or the whole entry */
  put(key: string, bytes: Buffer): Promise<void>
}

/**
 * Content-addressed files under `directory/ab/cd/<key>.img`.
 * Keys are hex digests; entries are never rewritten in place.
 */
export class FileImageCache implements ImageCache {
  constructor(private directory: string) {}

  private _getPath(key: string): string {
    if (!/^[0-9a-f]{8,}$/.test(key)) throw new Error(`Invalid cache key: ${key}`)
    return join(this.directory, key.substring(0, 2), key.substring(2, 4), `${key}.img`)
  }

  async get(key: string): Promise<Buffer | null> {
    try {
      return await readFile(this._getPath(key))
    } catch (e) {
      if (isNotFound(e)) return null
      throw e
    }
  }

  async put(key: string, bytes: Buffer): Promise<void> {
    const filePath = this._getPath(key)
    const tempPath = `${filePath}.${randomUUID()}.tmp`
    await mkdir(dirname(filePath), { recursive: true })
    try {
      await writeFile(tempPath, bytes)
      await rename(tempPath, filePath)
    } catch (e) {
      await rm(tempPath, { force: true })
      throw e
    }
  }
}

export class MemoryImageCache implements ImageCache {
  private entries = new Map<string, Buffer>()

  async get(key: string): Promise<Buffer | null> {
    return this.entries.get(key) ?? null
  }

  async put(key: string, bytes: Buffer): Promise<void> {
    this.entries.set(key, bytes)
  }

  get size() {
    return this.entries.size
  }
}

function isNotFound(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT'
}
