// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import * as msgpackr from 'msgpackr'
import { createHash } from 'node:crypto'
import { existsSync, mkdirSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { gunzipSync, gzipSync } from 'node:zlib'

export const ROOT = fileURLToPath(new URL('../..', import.meta.url))
export const DATA = join(ROOT, 'data')
export const OUTPUT = join(ROOT, 'output')

export function assert(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new Error(message)
  }
}

/** Returns a float in [0, 1), like Math.random */
export type Random = () => number

/** https://en.wikipedia.org/wiki/Mulberry32 style generator, 32-bit state */
export function createRandom(seed: number): Random {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

export function seedFromText(text: string): number {
  return createHash('sha256').update(text.trim().toLowerCase()).digest().readUInt32BE(0)
}

export function encodeMsgpackGzip(data: unknown): Buffer {
  return gzipSync(msgpackr.encode(data))
}

export function decodeMsgpackGzip(buffer: Buffer): unknown {
  return msgpackr.decode(gunzipSync(buffer))
}

export function deterministicJsonStringify(data: unknown): string {
  return JSON.stringify(data, (_key, value: unknown) => {
    if (isRecord(value)) {
      return Object.keys(value)
        .sort()
        .reduce(
          (acc, key) => {
            acc[key] = value[key]
            return acc
          },
          {} as Record<string, unknown>,
        )
    }
    return value
  })
}

export function hashRequest(request: unknown): string {
  return createHash('sha256').update(deterministicJsonStringify(request)).digest('hex')
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

export function makeDirectoryForFile(filename: string): void {
  const directory = dirname(filename)

  if (!existsSync(directory)) {
    mkdirSync(directory, { recursive: true })
  }
}

/** File name fragment derived from free text, e.g. an address */
export function safeFileName(text: string, maxLength = 50): string {
  const safe = text.replace(/[^A-Za-z0-9 _-]/g, '_').slice(0, maxLength).trim()
  return safe.length > 0 ? safe : 'tour'
}

/** Walks into parsed JSON; undefined as soon as a step is missing */
export function dig(value: unknown, ...path: (string | number)[]): unknown {
  let current = value
  for (const key of path) {
    if (typeof key === 'number' && Array.isArray(current)) current = current[key]
    else if (typeof key === 'string' && isRecord(current)) current = current[key]
    else return undefined
  }
  return current
}

export function asNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined
}

export function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : []
}
