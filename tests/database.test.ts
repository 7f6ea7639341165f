// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { ResponseDatabase, rememberResponse } from '../src/lib/database.js'

describe('ResponseDatabase', () => {
  let db: ResponseDatabase

  beforeEach(() => {
    db = ResponseDatabase.open(':memory:')
  })

  afterEach(() => {
    db.close()
  })

  it('round-trips responses by kind and request', () => {
    const response = { status: 'OK', results: [{ lat: 1.5, name: 'x' }] }
    db.insert('geocode', { address: 'Main Street 1' }, response)
    expect(db.select('geocode', { address: 'Main Street 1' })).toEqual({ response })
    expect(db.select('reverse-geocode', { address: 'Main Street 1' })).toBeNull()
    expect(db.select('geocode', { address: 'Main Street 2' })).toBeNull()
  })

  it('ignores the key order of requests', () => {
    db.insert('streets', { center: '0,0', radius: 800 }, 'data')
    expect(db.select('streets', { radius: 800, center: '0,0' })).toEqual({ response: 'data' })
  })

  it('counts stored responses', () => {
    db.insert('geocode', { address: 'a' }, 1)
    db.insert('geocode', { address: 'b' }, 2)
    db.insert('geocode', { address: 'b' }, 3)
    db.insert('isochrone', { range: [1800] }, 4)
    expect(db.count()).toBe(3)
    expect(db.count('geocode')).toBe(2)
    expect(db.count('panorama-metadata')).toBe(0)
  })

  it('fetches a request only once', async () => {
    const fetch = vi.fn(async () => ({ status: 'OK' }))
    expect(await db.remember('panorama-metadata', { location: '1,2' }, fetch)).toEqual({
      status: 'OK',
    })
    expect(await db.remember('panorama-metadata', { location: '1,2' }, fetch)).toEqual({
      status: 'OK',
    })
    expect(fetch).toHaveBeenCalledTimes(1)
  })

  it('stores nothing when the fetch fails', async () => {
    await expect(
      db.remember('geocode', { address: 'a' }, async () => {
        throw new Error('offline')
      }),
    ).rejects.toThrow('offline')
    expect(db.count()).toBe(0)
  })
})

describe('rememberResponse', () => {
  it('fetches every time without a database', async () => {
    const fetch = vi.fn(async () => 'fresh')
    expect(await rememberResponse(undefined, 'geocode', {}, fetch)).toBe('fresh')
    expect(await rememberResponse(undefined, 'geocode', {}, fetch)).toBe('fresh')
    expect(fetch).toHaveBeenCalledTimes(2)
  })
})
