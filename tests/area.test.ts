// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { describe, expect, it } from 'vitest'
import { queryRadius, resolveWalkableArea, WalkableAreaProvider } from '../src/lib/area.js'
import { distance, GeoPoint } from '../src/lib/geo.js'

const center = { lat: 0, lng: 0 }
const square: GeoPoint[] = [
  { lat: -0.01, lng: -0.01 },
  { lat: -0.01, lng: 0.01 },
  { lat: 0.01, lng: 0.01 },
  { lat: 0.01, lng: -0.01 },
  { lat: -0.01, lng: -0.01 },
]

function provider(answer: () => Promise<GeoPoint[] | null>) {
  const minutes: number[] = []
  const fake: WalkableAreaProvider = {
    isochrone: async (_center, m) => {
      minutes.push(m)
      return answer()
    },
  }
  return { fake, minutes }
}

const options = { targetLength: 4800, radius: 800, walkingPace: 80 }

describe('resolveWalkableArea', () => {
  it('uses a disk without an isochrone provider', async () => {
    const area = await resolveWalkableArea(center, options)
    expect(area).toEqual({ kind: 'disk', center, radius: 800 })
  })

  it('asks for half the walk as walking time', async () => {
    const { fake, minutes } = provider(async () => square)
    const area = await resolveWalkableArea(center, { ...options, provider: fake })
    expect(area).toEqual({ kind: 'polygon', ring: square })
    expect(minutes).toEqual([30])
  })

  it('falls back to the disk when the lookup fails', async () => {
    const { fake } = provider(async () => {
      throw new Error('quota exceeded')
    })
    const warnings: string[] = []
    const area = await resolveWalkableArea(center, {
      ...options,
      provider: fake,
      onWarning: (m) => warnings.push(m),
    })
    expect(area.kind).toBe('disk')
    expect(warnings).toEqual(['Isochrone lookup failed (quota exceeded), using disk'])
  })

  it('falls back to the disk for a degenerate polygon', async () => {
    const warnings: string[] = []
    const onWarning = (m: string) => warnings.push(m)
    const line = provider(async () => [square[0], square[1], square[0]])
    const away = provider(async () => square.map((p) => ({ lat: p.lat + 1, lng: p.lng })))
    const resolve = (fake: WalkableAreaProvider) =>
      resolveWalkableArea(center, { ...options, provider: fake, onWarning })
    const fromLine = await resolve(line.fake)
    const fromAway = await resolve(away.fake)
    expect(fromLine).toEqual({ kind: 'disk', center, radius: 800 })
    expect(fromAway).toEqual({ kind: 'disk', center, radius: 800 })
    expect(warnings).toEqual([
      'Isochrone polygon is degenerate, using disk',
      'Isochrone polygon is degenerate, using disk',
    ])
  })

  it('uses the disk quietly when the service has no answer', async () => {
    const warnings: string[] = []
    const { fake } = provider(async () => null)
    const area = await resolveWalkableArea(center, {
      ...options,
      provider: fake,
      onWarning: (m) => warnings.push(m),
    })
    expect(area.kind).toBe('disk')
    expect(warnings).toEqual([])
  })
})

describe('queryRadius', () => {
  it('covers a disk with a margin', () => {
    expect(queryRadius({ kind: 'disk', center, radius: 800 }, center, 0.5)).toBe(1200)
    expect(queryRadius({ kind: 'disk', center, radius: 1000 }, center)).toBe(1100)
  })

  it('reaches the farthest polygon vertex', () => {
    const farthest = Math.max(...square.map((p) => distance(center, p)))
    expect(queryRadius({ kind: 'polygon', ring: square }, center, 0)).toBe(Math.ceil(farthest))
  })
})
