// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { describe, expect, it } from 'vitest'
import { CoverageError } from '../src/lib/errors.js'
import { distance } from '../src/lib/geo.js'
import { buildStreetGraph, StreetGraph } from '../src/lib/graph.js'
import {
  chooseNextEdge,
  generateRoute,
  interestWeighting,
  resampleRoute,
  wander,
} from '../src/lib/route.js'
import { createRandom } from '../src/lib/utils.js'
import { gridSegments } from './fixtures.js'

const center = { lat: 0, lng: 0 }
const grid = buildStreetGraph(gridSegments(center, 5, 0.0009), {
  kind: 'disk',
  center,
  radius: 5000,
})

/** Two nodes on the equator joined by one street */
const deadEnd: StreetGraph = {
  nodes: [
    { id: 0, point: { lat: 0, lng: 0 }, soft: false },
    { id: 1, point: { lat: 0, lng: 0.0009 }, soft: false },
  ],
  edges: [
    {
      id: 0,
      from: 0,
      to: 1,
      geometry: [
        { lat: 0, lng: 0 },
        { lat: 0, lng: 0.0009 },
      ],
      length: distance({ lat: 0, lng: 0 }, { lat: 0, lng: 0.0009 }),
      interest: 0,
      segmentId: 'way/1',
    },
  ],
  adjacency: [[0], [0]],
}

const fixed = (...values: number[]) => {
  let i = 0
  return () => values[i++ % values.length]
}

describe('chooseNextEdge', () => {
  it('picks proportionally to the weights', () => {
    expect(chooseNextEdge([3, 5], [1, 3], fixed(0.2))).toBe(3)
    expect(chooseNextEdge([3, 5], [1, 3], fixed(0.3))).toBe(5)
  })

  it('breaks ties toward the earlier candidate', () => {
    expect(chooseNextEdge([3, 5], [1, 1], fixed(0.49))).toBe(3)
    expect(chooseNextEdge([3, 5], [1, 1], fixed(0.5))).toBe(5)
  })

  it('falls back to a uniform choice when every weight is zero', () => {
    expect(chooseNextEdge([3, 5], [0, 0], fixed(0.6))).toBe(5)
  })

  it('weights streets by their points of interest', () => {
    expect(interestWeighting(grid.edges[0])).toBe(1)
    expect(interestWeighting({ ...grid.edges[0], interest: 4 })).toBe(5)
  })
})

describe('wander', () => {
  it('turns around at a dead end and stops exactly at the target', () => {
    const path = wander(deadEnd, 0, { targetLength: 250, random: createRandom(1) })
    expect(path.length).toBe(250)
    expect(path.edgeIds).toEqual([0, 0, 0])
    expect(path.coords).toHaveLength(4)
    const edgeLength = deadEnd.edges[0].length
    expect(path.coords[3].lng).toBeCloseTo(((250 - 2 * edgeLength) / edgeLength) * 0.0009, 9)
  })

  it('rejects a start node without streets', () => {
    const isolated: StreetGraph = {
      nodes: [{ id: 0, point: center, soft: false }],
      edges: [],
      adjacency: [[]],
    }
    expect(() => wander(isolated, 0, { targetLength: 100, random: createRandom(1) })).toThrow(
      new CoverageError('Start location is not connected to any street'),
    )
  })

  it('prefers streets it has not walked yet', () => {
    // Three spokes around node 0; always taking the first candidate
    const star = buildStreetGraph(
      [
        { id: 'west', coords: [center, { lat: 0, lng: -0.0009 }] },
        { id: 'east', coords: [center, { lat: 0, lng: 0.0009 }] },
        { id: 'north', coords: [center, { lat: 0.0009, lng: 0 }] },
      ],
      { kind: 'disk', center, radius: 1000 },
    )
    const path = wander(star, 0, { targetLength: 450, random: fixed(0) })
    expect(path.edgeIds).toEqual([0, 0, 1, 1, 2])
  })
})

describe('resampleRoute', () => {
  it('samples every interval and ends at the exact end point', () => {
    const path = wander(deadEnd, 0, { targetLength: 250, random: createRandom(1) })
    const points = resampleRoute(path, 100)
    expect(points.map((p) => p.distance)).toEqual([0, 100, 200, 250])
    expect(points[3].lng).toBeCloseTo(path.coords[3].lng, 12)
  })

  it('heads toward the next point and repeats the last heading', () => {
    const path = wander(deadEnd, 0, { targetLength: 250, random: createRandom(1) })
    const headings = resampleRoute(path, 100).map((p) => p.heading)
    expect(headings[0]).toBeCloseTo(90, 6)
    expect(headings[1]).toBeCloseTo(270, 6)
    expect(headings[2]).toBeCloseTo(90, 6)
    expect(headings[3]).toBe(headings[2])
  })

  it('keeps a route without edges as its start point', () => {
    expect(resampleRoute({ coords: [center], edgeIds: [], length: 0 }, 10)).toEqual([
      { lat: 0, lng: 0, distance: 0, heading: 0, edgeId: -1 },
    ])
  })
})

describe('generateRoute', () => {
  const options = { targetLength: 1000, interval: 10 }

  it('is reproducible for the same seed', () => {
    const a = generateRoute(grid, center, { ...options, random: createRandom(42) })
    const b = generateRoute(grid, center, { ...options, random: createRandom(42) })
    expect(a).toEqual(b)
  })

  it('walks the target length in evenly spaced points', () => {
    const route = generateRoute(grid, center, { ...options, random: createRandom(3) })
    expect(route.length).toBe(1000)
    expect(route.points).toHaveLength(101)
    route.points.slice(0, -1).forEach((point, i) => expect(point.distance).toBe(i * 10))
    expect(route.points[100].distance).toBeCloseTo(1000, 6)
    for (let i = 1; i < route.points.length; i++) {
      expect(distance(route.points[i - 1], route.points[i])).toBeLessThanOrEqual(10 + 1e-6)
    }
  })

  it('lands exactly on the target length for any seed', () => {
    for (let seed = 0; seed < 20; seed++) {
      const route = generateRoute(grid, center, {
        targetLength: 1234.5,
        interval: 10,
        random: createRandom(seed),
      })
      expect(route.length).toBe(1234.5)
      expect(route.points.at(-1)?.distance).toBeCloseTo(1234.5, 6)
    }
  })

  it('starts at the node nearest to the address and names its streets', () => {
    const route = generateRoute(grid, { lat: 0.0001, lng: 0 }, {
      ...options,
      random: createRandom(5),
    })
    expect(grid.nodes[route.startNode].point).toEqual(center)
    expect(route.points[0]).toMatchObject({ lat: 0, lng: 0, distance: 0 })
    for (const point of route.points) expect(point.streetName).toMatch(/^(Row|Column) \d$/)
  })

  it('rejects an empty graph', () => {
    const empty = buildStreetGraph([], { kind: 'disk', center, radius: 100 })
    expect(() => generateRoute(empty, center, { ...options, random: createRandom(1) })).toThrow(
      CoverageError,
    )
  })
})
