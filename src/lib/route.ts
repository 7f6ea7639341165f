// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { CoverageError } from './errors.js'
import { bearing, distance, GeoPoint, interpolate } from './geo.js'
import { nearestNode, otherEnd, StreetEdge, StreetGraph } from './graph.js'
import { assert, Random } from './utils.js'

export interface RoutePoint extends GeoPoint {
  /** Meters from the start of the route */
  readonly distance: number
  /** (0, 90, 180, 270) = (north, east, south, west), toward the next point */
  readonly heading: number
  /** Edge the point lies on, -1 for a route without edges */
  readonly edgeId: number
  readonly streetName?: string
}

/** Walked polyline; `edgeIds[i]` is the edge of the segment ending at `coords[i + 1]` */
export interface WalkedPath {
  readonly coords: readonly GeoPoint[]
  readonly edgeIds: readonly number[]
  readonly length: number
}

export type EdgeWeighting = (edge: StreetEdge) => number

/** Streets with more points of interest are proportionally more likely */
export const interestWeighting: EdgeWeighting = (edge) => 1 + edge.interest

/**
 * Weighted random choice. Weights need not be normalized; equal weights resolve
 * toward the earlier candidate for the same random draw.
 */
export function chooseNextEdge(
  candidates: readonly number[],
  weights: readonly number[],
  random: Random,
): number {
  assert(candidates.length > 0, 'No candidate edges')
  assert(candidates.length === weights.length, 'Candidates and weights differ in length')
  const total = weights.reduce((sum, w) => sum + Math.max(0, w), 0)
  if (total <= 0) return candidates[Math.floor(random() * candidates.length)]
  let threshold = random() * total
  for (let i = 0; i < candidates.length; i++) {
    threshold -= Math.max(0, weights[i])
    if (threshold < 0) return candidates[i]
  }
  return candidates[candidates.length - 1]
}

export interface WanderOptions {
  targetLength: number
  random: Random
  weighting?: EdgeWeighting
  /** Upper bound on traversed edges */
  maxSteps?: number
}

export function wander(
  graph: StreetGraph,
  startNode: number,
  { targetLength, random, weighting = interestWeighting, maxSteps = 100_000 }: WanderOptions,
): WalkedPath {
  const coords: GeoPoint[] = [graph.nodes[startNode].point]
  const edgeIds: number[] = []
  const visited = new Set<number>()
  let node = startNode
  let previous: number | null = null
  let length = 0

  for (let step = 0; length < targetLength; step++) {
    if (step >= maxSteps) {
      throw new CoverageError(`Route stalled at ${length.toFixed(0)}m after ${maxSteps} edges`)
    }
    const incident = graph.adjacency[node]
    if (incident.length === 0) {
      throw new CoverageError('Start location is not connected to any street')
    }

    // No immediate back-and-forth, except at a dead end
    let candidates = incident.filter((id) => id !== previous)
    if (candidates.length === 0) candidates = [...incident]
    const fresh = candidates.filter((id) => !visited.has(id))
    const pool = fresh.length > 0 ? fresh : candidates

    const edgeId = chooseNextEdge(
      pool,
      pool.map((id) => weighting(graph.edges[id])),
      random,
    )
    const edge = graph.edges[edgeId]
    const geometry = edge.from === node ? edge.geometry : [...edge.geometry].reverse()

    const remaining = targetLength - length
    if (edge.length >= remaining) {
      for (const point of truncate(geometry, remaining)) {
        coords.push(point)
        edgeIds.push(edgeId)
      }
      length = targetLength
      break
    }

    for (const point of geometry.slice(1)) {
      coords.push(point)
      edgeIds.push(edgeId)
    }
    length += edge.length
    visited.add(edgeId)
    previous = edgeId
    node = otherEnd(edge, node)
  }

  return { coords, edgeIds, length }
}

/** Vertices after the first, cut so the polyline is `meters` long */
function truncate(geometry: readonly GeoPoint[], meters: number): GeoPoint[] {
  let walked = 0
  for (let i = 0; i + 1 < geometry.length; i++) {
    const d = distance(geometry[i], geometry[i + 1])
    if (walked + d >= meters) {
      const end =
        d > 0 ? interpolate(geometry[i], geometry[i + 1], (meters - walked) / d) : geometry[i + 1]
      return [...geometry.slice(1, i + 1), end]
    }
    walked += d
  }
  return geometry.slice(1)
}

/** Points every `interval` meters, plus the exact end when it is not already a sample */
export function resampleRoute(path: WalkedPath, interval: number): RoutePoint[] {
  assert(interval > 0, 'Sampling interval must be positive')
  const { coords, edgeIds } = path
  const samples: { point: GeoPoint; distance: number; edgeId: number }[] = []

  let walked = 0
  let k = 0
  for (let i = 0; i + 1 < coords.length; i++) {
    const a = coords[i]
    const b = coords[i + 1]
    const d = distance(a, b)
    if (d === 0) continue
    while (k * interval <= walked + d) {
      const at = k * interval
      const point = interpolate(a, b, (at - walked) / d)
      samples.push({ point, distance: at, edgeId: edgeIds[i] })
      k++
    }
    walked += d
  }

  const last = samples[samples.length - 1]
  if (!last) {
    return coords.length > 0 ? [{ ...coords[0], distance: 0, heading: 0, edgeId: -1 }] : []
  }
  if (walked - last.distance > 1e-6) {
    samples.push({
      point: coords[coords.length - 1],
      distance: Math.max(path.length, last.distance),
      edgeId: edgeIds[edgeIds.length - 1],
    })
  }

  const points: RoutePoint[] = []
  let heading = 0
  for (let i = 0; i < samples.length; i++) {
    const { point, distance: at, edgeId } = samples[i]
    const next = samples[i + 1]
    // Coincident neighbours happen when the walk turns around at a dead end
    if (next && distance(point, next.point) > 1e-6) heading = bearing(point, next.point)
    points.push({ lat: point.lat, lng: point.lng, distance: at, heading, edgeId })
  }
  return points
}

export interface RouteOptions {
  targetLength: number
  /** Meters between route points */
  interval: number
  random: Random
  weighting?: EdgeWeighting
}

export interface Route {
  readonly points: readonly RoutePoint[]
  /** Always the target length: the last edge is cut where the walk reaches it */
  readonly length: number
  readonly startNode: number
}

export function generateRoute(
  graph: StreetGraph,
  start: GeoPoint,
  { targetLength, interval, random, weighting }: RouteOptions,
): Route {
  assert(targetLength > 0, 'Target length must be positive')
  const nearest = nearestNode(graph, start)
  if (!nearest) throw new CoverageError('No walkable streets found in this area')

  const path = wander(graph, nearest.id, { targetLength, random, weighting })

  const points = resampleRoute(path, interval).map((point) => {
    const name = graph.edges[point.edgeId]?.name
    return name ? { ...point, streetName: name } : point
  })
  return { points, length: path.length, startNode: nearest.id }
}
