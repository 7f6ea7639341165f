// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { CoverageError } from './errors.js'
import {
  distance,
  GeoPoint,
  normalizeLongitude,
  pointInArea,
  polylineLength,
  segmentIntersectsArea,
  WalkableArea,
} from './geo.js'

/** A street polyline as delivered by the street data provider */
export interface RawSegment {
  id: string
  coords: readonly GeoPoint[]
  name?: string
  highway?: string
  /** Number of points of interest along the segment */
  interest?: number
}

export interface StreetNode {
  readonly id: number
  readonly point: GeoPoint
  /** Lies outside the walkable area; reachable, but only as the end of a boundary edge */
  readonly soft: boolean
}

export interface StreetEdge {
  readonly id: number
  readonly from: number
  readonly to: number
  /** Full polyline from `from` to `to` */
  readonly geometry: readonly GeoPoint[]
  readonly length: number
  readonly interest: number
  readonly name?: string
  readonly segmentId: string
}

export interface StreetGraph {
  readonly nodes: readonly StreetNode[]
  readonly edges: readonly StreetEdge[]
  /** Node id to incident edge ids, ascending */
  readonly adjacency: readonly (readonly number[])[]
}

export interface BuildGraphOptions {
  /** Vertices closer than this (meters) become one node */
  mergeTolerance?: number
}

interface RunVertex {
  point: GeoPoint
  soft: boolean
}

export function buildStreetGraph(
  segments: readonly RawSegment[],
  area: WalkableArea,
  { mergeTolerance = 5 }: BuildGraphOptions = {},
): StreetGraph {
  const origin = area.kind === 'disk' ? area.center : area.ring[0]
  const merger = new VertexMerger(mergeTolerance, origin)

  // 1-3. Clip to the area and merge vertices shared between segments
  const runs: { segment: RawSegment; ids: number[] }[] = []
  for (const segment of segments) {
    for (const run of clipSegment(segment, area)) {
      const ids: number[] = []
      for (const vertex of run) {
        const id = merger.add(vertex.point, vertex.soft)
        if (ids[ids.length - 1] !== id) ids.push(id)
      }
      if (ids.length >= 2) runs.push({ segment, ids })
    }
  }

  const uses = new Map<number, number>()
  for (const { ids } of runs) {
    for (const id of ids) uses.set(id, (uses.get(id) ?? 0) + 1)
  }
  const isJunction = (ids: number[], k: number) =>
    k === 0 || k === ids.length - 1 || (uses.get(ids[k]) ?? 0) > 1

  // 4. Split runs at junctions; only junctions survive as graph nodes
  const renumber = new Map<number, number>()
  const nodes: StreetNode[] = []
  const nodeId = (vertexId: number) => {
    let id = renumber.get(vertexId)
    if (id === undefined) {
      id = nodes.length
      renumber.set(vertexId, id)
      nodes.push({ id, point: merger.point(vertexId), soft: merger.soft(vertexId) })
    }
    return id
  }

  const edges: StreetEdge[] = []
  for (const { segment, ids } of runs) {
    let start = 0
    for (let k = 1; k < ids.length; k++) {
      if (!isJunction(ids, k)) continue
      const geometry = ids.slice(start, k + 1).map((id) => merger.point(id))
      const length = polylineLength(geometry)
      if (length > 0) {
        edges.push({
          id: edges.length,
          from: nodeId(ids[start]),
          to: nodeId(ids[k]),
          geometry,
          length,
          interest: segment.interest ?? 0,
          name: segment.name,
          segmentId: segment.id,
        })
      }
      start = k
    }
  }

  const adjacency: number[][] = nodes.map(() => [])
  for (const edge of edges) {
    adjacency[edge.from].push(edge.id)
    if (edge.to !== edge.from) adjacency[edge.to].push(edge.id)
  }

  return { nodes, edges, adjacency }
}

/**
 * Maximal inside runs, each extended by the outside vertex next to it, plus single edges
 * whose ends are both outside but which pass through the area
 */
function clipSegment(segment: RawSegment, area: WalkableArea): RunVertex[][] {
  const { coords } = segment
  const inside = coords.map((p) => pointInArea(p, area))
  const runs: RunVertex[][] = []
  let i = 0
  while (i < coords.length) {
    if (!inside[i]) {
      const next = i + 1
      if (
        next < coords.length &&
        !inside[next] &&
        segmentIntersectsArea(coords[i], coords[next], area)
      ) {
        runs.push([
          { point: coords[i], soft: true },
          { point: coords[next], soft: true },
        ])
      }
      i++
      continue
    }
    let j = i
    while (j + 1 < coords.length && inside[j + 1]) j++
    const first = Math.max(0, i - 1)
    const last = Math.min(coords.length - 1, j + 1)
    const run: RunVertex[] = []
    for (let k = first; k <= last; k++) run.push({ point: coords[k], soft: !inside[k] })
    if (run.length >= 2) runs.push(run)
    i = j + 1
  }
  return runs
}

/** Grid hash over an equirectangular projection around `origin` */
class VertexMerger {
  private points: GeoPoint[] = []
  private softFlags: boolean[] = []
  private cells = new Map<string, number[]>()
  private metersPerDegLat = 111320
  private metersPerDegLng: number

  constructor(
    private tolerance: number,
    private origin: GeoPoint,
  ) {
    this.metersPerDegLng = 111320 * Math.max(0.01, Math.cos((origin.lat * Math.PI) / 180))
  }

  add(point: GeoPoint, soft: boolean): number {
    const cellSize = Math.max(this.tolerance, 1e-6)
    const east = normalizeLongitude(point.lng - this.origin.lng) * this.metersPerDegLng
    const x = Math.floor(east / cellSize)
    const y = Math.floor(((point.lat - this.origin.lat) * this.metersPerDegLat) / cellSize)

    for (let dx = -1; dx <= 1; dx++) {
      for (let dy = -1; dy <= 1; dy++) {
        for (const id of this.cells.get(`${x + dx},${y + dy}`) ?? []) {
          if (distance(this.points[id], point) <= this.tolerance) {
            if (!soft) this.softFlags[id] = false
            return id
          }
        }
      }
    }

    const id = this.points.length
    this.points.push(point)
    this.softFlags.push(soft)
    const key = `${x},${y}`
    const cell = this.cells.get(key)
    if (cell) cell.push(id)
    else this.cells.set(key, [id])
    return id
  }

  point(id: number): GeoPoint {
    return this.points[id]
  }

  soft(id: number): boolean {
    return this.softFlags[id]
  }
}

export function otherEnd(edge: StreetEdge, node: number): number {
  return edge.from === node ? edge.to : edge.from
}

export function nearestNode(
  graph: StreetGraph,
  point: GeoPoint,
): { id: number; distance: number } | null {
  let best: { id: number; distance: number } | null = null
  for (const node of graph.nodes) {
    const d = distance(node.point, point)
    if (!best || d < best.distance) best = { id: node.id, distance: d }
  }
  return best
}

/** Total edge length of the connected component containing `start` */
export function componentLength(graph: StreetGraph, start: number): number {
  const seenNodes = new Set([start])
  const seenEdges = new Set<number>()
  const stack = [start]
  let total = 0
  while (stack.length > 0) {
    const node = stack.pop() ?? start
    for (const edgeId of graph.adjacency[node]) {
      if (seenEdges.has(edgeId)) continue
      seenEdges.add(edgeId)
      const edge = graph.edges[edgeId]
      total += edge.length
      const next = otherEnd(edge, node)
      if (!seenNodes.has(next)) {
        seenNodes.add(next)
        stack.push(next)
      }
    }
  }
  return total
}

/** Returns the node the route starts from */
export function assertCoverage(
  graph: StreetGraph,
  start: GeoPoint,
  targetLength: number,
  snapTolerance = 250,
): number {
  const nearest = nearestNode(graph, start)
  if (!nearest || nearest.distance > snapTolerance) {
    throw new CoverageError(
      nearest
        ? `Nearest street is ${nearest.distance.toFixed(0)}m away (limit ${snapTolerance}m)`
        : 'No walkable streets found in this area',
    )
  }
  const reachable = componentLength(graph, nearest.id)
  if (reachable < targetLength) {
    throw new CoverageError(
      `Only ${reachable.toFixed(0)}m of streets reachable from the start, need ${targetLength}m`,
    )
  }
  return nearest.id
}
