// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { GeoPoint } from '../src/lib/geo.js'
import { RawSegment } from '../src/lib/graph.js'
import { RoutePoint } from '../src/lib/route.js'
import {
  FallbackImageProvider,
  ImageSize,
  PanoramaAvailability,
  PanoramaProvider,
  PanoramaView,
} from '../src/lib/streetview.js'
import { FrameRenderer, OverlayContent, VideoEncoder, VideoSpec } from '../src/lib/video.js'

/** `n` streets each way, `step` degrees apart, centred on `center` */
export function gridSegments(center: GeoPoint, n: number, step: number): RawSegment[] {
  const offset = (i: number) => (i - (n - 1) / 2) * step
  const segments: RawSegment[] = []
  for (let i = 0; i < n; i++) {
    const row: GeoPoint[] = []
    const column: GeoPoint[] = []
    for (let j = 0; j < n; j++) {
      row.push({ lat: center.lat + offset(i), lng: center.lng + offset(j) })
      column.push({ lat: center.lat + offset(j), lng: center.lng + offset(i) })
    }
    segments.push({ id: `row/${i}`, coords: row, name: `Row ${i}` })
    segments.push({ id: `column/${i}`, coords: column, name: `Column ${i}` })
  }
  return segments
}

/** Points due east along the equator, `spacing` degrees apart */
export function routePoints(count: number, spacing = 0.0001): RoutePoint[] {
  return Array.from({ length: count }, (_, i) => ({
    lat: 0,
    lng: i * spacing,
    distance: i * 10,
    heading: 90,
    edgeId: i,
  }))
}

export class FakePanoramas implements PanoramaProvider {
  metadataCalls = 0
  imageCalls = 0

  constructor(
    private available: (point: GeoPoint) => boolean = () => true,
    private delay: (point: GeoPoint) => number = () => 0,
  ) {}

  async metadata(point: GeoPoint): Promise<PanoramaAvailability> {
    this.metadataCalls++
    return { available: this.available(point) }
  }

  async fetchImage(point: GeoPoint, view: PanoramaView): Promise<Buffer> {
    this.imageCalls++
    const ms = this.delay(point)
    if (ms > 0) await new Promise((resolve) => setTimeout(resolve, ms))
    return Buffer.from(`pano ${point.lng.toFixed(4)} ${view.heading}`)
  }
}

export class FakeFallback implements FallbackImageProvider {
  calls = 0

  constructor(private fail = false) {}

  async fetchImage(point: GeoPoint, size: ImageSize): Promise<Buffer> {
    this.calls++
    if (this.fail) throw new Error('map unavailable')
    return Buffer.from(`map ${point.lng.toFixed(4)} ${size.width}x${size.height}`)
  }
}

/** Every image becomes a frame filled with its first byte; blank frames are 0 */
export class FakeRenderer implements FrameRenderer {
  overlays: OverlayContent[] = []

  async decode(image: Buffer | null, size: ImageSize): Promise<Buffer> {
    return Buffer.alloc(size.width * size.height * 3, image ? image[0] : 0)
  }

  async compose(pixels: Buffer, overlay: OverlayContent): Promise<Buffer> {
    this.overlays.push(overlay)
    return pixels
  }
}

export class FakeEncoder implements VideoEncoder {
  frames: Buffer[] = []
  calls = 0
  signal?: AbortSignal

  async encode(
    frames: AsyncIterable<Buffer>,
    _spec: VideoSpec,
    outputPath: string,
    signal?: AbortSignal,
  ) {
    this.calls++
    this.signal = signal
    for await (const frame of frames) this.frames.push(frame)
    return outputPath
  }
}

export function videoSpec(overrides: Partial<VideoSpec> = {}): VideoSpec {
  return {
    width: 2,
    height: 1,
    duration: 1,
    fps: 10,
    crossfade: 2,
    codec: 'libx264',
    overlay: { streetName: true, distance: true, progressBar: true },
    ...overrides,
  }
}
