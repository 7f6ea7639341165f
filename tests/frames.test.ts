// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import sharp from 'sharp'
import { describe, expect, it } from 'vitest'
import {
  blankFrame,
  escapeXml,
  formatDistance,
  NO_COVERAGE_TEXT,
  overlaySvg,
  SharpFrameRenderer,
} from '../src/lib/frames.js'

const size = { width: 640, height: 480 }

describe('overlaySvg', () => {
  it('draws nothing for a plain panorama frame', () => {
    expect(overlaySvg({ fallback: false }, size)).toBeNull()
  })

  it('labels fallback frames', () => {
    expect(overlaySvg({ fallback: true }, size)).toContain(`>${NO_COVERAGE_TEXT}</text>`)
    expect(overlaySvg({ fallback: false, streetName: 'Elm Row' }, size)).not.toContain(
      NO_COVERAGE_TEXT,
    )
  })

  it('escapes street names', () => {
    const svg = overlaySvg({ fallback: false, streetName: 'Rue "A" & <B>' }, size)
    expect(svg).toContain('>Rue &quot;A&quot; &amp; &lt;B&gt;</text>')
  })

  it('fills the progress bar in proportion', () => {
    // 16px margins on each side of a 640px frame
    const svg = overlaySvg({ fallback: false, progress: 0.5 }, size)
    expect(svg).toContain('<rect x="16" y="459" width="608" height="5" ')
    expect(svg).toContain('<rect x="16" y="459" width="304" height="5" fill="#fff"/>')
  })

  it('shows the distance walked', () => {
    const svg = overlaySvg({ fallback: false, distance: 1234 }, size)
    expect(svg).toContain('text-anchor="end"')
    expect(svg).toContain('>1.23 km</text>')
  })
})

describe('formatting', () => {
  it('formats kilometres', () => {
    expect(formatDistance(0)).toBe('0.00 km')
    expect(formatDistance(4800)).toBe('4.80 km')
  })

  it('escapes XML', () => {
    expect(escapeXml(`a<b>&'c'`)).toBe('a&lt;b&gt;&amp;&apos;c&apos;')
  })
})

describe('SharpFrameRenderer', () => {
  const small = { width: 64, height: 48 }

  it('renders a missing image as black', async () => {
    const renderer = new SharpFrameRenderer()
    expect(await renderer.decode(null, small)).toEqual(blankFrame(small))
    expect(blankFrame(small)).toHaveLength(64 * 48 * 3)
  })

  it('decodes an image to raw RGB', async () => {
    const red = await sharp({
      create: { width: 2, height: 2, channels: 3, background: { r: 255, g: 0, b: 0 } },
    })
      .png()
      .toBuffer()
    const pixels = await new SharpFrameRenderer().decode(red, { width: 2, height: 2 })
    expect([...pixels]).toEqual([255, 0, 0, 255, 0, 0, 255, 0, 0, 255, 0, 0])
  })

  it('replaces an unreadable image with a blank frame and warns', async () => {
    const warnings: string[] = []
    const renderer = new SharpFrameRenderer((m) => warnings.push(m))
    const pixels = await renderer.decode(Buffer.from('not an image'), small)
    expect(pixels).toEqual(blankFrame(small))
    expect(warnings).toHaveLength(1)
    expect(warnings[0]).toMatch(/^Unreadable image replaced by a blank frame: /)
  })

  it('composites the overlay onto the frame', async () => {
    const renderer = new SharpFrameRenderer()
    const out = await renderer.compose(blankFrame(small), { fallback: false, progress: 1 }, small)
    expect(out).toHaveLength(64 * 48 * 3)
    // Inside the filled progress bar: x 8..56, y 37..40
    const offset = (38 * 64 + 20) * 3
    expect([...out.subarray(offset, offset + 3)]).toEqual([255, 255, 255])
    expect([...out.subarray(0, 3)]).toEqual([0, 0, 0])
  })

  it('returns the frame untouched when there is nothing to draw', async () => {
    const frame = blankFrame(small)
    expect(await new SharpFrameRenderer().compose(frame, { fallback: false }, small)).toBe(frame)
  })
})
