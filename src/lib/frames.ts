// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import sharp from 'sharp'
import { ImageSize } from './streetview.js'
import { FrameRenderer, OverlayContent } from './video.js'

export const NO_COVERAGE_TEXT = 'No street-level coverage'

/** Decodes captured images to raw RGB and draws overlays with sharp */
export class SharpFrameRenderer implements FrameRenderer {
  constructor(private onWarning?: (message: string) => void) {}

  async decode(image: Buffer | null, { width, height }: ImageSize): Promise<Buffer> {
    if (!image) return blankFrame({ width, height })
    try {
      return await sharp(image)
        .resize(width, height, { fit: 'cover' })
        .removeAlpha()
        .toColourspace('srgb')
        .raw()
        .toBuffer()
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e)
      this.onWarning?.(`Unreadable image replaced by a blank frame: ${reason}`)
      return blankFrame({ width, height })
    }
  }

  async compose(pixels: Buffer, overlay: OverlayContent, { width, height }: ImageSize) {
    const svg = overlaySvg(overlay, { width, height })
    if (!svg) return pixels
    return sharp(pixels, { raw: { width, height, channels: 3 } })
      .composite([{ input: Buffer.from(svg), top: 0, left: 0 }])
      .removeAlpha()
      .raw()
      .toBuffer()
  }
}

export function blankFrame({ width, height }: ImageSize): Buffer {
  return Buffer.alloc(width * height * 3)
}

/** SVG drawn over the frame, or null when there is nothing to draw */
export function overlaySvg(overlay: OverlayContent, { width, height }: ImageSize): string | null {
  const font = Math.max(10, Math.round(height / 24))
  const margin = Math.round(font * 0.8)
  const barHeight = Math.max(2, Math.round(font / 4))
  const parts: string[] = []
  const text = (x: number, y: number, content: string, anchor = 'start') =>
    `<text x="${x}" y="${y}" font-size="${font}" text-anchor="${anchor}" ` +
    `font-family="sans-serif" fill="#fff" stroke="#000" stroke-width="${Math.max(1, font / 12)}" ` +
    `paint-order="stroke">${escapeXml(content)}</text>`

  if (overlay.fallback) {
    const boxWidth = Math.round(NO_COVERAGE_TEXT.length * font * 0.6 + margin * 2)
    parts.push(
      `<rect x="${margin}" y="${margin}" width="${boxWidth}" height="${font + margin}" ` +
        `rx="${Math.round(margin / 2)}" fill="#000" fill-opacity="0.6"/>`,
      text(margin * 2, margin + font, NO_COVERAGE_TEXT),
    )
  }

  const baseline = height - margin - (overlay.progress === undefined ? 0 : barHeight + margin)
  if (overlay.streetName) parts.push(text(margin, baseline, overlay.streetName))
  if (overlay.distance !== undefined) {
    parts.push(text(width - margin, baseline, formatDistance(overlay.distance), 'end'))
  }

  if (overlay.progress !== undefined) {
    const track = width - margin * 2
    const filled = Math.round(track * Math.min(1, Math.max(0, overlay.progress)))
    const y = height - margin - barHeight
    parts.push(
      `<rect x="${margin}" y="${y}" width="${track}" height="${barHeight}" ` +
        `fill="#000" fill-opacity="0.5"/>`,
      `<rect x="${margin}" y="${y}" width="${filled}" height="${barHeight}" fill="#fff"/>`,
    )
  }

  if (parts.length === 0) return null
  const open = `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">`
  return `${open}${parts.join('')}</svg>`
}

export function formatDistance(meters: number): string {
  return `${(meters / 1000).toFixed(2)} km`
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;')
}
