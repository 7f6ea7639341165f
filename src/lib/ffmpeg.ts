// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { spawn } from 'node:child_process'
import { once } from 'node:events'
import { rename, rm } from 'node:fs/promises'
import { basename, dirname, extname, join } from 'node:path'
import { EncodingError, FlythroughError } from './errors.js'
import { makeDirectoryForFile } from './utils.js'
import { VideoEncoder, VideoSpec } from './video.js'

export interface FfmpegOptions {
  /** Defaults to `ffmpeg` on the PATH */
  executable?: string
  preset?: string
  crf?: number
}

/** Pipes raw RGB frames into an ffmpeg process */
export class FfmpegEncoder implements VideoEncoder {
  constructor(private options: FfmpegOptions = {}) {}

  async encode(
    frames: AsyncIterable<Buffer>,
    spec: VideoSpec,
    outputPath: string,
    signal?: AbortSignal,
  ) {
    signal?.throwIfAborted()
    const { executable = 'ffmpeg' } = this.options
    const frameBytes = spec.width * spec.height * 3
    const tempPath = temporaryPath(outputPath)
    makeDirectoryForFile(outputPath)

    const child = spawn(executable, ffmpegArgs(spec, tempPath, this.options), {
      stdio: ['pipe', 'ignore', 'pipe'],
    })
    let stderr = ''
    child.stderr.on('data', (chunk: Buffer) => {
      stderr = (stderr + chunk.toString('utf-8')).slice(-4000)
    })
    let pipeError: Error | undefined
    child.stdin.on('error', (e) => {
      pipeError = e
    })
    const state = { running: true }
    const exited = new Promise<{ code: number; error?: Error }>((resolve) => {
      child.on('error', (error) => {
        state.running = false
        resolve({ code: -1, error })
      })
      child.on('close', (code) => {
        state.running = false
        resolve({ code: code ?? -1 })
      })
    })

    // ffmpeg may also see the terminal's SIGINT and would finish the file on its own
    const stop = () => child.kill('SIGKILL')
    signal?.addEventListener('abort', stop, { once: true })

    try {
      for await (const frame of frames) {
        signal?.throwIfAborted()
        if (!state.running) break
        if (frame.length !== frameBytes) {
          throw new EncodingError(`Frame has ${frame.length} bytes, expected ${frameBytes}`)
        }
        if (!child.stdin.write(frame)) await Promise.race([once(child.stdin, 'drain'), exited])
      }
      child.stdin.end()

      const { code, error } = await exited
      signal?.throwIfAborted()
      if (error) {
        throw new EncodingError(`Could not start ${executable}: ${error.message}`, { cause: error })
      }
      if (code !== 0) {
        throw new EncodingError(`${executable} exited with code ${code}${tail(stderr)}`, {
          cause: pipeError,
        })
      }
      await rename(tempPath, outputPath)
      return outputPath
    } catch (e) {
      child.kill('SIGKILL')
      child.stdin.destroy()
      await exited
      await rm(tempPath, { force: true })
      if (e instanceof FlythroughError || signal?.aborted) throw e
      const message = e instanceof Error ? e.message : String(e)
      throw new EncodingError(`Encoding failed: ${message}${tail(stderr)}`, { cause: e })
    } finally {
      signal?.removeEventListener('abort', stop)
    }
  }
}

export function ffmpegArgs(spec: VideoSpec, outputPath: string, options: FfmpegOptions = {}) {
  const { preset = 'fast', crf = 23 } = options
  const args = ['-y', '-loglevel', 'error']
  args.push('-f', 'rawvideo', '-pix_fmt', 'rgb24', '-s', `${spec.width}x${spec.height}`)
  args.push('-r', String(spec.fps), '-i', '-')
  args.push('-c:v', spec.codec, '-pix_fmt', 'yuv420p')
  // Only the x264 family understands these
  if (/^libx26[45]$/.test(spec.codec)) args.push('-preset', preset, '-crf', String(crf))
  args.push('-movflags', '+faststart', outputPath)
  return args
}

/** Hidden sibling that keeps the extension, so ffmpeg still picks the container from it */
export function temporaryPath(outputPath: string): string {
  const ext = extname(outputPath)
  return join(dirname(outputPath), `.${basename(outputPath, ext)}.${process.pid}.partial${ext}`)
}

function tail(stderr: string): string {
  const lines = stderr.trim().split('\n').filter(Boolean).slice(-3)
  return lines.length > 0 ? `: ${lines.join(' | ')}` : ''
}
