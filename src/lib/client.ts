// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { IncomingMessage } from 'node:http'
import https, { RequestOptions } from 'node:https'
import pLimit from 'p-limit'
import { SocksProxyAgent } from 'socks-proxy-agent'
import { ProviderError } from './errors.js'
import { sleep } from './utils.js'

export interface FetchInit {
  method?: 'GET' | 'POST'
  headers?: Record<string, string>
  body?: string
}

export interface FetchClient {
  getText(url: string, init?: FetchInit): Promise<string>
  getBuffer(url: string, init?: FetchInit): Promise<Buffer>
}

export interface ClientOptions {
  concurrencyLimit?: number
  /** Attempts per request, including the first */
  retryLimit?: number
  /** Base delay in ms, doubled after every failed attempt */
  retryDelay?: number
}

/** One HTTP exchange; rejects only when no response arrived */
export type Transport = (url: string, init: FetchInit) => Promise<{ status: number; body: Buffer }>

/** Limits concurrency, retries transient failures and rejects non-2xx answers */
export function createRequestClient(
  send: Transport,
  { concurrencyLimit = 8, retryLimit = 3, retryDelay = 1000 }: ClientOptions = {},
): FetchClient {
  const fetchLimit = pLimit(concurrencyLimit)

  const request = (url: string, init: FetchInit) =>
    fetchLimit(() =>
      retry(
        async () => {
          const { status, body } = await send(url, init)
          if (status < 200 || status >= 300) {
            throw new ProviderError(`Request to ${redact(url)} returned ${status}`, { status })
          }
          return body
        },
        { retryLimit, retryDelay },
      ),
    )

  return {
    async getText(url: string, init: FetchInit = {}) {
      return (await request(url, init)).toString('utf-8')
    },
    async getBuffer(url: string, init: FetchInit = {}) {
      return request(url, init)
    },
  }
}

export function createFetchClient(options: ClientOptions = {}): FetchClient {
  return createRequestClient(async (url, init) => {
    let response: Response
    try {
      response = await fetch(url, init)
    } catch (e) {
      throw new ProviderError(`Request to ${redact(url)} failed`, { cause: e })
    }
    return { status: response.status, body: Buffer.from(await response.arrayBuffer()) }
  }, options)
}

/** Routes every request through a SOCKS proxy, e.g. `socks5h://localhost:9050` */
export function createProxyClient(proxyUrl: string, options: ClientOptions = {}): FetchClient {
  const agent = new SocksProxyAgent(proxyUrl)
  return createRequestClient(async (url, init) => {
    const response = await requestHttps(url, init, { agent })
    const chunks: Buffer[] = []
    try {
      for await (const chunk of response) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
      }
    } catch (e) {
      throw new ProviderError(`Request to ${redact(url)} failed`, { cause: e })
    }
    return { status: response.statusCode ?? 0, body: Buffer.concat(chunks) }
  }, options)
}

function requestHttps(
  url: string,
  init: FetchInit,
  options: RequestOptions = {},
): Promise<IncomingMessage> {
  return new Promise((resolve, reject) => {
    const request = https
      .request(url, { ...options, method: init.method ?? 'GET', headers: init.headers }, resolve)
      .on('error', (e) =>
        reject(new ProviderError(`Request to ${redact(url)} failed`, { cause: e })),
      )
    if (init.body !== undefined) request.write(init.body)
    request.end()
  })
}

/** Retries transient failures with exponential backoff */
export async function retry<T>(
  fn: () => Promise<T>,
  options: { retryLimit: number; retryDelay: number },
): Promise<T> {
  const { retryLimit, retryDelay } = options
  let i = 0
  while (true) {
    try {
      return await fn()
    } catch (e) {
      const transient = !(e instanceof ProviderError) || e.transient
      if (!transient || i >= retryLimit - 1) throw e
    }
    await sleep(retryDelay * 2 ** i)
    i++
  }
}

/** Keeps API keys out of messages and logs */
export function redact(url: string): string {
  return url.replace(/([?&]key=)[^&]*/g, '$1***')
}
