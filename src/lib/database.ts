// Copyright 2024 omasakun <omasakun@o137.net>.
//
// This Source Code Form is subject to the terms of the Mozilla Public License, v. 2.0.
// If a copy of the MPL was not distributed with this file, You can obtain one at https://mozilla.org/MPL/2.0/.

import Database from 'better-sqlite3'
import { decodeMsgpackGzip, deterministicJsonStringify, encodeMsgpackGzip } from './utils.js'

export type ResponseKind =
  | 'geocode'
  | 'reverse-geocode'
  | 'isochrone'
  | 'streets'
  | 'panorama-metadata'

interface ResponseRow {
  response: Buffer
}

interface CountRow {
  n: number
}

/** Provider responses keyed by their request, so a re-run needs no lookups */
export class ResponseDatabase {
  constructor(private db: Database.Database) {}

  static open(filename: string, initialize = true) {
    const db = new Database(filename)
    const database = new ResponseDatabase(db)
    if (initialize) database.initialize()
    return database
  }

  close() {
    this.db.close()
  }

  initialize() {
    this.db.exec(
      `
      CREATE TABLE IF NOT EXISTS provider_response (
        kind TEXT NOT NULL,
        request TEXT NOT NULL,
        response BLOB NOT NULL,
        created_at INTEGER NOT NULL,
        PRIMARY KEY (kind, request)
      );
      `,
    )
  }

  insert(kind: ResponseKind, request: object, response: unknown) {
    this.db
      .prepare(
        `INSERT OR REPLACE INTO provider_response (kind, request, response, created_at)
         VALUES (?, ?, ?, ?)`,
      )
      .run(kind, deterministicJsonStringify(request), encodeMsgpackGzip(response), Date.now())
  }

  select(kind: ResponseKind, request: object): { response: unknown } | null {
    const row = this.db
      .prepare<[string, string], ResponseRow>(
        'SELECT response FROM provider_response WHERE kind = ? AND request = ?',
      )
      .get(kind, deterministicJsonStringify(request))
    if (!row) return null
    return { response: decodeMsgpackGzip(row.response) }
  }

  count(kind?: ResponseKind): number {
    const row = kind
      ? this.db
          .prepare<[string], CountRow>('SELECT COUNT(*) AS n FROM provider_response WHERE kind = ?')
          .get(kind)
      : this.db.prepare<[], CountRow>('SELECT COUNT(*) AS n FROM provider_response').get()
    return row?.n ?? 0
  }

  /** Looks the request up first, and stores what `fetch` returns otherwise */
  async remember(
    kind: ResponseKind,
    request: object,
    fetch: () => Promise<unknown>,
  ): Promise<unknown> {
    const cached = this.select(kind, request)
    if (cached) return cached.response
    const response = await fetch()
    this.insert(kind, request, response)
    return response
  }
}

/** Same contract as the database, for runs without one */
export async function rememberResponse(
  db: ResponseDatabase | undefined,
  kind: ResponseKind,
  request: object,
  fetch: () => Promise<unknown>,
): Promise<unknown> {
  return db ? db.remember(kind, request, fetch) : fetch()
}
