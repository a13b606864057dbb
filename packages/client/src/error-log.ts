/**
 * @studycache/client - Bounded error log
 *
 * Kept so a user can export recent failures with a support request.
 */

import { logCacheEvent } from '@studycache/core';
import { sql } from 'kysely';
import type { ErrorLogEntryInput } from './errors';
import type { LocalCacheExecutor } from './schema';

export interface ErrorLogEntry {
  date: string;
  stack: string | null;
  code: number | null;
  description: string | null;
  requestUrl: string | null;
  responseUrl: string | null;
  requestData: string | null;
  requestHeaders: string | null;
  responseHeaders: string | null;
  responseData: string | null;
}

/**
 * Insert an entry, pruning so that at most `limit` rows remain.
 */
export async function recordErrorLogEntry(
  db: LocalCacheExecutor,
  entry: ErrorLogEntryInput,
  options: { limit?: number } = {}
): Promise<void> {
  const limit = options.limit ?? 100;

  await db.transaction().execute(async (trx) => {
    await sql`
      delete from ${sql.table('error_log')}
      where rowid in (
        select rowid from ${sql.table('error_log')}
        order by rowid desc
        limit -1 offset ${sql.val(limit - 1)}
      )
    `.execute(trx);

    await trx
      .insertInto('error_log')
      .values({
        stack: entry.stack ?? null,
        code: entry.code ?? null,
        description: entry.description ?? null,
        request_url: entry.requestUrl ?? null,
        response_url: entry.responseUrl ?? null,
        request_data: entry.requestData ?? null,
        request_headers: entry.requestHeaders ?? null,
        response_headers: entry.responseHeaders ?? null,
        response_data: entry.responseData ?? null,
      })
      .execute();
  });

  logCacheEvent({
    event: 'cache.error_logged',
    level: 'warn',
    code: entry.code ?? undefined,
    error: entry.description ?? undefined,
  });
}

/**
 * Newest first.
 */
export async function getErrorLogEntries(
  db: LocalCacheExecutor
): Promise<ErrorLogEntry[]> {
  const rows = await db
    .selectFrom('error_log')
    .selectAll()
    .orderBy(sql`rowid`, 'desc')
    .execute();

  return rows.map((row) => ({
    date: row.date,
    stack: row.stack,
    code: row.code,
    description: row.description,
    requestUrl: row.request_url,
    responseUrl: row.response_url,
    requestData: row.request_data,
    requestHeaders: row.request_headers,
    responseHeaders: row.response_headers,
    responseData: row.response_data,
  }));
}
