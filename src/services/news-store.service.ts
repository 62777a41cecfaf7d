/**
 * News Store
 *
 * SQLite file holding the guid of every delivered item. The file is the
 * only state carried between runs, so it keeps the default rollback
 * journal rather than WAL.
 */

import fs from 'node:fs/promises'
import { dirname } from 'node:path'
import type { Knex } from 'knex'
import knex from 'knex'
import { StoreError } from '../types/errors.js'
import type { NewsItem, NewsItemRow } from '../types/news.types.js'
import type { Logger } from '../utils/logger.js'

export const NEWS_TABLE = 'news_items'

/** Rows per insert statement, below SQLite's bound-variable limit */
const INSERT_CHUNK_SIZE = 100

export interface NewsStoreOptions {
  log: Logger
  /** Drop existing rows, and replace a file that is not a database */
  initialize?: boolean
}

/**
 * Builds a NewsItemRow for an item about to be recorded.
 */
export function toNewsItemRow(item: NewsItem, topic: string | null): NewsItemRow {
  return {
    guid: item.guid,
    pub_date: item.pubDate ? item.pubDate.toISOString() : null,
    title: item.title,
    link: item.link,
    topic,
    related_news: JSON.stringify(item.related),
  }
}

function chunkArray<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = []
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size))
  }
  return chunks
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export class NewsStore {
  private closed = false

  private constructor(
    private knex: Knex,
    readonly path: string,
    private readonly log: Logger,
  ) {}

  /**
   * Creates Knex configuration for better-sqlite3
   *
   * @param dbPath - Path to the SQLite database file
   * @param log - Logger to use for database operations
   */
  private static createKnexConfig(dbPath: string, log: Logger): Knex.Config {
    return {
      client: 'better-sqlite3',
      connection: {
        filename: dbPath,
      },
      useNullAsDefault: true,
      pool: {
        min: 1,
        max: 1,
      },
      log: {
        warn: (message: string) => log.warn(message),
        error: (message: string | Error) => {
          log.error(message instanceof Error ? message.message : message)
        },
        debug: (message: string) => log.debug(message),
      },
      debug: false,
    }
  }

  /**
   * Opens the store, creating the file and table when absent.
   *
   * The file is checked with PRAGMA integrity_check. A file that fails the
   * check, or cannot be read as a database at all, raises StoreError unless
   * `initialize` is set, in which case it is rebuilt from scratch.
   *
   * @throws StoreError
   */
  static async open(dbPath: string, options: NewsStoreOptions): Promise<NewsStore> {
    const { log, initialize = false } = options

    try {
      await fs.mkdir(dirname(dbPath), { recursive: true })
    } catch (error) {
      throw new StoreError(
        `Cannot create directory for ${dbPath}: ${errorMessage(error)}`,
        dbPath,
        { cause: error },
      )
    }

    const store = new NewsStore(
      knex(NewsStore.createKnexConfig(dbPath, log)),
      dbPath,
      log,
    )

    try {
      await store.verifyIntegrity()
    } catch (error) {
      if (!initialize) {
        await store.close()
        throw error instanceof StoreError
          ? error
          : new StoreError(
              `Cannot read store ${dbPath}: ${errorMessage(error)}`,
              dbPath,
              { cause: error },
            )
      }
      log.warn(
        { path: dbPath, error },
        'Store is unreadable, replacing it with an empty one',
      )
      await store.recreateFile()
    }

    try {
      if (initialize) {
        await store.knex.schema.dropTableIfExists(NEWS_TABLE)
        log.info({ path: dbPath }, 'Initialize mode: store cleared')
      }
      await store.ensureSchema()
    } catch (error) {
      await store.close()
      throw new StoreError(
        `Cannot prepare store ${dbPath}: ${errorMessage(error)}`,
        dbPath,
        { cause: error },
      )
    }

    return store
  }

  private async verifyIntegrity(): Promise<void> {
    const result: unknown = await this.knex.raw('PRAGMA integrity_check')
    const rows: unknown[] = Array.isArray(result) ? result : []
    const messages = rows.flatMap((row) =>
      typeof row === 'object' && row !== null
        ? Object.values(row).filter(
            (value): value is string => typeof value === 'string',
          )
        : [],
    )

    if (messages.some((message) => message !== 'ok')) {
      throw new StoreError(
        `Store ${this.path} failed its integrity check: ${messages.join('; ')}`,
        this.path,
      )
    }
  }

  private async recreateFile(): Promise<void> {
    await this.knex.destroy()
    try {
      await fs.rm(this.path, { force: true })
      await fs.rm(`${this.path}-journal`, { force: true })
    } catch (error) {
      throw new StoreError(
        `Cannot remove unreadable store ${this.path}: ${errorMessage(error)}`,
        this.path,
        { cause: error },
      )
    }
    this.knex = knex(NewsStore.createKnexConfig(this.path, this.log))
  }

  private async ensureSchema(): Promise<void> {
    const exists = await this.knex.schema.hasTable(NEWS_TABLE)
    if (exists) return

    await this.knex.schema.createTable(NEWS_TABLE, (table) => {
      table.string('guid').primary()
      table.string('pub_date').nullable()
      table.text('title').notNullable()
      table.text('link').nullable()
      table.string('topic').nullable()
      table.text('related_news').nullable()
      table.timestamp('created_at').defaultTo(this.knex.fn.now())
    })
    this.log.debug({ path: this.path }, `Created ${NEWS_TABLE} table`)
  }

  /**
   * Returns every guid recorded so far.
   *
   * @throws StoreError
   */
  async knownGuids(): Promise<Set<string>> {
    try {
      const rows = await this.knex(NEWS_TABLE).select<
        Pick<NewsItemRow, 'guid'>[]
      >('guid')
      return new Set(rows.map((row) => row.guid))
    } catch (error) {
      throw new StoreError(
        `Cannot read guids from ${this.path}: ${errorMessage(error)}`,
        this.path,
        { cause: error },
      )
    }
  }

  /**
   * Records delivered items in one transaction. Guids already present are
   * left untouched.
   *
   * @throws StoreError
   */
  async record(items: NewsItem[], topic: string | null = null): Promise<void> {
    if (items.length === 0) return

    const rows = items.map((item) => toNewsItemRow(item, topic))
    try {
      await this.knex.transaction(async (trx) => {
        for (const chunk of chunkArray(rows, INSERT_CHUNK_SIZE)) {
          await trx(NEWS_TABLE).insert(chunk).onConflict('guid').ignore()
        }
      })
    } catch (error) {
      throw new StoreError(
        `Cannot record items in ${this.path}: ${errorMessage(error)}`,
        this.path,
        { cause: error },
      )
    }
  }

  /**
   * Number of recorded items.
   */
  async count(): Promise<number> {
    const result = await this.knex(NEWS_TABLE).count('* as count').first()
    const numCount = Number(result?.count || 0)
    return Number.isNaN(numCount) ? 0 : numCount
  }

  /**
   * Releases the connection. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    await this.knex.destroy()
  }
}
