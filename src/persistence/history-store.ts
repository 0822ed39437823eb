/**
 * SqliteHistoryStore: append-only store of completed project records.
 *
 * The learning phase appends through the RunRecorder interface; the threshold
 * optimizer reads the whole history back.
 */

import type { ProjectRecord } from '../core/types.js'
import type { RunRecorder } from '../modules/phase-machine/types.js'
import { createLogger } from '../utils/logger.js'
import { openDatabase, type DatabaseWrapper } from './database.js'
import { countProjectRecords, insertProjectRecord, listProjectRecords } from './queries/project-records.js'

const logger = createLogger('persistence:history')

/** File name of the history database inside the state directory */
export const HISTORY_DB_FILE = 'history.db'

export class SqliteHistoryStore implements RunRecorder {
  private readonly _path: string
  private _wrapper: DatabaseWrapper | null = null

  constructor(databasePath: string) {
    this._path = databasePath
  }

  /** Opened and migrated on first use */
  private get _db(): DatabaseWrapper {
    if (this._wrapper === null) {
      this._wrapper = openDatabase(this._path)
    }
    return this._wrapper
  }

  record(record: ProjectRecord): void {
    const inserted = insertProjectRecord(this._db.db, record)
    if (inserted) {
      logger.info({ id: record.id, items: record.items.length }, 'Project record appended')
    } else {
      logger.warn({ id: record.id }, 'Project record already stored; ignoring duplicate')
    }
  }

  list(): ProjectRecord[] {
    return listProjectRecords(this._db.db)
  }

  count(): number {
    return countProjectRecords(this._db.db)
  }

  close(): void {
    this._wrapper?.close()
    this._wrapper = null
  }
}
