import type { RowDataPacket } from 'mysql2/promise'
import type { DB } from '../../db'

export type MetadataDoc = Record<string, unknown>

/**
 * Hierarchical document store. Paths are slash-separated and each segment must
 * already be sanitized (see `sanitizeKey`).
 */
export interface MetadataStore {
  get(path: string): Promise<unknown>
  set(path: string, doc: MetadataDoc): Promise<void>
  // Shallow merge into the document at `path`, creating it when absent.
  update(path: string, patch: MetadataDoc): Promise<void>
}

interface MetadataNodeRow extends RowDataPacket {
  doc: unknown
}

function parseDoc(raw: unknown): unknown {
  // MariaDB returns JSON columns as text.
  if (typeof raw === 'string') return JSON.parse(raw)
  return raw
}

export class MysqlMetadataStore implements MetadataStore {
  constructor(private readonly db: DB) {}

  async get(path: string): Promise<unknown> {
    const [rows] = await this.db.query<MetadataNodeRow[]>(`SELECT doc FROM metadata_nodes WHERE path = ? LIMIT 1`, [path])
    const row = rows[0]
    if (!row) return null
    return parseDoc(row.doc)
  }

  async set(path: string, doc: MetadataDoc): Promise<void> {
    await this.db.query(
      `INSERT INTO metadata_nodes (path, doc) VALUES (?, ?)
       ON DUPLICATE KEY UPDATE doc = VALUES(doc)`,
      [path, JSON.stringify(doc)]
    )
  }

  async update(path: string, patch: MetadataDoc): Promise<void> {
    await this.db.query(
      `INSERT INTO metadata_nodes (path, doc) VALUES (?, ?)
       ON DUPLICATE KEY UPDATE doc = JSON_MERGE_PATCH(doc, VALUES(doc))`,
      [path, JSON.stringify(patch)]
    )
  }
}
