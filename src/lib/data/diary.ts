import { mkdirSync } from 'fs'
import { dirname } from 'path'
import Database from 'better-sqlite3'
import { z } from 'zod'
import type { FoodEntry, NutrientMap } from '../../types'
import { StoreError, errorMessage } from '../utils/errors'

const SCHEMA = `
CREATE TABLE IF NOT EXISTS food_entries (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id INTEGER NOT NULL,
  timestamp INTEGER NOT NULL,
  food_name TEXT NOT NULL,
  quantity REAL NOT NULL CHECK (quantity > 0),
  unit TEXT NOT NULL,
  nutrients TEXT NOT NULL,
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
);
CREATE INDEX IF NOT EXISTS idx_food_entries_user_time ON food_entries (user_id, timestamp);
`

interface FoodEntryRow {
  id: number
  user_id: number
  timestamp: number
  food_name: string
  quantity: number
  unit: string
  nutrients: string
}

const NutrientsColumn = z.record(z.string(), z.number())

/** Food diary on a single SQLite file. One row per logged food item; rows are never updated. */
export class DiaryStore {
  private readonly db: Database.Database
  private readonly insertStmt: Database.Statement<[number, number, string, number, string, string]>
  private readonly rangeStmt: Database.Statement<[number, number, number], FoodEntryRow>

  constructor(path: string) {
    try {
      if (path !== ':memory:') mkdirSync(dirname(path), { recursive: true })
      this.db = new Database(path)
      this.db.pragma('journal_mode = WAL')
      this.db.exec(SCHEMA)
      this.insertStmt = this.db.prepare<[number, number, string, number, string, string]>(
        'INSERT INTO food_entries (user_id, timestamp, food_name, quantity, unit, nutrients) VALUES (?, ?, ?, ?, ?, ?)'
      )
      this.rangeStmt = this.db.prepare<[number, number, number], FoodEntryRow>(
        `SELECT id, user_id, timestamp, food_name, quantity, unit, nutrients
         FROM food_entries
         WHERE user_id = ? AND timestamp >= ? AND timestamp < ?
         ORDER BY timestamp ASC, id ASC`
      )
    } catch (e) {
      throw new StoreError(`Could not open diary at ${path}: ${errorMessage(e)}`, { cause: e })
    }
  }

  insert(entry: FoodEntry): FoodEntry {
    try {
      return this.write(entry)
    } catch (e) {
      throw new StoreError(`Insert failed for user ${entry.userId}: ${errorMessage(e)}`, { cause: e })
    }
  }

  /** Insert all entries in one transaction: either every item of a meal is stored or none is. */
  insertMany(entries: readonly FoodEntry[]): FoodEntry[] {
    try {
      const tx = this.db.transaction((items: readonly FoodEntry[]) => items.map((item) => this.write(item)))
      return tx(entries)
    } catch (e) {
      throw new StoreError(`Insert of ${entries.length} entries failed: ${errorMessage(e)}`, { cause: e })
    }
  }

  /** Entries for one user with start <= timestamp < end, oldest first. */
  queryByUserAndRange(userId: number, start: number, end: number): FoodEntry[] {
    try {
      return this.rangeStmt.all(userId, start, end).map(toEntry)
    } catch (e) {
      if (e instanceof StoreError) throw e
      throw new StoreError(`Query failed for user ${userId}: ${errorMessage(e)}`, { cause: e })
    }
  }

  close(): void {
    this.db.close()
  }

  private write(entry: FoodEntry): FoodEntry {
    const result = this.insertStmt.run(
      entry.userId,
      entry.timestamp,
      entry.foodName,
      entry.quantity,
      entry.unit,
      JSON.stringify(entry.nutrients)
    )
    return { ...entry, nutrients: { ...entry.nutrients }, id: Number(result.lastInsertRowid) }
  }
}

function toEntry(row: FoodEntryRow): FoodEntry {
  return {
    id: row.id,
    userId: row.user_id,
    timestamp: row.timestamp,
    foodName: row.food_name,
    quantity: row.quantity,
    unit: row.unit,
    nutrients: parseNutrients(row),
  }
}

function parseNutrients(row: FoodEntryRow): NutrientMap {
  try {
    return NutrientsColumn.parse(JSON.parse(row.nutrients))
  } catch (e) {
    throw new StoreError(`Corrupt nutrients in food_entries row ${row.id}`, { cause: e })
  }
}
