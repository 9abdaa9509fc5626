/**
 * Settings Service
 *
 * Handles CRUD operations for application settings with prepared statements
 */

import type Database from 'better-sqlite3'
import { getDatabaseService, type DatabaseInstance } from './database'
import type { Setting, SettingCategory, CreateSettingInput } from '../types/sermon'

// ============================================================================
// Prepared Statements Cache
// ============================================================================

interface SettingsStatements {
  get: Database.Statement<[string], Setting>
  set: Database.Statement<[{ key: string; value: string; category: SettingCategory }]>
  delete: Database.Statement<[string]>
  getByCategory: Database.Statement<[SettingCategory], Setting>
}

let cache: { db: DatabaseInstance; statements: SettingsStatements } | null = null

function getStatements(): SettingsStatements {
  const db = getDatabaseService().getDatabase()
  if (cache && cache.db === db) return cache.statements

  const statements: SettingsStatements = {
    get: db.prepare<[string], Setting>(`
      SELECT * FROM settings WHERE key = ?
    `),

    set: db.prepare<{ key: string; value: string; category: SettingCategory }>(`
      INSERT INTO settings (key, value, category, created_at, updated_at)
      VALUES (@key, @value, @category, datetime('now'), datetime('now'))
      ON CONFLICT(key) DO UPDATE SET
        value = excluded.value,
        category = excluded.category
    `),

    delete: db.prepare<[string]>(`
      DELETE FROM settings WHERE key = ?
    `),

    getByCategory: db.prepare<[SettingCategory], Setting>(`
      SELECT * FROM settings WHERE category = ? ORDER BY key ASC
    `)
  }

  cache = { db, statements }
  return statements
}

function parseValue(setting: Setting): unknown {
  try {
    return JSON.parse(setting.value)
  } catch {
    // Rows written by hand may hold bare strings
    return setting.value
  }
}

// ============================================================================
// Settings Service Functions
// ============================================================================

export const settingsService = {
  /**
   * Get a setting value by key. The value is returned as stored; callers
   * narrow it.
   */
  get(key: string): unknown {
    const setting = getStatements().get.get(key)
    return setting ? parseValue(setting) : null
  },

  /**
   * Get a numeric setting, falling back when absent or not a finite number
   */
  getNumber(key: string, defaultValue: number): number {
    const value = settingsService.get(key)
    return typeof value === 'number' && Number.isFinite(value) ? value : defaultValue
  },

  /**
   * Stored value when present and accepted by the guard, otherwise the default
   */
  getOrDefault<T>(key: string, defaultValue: T, isValid: (value: unknown) => value is T): T {
    const value = settingsService.get(key)
    return value !== null && isValid(value) ? value : defaultValue
  },

  getString(key: string, defaultValue: string): string {
    const value = settingsService.get(key)
    return typeof value === 'string' && value.length > 0 ? value : defaultValue
  },

  /**
   * Set a setting value
   */
  set(key: string, value: unknown, category: SettingCategory = 'general'): Setting | null {
    const stmts = getStatements()

    stmts.set.run({
      key,
      value: JSON.stringify(value),
      category
    })

    return stmts.get.get(key) ?? null
  },

  /**
   * Set multiple settings at once
   */
  setMany(settings: CreateSettingInput[]): void {
    const db = getDatabaseService().getDatabase()
    const stmts = getStatements()

    const setAll = db.transaction(() => {
      for (const setting of settings) {
        stmts.set.run({
          key: setting.key,
          value: JSON.stringify(setting.value),
          category: setting.category
        })
      }
    })

    setAll()
  },

  delete(key: string): boolean {
    const result = getStatements().delete.run(key)
    return result.changes > 0
  },

  getByCategory(category: SettingCategory): Setting[] {
    return getStatements().getByCategory.all(category)
  },

  /**
   * Get all settings in a category as a key-value object
   */
  getCategoryAsObject(category: SettingCategory): Record<string, unknown> {
    const result: Record<string, unknown> = {}
    for (const setting of settingsService.getByCategory(category)) {
      result[setting.key] = parseValue(setting)
    }
    return result
  },

  exists(key: string): boolean {
    return getStatements().get.get(key) !== undefined
  }
}
