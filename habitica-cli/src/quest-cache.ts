import Database from 'better-sqlite3';
import type { QuestCacheRecord } from './types.js';

export const CACHE_FILE_NAME = 'cache.sqlite';
export const SECTION_CACHE_QUEST = 'Quest';
export const NO_QUEST = 'Not currently on a quest';

const QUEST_DEFAULTS: Record<string, string> = {
  quest_key: '',
};

const FIELD_KEYS: ReadonlyArray<[keyof QuestCacheRecord, string]> = [
  ['questKey', 'quest_key'],
  ['questType', 'quest_type'],
  ['questMax', 'quest_max'],
  ['questTitle', 'quest_title'],
];

export interface QuestCache {
  read(): QuestCacheRecord;
  update(fields: Partial<QuestCacheRecord>): QuestCacheRecord;
}

type DbCacheRow = {
  key: string;
  value: string;
};

/** Quest metadata from /content, memoized per quest key in a side SQLite file. */
export class QuestCacheStore implements QuestCache {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.ensureSchema();
  }

  ensureSchema() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS cache_entries (
        section TEXT NOT NULL,
        key TEXT NOT NULL,
        value TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        PRIMARY KEY (section, key)
      );
    `);
  }

  read(): QuestCacheRecord {
    const rows = this.db
      .prepare<[string], DbCacheRow>('SELECT key, value FROM cache_entries WHERE section = ?')
      .all(SECTION_CACHE_QUEST);
    const values: Record<string, string> = { ...QUEST_DEFAULTS };
    for (const row of rows) {
      values[row.key] = row.value;
    }
    return {
      questKey: values.quest_key ?? '',
      questType: normalizeQuestType(values.quest_type),
      questMax: values.quest_max ?? '',
      questTitle: values.quest_title ?? '',
    };
  }

  update(fields: Partial<QuestCacheRecord>): QuestCacheRecord {
    const now = new Date().toISOString();
    const stmt = this.db.prepare(
      `INSERT INTO cache_entries (section, key, value, updated_at) VALUES (@section, @key, @value, @updated)
       ON CONFLICT(section, key) DO UPDATE SET value = @value, updated_at = @updated`
    );
    const tx = this.db.transaction((entries: Array<[string, string]>) => {
      entries.forEach(([key, value]) => stmt.run({ section: SECTION_CACHE_QUEST, key, value, updated: now }));
    });
    const entries: Array<[string, string]> = [];
    for (const [field, key] of FIELD_KEYS) {
      const value = fields[field];
      if (value !== undefined) entries.push([key, value]);
    }
    tx(entries);
    return this.read();
  }

  close() {
    this.db.close();
  }
}

function normalizeQuestType(value: string | undefined): QuestCacheRecord['questType'] {
  return value === 'collect' || value === 'hp' ? value : '';
}
