import type { Pool } from 'pg';
import type { Migration } from './migration.interface';

export const migration001CreateCharacters: Migration = {
  name: '001_create_characters',

  async up(pool: Pool): Promise<void> {
    await pool.query(`
      CREATE TABLE IF NOT EXISTS characters (
        id VARCHAR(64) PRIMARY KEY,
        key VARCHAR(255) NOT NULL,
        full_name VARCHAR(255),
        status VARCHAR(20) NOT NULL DEFAULT 'available',
        owner_id TEXT,
        created_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP,
        CONSTRAINT characters_status_check CHECK (status IN ('available', 'active', 'gone'))
      )
    `);

    await pool.query(`
      CREATE INDEX IF NOT EXISTS idx_characters_status ON characters(status, key)
    `);

    await pool.query(`
      CREATE INDEX IF NOT EXISTS idx_characters_owner_id ON characters(owner_id)
    `);
  },

  async down(pool: Pool): Promise<void> {
    await pool.query(`DROP INDEX IF EXISTS idx_characters_owner_id`);
    await pool.query(`DROP INDEX IF EXISTS idx_characters_status`);
    await pool.query(`DROP TABLE IF EXISTS characters`);
  },
};
