import type { Pool } from 'pg';
import type { Migration } from './migration.interface';

export const migration002CreateCharacterAttributes: Migration = {
  name: '002_create_character_attributes',

  async up(pool: Pool): Promise<void> {
    // Free-form per-character metadata; the gallery lives under key 'gallery'
    await pool.query(`
      CREATE TABLE IF NOT EXISTS character_attributes (
        character_id VARCHAR(64) NOT NULL REFERENCES characters(id) ON DELETE CASCADE,
        key VARCHAR(128) NOT NULL,
        value JSONB NOT NULL,
        updated_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP,
        PRIMARY KEY (character_id, key)
      )
    `);
  },

  async down(pool: Pool): Promise<void> {
    await pool.query(`DROP TABLE IF EXISTS character_attributes`);
  },
};
