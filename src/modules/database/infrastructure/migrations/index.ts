import type { Migration } from './migration.interface';
import { migration001CreateCharacters } from './001_create_characters';
import { migration002CreateCharacterAttributes } from './002_create_character_attributes';

// Export all migrations in order
// Add new migrations to this array as they are created
export const migrations: Migration[] = [
  migration001CreateCharacters,
  migration002CreateCharacterAttributes,
];

export type { Migration } from './migration.interface';
export { runMigrations, getMigrationStatus } from './migration-runner';
