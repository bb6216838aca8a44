import { Injectable } from '@nestjs/common';
import { PgPoolService } from '../../../../database/infrastructure/pg-pool.service';
import type { ICharacterAttributesRepository } from '../../../domain/character-attributes.repository.interface';

interface AttributeRow {
  character_id: string;
  value: unknown;
}

@Injectable()
export class CharacterAttributesRepository implements ICharacterAttributesRepository {
  constructor(private readonly db: PgPoolService) {}

  async getAttribute(characterId: string, key: string): Promise<unknown> {
    const { rows } = await this.db.client.query<AttributeRow>(
      `SELECT character_id, value FROM character_attributes
       WHERE character_id = $1 AND key = $2 LIMIT 1`,
      [characterId, key],
    );
    return rows[0]?.value;
  }

  async setAttribute(characterId: string, key: string, value: unknown): Promise<void> {
    // JSONB parameters are sent as text so arrays are not mistaken for pg arrays
    await this.db.client.query(
      `INSERT INTO character_attributes (character_id, key, value, updated_at)
       VALUES ($1, $2, $3::jsonb, CURRENT_TIMESTAMP)
       ON CONFLICT (character_id, key)
       DO UPDATE SET value = EXCLUDED.value, updated_at = EXCLUDED.updated_at`,
      [characterId, key, JSON.stringify(value)],
    );
  }

  async findValues(characterIds: string[], key: string): Promise<Map<string, unknown>> {
    if (characterIds.length === 0) {
      return new Map();
    }

    const { rows } = await this.db.client.query<AttributeRow>(
      `SELECT character_id, value FROM character_attributes
       WHERE character_id = ANY($1::varchar[]) AND key = $2`,
      [characterIds, key],
    );
    return new Map(rows.map((row) => [row.character_id, row.value]));
  }
}
