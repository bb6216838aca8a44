import { Injectable } from '@nestjs/common';
import { PgPoolService } from '../../../../database/infrastructure/pg-pool.service';
import type {
  CharacterRow,
  CharacterStatus,
} from '../../../domain/entities/character.entity';
import type { ICharactersRepository } from '../../../domain/characters.repository.interface';

@Injectable()
export class CharactersRepository implements ICharactersRepository {
  constructor(private readonly db: PgPoolService) {}

  async findById(id: string): Promise<CharacterRow | null> {
    const { rows } = await this.db.client.query<CharacterRow>(
      'SELECT * FROM characters WHERE id = $1 LIMIT 1',
      [id],
    );
    return rows[0] ?? null;
  }

  async findByStatus(status: CharacterStatus): Promise<CharacterRow[]> {
    const { rows } = await this.db.client.query<CharacterRow>(
      'SELECT * FROM characters WHERE status = $1 ORDER BY key ASC',
      [status],
    );
    return rows;
  }
}
