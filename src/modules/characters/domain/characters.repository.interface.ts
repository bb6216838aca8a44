import type { CharacterRow, CharacterStatus } from './entities/character.entity';

export interface ICharactersRepository {
  findById(id: string): Promise<CharacterRow | null>;
  /** Rows ordered by `key`. */
  findByStatus(status: CharacterStatus): Promise<CharacterRow[]>;
}

export const ICharactersRepositoryToken = Symbol('ICharactersRepository');
