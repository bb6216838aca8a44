import { Inject, Injectable } from '@nestjs/common';
import { NotFoundError } from '../../../common/errors/domain.errors';
import {
  CHARACTER_STATUSES,
  getDisplayName,
  rowToCharacter,
  type Character,
  type CharacterStatus,
} from '../domain/entities/character.entity';
import {
  ICharactersRepositoryToken,
  type ICharactersRepository,
} from '../domain/characters.repository.interface';
import {
  ICharacterAttributesRepositoryToken,
  type ICharacterAttributesRepository,
} from '../domain/character-attributes.repository.interface';

export interface RosterEntry {
  id: string;
  name: string;
  displayName: string;
  concept: string;
}

export type Roster = Record<CharacterStatus, RosterEntry[]>;

const DISTINCTIONS_KEY = 'distinctions';
const NO_CONCEPT = 'No concept set';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Reads `distinctions.concept.name`, the first of a character's three distinctions. */
export const readConcept = (distinctions: unknown): string => {
  if (!isRecord(distinctions)) return NO_CONCEPT;
  const concept = distinctions.concept;
  if (isRecord(concept) && typeof concept.name === 'string' && concept.name.trim()) {
    return concept.name;
  }
  return NO_CONCEPT;
};

@Injectable()
export class CharactersService {
  constructor(
    @Inject(ICharactersRepositoryToken)
    private readonly charactersRepository: ICharactersRepository,
    @Inject(ICharacterAttributesRepositoryToken)
    private readonly attributesRepository: ICharacterAttributesRepository,
  ) {}

  async findById(id: string): Promise<Character | null> {
    const row = await this.charactersRepository.findById(id);
    return row ? rowToCharacter(row) : null;
  }

  async getCharacter(id: string): Promise<Character> {
    const character = await this.findById(id);
    if (!character) {
      throw new NotFoundError(`Character ${id} not found`);
    }
    return character;
  }

  async getRoster(): Promise<Roster> {
    const groups = await Promise.all(
      CHARACTER_STATUSES.map(async (status) => {
        const rows = await this.charactersRepository.findByStatus(status);
        return [status, rows.map(rowToCharacter)] as const;
      }),
    );

    const allIds = groups.flatMap(([, characters]) => characters.map((c) => c.id));
    const distinctions = await this.attributesRepository.findValues(
      allIds,
      DISTINCTIONS_KEY,
    );

    const toEntry = (character: Character): RosterEntry => ({
      id: character.id,
      name: character.key,
      displayName: getDisplayName(character),
      concept: readConcept(distinctions.get(character.id)),
    });

    const roster: Roster = { available: [], active: [], gone: [] };
    for (const [status, characters] of groups) {
      roster[status] = characters.map(toEntry);
    }
    return roster;
  }
}
