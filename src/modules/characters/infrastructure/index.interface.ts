import { CharactersRepository } from './database/repositories/characters.repository';
import { CharacterAttributesRepository } from './database/repositories/character-attributes.repository';
import { ICharactersRepositoryToken } from '../domain/characters.repository.interface';
import { ICharacterAttributesRepositoryToken } from '../domain/character-attributes.repository.interface';

export const CharactersRepositoryInterfaces = [
  {
    provide: ICharactersRepositoryToken,
    useClass: CharactersRepository,
  },
  {
    provide: ICharacterAttributesRepositoryToken,
    useClass: CharacterAttributesRepository,
  },
];
