import { Module } from '@nestjs/common';
import { CharactersService } from '../application/characters.service';
import { ICharacterAttributesRepositoryToken } from '../domain/character-attributes.repository.interface';
import { RosterController } from '../interfaces/controllers/roster.controller';
import { CharactersRepositoryInterfaces } from './index.interface';

@Module({
  controllers: [RosterController],
  providers: [CharactersService, ...CharactersRepositoryInterfaces],
  exports: [CharactersService, ICharacterAttributesRepositoryToken],
})
export class CharactersModule {}
