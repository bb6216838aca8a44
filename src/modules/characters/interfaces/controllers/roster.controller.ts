import { Controller, Get } from '@nestjs/common';
import { CharactersService } from '../../application/characters.service';

@Controller('roster')
export class RosterController {
  constructor(private readonly charactersService: CharactersService) {}

  /**
   * Available, active and retired characters, each group sorted by name
   */
  @Get()
  async getRoster() {
    return this.charactersService.getRoster();
  }
}
