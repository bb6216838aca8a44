/**
 * Key-value metadata attached to a character. Values are arbitrary JSON; each
 * consumer owns its own key and must leave the others untouched.
 */
export interface ICharacterAttributesRepository {
  getAttribute(characterId: string, key: string): Promise<unknown>;
  setAttribute(characterId: string, key: string, value: unknown): Promise<void>;
  findValues(characterIds: string[], key: string): Promise<Map<string, unknown>>;
}

export const ICharacterAttributesRepositoryToken = Symbol(
  'ICharacterAttributesRepository',
);
