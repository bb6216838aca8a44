import type { Principal } from '../../auth/domain/principal';
import type { Character } from '../../characters/domain/entities/character.entity';

export type GalleryAction = 'upload' | 'delete';

/**
 * Single decision point for gallery writes: staff may modify any gallery,
 * everyone else only the galleries of characters they own. Reading a gallery
 * never needs authorization.
 */
export function authorizeGalleryAction(
  principal: Principal | null,
  character: Pick<Character, 'ownerId'>,
  _action: GalleryAction,
): boolean {
  if (!principal) {
    return false;
  }
  if (principal.role === 'staff') {
    return true;
  }
  return character.ownerId !== null && character.ownerId === principal.id;
}
