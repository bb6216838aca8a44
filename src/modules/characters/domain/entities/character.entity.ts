export const CHARACTER_STATUSES = ['available', 'active', 'gone'] as const;

export type CharacterStatus = (typeof CHARACTER_STATUSES)[number];

// Character ids double as storage namespaces, so they stay path-safe
export const CHARACTER_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

export interface Character {
  id: string;
  key: string;
  fullName: string | null;
  status: CharacterStatus;
  ownerId: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface CharacterRow {
  id: string;
  key: string;
  full_name: string | null;
  status: CharacterStatus;
  owner_id: string | null;
  created_at: Date;
  updated_at: Date;
}

export function rowToCharacter(row: CharacterRow): Character {
  return {
    id: row.id,
    key: row.key,
    fullName: row.full_name,
    status: row.status,
    ownerId: row.owner_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export const getDisplayName = (character: Character) =>
  character.fullName || character.key;
