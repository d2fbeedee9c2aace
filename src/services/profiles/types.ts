export type UpsertAction = 'created' | 'updated';
