/**
 * Index plan for the elements collection, applied on first use:
 * - unique: { elementId: 1 } (upsert key)
 * - { recordId: 1 } for per-document lookups and deletes
 */
export const mongoIndexes = {
  elementCollection: [
    { keys: { elementId: 1 }, options: { unique: true } },
    { keys: { recordId: 1 }, options: {} }
  ]
} as const;
