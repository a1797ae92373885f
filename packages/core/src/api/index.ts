/**
 * Entity construction API
 *
 * - EntityFactory - main entry point, one method per entity kind
 * - PendingDimension - created dimension awaiting an explicit render()
 * - collaborator contracts (database, block table, renderer, arrows)
 */

export * from './types.js';
export * from './options.js';
export * from './EntityFactory.js';
