/**
 * Library entry point
 */

export { DeletionCoordinator, parseRegistryOperation } from './processors/deletion-coordinator.js';
export type { DeletionCoordinatorDeps, ResolvedRequests } from './processors/deletion-coordinator.js';
export { NameResolver } from './processors/name-resolver.js';
export { RegistryDeletionClient } from './processors/registry-deletion.js';
export { CatalogPruner } from './processors/catalog-pruner.js';
export { LocalCatalogDeleter } from './processors/local-catalog-deleter.js';
export { CatalogSession } from './catalog/database.js';
export { CatalogRepository, versionName } from './catalog/repository.js';
export { RpcRegistryTransport, RestRegistryTransport, createRegistryTransport } from './api/registry-client.js';
export { FileServingIndex } from './services/serving-index.js';
export { HttpDiscoveryService } from './services/discovery.js';
export { loadSettings } from './config/settings.js';
export type { UnpublishSettings, RegistrySettings } from './config/settings.js';
export { parseCompositeId, parseDatasetRequests, parseRequestSpec } from './parsers/dataset-id-parser.js';
export { UnpublishError, isUnpublishError } from './utils/errors.js';
export type { UnpublishErrorKind } from './utils/errors.js';
export * from './config/types.js';
export type * from './config/unpublish-types.js';
