/**
 * Shared type definitions for the unpublish pipeline
 *
 * Catalog records, lifecycle events, resolution results and reports.
 * Command-specific option types live in unpublish-types.ts.
 */

// ============================================================================
// Registry operations
// ============================================================================

export const REGISTRY_OPERATIONS = ['delete', 'retract', 'none'] as const;

/**
 * - delete:  purge all registry metadata for the target
 * - retract: withdraw discoverability, records may persist remotely
 * - none:    skip the registry phase entirely
 */
export type RegistryOperation = (typeof REGISTRY_OPERATIONS)[number];

/** Version sentinel meaning "every version of the dataset" */
export const ALL_VERSIONS = -1;

// ============================================================================
// Local catalog records
// ============================================================================

export interface DatasetRecord {
  id: number;
  name: string;
}

export interface VersionRecord {
  id: number;
  datasetId: number;
  version: number;
  name: string; // Canonical registry name: <dataset>.v<version>
}

/**
 * Dataset with its versions ordered by version number (ascending)
 */
export interface Dataset extends DatasetRecord {
  versions: VersionRecord[];
}

export interface CatalogEntry {
  datasetName: string;
  version: number;
  location: string; // Relative to the serving root
}

export type WarningLevel = 'info' | 'warning' | 'error';

export interface DatasetWarning {
  datasetId: number;
  module: string;
  level: WarningLevel;
  message: string;
}

// ============================================================================
// Lifecycle events
// ============================================================================

export const EVENT_KINDS = [
  'registry-delete-succeeded',
  'registry-delete-failed',
  'registry-retract-succeeded',
  'registry-retract-failed',
  'serving-catalog-entry-removed',
  'dataset-deleted',
  'dataset-version-deleted',
] as const;

export type EventKind = (typeof EVENT_KINDS)[number];

export interface DatasetEvent {
  datasetName: string;
  version: number;
  kind: EventKind;
  timestamp: string;
}

// ============================================================================
// Requests, resolution and outcomes
// ============================================================================

export interface DatasetRequest {
  identifier: string;
  version: number;
}

/**
 * Computed once per identifier per run and shared by every phase.
 */
export interface ResolutionResult {
  forceDeleteAll: boolean;
  dataset?: Dataset;
  targetVersions: VersionRecord[];
  isLatestVersion: boolean;
}

export type RegistryOutcome =
  | { status: 'succeeded'; eventKind: EventKind }
  | { status: 'failed'; eventKind: EventKind; reason: string };

export interface RepublishCandidate {
  datasetName: string;
  version: number;
}

// ============================================================================
// Operation Reports
// ============================================================================

export interface ReportBase {
  operationType: string;
  timestamp: string;
  success: boolean;
  dryRun: boolean;
  error?: string;
}

export interface UnpublishReport extends ReportBase {
  operationType: 'unpublish';
  registryOperation: RegistryOperation;
  phases: {
    registry: boolean;
    serving: boolean;
    discovery: boolean;
    localCatalog: boolean;
  };
  summary: {
    requested: number;
    resolved: number;
    registrySucceeded: number;
    registryFailed: number;
    republishCandidates: number;
  };
  details: {
    outcomes: Record<string, EventKind>;
    republish: RepublishCandidate[];
    unresolved: string[];
  };
}

export type OperationReport = UnpublishReport;
