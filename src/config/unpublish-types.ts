/**
 * Unpublish-specific type definitions
 *
 * Options for the coordinator and the CLI handler, plus the collaborator interfaces the
 * coordinator consumes. Shared record types live in types.ts.
 */

import type { EventKind, RepublishCandidate } from './types.js';

/**
 * Progress hook: `callback` receives values from `initial` up to `final`.
 */
export interface ProgressReporter {
  callback: (progress: number) => void;
  initial: number;
  final: number;
}

/** Options for a single coordinator run */
export interface DeletionRunOptions {
  operation: string; // 'delete' | 'retract' | 'none'; validated before any phase
  servingLayer: boolean;
  discoveryReinit: boolean;
  deleteLocal: boolean;
  forceDeleteAll: boolean;
  wantRepublish: boolean;
  compositeIds: boolean;
  progress?: ProgressReporter;
}

export interface DeletionResult {
  outcomes: Map<string, EventKind>;
}

export interface RepublishingDeletionResult extends DeletionResult {
  republishList: RepublishCandidate[];
}

/** Options for the unpublish command (parsed from CLI flags) */
export interface UnpublishCommandOptions {
  file?: string;
  operation: string;
  version?: number;
  serving: boolean;
  discovery: boolean;
  deleteLocal: boolean;
  allVersions: boolean;
  republish: boolean;
  compositeIds: boolean;
  dryRun: boolean;
  force: boolean;
  output: string;
  verbose: boolean;
}

// ============================================================================
// Collaborators
// ============================================================================

export type RegistryResponse = { ok: true } | { ok: false; message: string };

/**
 * Remote registry calls. Rejections are returned; transport faults are thrown.
 */
export interface RegistryTransport {
  readonly description: string;
  delete(name: string): Promise<RegistryResponse>;
  retract(name: string): Promise<RegistryResponse>;
}

export interface ServingIndex {
  regenerateIndex(): Promise<void>;
}

export interface DiscoveryService {
  reinitialize(): Promise<void>;
}
