/**
 * Update Negotiation Types
 *
 * Offers reported by the gateway and the aggregate the negotiator returns.
 */

import type { JsonObject } from './json.types.js';

// =============================================================================
// Installed Units
// =============================================================================

export interface InstalledUnitRecord {
  /** Unique identifier, e.g. `Acme.Blog` */
  code: string;

  /** Installed version (opaque, ordered by the unit's own version list) */
  version: string;

  /** Display name */
  name: string;

  /** Icon reference */
  icon: string | null;

  /** Updates suppressed by an administrator */
  isFrozen: boolean;

  /** Whether the unit may be updated at all */
  isUpdatable: boolean;

  /** When the unit was first installed */
  createdAt: Date;
}

// =============================================================================
// Offers
// =============================================================================

export interface UpdateOffer {
  /** Unit code, or `core` for the application itself */
  code: string;

  /** Version the gateway offers */
  targetVersion: string | null;

  /** Hash of the offered artifact */
  targetHash: string | null;

  /** Locally known display name (plugins only) */
  name?: string;

  /** Locally known icon, `false` when unknown (plugins only) */
  icon?: string | false;

  /** Locally installed version, `false` when not installed (plugins only) */
  oldVersion?: string | false;

  /** Locally installed core build (core only) */
  oldBuild?: string | null;

  /** Offer fields exactly as the gateway sent them */
  details: JsonObject;
}

export interface UpdateNegotiationResult {
  /** Core update, absent when none is offered or core updates are disabled */
  coreOffer?: UpdateOffer;

  /** Surviving plugin offers by code */
  pluginOffers: Record<string, UpdateOffer>;

  /** Surviving theme offers by code */
  themeOffers: Record<string, UpdateOffer>;

  /** Outstanding updates after exclusions */
  updateCount: number;

  /** `updateCount > 0` */
  hasUpdates: boolean;
}

/** Persisted throttle state of the negotiator */
export interface RetryState {
  lastKnownCount: number;

  /** Unix seconds; no automatic negotiation before this instant */
  retryAfter: number | null;
}
