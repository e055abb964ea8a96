/**
 * Fingerprint Schemas
 *
 * Validates fingerprint JSON written by this tool or by another
 * implementation before it is handed to the comparator.
 *
 * @module schemas/fingerprint
 */

import { z } from 'zod';
import { NonEmptyString, NonNegativeInteger, RepoKindSchema } from './common.js';

export const SnapshotFingerprintSchema = z.object({
  commit: NonEmptyString,
  file_count: NonNegativeInteger,
  symlink_count: NonNegativeInteger,
});

/**
 * `degraded` is optional on input: fingerprints from other implementations
 * never carry it.
 */
export const RepoFingerprintSchema = z.object({
  name: NonEmptyString,
  has_refs: z.boolean(),
  refs: z.record(z.string()),
  has_blobs: z.boolean(),
  blob_count: NonNegativeInteger,
  has_snapshots: z.boolean(),
  snapshots: z.array(SnapshotFingerprintSchema),
  degraded: z.boolean().default(false),
});

export const FriendlyAliasEntrySchema = z.object({
  kind: RepoKindSchema,
  owner: NonEmptyString,
  name: NonEmptyString,
  repo_dir_name: NonEmptyString,
});

export const CacheFingerprintSchema = z.object({
  hub_repos: z.array(RepoFingerprintSchema),
  friendly_repo_ids: z.array(z.string()).default([]),
  friendly_aliases: z.array(FriendlyAliasEntrySchema).default([]),
  complete: z.boolean().default(true),
});
