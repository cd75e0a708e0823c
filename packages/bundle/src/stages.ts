/**
 * Load pipeline stages
 *
 * opened -> manifest_loaded -> [manifest_verified] -> platform_resolved ->
 * artifact_read -> checksum_verified -> [signature_verified] -> written -> done
 *
 * Bracketed stages are skipped when signature verification is disabled.
 * Any stage may move to failed, which is terminal.
 */

export const LOAD_STAGES = [
  'opened',
  'manifest_loaded',
  'manifest_verified',
  'platform_resolved',
  'artifact_read',
  'checksum_verified',
  'signature_verified',
  'written',
  'done',
  'failed',
] as const;

export type LoadStage = (typeof LOAD_STAGES)[number];

const ORDER: Record<LoadStage, number> = {
  opened: 0,
  manifest_loaded: 1,
  manifest_verified: 2,
  platform_resolved: 3,
  artifact_read: 4,
  checksum_verified: 5,
  signature_verified: 6,
  written: 7,
  done: 8,
  failed: 9,
};

/**
 * Whether a pipeline may move from one stage to another.
 * Stages only move forward; done and failed are terminal.
 */
export function canTransition(from: LoadStage | undefined, to: LoadStage): boolean {
  if (from === undefined) return to === 'opened' || to === 'failed';
  if (from === 'done' || from === 'failed') return false;
  if (to === 'failed') return true;
  return ORDER[to] > ORDER[from];
}
