/**
 * `update_only` only ever adds members; `full` makes the group match exactly
 */
export type SyncMode = 'update_only' | 'full';

export const SYNC_MODES: readonly SyncMode[] = ['update_only', 'full'];

export type MembershipChange =
  | { action: 'skip' }
  | { action: 'update'; members: string[]; added: string[]; removed: string[] };

/**
 * Compare group membership as sets and plan the update, if any.
 * Member order never causes an update.
 */
export function planMembershipChange(
  current: readonly string[],
  desired: readonly string[],
  mode: SyncMode
): MembershipChange {
  const currentSet = new Set(current);
  const desiredSet = new Set(desired);
  const added = [...desiredSet].filter((id) => !currentSet.has(id));
  const removed = [...currentSet].filter((id) => !desiredSet.has(id));

  if (mode === 'update_only') {
    if (added.length === 0) return { action: 'skip' };
    return { action: 'update', members: [...currentSet, ...added], added, removed: [] };
  }

  if (added.length === 0 && removed.length === 0) return { action: 'skip' };
  return { action: 'update', members: [...desiredSet], added, removed };
}
