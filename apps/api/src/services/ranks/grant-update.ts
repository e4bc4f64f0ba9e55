// =====================================================
// Grant Update
// =====================================================
// Moves a member's grant from one rank to another as two
// independently retried sub-operations. A failure in one
// sub-operation is recorded and the other is still attempted.

import { Member, Rank } from '@rank-ledger/shared-types';
import { callWithRetry, RetryOptions } from '../../lib/retry';
import { errorMessage } from '../../utils/errors';
import { GrantProvider } from '../external/types';

export type GrantUpdateOrder = 'add-then-remove' | 'remove-then-add';

export interface GrantUpdateResult {
  ok: boolean;
  errors: string[];
}

export async function updateGrant(
  grants: GrantProvider,
  member: Member,
  previous: Rank | undefined,
  next: Rank,
  order: GrantUpdateOrder,
  retry: RetryOptions = {}
): Promise<GrantUpdateResult> {
  const errors: string[] = [];

  const add = async (): Promise<void> => {
    try {
      await callWithRetry(() => grants.grant(member, next), {
        ...retry,
        label: `grant ${next.name} to ${member.externalId}`,
      });
    } catch (error) {
      errors.push(`grant ${next.name}: ${errorMessage(error)}`);
    }
  };

  const remove = async (): Promise<void> => {
    if (!previous || previous.order === next.order) return;
    try {
      await callWithRetry(() => grants.revoke(member, previous), {
        ...retry,
        label: `revoke ${previous.name} from ${member.externalId}`,
      });
    } catch (error) {
      errors.push(`revoke ${previous.name}: ${errorMessage(error)}`);
    }
  };

  if (order === 'add-then-remove') {
    await add();
    await remove();
  } else {
    await remove();
    await add();
  }

  return { ok: errors.length === 0, errors };
}
