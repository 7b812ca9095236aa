/**
 * Chat Access Policy
 */

export interface AccessPolicy {
  allowPrivate: boolean;
  /** Group ids as strings; empty allows every group */
  allowedGroups: readonly string[];
}

export interface ChatRef {
  id: number;
  type: 'private' | 'group' | 'supergroup' | 'channel';
}

export type AccessDecision = 'allow' | 'deny-private' | 'deny-group';

export function checkAccess(chat: ChatRef, policy: AccessPolicy): AccessDecision {
  switch (chat.type) {
    case 'private':
      return policy.allowPrivate ? 'allow' : 'deny-private';
    case 'group':
    case 'supergroup':
      if (policy.allowedGroups.length === 0 || policy.allowedGroups.includes(chat.id.toString())) {
        return 'allow';
      }
      return 'deny-group';
    case 'channel':
      return 'deny-group';
  }
}
