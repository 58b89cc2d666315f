/**
 * backend/src/modules/auth/auth.types.ts
 *
 * RULES:
 * - Response shapes only carry what the client needs (no hashes, no codes).
 */

import type { RequestContext } from '../../shared/http/request-context';
import type { Capability } from '../members/policies/capability.policy';
import type { MemberStatus } from '../members/member.types';

export type ActivateAccountParams = {
  code: string;
  email: string;
  username: string;
  password: string;
  /** Used only when the invitation carries no name. */
  firstName: string;
  lastName: string;
  request: RequestContext;
};

export type CredentialOutcome = 'created' | 'adopted';
export type ProfileOutcome = 'created' | 'attached' | 'relinked' | 'kept';

export type ActivationResult = {
  userId: string;
  memberId: string;
  username: string;
  memberNumber: string | null;
  status: MemberStatus;
  credential: CredentialOutcome;
  profile: ProfileOutcome;
};

export type LoginParams = {
  /** Username or email address. */
  identifier: string;
  password: string;
  request: RequestContext;
};

export type LoginResult = {
  user: {
    id: string;
    username: string;
    email: string;
    firstName: string;
    lastName: string;
  };
  member: {
    id: string;
    memberNumber: string | null;
    status: MemberStatus;
  } | null;
  capabilities: Capability[];
};
