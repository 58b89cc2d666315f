import { describe, it, expect } from 'vitest';
import type { FastifyRequest } from 'fastify';
import { AppError } from '../../../../src/shared/http/errors';
import { requireSession } from '../../../../src/shared/http/require-session';
import type { AuthContext } from '../../../../src/shared/http/auth-context';

function makeReq(authContext: AuthContext): FastifyRequest {
  return { authContext } as unknown as FastifyRequest;
}

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return null;
}

const ANONYMOUS: AuthContext = { userId: null, sessionId: null, capabilities: [] };

describe('requireSession', () => {
  it('throws 401 when no session is present', () => {
    const err = catchError(() => requireSession(makeReq(ANONYMOUS)));

    expect(err).toBeInstanceOf(AppError);
    expect(err).toMatchObject({ status: 401, message: 'Authentication required' });
  });

  it('throws 403 when none of the required capabilities is held', () => {
    const req = makeReq({ userId: 'usr_1', sessionId: 'sess_1', capabilities: ['officer'] });
    const err = catchError(() => requireSession(req, { anyOf: ['staff'] }));

    expect(err).toBeInstanceOf(AppError);
    expect(err).toMatchObject({ status: 403, message: 'Insufficient permissions.' });
  });

  it('returns the session when one capability matches', () => {
    const req = makeReq({ userId: 'usr_1', sessionId: 'sess_1', capabilities: ['officer'] });

    expect(requireSession(req, { anyOf: ['staff', 'officer'] })).toEqual({
      userId: 'usr_1',
      sessionId: 'sess_1',
      capabilities: ['officer'],
    });
  });

  it('only requires a session when no capability is asked for', () => {
    const req = makeReq({ userId: 'usr_2', sessionId: 'sess_2', capabilities: [] });
    expect(requireSession(req).userId).toBe('usr_2');
  });
});
