import { describe, it, expect } from 'vitest';
import { ActiveJobError, ArchiveError, SessionExpiredError, TrackdropError, isTrackdropError } from './index.js';

describe('error taxonomy', () => {
  it('carries a code and details for each refusal', () => {
    const expired = new SessionExpiredError(7);
    const busy = new ActiveJobError(7);

    expect(expired).toBeInstanceOf(TrackdropError);
    expect(expired.code).toBe('SESSION_EXPIRED');
    expect(expired.message).toBe('No pending conversation for user 7');
    expect(busy.code).toBe('ACTIVE_JOB');
    expect(busy.details).toEqual({ userId: 7 });
  });

  it('recognises its own errors only', () => {
    expect(isTrackdropError(new ArchiveError('/tmp/a.zip', 'disk full'))).toBe(true);
    expect(isTrackdropError(new Error('plain'))).toBe(false);
    expect(isTrackdropError('ACTIVE_JOB')).toBe(false);
  });
});
