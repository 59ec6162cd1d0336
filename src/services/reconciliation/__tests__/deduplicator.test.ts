import { describe, expect, it } from 'vitest';
import { makeRecord } from '../../../__tests__/fixtures';
import { deduplicateFacilities, findDuplicateGroups } from '../deduplicator';

// ============================================================================
// deduplicateFacilities
// ============================================================================

describe('deduplicateFacilities', () => {
  it('keeps the verified copy regardless of input order', () => {
    const verified = makeRecord({ id: 'verified', name: 'Signature Aviation', isVerified: true });
    const cached = makeRecord({
      id: 'cached',
      name: 'signature fbo',
      lastUpdated: new Date('2025-06-01T00:00:00Z'),
    });

    expect(deduplicateFacilities([verified, cached]).map((r) => r.id)).toEqual(['verified']);
    expect(deduplicateFacilities([cached, verified]).map((r) => r.id)).toEqual(['verified']);
  });

  it('prefers the newer copy when verification is equal', () => {
    const older = makeRecord({ id: 'older', name: 'Summit Air', lastUpdated: new Date('2024-01-01T00:00:00Z') });
    const newer = makeRecord({ id: 'newer', name: 'summit air', lastUpdated: new Date('2024-02-01T00:00:00Z') });

    expect(deduplicateFacilities([older, newer]).map((r) => r.id)).toEqual(['newer']);
    expect(deduplicateFacilities([newer, older]).map((r) => r.id)).toEqual(['newer']);
  });

  it('keeps the first copy on a full tie', () => {
    const first = makeRecord({ id: 'first', name: 'Summit Air' });
    const second = makeRecord({ id: 'second', name: 'SUMMIT AIR' });

    expect(deduplicateFacilities([first, second]).map((r) => r.id)).toEqual(['first']);
  });

  it('does not merge field content from discarded copies', () => {
    const verified = makeRecord({ name: 'Signature Aviation', isVerified: true, phone: null });
    const cached = makeRecord({ name: 'Signature', phone: '555-0199' });

    const [winner] = deduplicateFacilities([verified, cached]);
    expect(winner.phone).toBeNull();
  });

  it('orders the result by name', () => {
    const records = [
      makeRecord({ name: 'Northgate FBO' }),
      makeRecord({ name: 'Lakeside Jet Center' }),
      makeRecord({ name: 'Harbor Field Aviation' }),
    ];

    expect(deduplicateFacilities(records).map((r) => r.name)).toEqual([
      'Harbor Field Aviation',
      'Lakeside Jet Center',
      'Northgate FBO',
    ]);
  });

  it('returns an empty collection for empty input', () => {
    expect(deduplicateFacilities([])).toEqual([]);
  });
});

// ============================================================================
// findDuplicateGroups
// ============================================================================

describe('findDuplicateGroups', () => {
  it('reports only colliding groups with their winner and losers', () => {
    const verified = makeRecord({ id: 'v', name: 'Signature Aviation', isVerified: true });
    const loser = makeRecord({ id: 'l', name: 'Signature FBO' });
    const single = makeRecord({ id: 's', name: 'Summit Air' });

    const groups = findDuplicateGroups([loser, single, verified]);

    expect(groups).toHaveLength(1);
    expect(groups[0].key).toBe('signature');
    expect(groups[0].winner.id).toBe('v');
    expect(groups[0].losers.map((r) => r.id)).toEqual(['l']);
  });
});
