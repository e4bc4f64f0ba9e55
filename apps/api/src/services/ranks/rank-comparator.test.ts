import { describe, it, expect } from 'vitest';
import { compareRank, describeExternalRank, matchesExternalRank } from './rank-comparator';
import { rankByOrder } from '../../../test/fixtures/ranks.fixture';

describe('Rank Comparator', () => {
  const corporal = rankByOrder(3); // ref 45
  const sergeant = rankByOrder(4); // ref 4004

  it('should match when the reference equals the external level', () => {
    const external = { externalId: 999, externalLevel: 45 };
    expect(compareRank({ ...corporal, externalRankRef: 45 }, external)).toEqual({
      kind: 'MATCH',
      rank: { ...corporal, externalRankRef: 45 },
    });
  });

  it('should match when the reference equals the external id', () => {
    expect(matchesExternalRank(sergeant, { externalId: 4004, externalLevel: 70 })).toBe(true);
  });

  it('should report a mismatch carrying the external descriptor', () => {
    const external = { externalId: 9002, externalLevel: 2 };
    expect(compareRank(corporal, external)).toEqual({ kind: 'MISMATCH', rank: corporal, external });
  });

  it('should treat an unknown local rank as a mismatch', () => {
    const external = { externalId: 9045, externalLevel: 45 };
    expect(compareRank(undefined, external)).toEqual({ kind: 'MISMATCH', rank: undefined, external });
  });

  it('should describe an external role', () => {
    expect(describeExternalRank({ externalId: 9045, externalLevel: 45, name: 'Corporal' })).toBe(
      '"Corporal" (id 9045, level 45)'
    );
    expect(describeExternalRank({ externalId: 1, externalLevel: 2 })).toBe('(id 1, level 2)');
  });
});
