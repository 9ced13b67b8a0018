import { beforeAll, describe, expect, it } from 'vitest';
import { makeRule } from '../../../lib/tests/fixtures.js';
import type { RuleCatalog } from '../../catalog/services/build-catalog.js';
import { loadRuleCatalog } from '../../catalog/services/load-catalog.js';
import { requiredFacts } from './required-facts.js';

describe('requiredFacts', () => {
  it('returns nothing for an authority without inputs', () => {
    expect(requiredFacts([makeRule({ id: 'flat' })], 'CN')).toEqual([]);
  });

  it('merges fields shared by several authorities', () => {
    const returned = makeRule({
      id: 'returns',
      exclusionRules: [
        { code: 'RET', condition: { kind: 'entryType', entryTypes: ['assemblyReturn'] } },
        { code: 'RTA', condition: { kind: 'tradeAgreement' } },
      ],
    });
    const agreement = makeRule({
      id: 'agreement',
      exclusionRules: [{ code: 'RTA-2', condition: { kind: 'tradeAgreement' } }],
    });

    expect(requiredFacts([returned, agreement], 'mx')).toEqual([
      { field: 'tradeAgreementQualified', authorityIds: ['returns', 'agreement'] },
      { field: 'entryType', authorityIds: ['returns'] },
    ]);
  });

  it('only asks for a base duty rate from floor origins', () => {
    const floor = makeRule({
      id: 'floor',
      rateAdjustment: { kind: 'topUpToFloor', floorRate: 0.15, originCountries: ['JP'] },
    });
    expect(requiredFacts([floor], 'JP')).toEqual([
      { field: 'baseDutyRate', authorityIds: ['floor'] },
    ]);
    expect(requiredFacts([floor], 'VN')).toEqual([]);
  });

  describe('bundled catalog', () => {
    let catalog: RuleCatalog;

    beforeAll(async () => {
      catalog = await loadRuleCatalog();
    });

    it('lists vehicle facts for a floor origin', () => {
      const rules = catalog.lookup('8703.23.01', 'DE', 'US', '2025-06-01');
      expect(requiredFacts(rules, 'DE')).toEqual([
        { field: 'composition.steel', authorityIds: ['ns-steel'] },
        { field: 'composition.aluminum', authorityIds: ['ns-aluminum'] },
        { field: 'composition.domesticContent', authorityIds: ['ep-reciprocal'] },
        { field: 'materialOrigin.steel', authorityIds: ['ns-steel'] },
        { field: 'materialOrigin.aluminum', authorityIds: ['ns-aluminum'] },
        { field: 'baseDutyRate', authorityIds: ['ep-reciprocal'] },
        { field: 'exclusionClaims', authorityIds: ['ns-steel'] },
        { field: 'productCategories', authorityIds: ['ep-reciprocal'] },
      ]);
    });

    it('asks agreement origins about qualification', () => {
      const rules = catalog.lookup('8703.23.01', 'CA', 'US', '2025-06-01');
      expect(requiredFacts(rules, 'CA')).toEqual([
        { field: 'composition.steel', authorityIds: ['ns-steel'] },
        { field: 'composition.aluminum', authorityIds: ['ns-aluminum'] },
        { field: 'materialOrigin.steel', authorityIds: ['ns-steel'] },
        { field: 'materialOrigin.aluminum', authorityIds: ['ns-aluminum'] },
        {
          field: 'tradeAgreementQualified',
          authorityIds: ['ns-automotive', 'ns-steel', 'ns-aluminum'],
        },
        { field: 'exclusionClaims', authorityIds: ['ns-steel'] },
      ]);
    });

    it('skips authorities the origin is blanket-exempt from', () => {
      const rules = catalog.lookup('7208.10.00.00', 'RU', 'US', '2025-06-01');
      expect(rules.map((r) => r.id)).toEqual(['ns-steel', 'ep-reciprocal']);
      expect(requiredFacts(rules, 'RU')).toEqual([
        { field: 'composition.steel', authorityIds: ['ns-steel'] },
        { field: 'materialOrigin.steel', authorityIds: ['ns-steel'] },
        { field: 'exclusionClaims', authorityIds: ['ns-steel'] },
      ]);
    });
  });
});
