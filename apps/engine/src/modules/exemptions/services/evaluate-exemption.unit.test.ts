import type { AuthorityRuleInput } from '@dutystack/types';
import { describe, expect, it } from 'vitest';
import { makeDescriptor, makeRule } from '../../../lib/tests/fixtures.js';
import { evaluateExemption } from './evaluate-exemption.js';

type ExclusionRuleInput = NonNullable<AuthorityRuleInput['exclusionRules']>[number];

const steelRule = (exclusionRules: ExclusionRuleInput[]) =>
  makeRule({
    id: 'ns-steel',
    family: 'national-security-steel',
    legalBasis: 'national-security',
    appliesToValuePortion: { kind: 'materialPortion', material: 'steel' },
    exclusionRules,
  });

const agreement: ExclusionRuleInput = {
  code: 'RTA-CA-MX',
  condition: { kind: 'tradeAgreement', originCountries: ['CA', 'MX'] },
};
const meltedAndPoured: ExclusionRuleInput = {
  code: 'US-MELT-POUR',
  condition: { kind: 'domesticProcessing', material: 'steel' },
};
const productExclusion: ExclusionRuleInput = {
  code: 'PX-001',
  condition: { kind: 'claimedExclusion' },
  validFrom: '2025-01-01',
  validUntil: '2025-12-31',
  quantityLimit: 100,
  cumulativeUsage: 40,
};
const informational: ExclusionRuleInput = {
  code: 'INFO-MAT',
  condition: { kind: 'productCategory', category: 'informationalMaterials' },
};

describe('evaluateExemption', () => {
  it('applies when no exclusion matches', () => {
    expect(evaluateExemption(steelRule([agreement]), makeDescriptor())).toEqual({
      exempt: false,
      reasonCode: 'APPLIES',
    });
  });

  it('exempts qualified agreement origins', () => {
    const out = evaluateExemption(
      steelRule([agreement]),
      makeDescriptor({ originCountry: 'MX', tradeAgreementQualified: true })
    );
    expect(out).toEqual({ exempt: true, code: 'RTA-CA-MX', reasonCode: 'EXEMPT_TRADE_AGREEMENT' });
  });

  it('requires the qualification flag for agreement exemptions', () => {
    const out = evaluateExemption(steelRule([agreement]), makeDescriptor({ originCountry: 'MX' }));
    expect(out.reasonCode).toBe('APPLIES');
  });

  it('exempts material sourced and processed in the destination country', () => {
    const out = evaluateExemption(
      steelRule([meltedAndPoured]),
      makeDescriptor({ materialOrigin: { steel: { sourcedIn: 'US', processedIn: 'US' } } })
    );
    expect(out).toEqual({
      exempt: true,
      code: 'US-MELT-POUR',
      reasonCode: 'EXEMPT_DOMESTIC_PROCESSING',
    });
  });

  it('does not exempt domestically sourced material processed abroad', () => {
    const out = evaluateExemption(
      steelRule([meltedAndPoured]),
      makeDescriptor({ materialOrigin: { steel: { sourcedIn: 'US', processedIn: 'CN' } } })
    );
    expect(out.exempt).toBe(false);
  });

  it('runs the steps in fixed order regardless of record order', () => {
    const out = evaluateExemption(
      steelRule([informational, meltedAndPoured, agreement]),
      makeDescriptor({
        originCountry: 'CA',
        tradeAgreementQualified: true,
        productCategories: ['informationalMaterials'],
        materialOrigin: { steel: { sourcedIn: 'US' } },
      })
    );
    expect(out.reasonCode).toBe('EXEMPT_TRADE_AGREEMENT');
  });

  describe('partial agreement share', () => {
    const automotive = (exclusionRules: ExclusionRuleInput[]) =>
      makeRule({
        id: 'ns-automotive',
        family: 'national-security-automotive',
        legalBasis: 'national-security',
        exclusionRules,
      });
    const caShare: ExclusionRuleInput = {
      code: '9903.01.26',
      condition: {
        kind: 'tradeAgreementShare',
        originCountries: ['CA'],
        agreementShare: 0.9136,
        contentFactor: 0.4,
      },
    };

    it('relieves agreementShare × contentFactor of the duty', () => {
      expect(
        evaluateExemption(
          automotive([caShare]),
          makeDescriptor({ originCountry: 'CA', tradeAgreementQualified: true })
        )
      ).toEqual({
        exempt: true,
        code: '9903.01.26',
        reasonCode: 'EXEMPT_PARTIAL_TRADE_AGREEMENT',
        share: 0.36544,
      });
    });

    it('needs qualification and a listed origin', () => {
      const rule = automotive([caShare]);
      expect(evaluateExemption(rule, makeDescriptor({ originCountry: 'CA' })).exempt).toBe(false);
      expect(
        evaluateExemption(
          rule,
          makeDescriptor({ originCountry: 'MX', tradeAgreementQualified: true })
        ).exempt
      ).toBe(false);
    });

    it('gives way to a whole-duty agreement record', () => {
      const outcome = evaluateExemption(
        automotive([caShare, { code: 'RTA-CA', condition: { kind: 'tradeAgreement' } }]),
        makeDescriptor({ originCountry: 'CA', tradeAgreementQualified: true })
      );
      expect(outcome).toEqual({
        exempt: true,
        code: 'RTA-CA',
        reasonCode: 'EXEMPT_TRADE_AGREEMENT',
      });
    });
  });

  describe('claimed exclusions', () => {
    it('grants a claim inside the window and under the cap, reporting usage', () => {
      const out = evaluateExemption(
        steelRule([productExclusion]),
        makeDescriptor({ exclusionClaims: [{ code: 'PX-001', quantity: 60 }] })
      );
      expect(out).toEqual({
        exempt: true,
        code: 'PX-001',
        reasonCode: 'EXEMPT_CLAIMED_EXCLUSION',
        usage: { exclusionCode: 'PX-001', quantity: 60 },
      });
    });

    it('denies a claim that would exceed the cap', () => {
      const out = evaluateExemption(
        steelRule([productExclusion]),
        makeDescriptor({ exclusionClaims: [{ code: 'PX-001', quantity: 61 }] })
      );
      expect(out).toEqual({
        exempt: false,
        reasonCode: 'EXCLUSION_DENIED_QUANTITY_CAP',
        denial: { code: 'PX-001', reasonCode: 'EXCLUSION_DENIED_QUANTITY_CAP' },
      });
    });

    it('prefers the caller usage snapshot over the catalog running total', () => {
      const out = evaluateExemption(
        steelRule([productExclusion]),
        makeDescriptor({ exclusionClaims: [{ code: 'PX-001', quantity: 60 }] }),
        { 'PX-001': 90 }
      );
      expect(out.reasonCode).toBe('EXCLUSION_DENIED_QUANTITY_CAP');
    });

    it('denies a claim outside the validity window', () => {
      const out = evaluateExemption(
        steelRule([productExclusion]),
        makeDescriptor({
          entryDate: '2026-01-01',
          exclusionClaims: [{ code: 'PX-001', quantity: 1 }],
        })
      );
      expect(out.reasonCode).toBe('EXCLUSION_DENIED_OUTSIDE_WINDOW');
    });

    it('accepts a claim on the last valid day', () => {
      const out = evaluateExemption(
        steelRule([productExclusion]),
        makeDescriptor({
          entryDate: '2025-12-31',
          exclusionClaims: [{ code: 'PX-001', quantity: 1 }],
        })
      );
      expect(out.exempt).toBe(true);
    });

    it('reports window and cap failures together', () => {
      const out = evaluateExemption(
        steelRule([productExclusion]),
        makeDescriptor({
          entryDate: '2026-01-01',
          exclusionClaims: [{ code: 'PX-001', quantity: 500 }],
        })
      );
      expect(out.reasonCode).toBe('EXCLUSION_DENIED_WINDOW_AND_QUANTITY_CAP');
    });

    it('denies a capped claim without a declared quantity', () => {
      const out = evaluateExemption(
        steelRule([productExclusion]),
        makeDescriptor({ exclusionClaims: [{ code: 'PX-001' }] })
      );
      expect(out.reasonCode).toBe('EXCLUSION_DENIED_QUANTITY_UNDECLARED');
    });

    it('ignores claims for codes the authority does not know', () => {
      const out = evaluateExemption(
        steelRule([productExclusion]),
        makeDescriptor({ exclusionClaims: [{ code: 'PX-999', quantity: 1 }] })
      );
      expect(out).toEqual({ exempt: false, reasonCode: 'APPLIES' });
    });

    it('lets a later blanket exemption override a denial', () => {
      const out = evaluateExemption(
        steelRule([productExclusion, informational]),
        makeDescriptor({
          productCategories: ['informationalMaterials'],
          exclusionClaims: [{ code: 'PX-001', quantity: 500 }],
        })
      );
      expect(out).toEqual({
        exempt: true,
        code: 'INFO-MAT',
        reasonCode: 'EXEMPT_BLANKET_CATEGORY',
      });
    });
  });

  describe('blanket exemptions', () => {
    it('exempts listed origins', () => {
      const rule = steelRule([
        { code: 'COL2', condition: { kind: 'originCountry', countries: ['CU', 'KP'] } },
      ]);
      expect(evaluateExemption(rule, makeDescriptor({ originCountry: 'KP' })).exempt).toBe(true);
      expect(evaluateExemption(rule, makeDescriptor({ originCountry: 'CN' })).exempt).toBe(false);
    });

    it('exempts listed entry types', () => {
      const rule = steelRule([
        { code: 'RETURN', condition: { kind: 'entryType', entryTypes: ['assemblyReturn'] } },
      ]);
      const out = evaluateExemption(rule, makeDescriptor({ entryType: 'assemblyReturn' }));
      expect(out).toEqual({ exempt: true, code: 'RETURN', reasonCode: 'EXEMPT_BLANKET_CATEGORY' });
    });

    it('skips blanket records outside their window', () => {
      const rule = steelRule([{ ...informational, validUntil: '2024-12-31' }]);
      const out = evaluateExemption(
        rule,
        makeDescriptor({ productCategories: ['informationalMaterials'] })
      );
      expect(out.exempt).toBe(false);
    });
  });
});
