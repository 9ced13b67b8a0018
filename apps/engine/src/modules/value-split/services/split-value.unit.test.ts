import { describe, expect, it } from 'vitest';
import { makeDescriptor, makeRule } from '../../../lib/tests/fixtures.js';
import {
  domesticContentShareApplies,
  dutiableValueFor,
  grossDutiableValueFor,
  splitValue,
  valuePortionLabel,
} from './split-value.js';

describe('splitValue', () => {
  it('splits materials and the non-material residual in cents', () => {
    const split = splitValue(
      makeDescriptor({ declaredValue: 5000, composition: { steel: 60, aluminum: 30 } })
    );
    expect(split).toEqual({
      declaredValue: 500000,
      materials: { steel: 300000, aluminum: 150000, copper: 0, lumber: 0 },
      domesticCarveOut: 0,
      domesticContentResidual: 50000,
      nonMaterialResidual: 50000,
    });
  });

  it('carves domestic content out of the non-material share', () => {
    const split = splitValue(
      makeDescriptor({ declaredValue: 1000, composition: { steel: 20, domesticContent: 30 } })
    );
    expect(split.materials.steel).toBe(20000);
    expect(split.domesticCarveOut).toBe(30000);
    expect(split.domesticContentResidual).toBe(50000);
    expect(split.nonMaterialResidual).toBe(80000);
  });

  it('caps domestic content at the non-material share', () => {
    const split = splitValue(
      makeDescriptor({ declaredValue: 1000, composition: { steel: 80, domesticContent: 50 } })
    );
    expect(split.domesticCarveOut).toBe(20000);
    expect(split.domesticContentResidual).toBe(0);
  });

  it('reconciles rounding drift onto the largest share', () => {
    const split = splitValue(
      makeDescriptor({
        declaredValue: 100.01,
        composition: { steel: 33.33, aluminum: 33.33, copper: 33.33 },
      })
    );
    expect(split.materials).toEqual({ steel: 3334, aluminum: 3333, copper: 3333, lumber: 0 });
    expect(split.domesticContentResidual).toBe(1);
  });

  it('takes excess rounding back from the largest share', () => {
    const split = splitValue(
      makeDescriptor({ declaredValue: 0.03, composition: { steel: 50, aluminum: 50 } })
    );
    expect(split.materials.steel).toBe(1);
    expect(split.materials.aluminum).toBe(2);
  });

  it('conserves the declared value', () => {
    const split = splitValue(
      makeDescriptor({
        declaredValue: 987.65,
        composition: { steel: 12.5, copper: 7.25, lumber: 0.35, domesticContent: 41.1 },
      })
    );
    const materials = Object.values(split.materials).reduce((sum, v) => sum + v, 0);
    expect(materials + split.domesticCarveOut + split.domesticContentResidual).toBe(98765);
  });
});

describe('dutiableValueFor', () => {
  const descriptor = makeDescriptor({
    declaredValue: 1000,
    composition: { steel: 20, domesticContent: 30 },
  });
  const split = splitValue(descriptor);

  it('uses the whole declared value for whole-value authorities', () => {
    expect(dutiableValueFor(makeRule({ id: 'w' }), split, descriptor)).toBe(100000);
  });

  it('uses the material share for material authorities', () => {
    const rule = makeRule({
      id: 'steel',
      appliesToValuePortion: { kind: 'materialPortion', material: 'steel' },
    });
    expect(dutiableValueFor(rule, split, descriptor)).toBe(20000);
  });

  it('carves domestic content once it reaches the threshold', () => {
    const rule = makeRule({
      id: 'reciprocal',
      appliesToValuePortion: { kind: 'nonMaterialResidual' },
      domesticContentThreshold: 30,
    });
    expect(dutiableValueFor(rule, split, descriptor)).toBe(50000);
  });

  it('keeps the full non-material value below the threshold', () => {
    const rule = makeRule({
      id: 'reciprocal',
      appliesToValuePortion: { kind: 'nonMaterialResidual' },
      domesticContentThreshold: 30.01,
    });
    expect(dutiableValueFor(rule, split, descriptor)).toBe(80000);
  });

  it('always nets domestic content for domestic-content residual authorities', () => {
    const rule = makeRule({
      id: 'residual',
      appliesToValuePortion: { kind: 'domesticContentResidual' },
    });
    expect(dutiableValueFor(rule, split, descriptor)).toBe(50000);
  });
});

describe('valuePortionLabel', () => {
  it('labels material portions with their material', () => {
    expect(valuePortionLabel({ kind: 'materialPortion', material: 'copper' })).toBe(
      'material:copper'
    );
    expect(valuePortionLabel({ kind: 'wholeValue' })).toBe('wholeValue');
  });
});

describe('domestic-content carve-out', () => {
  const descriptor = makeDescriptor({
    declaredValue: 1000,
    composition: { steel: 20, domesticContent: 30 },
  });
  const split = splitValue(descriptor);
  const residualRule = makeRule({
    id: 'r',
    appliesToValuePortion: { kind: 'nonMaterialResidual' },
    domesticContentThreshold: 20,
  });

  it('reports whether the share qualifies', () => {
    expect(domesticContentShareApplies(residualRule, descriptor)).toBe(true);
    expect(
      domesticContentShareApplies(
        residualRule,
        makeDescriptor({ composition: { domesticContent: 19.99 } })
      )
    ).toBe(false);
    expect(domesticContentShareApplies(makeRule({ id: 'w' }), descriptor)).toBe(false);
  });

  it('keeps the gross value for the un-exempted figure', () => {
    expect(grossDutiableValueFor(residualRule, split)).toBe(80000);
    expect(dutiableValueFor(residualRule, split, descriptor)).toBe(50000);
  });
});
