import {
  type AuthorityRule,
  type AuthorityRuleInput,
  AuthorityRuleSchema,
  type ShipmentDescriptor,
  type ShipmentDescriptorInput,
  ShipmentDescriptorSchema,
} from '@dutystack/types';

export function ruleInput(
  overrides: Partial<AuthorityRuleInput> & Pick<AuthorityRuleInput, 'id'>
): AuthorityRuleInput {
  return {
    displayName: overrides.id,
    family: 'retaliatory',
    legalBasis: 'retaliatory',
    precedenceLevel: 1,
    applicability: { hsPrefixes: ['72'], destinationCountries: ['US'] },
    rateTable: { byProduct: [{ hsPrefix: '72', rate: 0.25 }] },
    stackingMode: { mode: 'additive' },
    appliesToValuePortion: { kind: 'wholeValue' },
    ...overrides,
  };
}

export function makeRule(
  overrides: Partial<AuthorityRuleInput> & Pick<AuthorityRuleInput, 'id'>
): AuthorityRule {
  return AuthorityRuleSchema.parse(ruleInput(overrides));
}

export function descriptorInput(
  overrides: Partial<ShipmentDescriptorInput> = {}
): ShipmentDescriptorInput {
  return {
    hsCode: '7208.10.00.00',
    originCountry: 'CN',
    destinationCountry: 'US',
    declaredValue: 1000,
    entryDate: '2025-06-01',
    ...overrides,
  };
}

export function makeDescriptor(overrides: Partial<ShipmentDescriptorInput> = {}): ShipmentDescriptor {
  return ShipmentDescriptorSchema.parse(descriptorInput(overrides));
}
