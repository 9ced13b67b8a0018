import {
  type AuthorityRule,
  MATERIAL_KINDS,
  type MaterialKind,
  type ShipmentDescriptor,
  type ValuePortion,
} from '@dutystack/types';
import { mulRatio, toBasisPoints, toCents } from '../../../lib/money.js';

/** All amounts in cents. materials + domesticCarveOut + domesticContentResidual == declaredValue. */
export type ValueSplit = {
  declaredValue: number;
  materials: Record<MaterialKind, number>;
  domesticCarveOut: number;
  /** non-material value net of declared domestic content */
  domesticContentResidual: number;
  /** all non-material value (carve-out included) */
  nonMaterialResidual: number;
};

const FULL_BP = 10_000;

function reconcileDrift(parts: number[], target: number): number[] {
  const out = [...parts];
  let drift = target - out.reduce((sum, v) => sum + v, 0);
  while (drift !== 0) {
    let idx = 0;
    for (let i = 1; i < out.length; i++) {
      if ((out[i] ?? 0) > (out[idx] ?? 0)) idx = i;
    }
    const step = drift > 0 ? 1 : -1;
    out[idx] = (out[idx] ?? 0) + step;
    drift -= step;
  }
  return out;
}

export function materialBasisPoints(descriptor: ShipmentDescriptor, material: MaterialKind): number {
  return toBasisPoints(descriptor.composition[material] ?? 0);
}

export function domesticContentBasisPoints(descriptor: ShipmentDescriptor): number {
  return toBasisPoints(descriptor.composition.domesticContent ?? 0);
}

export function splitValue(descriptor: ShipmentDescriptor): ValueSplit {
  const total = toCents(descriptor.declaredValue);

  const materialBp = MATERIAL_KINDS.map((m) => materialBasisPoints(descriptor, m));
  const nonMaterialBp = FULL_BP - materialBp.reduce((sum, bp) => sum + bp, 0);
  const domesticBp = Math.min(domesticContentBasisPoints(descriptor), nonMaterialBp);
  const residualBp = nonMaterialBp - domesticBp;

  const raw = [...materialBp, domesticBp, residualBp].map((bp) => mulRatio(total, bp / FULL_BP));
  const parts = reconcileDrift(raw, total);

  const materials: Record<MaterialKind, number> = { steel: 0, aluminum: 0, copper: 0, lumber: 0 };
  MATERIAL_KINDS.forEach((m, i) => {
    materials[m] = parts[i] ?? 0;
  });
  const domesticCarveOut = parts[MATERIAL_KINDS.length] ?? 0;
  const domesticContentResidual = parts[MATERIAL_KINDS.length + 1] ?? 0;

  return {
    declaredValue: total,
    materials,
    domesticCarveOut,
    domesticContentResidual,
    nonMaterialResidual: domesticCarveOut + domesticContentResidual,
  };
}

/** Label used on calculation lines, e.g. `material:steel`. */
export function valuePortionLabel(portion: ValuePortion): string {
  return portion.kind === 'materialPortion' ? `material:${portion.material}` : portion.kind;
}

/** Declared domestic content reaches the rule's threshold, so that share is carved out. */
export function domesticContentShareApplies(
  rule: AuthorityRule,
  descriptor: ShipmentDescriptor
): boolean {
  const threshold = rule.domesticContentThreshold;
  return (
    rule.appliesToValuePortion.kind === 'nonMaterialResidual' &&
    threshold !== undefined &&
    domesticContentBasisPoints(descriptor) >= toBasisPoints(threshold)
  );
}

/** Dutiable amount in cents before any domestic-content carve-out. */
export function grossDutiableValueFor(rule: AuthorityRule, split: ValueSplit): number {
  const portion = rule.appliesToValuePortion;
  switch (portion.kind) {
    case 'wholeValue':
      return split.declaredValue;
    case 'materialPortion':
      return split.materials[portion.material];
    case 'domesticContentResidual':
      return split.domesticContentResidual;
    case 'nonMaterialResidual':
      return split.nonMaterialResidual;
  }
}

/** Dutiable amount in cents for one authority. Whole-value authorities bypass the split. */
export function dutiableValueFor(
  rule: AuthorityRule,
  split: ValueSplit,
  descriptor: ShipmentDescriptor
): number {
  return domesticContentShareApplies(rule, descriptor)
    ? split.domesticContentResidual
    : grossDutiableValueFor(rule, split);
}
