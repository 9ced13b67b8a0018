import type { AuthorityRule, CalculationResult } from '@dutystack/types';
import { CatalogError } from '../../../lib/errors.js';
import { silentLogger } from '../../../lib/logger.js';
import type { RuleCatalog } from '../../catalog/services/build-catalog.js';
import { parseDescriptor, parseUsage, type StackingOptions, stackRules } from './compute-stacking.js';

/**
 * Resolves candidate authority ids through the catalog and stacks the applicable ones.
 * Without ids, every rule the catalog finds for the shipment is a candidate.
 */
export function computeForCandidates(
  catalog: RuleCatalog,
  input: unknown,
  ids?: readonly string[],
  opts: StackingOptions = {}
): CalculationResult {
  const descriptor = parseDescriptor(input);

  const usage = parseUsage(opts.usage);

  const applicable = catalog.lookup(
    descriptor.hsCode,
    descriptor.originCountry,
    descriptor.destinationCountry,
    descriptor.entryDate
  );

  let rules: AuthorityRule[] = applicable;
  if (ids) {
    const unknown = ids.filter((id) => !catalog.get(id));
    if (unknown.length) {
      throw new CatalogError(`Unknown authority id: ${unknown.join(', ')}`, { ids: unknown });
    }
    const wanted = new Set(ids);
    rules = applicable.filter((rule) => wanted.has(rule.id));
  }

  const log = opts.log ?? silentLogger;
  log.debug(
    { candidates: ids?.length ?? null, applicable: rules.map((r) => r.id) },
    'resolved candidate authorities'
  );

  return stackRules(descriptor, rules, usage, log);
}
