import { computeForCandidates } from '../../../modules/stacking/services/compute-for-candidates.js';
import { parseUsage } from '../../../modules/stacking/services/compute-stacking.js';
import { type Command, openCatalog } from '../runtime.js';
import {
  flagBool,
  flagCSV,
  flagStr,
  parseFlags,
  printJson,
  readJsonFile,
  requireFlag,
} from '../utils.js';

/**
 * compute --input=shipment.json [--ids=ns-steel,ep-reciprocal] [--usage=usage.json]
 *         [--catalog=rules.json] [--compact]
 */
export const compute: Command = async (args, ctx) => {
  const flags = parseFlags(args);
  const input = await readJsonFile(requireFlag(flags, 'input'));
  const usagePath = flagStr(flags, 'usage');
  const usage = usagePath ? parseUsage(await readJsonFile(usagePath)) : undefined;
  const ids = flagCSV(flags, 'ids');

  const catalog = await openCatalog(flags, ctx);
  const result = computeForCandidates(catalog, input, ids.length ? ids : undefined, {
    usage,
    log: ctx.log.child({ cmd: 'compute' }),
  });

  printJson(result, flagBool(flags, 'compact'));
};
