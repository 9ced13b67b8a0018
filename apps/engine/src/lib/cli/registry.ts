import type { Command } from './runtime.js';
import { catalogCheck, catalogFacts, catalogLookup } from './commands/catalog.js';
import { compute } from './commands/compute.js';

export const commands: Record<string, Command> = {
  compute,
  'catalog:check': catalogCheck,
  'catalog:lookup': catalogLookup,
  'catalog:facts': catalogFacts,
};
