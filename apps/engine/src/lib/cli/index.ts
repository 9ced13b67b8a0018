#!/usr/bin/env node
/**
 * Duty stacking CLI.
 *
 * Usage:
 *   dutystack compute --input=shipment.json [--ids=ns-steel,ep-reciprocal] [--usage=usage.json]
 *   dutystack catalog:check [--catalog=rules.json]
 *   dutystack catalog:lookup --hs=7208.10.00.00 --origin=CN --dest=US --date=2025-06-01
 */
import 'dotenv/config';
import { runCli } from './run.js';

runCli(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((e) => {
    console.error(e);
    process.exit(1);
  });
