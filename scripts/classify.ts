#!/usr/bin/env tsx
/**
 * Classify a record file against a rule set.
 *
 * Prints each record with its risk, action and matched rule id appended,
 * one JSON object per line.
 *
 * Usage:
 *   npm run classify -- --rules rules/fire-risk.yaml --records data/alerts.sample.csv
 */

import { runClassify } from '@ignis/core';

process.exitCode = runClassify(process.argv.slice(2), {
  out: (line) => process.stdout.write(line),
  err: (line) => process.stderr.write(line),
});
