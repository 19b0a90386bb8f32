import { extname, join } from 'node:path';
import { MalformedSourceError } from '../shared/errors.js';
import {
  STRUCTURED_EXTENSIONS,
  isDirectory,
  listDirectory,
  parseStructuredText,
  readSourceText,
} from '../shared/source-reader.js';
import { parseRuleDocument } from './rule-schema.js';
import type { RuleDefinition } from './types.js';

/**
 * Load rules from a single YAML or JSON file, in document order.
 */
export function loadRulesFromFile(filePath: string): RuleDefinition[] {
  const content = readSourceText(filePath);
  return parseRuleDocument(parseStructuredText(content, filePath), filePath);
}

/**
 * Load and concatenate rules from every YAML/JSON file in a directory,
 * taking the files in name order.
 */
export function loadRulesFromDirectory(dirPath: string): RuleDefinition[] {
  const files = listDirectory(dirPath)
    .filter((f) => STRUCTURED_EXTENSIONS.has(extname(f).toLowerCase()))
    .sort();

  if (files.length === 0) {
    throw new MalformedSourceError(dirPath, 'contains no .json, .yaml or .yml rule files');
  }

  return files.flatMap((file) => loadRulesFromFile(join(dirPath, file)));
}

export function loadRules(path: string): RuleDefinition[] {
  return isDirectory(path) ? loadRulesFromDirectory(path) : loadRulesFromFile(path);
}
