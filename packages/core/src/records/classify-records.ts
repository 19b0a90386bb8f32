import { RuleStore } from '../rules-engine/rule-store.js';
import { RulesEngine } from '../rules-engine/rules-engine.js';
import { isSourceLoadError } from '../shared/errors.js';
import { loadRecordsFromFile } from './record-reader.js';

export type LineWriter = (line: string) => void;

export interface ClassifyIO {
  out: LineWriter;
  err: LineWriter;
}

export const DEFAULT_RULES_PATH = 'rules/fire-risk.yaml';

/**
 * Classify every record in `recordsPath` and write each one, annotated, as a
 * JSON line. Both sources load before the first line is written, so a load
 * error leaves the output empty. Returns the number of lines written.
 */
export function classifyFile(rulesPath: string, recordsPath: string, write: LineWriter): number {
  const engine = new RulesEngine(RuleStore.load(rulesPath));
  const records = loadRecordsFromFile(recordsPath);

  let written = 0;
  for (const annotated of engine.annotateRecords(records)) {
    write(`${JSON.stringify(annotated)}\n`);
    written++;
  }
  return written;
}

function argValue(args: readonly string[], name: string): string | undefined {
  const index = args.indexOf(name);
  return index >= 0 ? args[index + 1] : undefined;
}

/**
 * Command line entry: `--rules <file|dir> --records <file>`.
 * Exit codes: 0 done, 1 a source failed to load, 2 bad arguments.
 */
export function runClassify(args: readonly string[], io: ClassifyIO): number {
  const rulesPath = argValue(args, '--rules') ?? DEFAULT_RULES_PATH;
  const recordsPath = argValue(args, '--records');
  if (!recordsPath) {
    io.err('Missing required argument --records <path>\n');
    return 2;
  }

  try {
    classifyFile(rulesPath, recordsPath, io.out);
    return 0;
  } catch (error) {
    if (!isSourceLoadError(error)) throw error;
    io.err(`${error.message}\n`);
    return 1;
  }
}
