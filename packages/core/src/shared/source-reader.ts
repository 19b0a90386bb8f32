import { readFileSync, readdirSync, statSync } from 'node:fs';
import { extname } from 'node:path';
import yaml from 'js-yaml';
import { MalformedSourceError, SourceNotFoundError } from './errors.js';

export const STRUCTURED_EXTENSIONS: ReadonlySet<string> = new Set(['.json', '.yaml', '.yml']);

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function rethrowMissing(error: unknown, path: string): never {
  const code = errnoCode(error);
  if (code === 'ENOENT' || code === 'ENOTDIR') {
    throw new SourceNotFoundError(path, error);
  }
  throw error;
}

export function readSourceText(path: string): string {
  try {
    return readFileSync(path, 'utf-8');
  } catch (error) {
    if (errnoCode(error) === 'EISDIR') {
      throw new MalformedSourceError(path, 'is a directory, expected a file', error);
    }
    return rethrowMissing(error, path);
  }
}

export function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch (error) {
    return rethrowMissing(error, path);
  }
}

export function listDirectory(path: string): string[] {
  try {
    return readdirSync(path);
  } catch (error) {
    return rethrowMissing(error, path);
  }
}

/**
 * Parse JSON or YAML text, picking the format from the file extension.
 */
export function parseStructuredText(content: string, path: string): unknown {
  const ext = extname(path).toLowerCase();

  if (ext === '.json') {
    try {
      return JSON.parse(content);
    } catch (error) {
      throw new MalformedSourceError(path, 'not valid JSON', error);
    }
  }

  if (ext === '.yaml' || ext === '.yml') {
    try {
      return yaml.load(content);
    } catch (error) {
      throw new MalformedSourceError(path, 'not valid YAML', error);
    }
  }

  throw new MalformedSourceError(path, `unsupported format ${ext || '(none)'}, expected .json, .yaml or .yml`);
}
