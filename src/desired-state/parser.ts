/**
 * Desired-state text parsing: YAML to a plain, still unvalidated value.
 */

import { readFile } from 'fs/promises';
import YAML, { YAMLParseError } from 'yaml';
import { ConfigParseError, errorMessage } from '../domain/errors';

export function parseDesiredStateText(text: string, source = '<inline>'): unknown {
  try {
    return YAML.parse(text);
  } catch (err) {
    if (err instanceof YAMLParseError) {
      const position = err.linePos?.[0];
      throw new ConfigParseError(`Cannot parse desired state ${source}: ${err.message}`, {
        source,
        code: err.code,
        ...(position ? { line: position.line, column: position.col } : {}),
      });
    }
    throw new ConfigParseError(`Cannot parse desired state ${source}: ${errorMessage(err)}`, { source });
  }
}

/** Read and parse a desired-state file. */
export async function readDesiredStateFile(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new ConfigParseError(`Cannot read desired state file ${path}: ${errorMessage(err)}`, { source: path });
  }
  return parseDesiredStateText(text, path);
}
