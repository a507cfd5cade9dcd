// Change ingestion - entry point for change events arriving from producers

import { validateChangeEvent, type ChangeEvent } from '@metagraph/protocol';
import { InvalidChangeEventError } from '../errors.js';
import { isChangeError, type ChangeError, type ChangeProcessor } from '../changes/index.js';

/**
 * Validate an untrusted value against the change event wire shape.
 *
 * @throws InvalidChangeEventError listing every issue path
 */
export function parseChangeEvent(value: unknown): ChangeEvent {
  const result = validateChangeEvent(value);
  if (!result.valid) {
    throw new InvalidChangeEventError(result.issues);
  }
  return result.event;
}

export type ChangeLogFailure = {
  /** 1-based line number in the log */
  line: number;
  error: ChangeError;
};

export type IngestChangeLogResult = {
  /** Non-blank lines seen */
  total: number;
  succeeded: number;
  failed: ChangeLogFailure[];
};

function parseLine(text: string): ChangeEvent {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new InvalidChangeEventError([
      { path: '(root)', message: `not valid JSON: ${error instanceof Error ? error.message : String(error)}` },
    ]);
  }
  return parseChangeEvent(value);
}

/**
 * Apply an NDJSON change log line by line, in order.
 *
 * Lines that are not valid change events, and events the processor rejects,
 * are reported in `failed` and do not stop the log. Any other error aborts.
 */
export async function ingestChangeLog(
  processor: ChangeProcessor,
  ndjson: string
): Promise<IngestChangeLogResult> {
  const result: IngestChangeLogResult = { total: 0, succeeded: 0, failed: [] };
  const lines = ndjson.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const text = lines[i].trim();
    if (!text) continue;
    result.total++;

    try {
      await processor.process(parseLine(text));
      result.succeeded++;
    } catch (error) {
      if (!isChangeError(error)) {
        throw error;
      }
      result.failed.push({ line: i + 1, error });
    }
  }

  return result;
}
