/**
 * Response body codecs.
 *
 * Both codecs are generators: records are produced one at a time as the
 * caller iterates, and a body can only be walked once. Only `json` can fail
 * a whole body, and it does so before yielding anything.
 */

import type { CodecName } from '../shared/config.js';
import { createLogger } from '../shared/logger.js';
import type { Codec, DecodedRecord } from './types.js';

const log = createLogger('codec');

/** A response body (or one line of it) could not be decoded. */
export class DecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DecodeError';
  }
}

function isRecord(value: unknown): value is DecodedRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJson(text: string, what: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new DecodeError(`Invalid JSON in ${what}: ${message}`, { cause: err });
  }
}

/**
 * `json`: the body is one JSON document. An array yields each object
 * element; an object yields itself. Non-object elements are skipped.
 */
export const jsonCodec: Codec = {
  name: 'json',
  *decode(body: string): Generator<DecodedRecord> {
    const document = parseJson(body, 'response body');

    if (Array.isArray(document)) {
      for (const [index, item] of document.entries()) {
        if (isRecord(item)) {
          yield item;
        } else {
          log.warn(`Skipping non-object element at index ${index}`, { type: typeof item });
        }
      }
      return;
    }

    if (isRecord(document)) {
      yield document;
      return;
    }

    throw new DecodeError(`Expected a JSON array or object, got ${typeof document}`);
  },
};

/**
 * `json_lines`: one JSON object per line. Blank lines are ignored; a line
 * that is not a JSON object is skipped with a warning and the rest of the
 * body is still decoded.
 */
export const jsonLinesCodec: Codec = {
  name: 'json_lines',
  *decode(body: string): Generator<DecodedRecord> {
    const lines = body.split(/\r?\n/);
    for (const [index, line] of lines.entries()) {
      if (line.trim() === '') continue;

      let value: unknown;
      try {
        value = parseJson(line, `line ${index + 1}`);
      } catch (err) {
        log.warn(`Skipping undecodable line ${index + 1}`, { error: err });
        continue;
      }
      if (!isRecord(value)) {
        log.warn(`Skipping non-object value on line ${index + 1}`, { type: typeof value });
        continue;
      }
      yield value;
    }
  },
};

const CODECS: Record<CodecName, Codec> = {
  json: jsonCodec,
  json_lines: jsonLinesCodec,
};

export function getCodec(name: CodecName): Codec {
  return CODECS[name];
}
