import { TextDecoder } from 'util';
import { ConfigurationError } from '../errors';

// WHATWG labels cover most names; `latin-1` / `utf_8` style spellings
// match once separators are dropped, and `-sig` only asks for BOM removal.
const labelCandidates = (name: string) => {
  const label = name.trim().toLowerCase().replace(/[-_]sig$/, '');
  return [label, label.replace(/[-_]/g, '')];
};

export const createDecoder = (name: string): TextDecoder => {
  for (const label of labelCandidates(name)) {
    try {
      return new TextDecoder(label, { fatal: true });
    } catch (err) {
      if (!(err instanceof RangeError)) throw err;
    }
  }
  throw new ConfigurationError(`Unsupported text encoding: ${name}`);
};

/** Throws a TypeError on bytes that are invalid in the given encoding. */
export const decodeText = (bytes: Buffer, name: string): string => createDecoder(name).decode(bytes);
