/**
 * Deterministic CBOR encoding (RFC 8949 §4.2.1 subset) used for event hashing.
 *
 * Supports null, booleans, safe integers, text, arrays and plain objects.
 * Map keys are ordered by encoded length, then bytewise.
 */

const MAJOR_UNSIGNED = 0;
const MAJOR_NEGATIVE = 1;
const MAJOR_TEXT = 3;
const MAJOR_ARRAY = 4;
const MAJOR_MAP = 5;

const SIMPLE_FALSE = 0xf4;
const SIMPLE_TRUE = 0xf5;
const SIMPLE_NULL = 0xf6;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function head(major: number, arg: number): Buffer {
  const prefix = (major << 5) & 0xff;

  if (arg <= 23) return Buffer.from([prefix | arg]);
  if (arg <= 0xff) return Buffer.from([prefix | 24, arg]);

  if (arg <= 0xffff) {
    const b = Buffer.alloc(3);
    b[0] = prefix | 25;
    b.writeUInt16BE(arg, 1);
    return b;
  }

  if (arg <= 0xffffffff) {
    const b = Buffer.alloc(5);
    b[0] = prefix | 26;
    b.writeUInt32BE(arg, 1);
    return b;
  }

  const b = Buffer.alloc(9);
  b[0] = prefix | 27;
  b.writeBigUInt64BE(BigInt(arg), 1);
  return b;
}

function encodeInteger(value: number): Buffer {
  if (!Number.isFinite(value)) throw new Error('CBOR does not allow NaN/Infinity');
  if (!Number.isInteger(value)) throw new Error('Canonical encoding forbids floats');
  if (!Number.isSafeInteger(value)) throw new Error(`Unsafe integer: ${value}`);

  return value >= 0 ? head(MAJOR_UNSIGNED, value) : head(MAJOR_NEGATIVE, -1 - value);
}

function encodeText(text: string): Buffer {
  const bytes = Buffer.from(text, 'utf8');
  return Buffer.concat([head(MAJOR_TEXT, bytes.length), bytes]);
}

function encodeEntries(obj: Record<string, unknown>): Buffer {
  const entries = Object.keys(obj)
    .filter(key => obj[key] !== undefined)
    .map(key => ({ key: encodeText(key), value: canonicalCborEncode(obj[key]) }));

  entries.sort((x, y) =>
    x.key.length !== y.key.length ? x.key.length - y.key.length : Buffer.compare(x.key, y.key)
  );

  const parts: Buffer[] = [head(MAJOR_MAP, entries.length)];
  for (const { key, value } of entries) {
    parts.push(key, value);
  }
  return Buffer.concat(parts);
}

export function canonicalCborEncode(value: unknown): Buffer {
  if (value === null) return Buffer.from([SIMPLE_NULL]);
  if (typeof value === 'boolean') return Buffer.from([value ? SIMPLE_TRUE : SIMPLE_FALSE]);
  if (typeof value === 'number') return encodeInteger(value);
  if (typeof value === 'string') return encodeText(value);

  if (Array.isArray(value)) {
    return Buffer.concat([head(MAJOR_ARRAY, value.length), ...value.map(item => canonicalCborEncode(item))]);
  }

  // Absent object fields are skipped above; a bare undefined has no canonical form.
  if (isPlainObject(value)) return encodeEntries(value);

  throw new Error(`Unsupported CBOR type: ${typeof value}`);
}
