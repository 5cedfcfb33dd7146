import { EMBEDDING_DIMENSION, SerializationError } from '@recall/shared';

const SEPARATOR = ',';

/**
 * Nine significant digits round-trip any float32 exactly and keep a
 * 384-component vector around 4-5KB of text.
 */
function formatComponent(value: number): string {
  return value === 0 ? '0' : value.toPrecision(9);
}

/** Comma-separated decimal text form stored in the `embedding` column. */
export function toStorageForm(vector: ArrayLike<number>): string {
  const parts: string[] = new Array(vector.length);
  for (let i = 0; i < vector.length; i++) {
    parts[i] = formatComponent(vector[i]);
  }
  return parts.join(SEPARATOR);
}

/**
 * Parses the stored text form. Throws SerializationError when the text is
 * empty, has the wrong component count or holds a non-finite component.
 */
export function decodeStorageForm(
  raw: string,
  dimension: number = EMBEDDING_DIMENSION,
): Float32Array {
  if (raw.trim() === '') {
    throw new SerializationError('Stored embedding is empty');
  }

  const parts = raw.split(SEPARATOR);
  if (parts.length !== dimension) {
    throw new SerializationError(
      `Stored embedding has ${parts.length} components, expected ${dimension}`,
      { details: { components: parts.length, dimension } },
    );
  }

  const vector = new Float32Array(dimension);
  for (let i = 0; i < dimension; i++) {
    const part = parts[i].trim();
    const value = part === '' ? Number.NaN : Number(part);
    if (!Number.isFinite(value)) {
      throw new SerializationError(`Stored embedding component ${i} is not a number`, {
        details: { index: i },
      });
    }
    vector[i] = value;
  }
  return vector;
}

/** Like decodeStorageForm, but malformed input yields null ("no embedding"). */
export function fromStorageForm(
  raw: string | null | undefined,
  dimension: number = EMBEDDING_DIMENSION,
): Float32Array | null {
  if (raw === null || raw === undefined) return null;
  try {
    return decodeStorageForm(raw, dimension);
  } catch (error) {
    if (error instanceof SerializationError) return null;
    throw error;
  }
}
