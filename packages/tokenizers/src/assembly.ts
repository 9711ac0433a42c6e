/**
 * Sequence assembly: wraps encoded words in CLS/SEP and derives the
 * per-position arrays a model consumes next to the ids.
 *
 *   single: [CLS] A [SEP]
 *   pair:   [CLS] A [SEP] B [SEP]
 *
 * The functions are generic over the element type; the tokenizer supplies
 * the CLS and SEP character-id arrays.
 */

/** Produce a fresh CLS/SEP element for every position they occupy. */
export interface SequenceDelimiters<T> {
  cls(): T;
  sep(): T;
}

export function buildInputs<T>(
  delimiters: SequenceDelimiters<T>,
  seqA: readonly T[],
  seqB?: readonly T[],
): T[] {
  if (seqB === undefined) {
    return [delimiters.cls(), ...seqA, delimiters.sep()];
  }
  return [delimiters.cls(), ...seqA, delimiters.sep(), ...seqB, delimiters.sep()];
}

/** 1 where `buildInputs` places CLS or SEP, 0 for every word. */
export function specialTokensMask(seqA: readonly unknown[], seqB?: readonly unknown[]): number[] {
  const mask = [1, ...new Array<number>(seqA.length).fill(0), 1];
  if (seqB !== undefined) {
    mask.push(...new Array<number>(seqB.length).fill(0), 1);
  }
  return mask;
}

/** 0 across `[CLS] A [SEP]`, then 1 across `B [SEP]`. */
export function tokenTypeIds(seqA: readonly unknown[], seqB?: readonly unknown[]): number[] {
  const ids = new Array<number>(seqA.length + 2).fill(0);
  if (seqB !== undefined) {
    ids.push(...new Array<number>(seqB.length + 1).fill(1));
  }
  return ids;
}

/** Mask for a sequence that already carries its special tokens. */
export function markSpecial<T>(sequence: readonly T[], isSpecial: (item: T) => boolean): number[] {
  return sequence.map((item) => (isSpecial(item) ? 1 : 0));
}

/**
 * Shorten a sequence (or pair) to at most `budget` elements by repeatedly
 * dropping the last element of the longer one; ties drop from `seqB`.
 */
export function truncateLongestFirst<T>(
  seqA: readonly T[],
  seqB: readonly T[] | undefined,
  budget: number,
): [T[], T[] | undefined] {
  let lengthA = seqA.length;
  let lengthB = seqB?.length ?? 0;
  while (lengthA + lengthB > budget) {
    if (lengthA > lengthB) lengthA--;
    else lengthB--;
  }
  return [seqA.slice(0, lengthA), seqB?.slice(0, lengthB)];
}
