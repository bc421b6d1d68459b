import { randomUUID } from 'node:crypto';

export const randomId = (): string => randomUUID();

const toHex = (value: number) => value.toString(16).padStart(8, '0');

const fnv1a = (value: string, seed: number): number => {
  let hash = seed;
  for (let i = 0; i < value.length; i += 1) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
};

/** Two FNV-1a passes with different seeds, for keys where 32 bits collide too easily. */
export const fingerprint = (value: string): string =>
  `${toHex(fnv1a(value, 0x811c9dc5))}${toHex(fnv1a(value, 0x050c5d1f))}`;
