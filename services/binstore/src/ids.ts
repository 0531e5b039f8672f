import { randomInt } from 'crypto';

export const ID_ALPHABET = 'abcdefghijklmnopqrstuvwxyz0123456789';

export type IdGenerator = (length: number) => string;

/** Short random identifier used for bin names and request ids. */
export const tinyId: IdGenerator = (length) => {
  let out = '';
  for (let i = 0; i < length; i++) {
    out += ID_ALPHABET[randomInt(ID_ALPHABET.length)];
  }
  return out;
};
