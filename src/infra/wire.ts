import { z } from 'zod';

const INTEGER = /^-?\d+$/;

/**
 * Raw ledger quantity. Accepts an integer string, or a JSON number that is
 * still exact, and yields the canonical decimal string.
 */
export const rawQuantity = z
  .union([
    z.string().regex(INTEGER, 'expected an integer string'),
    z.number().int().refine(Number.isSafeInteger, 'integer beyond 2^53 arrived as a lossy number'),
  ])
  .transform((v) => BigInt(v).toString());

export const OrderSchema = z.object({
  tx_index: z.number().int(),
  tx_hash: z.string(),
  source: z.string(),
  give_asset: z.string(),
  give_quantity: rawQuantity,
  give_remaining: rawQuantity,
  get_asset: z.string(),
  get_quantity: rawQuantity,
  get_remaining: rawQuantity,
  fee_required: rawQuantity,
  fee_provided: rawQuantity,
  block_index: z.number().int(),
  expiration: z.number().int(),
  expire_index: z.number().int(),
  status: z.string(),
});

export const CallbackSchema = z.object({
  asset: z.string(),
  fraction: z.number(),
  block_index: z.number().int(),
});

export const RunningInfoSchema = z.object({
  db_caught_up: z.boolean(),
  last_block: z.object({ block_index: z.number().int() }).nullable(),
  last_message_index: z.number().int(),
  running_testnet: z.boolean(),
});

/**
 * Wraps every integer literal that JSON.parse would round in quotes, so a
 * response body keeps raw quantities exact. String contents are untouched.
 */
export function quoteLargeIntegers(text: string): string {
  let out = '';
  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '"') {
      let j = i + 1;
      while (j < text.length && text[j] !== '"') j += text[j] === '\\' ? 2 : 1;
      out += text.slice(i, j + 1);
      i = j + 1;
      continue;
    }
    if (ch === '-' || (ch >= '0' && ch <= '9')) {
      let j = ch === '-' ? i + 1 : i;
      while (j < text.length && text[j] >= '0' && text[j] <= '9') j++;
      const literal = text.slice(i, j);
      const next = text[j] ?? '';
      if (next !== '.' && next !== 'e' && next !== 'E' && !Number.isSafeInteger(Number(literal))) {
        out += `"${literal}"`;
        i = j;
        continue;
      }
      while (j < text.length && /[0-9.eE+-]/.test(text[j])) j++;
      out += text.slice(i, j);
      i = j;
      continue;
    }
    out += ch;
    i++;
  }
  return out;
}

export function parseLedgerBody(text: string): unknown {
  return JSON.parse(quoteLargeIntegers(text));
}
