// zod field schemas backed by DataNormalizer
// A failed coercion becomes a zod issue on that field

import { z } from 'zod';
import { DataNormalizer, type Normalized } from '../validation/DataNormalizer';

export type FieldSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

function field<T>(normalize: (value: unknown) => Normalized<T>): FieldSchema<T> {
  return z.unknown().transform((value, ctx): T => {
    const result = normalize(value);
    if (!result.ok) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: result.error });
      return z.NEVER;
    }
    return result.value;
  });
}

export function fieldBuilders(normalizer: DataNormalizer) {
  return {
    text: () => field((value) => normalizer.normalizeText(value)),
    number: () => field((value) => normalizer.normalizeNumber(value)),
    integer: () => field((value) => normalizer.normalizeInteger(value)),
    boolean: () => field((value) => normalizer.normalizeBoolean(value)),
    date: () => field((value) => normalizer.normalizeDate(value)),
    list: () => field((value) => normalizer.normalizeList(value)),
  };
}

export type FieldBuilders = ReturnType<typeof fieldBuilders>;
