// Externally tagged variant enums
//
// A variant enum is written the way game data usually spells it:
//   "Burning"                          unit variant
//   { "Slow": [0.5, 2] }               tuple variant
//   { "Knockback": { "force": 10 } }   struct variant

import { z } from 'zod';
import { SchemaGenerationError } from '../errors.js';
import { named } from './meta.js';

/** Unit variant marker */
export const unit = null;

export type VariantSpec = null | z.ZodTuple | z.ZodObject<z.ZodRawShape>;

export type VariantOutput<V extends Record<string, VariantSpec>> = {
  [K in keyof V & string]: V[K] extends null
    ? K
    : V[K] extends z.ZodTypeAny
      ? { [P in K]: z.infer<V[K]> }
      : never;
}[keyof V & string];

/**
 * Build a titled enum from unit, tuple and struct variants.
 *
 * Unit variants become one string enumeration; every tuple or struct variant
 * becomes a single-key object. The branches are combined into a union.
 *
 * @example
 * const Status = variants('Status', {
 *   Burning: unit,
 *   Slow: z.tuple([z.number(), z.number()]),
 *   Knockback: z.object({ force: z.number() }),
 * });
 */
export function variants<const V extends Record<string, VariantSpec>>(
  title: string,
  spec: V
): z.ZodType<VariantOutput<V>> {
  const units: string[] = [];
  const branches: z.ZodTypeAny[] = [];

  for (const [key, variant] of Object.entries(spec)) {
    if (variant === null) {
      units.push(key);
    } else {
      branches.push(z.object({ [key]: variant }).strict());
    }
  }

  if (units.length > 0) {
    const [first, ...rest] = units;
    branches.unshift(z.enum([first, ...rest]));
  }

  const [head, second, ...others] = branches;
  if (head === undefined) {
    throw new SchemaGenerationError(`Variant enum ${title} has no variants`);
  }
  if (second === undefined) {
    return named(title, head);
  }
  return named(title, z.union([head, second, ...others]));
}
