import { TLiteral, TUnion, Type } from '@sinclair/typebox';

export const variantsSchema = <T extends readonly string[]>(
  values: T,
  options?: {
    default?: T[number];
    description?: string;
    examples?: string[];
  },
): TUnion<TLiteral<T[number]>[]> =>
  Type.Union(
    values.map((value) => Type.Literal(value)),
    {
      ...(options?.default && { default: options.default }),
      ...(options?.description && { description: options.description }),
      ...(options?.examples && { examples: options.examples }),
    },
  );
