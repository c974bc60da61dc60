import { TLiteral, TUnion, Type } from '@sinclair/typebox';

export const variantsSchema = <T extends readonly string[]>(
  values: T,
  options: {
    default?: T[number];
    description?: string;
    examples?: string[];
  } = {},
): TUnion<TLiteral<T[number]>[]> =>
  Type.Union(
    values.map((value) => Type.Literal(value)),
    Object.fromEntries(
      Object.entries(options).filter(([, value]) => value !== undefined),
    ),
  );
