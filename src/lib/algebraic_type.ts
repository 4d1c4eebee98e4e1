import { MalformedMessageError } from './errors';
import type { JsonObject, JsonValue } from './json';
import { JsonReader } from './json_reader';

/**
 * A variant of a sum type.
 *
 * NOTE: Each variant has an implicit tag based on its order.
 * The name is metadata only.
 */
export type SumTypeVariant = {
  name?: string;
  algebraicType: AlgebraicType;
};

/**
 * A factor / element of a product type.
 *
 * An element consist of an optional name and a type.
 *
 * NOTE: Each element has an implicit element tag based on its order.
 * Uniquely identifies an element similarly to protobuf tags.
 */
export type ProductTypeElement = {
  name?: string;
  algebraicType: AlgebraicType;
};

/**
 * Unlike most languages, sums in SATS are *[structural]* and not nominal.
 * When checking whether two nominal types are the same,
 * their names and/or declaration sites (e.g., module / namespace) are considered.
 * Meanwhile, a structural type system would only check the structure of the type itself,
 * e.g., the names of its variants and their inner data types in the case of a sum.
 *
 * This is also known as a discriminated union (implementation) or disjoint union.
 * Another name is [coproduct (category theory)](https://ncatlab.org/nlab/show/coproduct).
 *
 * These structures are known as sum types because the number of possible values a sum
 * ```ignore
 * { N_0(T_0), N_1(T_1), ..., N_n(T_n) }
 * ```
 * is:
 * ```ignore
 * Σ (i ∈ 0..n). values(T_i)
 * ```
 * so for example, `values({ A(U64), B(Bool) }) = values(U64) + values(Bool)`.
 *
 * [structural]: https://en.wikipedia.org/wiki/Structural_type_system
 */
export type SumType = {
  variants: SumTypeVariant[];
};

/**
 * A structural product type  of the factors given by `elements`.
 *
 * This is also known as `struct` and `tuple` in many languages,
 * but note that unlike most languages, products in SATs are *[structural]* and not nominal.
 * The name "product" comes from category theory.
 *
 * These structures are known as product types because the number of possible values in product
 * ```ignore
 * { N_0: T_0, N_1: T_1, ..., N_n: T_n }
 * ```
 * is:
 * ```ignore
 * Π (i ∈ 0..n). values(T_i)
 * ```
 * so for example, `values({ A: U64, B: Bool }) = values(U64) * values(Bool)`.
 *
 * [structural]: https://en.wikipedia.org/wiki/Structural_type_system
 */
export type ProductType = {
  elements: ProductTypeElement[];
};

/* A map type from keys of type `keyType` to values of type `valueType`. */
export type MapType = {
  keyType: AlgebraicType;
  valueType: AlgebraicType;
};

export const SCALAR_BUILTINS = [
  'Bool',
  'I8',
  'U8',
  'I16',
  'U16',
  'I32',
  'U32',
  'I64',
  'U64',
  'I128',
  'U128',
  'I256',
  'U256',
  'F32',
  'F64',
  'String',
] as const;

export type ScalarBuiltinTag = (typeof SCALAR_BUILTINS)[number];

/**
 * The primitive types. Each integer width is its own type; a value of one
 * width never stands in for another.
 */
export type BuiltinType =
  | { tag: ScalarBuiltinTag }
  | { tag: 'Array'; value: AlgebraicType }
  | { tag: 'Map'; value: MapType };

/**
 * The Algebraic Type System (SATS) is a structural type system in
 * which a nominal type system can be constructed.
 *
 * The type system unifies the concepts sum types, product types, and built-in
 * primitive types into a single type system. A `Ref` points into a
 * {@link Typespace} and is only meaningful next to one.
 */
export type AlgebraicType =
  | { tag: 'Sum'; value: SumType }
  | { tag: 'Product'; value: ProductType }
  | { tag: 'Builtin'; value: BuiltinType }
  | { tag: 'Ref'; value: number };

export type AlgebraicTypeTag = AlgebraicType['tag'];

export function isScalarBuiltinTag(tag: string): tag is ScalarBuiltinTag {
  return SCALAR_BUILTINS.some(scalar => scalar === tag);
}

function builtin(value: BuiltinType): AlgebraicType {
  return { tag: 'Builtin', value };
}

function readName(reader: JsonReader): string | undefined {
  const name = reader.optionalField('name');
  return name?.asOption(r => r.asString());
}

function readElements(reader: JsonReader): ProductTypeElement[] {
  return reader.asArray().map(element => ({
    name: readName(element),
    algebraicType: AlgebraicType.fromReader(element.field('algebraic_type')),
  }));
}

function readBuiltin(tag: string, payload: JsonReader): BuiltinType {
  if (isScalarBuiltinTag(tag)) return { tag };
  if (tag === 'Array') {
    return { tag: 'Array', value: AlgebraicType.fromReader(payload) };
  }
  if (tag === 'Map') {
    return {
      tag: 'Map',
      value: {
        keyType: AlgebraicType.fromReader(payload.field('key_ty')),
        valueType: AlgebraicType.fromReader(payload.field('ty')),
      },
    };
  }
  throw new MalformedMessageError(payload.path, 'a type tag', tag);
}

function nameToJson(name: string | undefined): JsonValue {
  return name === undefined ? { none: [] } : { some: name };
}

function builtinToJson(ty: BuiltinType): JsonObject {
  switch (ty.tag) {
    case 'Array':
      return { Array: AlgebraicType.toJson(ty.value) };
    case 'Map':
      return {
        Map: {
          key_ty: AlgebraicType.toJson(ty.value.keyType),
          ty: AlgebraicType.toJson(ty.value.valueType),
        },
      };
    default:
      return { [ty.tag]: [] };
  }
}

/**
 * Algebraic Type utilities.
 */
export const AlgebraicType = {
  Sum: (value: SumType): AlgebraicType => ({ tag: 'Sum', value }),
  Product: (value: ProductType): AlgebraicType => ({ tag: 'Product', value }),
  Builtin: builtin,
  Ref: (value: number): AlgebraicType => ({ tag: 'Ref', value }),

  Bool: builtin({ tag: 'Bool' }),
  I8: builtin({ tag: 'I8' }),
  U8: builtin({ tag: 'U8' }),
  I16: builtin({ tag: 'I16' }),
  U16: builtin({ tag: 'U16' }),
  I32: builtin({ tag: 'I32' }),
  U32: builtin({ tag: 'U32' }),
  I64: builtin({ tag: 'I64' }),
  U64: builtin({ tag: 'U64' }),
  I128: builtin({ tag: 'I128' }),
  U128: builtin({ tag: 'U128' }),
  I256: builtin({ tag: 'I256' }),
  U256: builtin({ tag: 'U256' }),
  F32: builtin({ tag: 'F32' }),
  F64: builtin({ tag: 'F64' }),
  String: builtin({ tag: 'String' }),

  Array: (elementType: AlgebraicType): AlgebraicType =>
    builtin({ tag: 'Array', value: elementType }),
  Map: (keyType: AlgebraicType, valueType: AlgebraicType): AlgebraicType =>
    builtin({ tag: 'Map', value: { keyType, valueType } }),

  createOptionType(innerType: AlgebraicType): AlgebraicType {
    return AlgebraicType.Sum({
      variants: [
        { name: 'some', algebraicType: innerType },
        { name: 'none', algebraicType: AlgebraicType.Product({ elements: [] }) },
      ],
    });
  },

  createBytesType(): AlgebraicType {
    return AlgebraicType.Array(AlgebraicType.U8);
  },

  /**
   * Decode a type from its JSON form in a schema document.
   *
   * Builtins are accepted both flattened (`{"U32": []}`) and wrapped
   * (`{"Builtin": {"U32": []}}`).
   */
  fromJson(json: JsonValue): AlgebraicType {
    return AlgebraicType.fromReader(new JsonReader(json));
  },

  fromReader(reader: JsonReader): AlgebraicType {
    const [tag, payload] = reader.asTagged();
    switch (tag) {
      case 'Sum':
        return AlgebraicType.Sum({
          variants: readElements(payload.field('variants')),
        });
      case 'Product':
        return AlgebraicType.Product(AlgebraicType.productFromReader(payload));
      case 'Ref':
        return AlgebraicType.Ref(payload.asU32());
      case 'Builtin': {
        const [inner, innerPayload] = payload.asTagged();
        return builtin(readBuiltin(inner, innerPayload));
      }
      default:
        return builtin(readBuiltin(tag, payload));
    }
  },

  /** Encode a type in the flattened form the schema endpoint produces. */
  toJson(ty: AlgebraicType): JsonObject {
    switch (ty.tag) {
      case 'Sum':
        return {
          Sum: {
            variants: ty.value.variants.map(v => ({
              name: nameToJson(v.name),
              algebraic_type: AlgebraicType.toJson(v.algebraicType),
            })),
          },
        };
      case 'Product':
        return { Product: AlgebraicType.productToJson(ty.value) };
      case 'Ref':
        return { Ref: ty.value };
      case 'Builtin':
        return builtinToJson(ty.value);
    }
  },

  /** Reads the `{"elements": [...]}` body of a product type. */
  productFromReader(reader: JsonReader): ProductType {
    return { elements: readElements(reader.field('elements')) };
  },

  productToJson(ty: ProductType): JsonObject {
    return {
      elements: ty.elements.map(e => ({
        name: nameToJson(e.name),
        algebraic_type: AlgebraicType.toJson(e.algebraicType),
      })),
    };
  },

  isSum(ty: AlgebraicType): ty is { tag: 'Sum'; value: SumType } {
    return ty.tag === 'Sum';
  },

  isProduct(ty: AlgebraicType): ty is { tag: 'Product'; value: ProductType } {
    return ty.tag === 'Product';
  },

  isBuiltin(ty: AlgebraicType): ty is { tag: 'Builtin'; value: BuiltinType } {
    return ty.tag === 'Builtin';
  },

  isRef(ty: AlgebraicType): ty is { tag: 'Ref'; value: number } {
    return ty.tag === 'Ref';
  },

  /**
   * Whether `ty` is the `some | none` shape used for optional values.
   */
  isOptionType(ty: AlgebraicType): boolean {
    return (
      ty.tag === 'Sum' &&
      ty.value.variants.length === 2 &&
      ty.value.variants[0].name === 'some' &&
      ty.value.variants[1].name === 'none'
    );
  },

  /**
   * Short human readable rendering, used in error messages and logs.
   */
  describe(ty: AlgebraicType): string {
    switch (ty.tag) {
      case 'Ref':
        return `&${ty.value}`;
      case 'Sum':
        return `{ ${ty.value.variants
          .map((v, i) => `${v.name ?? i}(${AlgebraicType.describe(v.algebraicType)})`)
          .join(' | ')} }`;
      case 'Product':
        return `(${ty.value.elements
          .map((e, i) => `${e.name ?? i}: ${AlgebraicType.describe(e.algebraicType)}`)
          .join(', ')})`;
      case 'Builtin':
        switch (ty.value.tag) {
          case 'Array':
            return `Array<${AlgebraicType.describe(ty.value.value)}>`;
          case 'Map':
            return `Map<${AlgebraicType.describe(ty.value.value.keyType)}, ${AlgebraicType.describe(ty.value.value.valueType)}>`;
          default:
            return ty.value.tag;
        }
    }
  },
};
