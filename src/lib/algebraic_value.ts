import {
  AlgebraicType,
  type BuiltinType,
  type ProductType,
  type SumType,
} from './algebraic_type';
import {
  AmbiguousSumTagError,
  MalformedMessageError,
  TypeMismatchError,
  UnsupportedTypeError,
} from './errors';
import { isJsonObject, parseJson, stringifyJson, type JsonValue } from './json';
import { JsonReader } from './json_reader';
import type { Typespace } from './typespace';

export type MapEntry = [key: AlgebraicValue, value: AlgebraicValue];

/**
 * What a {@link BuiltinValue} holds: a scalar, the elements of an `Array`, or
 * the entries of a `Map`.
 */
export type BuiltinPrimitive =
  | boolean
  | number
  | bigint
  | string
  | AlgebraicValue[]
  | MapEntry[];

/** A value of a sum type choosing a specific variant of the type. */
export class SumValue {
  readonly kind = 'Sum' as const;
  /** The name of the chosen variant, which is also its key on the wire. */
  tag: string;
  /**
   * Given a variant `Var(Ty)` in a sum type `{ Var(Ty), ... }`,
   * this provides the `value` for `Ty`.
   */
  value: AlgebraicValue;

  constructor(tag: string, value: AlgebraicValue) {
    this.tag = tag;
    this.value = value;
  }

  /** A variant with no payload, i.e. an empty product. */
  static unit(tag: string): SumValue {
    return new SumValue(tag, new ProductValue([]));
  }
}

/**
 * A product value is made of a list of
 * "elements" / "fields" / "factors" of other `AlgebraicValue`s.
 *
 * The type of product value is a [product type](`ProductType`), and the
 * elements are positional: on the wire a product is a JSON array.
 */
export class ProductValue {
  readonly kind = 'Product' as const;
  elements: AlgebraicValue[];

  constructor(elements: AlgebraicValue[]) {
    this.elements = elements;
  }
}

/**
 * A value of a builtin type. On the wire it is the JSON value itself, with
 * no wrapping.
 */
export class BuiltinValue {
  readonly kind = 'Builtin' as const;
  value: BuiltinPrimitive;

  constructor(value: BuiltinPrimitive) {
    this.value = value;
  }
}

/** A value in SATS. */
export type AlgebraicValue = SumValue | ProductValue | BuiltinValue;

const INTEGER_RANGES = {
  I8: [-0x80, 0x7f],
  U8: [0, 0xff],
  I16: [-0x8000, 0x7fff],
  U16: [0, 0xffff],
  I32: [-0x8000_0000, 0x7fff_ffff],
  U32: [0, 0xffff_ffff],
} as const;

const BIG_INTEGER_RANGES = {
  I64: [-(2n ** 63n), 2n ** 63n - 1n],
  U64: [0n, 2n ** 64n - 1n],
} as const;

const F32_MAX = 3.4028234663852886e38;

function isMapEntries(items: AlgebraicValue[] | MapEntry[]): items is MapEntry[] {
  return items.length > 0 && Array.isArray(items[0]);
}

function variantIndex(ty: SumType, tag: string): number {
  const byName = ty.variants.findIndex(v => v.name === tag);
  if (byName >= 0) return byName;
  // Unnamed variants are addressed by position.
  if (/^\d+$/.test(tag)) {
    const index = Number(tag);
    if (index < ty.variants.length && ty.variants[index].name === undefined) {
      return index;
    }
  }
  return -1;
}

function variantTag(ty: SumType, index: number): string {
  return ty.variants[index].name ?? String(index);
}

function resolve(
  ty: AlgebraicType,
  typespace: Typespace | undefined,
  path: string
): AlgebraicType {
  if (ty.tag !== 'Ref') return ty;
  if (!typespace) {
    throw new TypeMismatchError(path, 'cannot resolve refs without a typespace');
  }
  return typespace.resolve(ty);
}

function readTyped(
  reader: JsonReader,
  ty: AlgebraicType,
  typespace: Typespace | undefined
): AlgebraicValue {
  const resolved = resolve(ty, typespace, reader.path);
  switch (resolved.tag) {
    case 'Product':
      return readProduct(reader, resolved.value, typespace);
    case 'Sum':
      return readSum(reader, resolved.value, typespace);
    case 'Builtin':
      return new BuiltinValue(readBuiltin(reader, resolved.value, typespace));
    case 'Ref':
      throw new TypeMismatchError(reader.path, 'unresolved type reference');
  }
}

function readProduct(
  reader: JsonReader,
  ty: ProductType,
  typespace: Typespace | undefined
): ProductValue {
  if (!Array.isArray(reader.value)) {
    throw new TypeMismatchError(reader.path, 'expected a product (JSON array)');
  }
  const items = reader.asArray();
  if (items.length !== ty.elements.length) {
    throw new TypeMismatchError(
      reader.path,
      `expected ${ty.elements.length} element(s), got ${items.length}`
    );
  }
  return new ProductValue(
    items.map((item, i) => readTyped(item, ty.elements[i].algebraicType, typespace))
  );
}

function readSum(
  reader: JsonReader,
  ty: SumType,
  typespace: Typespace | undefined
): SumValue {
  if (!isJsonObject(reader.value)) {
    throw new TypeMismatchError(reader.path, 'expected a sum (single-key object)');
  }
  const [tag, payload] = reader.asTagged();
  const index = variantIndex(ty, tag);
  if (index < 0) {
    throw new TypeMismatchError(reader.path, `unknown variant ${tag}`);
  }
  return new SumValue(
    variantTag(ty, index),
    readTyped(payload, ty.variants[index].algebraicType, typespace)
  );
}

function readInteger(reader: JsonReader, tag: keyof typeof INTEGER_RANGES): number {
  const value = reader.value;
  const [min, max] = INTEGER_RANGES[tag];
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new TypeMismatchError(reader.path, `expected ${tag}`);
  }
  if (value < min || value > max) {
    throw new TypeMismatchError(reader.path, `${value} is out of range for ${tag}`);
  }
  return value;
}

function readBigInteger(
  reader: JsonReader,
  tag: keyof typeof BIG_INTEGER_RANGES
): bigint {
  let value: bigint;
  try {
    value = reader.asBigInt();
  } catch {
    throw new TypeMismatchError(reader.path, `expected ${tag}`);
  }
  const [min, max] = BIG_INTEGER_RANGES[tag];
  if (value < min || value > max) {
    throw new TypeMismatchError(reader.path, `${value} is out of range for ${tag}`);
  }
  return value;
}

function readFloat(reader: JsonReader, tag: 'F32' | 'F64'): number {
  const value = reader.value;
  if (typeof value !== 'number') {
    throw new TypeMismatchError(reader.path, `expected ${tag}`);
  }
  if (tag === 'F32' && Math.abs(value) > F32_MAX) {
    throw new TypeMismatchError(reader.path, `${value} is out of range for F32`);
  }
  return value;
}

function readBuiltin(
  reader: JsonReader,
  ty: BuiltinType,
  typespace: Typespace | undefined
): BuiltinPrimitive {
  const value = reader.value;
  switch (ty.tag) {
    case 'Bool':
      if (typeof value !== 'boolean') {
        throw new TypeMismatchError(reader.path, 'expected Bool');
      }
      return value;
    case 'String':
      if (typeof value !== 'string') {
        throw new TypeMismatchError(reader.path, 'expected String');
      }
      return value;
    case 'I8':
    case 'U8':
    case 'I16':
    case 'U16':
    case 'I32':
    case 'U32':
      return readInteger(reader, ty.tag);
    case 'I64':
    case 'U64':
      return readBigInteger(reader, ty.tag);
    case 'I128':
    case 'U128':
    case 'I256':
    case 'U256':
      throw new UnsupportedTypeError(ty.tag);
    case 'F32':
    case 'F64':
      return readFloat(reader, ty.tag);
    case 'Array': {
      if (!Array.isArray(value)) {
        throw new TypeMismatchError(reader.path, 'expected Array');
      }
      const elementType = ty.value;
      return reader.asArray().map(item => readTyped(item, elementType, typespace));
    }
    case 'Map': {
      if (!Array.isArray(value)) {
        throw new TypeMismatchError(reader.path, 'expected Map (array of pairs)');
      }
      const { keyType, valueType } = ty.value;
      return reader.asArray().map((pair): MapEntry => {
        if (!Array.isArray(pair.value) || pair.value.length !== 2) {
          throw new TypeMismatchError(pair.path, 'expected a [key, value] pair');
        }
        const [k, v] = pair.asArray();
        return [readTyped(k, keyType, typespace), readTyped(v, valueType, typespace)];
      });
    }
  }
}

function readUntyped(reader: JsonReader): AlgebraicValue {
  const value = reader.value;
  if (value === null) {
    throw new MalformedMessageError(reader.path, 'a SATS value', 'null');
  }
  if (Array.isArray(value)) {
    return new ProductValue(reader.asArray().map(readUntyped));
  }
  if (isJsonObject(value)) {
    const keys = Object.keys(value);
    if (keys.length !== 1) {
      throw new AmbiguousSumTagError(keys, reader.path);
    }
    const [tag, payload] = reader.asTagged();
    return new SumValue(tag, readUntyped(payload));
  }
  return new BuiltinValue(value);
}

function builtinToJson(value: BuiltinPrimitive): JsonValue {
  if (!Array.isArray(value)) return value;
  if (isMapEntries(value)) {
    return value.map(([k, v]) => [AlgebraicValue.toJson(k), AlgebraicValue.toJson(v)]);
  }
  return value.map(AlgebraicValue.toJson);
}

function primitiveEquals(a: BuiltinPrimitive, b: BuiltinPrimitive): boolean {
  if (!Array.isArray(a) || !Array.isArray(b)) return a === b;
  if (a.length !== b.length) return false;
  if (isMapEntries(a) !== isMapEntries(b)) return false;
  if (isMapEntries(a) && isMapEntries(b)) {
    return a.every(
      ([k, v], i) =>
        AlgebraicValue.equals(k, b[i][0]) && AlgebraicValue.equals(v, b[i][1])
    );
  }
  if (!isMapEntries(a) && !isMapEntries(b)) {
    return a.every((item, i) => AlgebraicValue.equals(item, b[i]));
  }
  return false;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fromNative(
  native: unknown,
  ty: AlgebraicType,
  typespace: Typespace | undefined,
  path: string
): AlgebraicValue {
  if (
    native instanceof SumValue ||
    native instanceof ProductValue ||
    native instanceof BuiltinValue
  ) {
    AlgebraicValue.check(native, ty, typespace, path);
    return native;
  }
  const resolved = resolve(ty, typespace, path);
  switch (resolved.tag) {
    case 'Product': {
      const elements = resolved.value.elements;
      let items: unknown[];
      if (Array.isArray(native)) {
        items = native;
      } else if (isRecord(native)) {
        const record = native;
        items = elements.map((e, i) => record[e.name ?? String(i)]);
      } else {
        throw new TypeMismatchError(path, 'expected an array or an object for a product');
      }
      if (items.length !== elements.length) {
        throw new TypeMismatchError(
          path,
          `expected ${elements.length} element(s), got ${items.length}`
        );
      }
      return new ProductValue(
        items.map((item, i) =>
          fromNative(item, elements[i].algebraicType, typespace, `${path}[${i}]`)
        )
      );
    }
    case 'Sum': {
      if (AlgebraicType.isOptionType(resolved)) {
        const [some] = resolved.value.variants;
        if (native === null || native === undefined) return SumValue.unit('none');
        return new SumValue(
          'some',
          fromNative(native, some.algebraicType, typespace, `${path}.some`)
        );
      }
      if (!isRecord(native) || typeof native.tag !== 'string') {
        throw new TypeMismatchError(path, 'expected { tag, value } for a sum');
      }
      const index = variantIndex(resolved.value, native.tag);
      if (index < 0) {
        throw new TypeMismatchError(path, `unknown variant ${native.tag}`);
      }
      const payloadType = resolved.value.variants[index].algebraicType;
      const payload = native.value === undefined ? [] : native.value;
      return new SumValue(
        variantTag(resolved.value, index),
        fromNative(payload, payloadType, typespace, `${path}.${native.tag}`)
      );
    }
    case 'Builtin': {
      const builtinType = resolved.value;
      if (builtinType.tag === 'Array') {
        if (!Array.isArray(native)) throw new TypeMismatchError(path, 'expected an array');
        return new BuiltinValue(
          native.map((item: unknown, i) =>
            fromNative(item, builtinType.value, typespace, `${path}[${i}]`)
          )
        );
      }
      if (builtinType.tag === 'Map') {
        if (!(native instanceof Map)) throw new TypeMismatchError(path, 'expected a Map');
        const entries: Array<[unknown, unknown]> = [...native.entries()];
        return new BuiltinValue(
          entries.map(([k, v], i): MapEntry => [
            fromNative(k, builtinType.value.keyType, typespace, `${path}[${i}][0]`),
            fromNative(v, builtinType.value.valueType, typespace, `${path}[${i}][1]`),
          ])
        );
      }
      if (
        typeof native !== 'boolean' &&
        typeof native !== 'number' &&
        typeof native !== 'bigint' &&
        typeof native !== 'string'
      ) {
        throw new TypeMismatchError(path, `expected ${builtinType.tag}`);
      }
      const value = new BuiltinValue(native);
      AlgebraicValue.check(value, resolved, typespace, path);
      return value;
    }
    case 'Ref':
      throw new TypeMismatchError(path, 'unresolved type reference');
  }
}

function checkBuiltin(
  value: BuiltinPrimitive,
  ty: BuiltinType,
  typespace: Typespace | undefined,
  path: string
): void {
  const mismatch = () => new TypeMismatchError(path, `expected ${ty.tag}`);
  switch (ty.tag) {
    case 'Bool':
      if (typeof value !== 'boolean') throw mismatch();
      return;
    case 'String':
      if (typeof value !== 'string') throw mismatch();
      return;
    case 'I8':
    case 'U8':
    case 'I16':
    case 'U16':
    case 'I32':
    case 'U32': {
      const [min, max] = INTEGER_RANGES[ty.tag];
      if (typeof value !== 'number' || !Number.isInteger(value)) throw mismatch();
      if (value < min || value > max) {
        throw new TypeMismatchError(path, `${value} is out of range for ${ty.tag}`);
      }
      return;
    }
    case 'I64':
    case 'U64': {
      const [min, max] = BIG_INTEGER_RANGES[ty.tag];
      let n: bigint;
      if (typeof value === 'bigint') n = value;
      else if (typeof value === 'number' && Number.isSafeInteger(value)) n = BigInt(value);
      else throw mismatch();
      if (n < min || n > max) {
        throw new TypeMismatchError(path, `${n} is out of range for ${ty.tag}`);
      }
      return;
    }
    case 'I128':
    case 'U128':
    case 'I256':
    case 'U256':
      throw new UnsupportedTypeError(ty.tag);
    case 'F32':
    case 'F64':
      if (typeof value !== 'number') throw mismatch();
      if (ty.tag === 'F32' && Math.abs(value) > F32_MAX) {
        throw new TypeMismatchError(path, `${value} is out of range for F32`);
      }
      return;
    case 'Array': {
      if (!Array.isArray(value) || isMapEntries(value)) throw mismatch();
      const elementType = ty.value;
      value.forEach((item, i) =>
        AlgebraicValue.check(item, elementType, typespace, `${path}[${i}]`)
      );
      return;
    }
    case 'Map': {
      if (!Array.isArray(value)) throw mismatch();
      if (value.length === 0) return;
      if (!isMapEntries(value)) throw mismatch();
      const { keyType, valueType } = ty.value;
      value.forEach(([k, v], i) => {
        AlgebraicValue.check(k, keyType, typespace, `${path}[${i}][0]`);
        AlgebraicValue.check(v, valueType, typespace, `${path}[${i}][1]`);
      });
      return;
    }
  }
}

/**
 * Encoding, decoding and comparison of {@link AlgebraicValue}s.
 *
 * Every type maps to exactly one wire shape: a sum is an object with one key
 * (the tag), a product is a positional array and a builtin is the bare JSON
 * value.
 */
export const AlgebraicValue = {
  toJson(value: AlgebraicValue): JsonValue {
    switch (value.kind) {
      case 'Sum':
        return { [value.tag]: AlgebraicValue.toJson(value.value) };
      case 'Product':
        return value.elements.map(AlgebraicValue.toJson);
      case 'Builtin':
        return builtinToJson(value.value);
    }
  },

  serialize(value: AlgebraicValue): string {
    return stringifyJson(AlgebraicValue.toJson(value));
  },

  /**
   * Decode without a type. Arrays become products, single-key objects become
   * sums and scalars become builtins. An object with zero or several keys is
   * rejected with an {@link AmbiguousSumTagError}.
   */
  fromJson(json: JsonValue, path: string = '$'): AlgebraicValue {
    return readUntyped(new JsonReader(json, path));
  },

  deserialize(text: string): AlgebraicValue {
    return AlgebraicValue.fromJson(parseJson(text));
  },

  /**
   * Decode against `ty`, resolving refs through `typespace`. Checks product
   * arity, variant membership, integer widths and element types, and
   * produces bigints for 64-bit integers.
   */
  fromJsonTyped(
    json: JsonValue,
    ty: AlgebraicType,
    typespace?: Typespace,
    path: string = '$'
  ): AlgebraicValue {
    return readTyped(new JsonReader(json, path), ty, typespace);
  },

  deserializeTyped(
    text: string,
    ty: AlgebraicType,
    typespace?: Typespace
  ): AlgebraicValue {
    return AlgebraicValue.fromJsonTyped(parseJson(text), ty, typespace);
  },

  /**
   * Build a value of type `ty` from plain JavaScript data: arrays or objects
   * for products, `{ tag, value }` for sums (or the bare value / `null` for
   * options), `Map` for maps and primitives for the rest.
   */
  fromNative(
    native: unknown,
    ty: AlgebraicType,
    typespace?: Typespace,
    path: string = '$'
  ): AlgebraicValue {
    return fromNative(native, ty, typespace, path);
  },

  /**
   * Throw a {@link TypeMismatchError} unless `value` conforms to `ty`.
   */
  check(
    value: AlgebraicValue,
    ty: AlgebraicType,
    typespace?: Typespace,
    path: string = '$'
  ): void {
    const resolved = resolve(ty, typespace, path);
    switch (resolved.tag) {
      case 'Product': {
        const elements = resolved.value.elements;
        if (value.kind !== 'Product') {
          throw new TypeMismatchError(path, 'expected a product');
        }
        if (value.elements.length !== elements.length) {
          throw new TypeMismatchError(
            path,
            `expected ${elements.length} element(s), got ${value.elements.length}`
          );
        }
        value.elements.forEach((item, i) =>
          AlgebraicValue.check(item, elements[i].algebraicType, typespace, `${path}[${i}]`)
        );
        return;
      }
      case 'Sum': {
        if (value.kind !== 'Sum') {
          throw new TypeMismatchError(path, 'expected a sum');
        }
        const index = variantIndex(resolved.value, value.tag);
        if (index < 0) {
          throw new TypeMismatchError(path, `unknown variant ${value.tag}`);
        }
        AlgebraicValue.check(
          value.value,
          resolved.value.variants[index].algebraicType,
          typespace,
          `${path}.${value.tag}`
        );
        return;
      }
      case 'Builtin':
        if (value.kind !== 'Builtin') {
          throw new TypeMismatchError(path, `expected ${resolved.value.tag}`);
        }
        checkBuiltin(value.value, resolved.value, typespace, path);
        return;
      case 'Ref':
        throw new TypeMismatchError(path, 'unresolved type reference');
    }
  },

  equals(a: AlgebraicValue, b: AlgebraicValue): boolean {
    if (a.kind === 'Sum' && b.kind === 'Sum') {
      return a.tag === b.tag && AlgebraicValue.equals(a.value, b.value);
    }
    if (a.kind === 'Product' && b.kind === 'Product') {
      return (
        a.elements.length === b.elements.length &&
        a.elements.every((item, i) => AlgebraicValue.equals(item, b.elements[i]))
      );
    }
    if (a.kind === 'Builtin' && b.kind === 'Builtin') {
      return primitiveEquals(a.value, b.value);
    }
    return false;
  },

  some(value: AlgebraicValue): SumValue {
    return new SumValue('some', value);
  },

  none(): SumValue {
    return SumValue.unit('none');
  },
};
