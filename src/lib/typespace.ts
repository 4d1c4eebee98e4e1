import { AlgebraicType } from './algebraic_type';
import { TypeMismatchError } from './errors';
import type { JsonObject, JsonValue } from './json';
import { JsonReader } from './json_reader';

/**
 * An append-only registry of types. A type's index is its address: it is
 * handed out by {@link Typespace.addType} and never changes or gets reused,
 * which is what lets types refer to themselves through `Ref`s.
 */
export class Typespace {
  #types: AlgebraicType[];

  constructor(types: AlgebraicType[] = []) {
    this.#types = [...types];
  }

  get size(): number {
    return this.#types.length;
  }

  get types(): readonly AlgebraicType[] {
    return this.#types;
  }

  /**
   * Append `ty` and return the index it can be referred to by.
   */
  addType(ty: AlgebraicType): number {
    this.#types.push(ty);
    return this.#types.length - 1;
  }

  /**
   * Look up a type by reference. Anything that is not the index of an
   * added type, including negative and fractional numbers, is not found.
   */
  getType(ref: number): AlgebraicType | undefined {
    if (!Number.isInteger(ref) || ref < 0 || ref >= this.#types.length) {
      return undefined;
    }
    return this.#types[ref];
  }

  /**
   * Follow `Ref`s until reaching a structural type. Nested refs inside the
   * result are left alone.
   */
  resolve(ty: AlgebraicType): AlgebraicType {
    const seen = new Set<number>();
    let current = ty;
    while (current.tag === 'Ref') {
      if (seen.has(current.value)) {
        throw new TypeMismatchError(
          `&${current.value}`,
          'reference cycle with no structural type'
        );
      }
      seen.add(current.value);
      const next = this.getType(current.value);
      if (next === undefined) {
        throw new TypeMismatchError(
          `&${current.value}`,
          `reference out of range for a typespace of ${this.size} type(s)`
        );
      }
      current = next;
    }
    return current;
  }

  /**
   * The refs reachable from `ty` that do not resolve in this typespace.
   */
  danglingRefs(ty: AlgebraicType): number[] {
    const dangling = new Set<number>();
    const visited = new Set<number>();
    const visit = (t: AlgebraicType): void => {
      switch (t.tag) {
        case 'Ref': {
          const target = this.getType(t.value);
          if (target === undefined) {
            dangling.add(t.value);
          } else if (!visited.has(t.value)) {
            visited.add(t.value);
            visit(target);
          }
          break;
        }
        case 'Sum':
          t.value.variants.forEach(v => visit(v.algebraicType));
          break;
        case 'Product':
          t.value.elements.forEach(e => visit(e.algebraicType));
          break;
        case 'Builtin':
          if (t.value.tag === 'Array') visit(t.value.value);
          if (t.value.tag === 'Map') {
            visit(t.value.value.keyType);
            visit(t.value.value.valueType);
          }
          break;
      }
    };
    visit(ty);
    return [...dangling].sort((a, b) => a - b);
  }

  static fromJson(json: JsonValue): Typespace {
    return Typespace.fromReader(new JsonReader(json));
  }

  static fromReader(reader: JsonReader): Typespace {
    return new Typespace(
      reader.field('types').asArray().map(AlgebraicType.fromReader)
    );
  }

  toJson(): JsonObject {
    return { types: this.#types.map(AlgebraicType.toJson) };
  }
}
