import { AlgebraicType, type ProductType } from './algebraic_type';
import {
  AlgebraicValue,
  BuiltinValue,
  ProductValue,
  SumValue,
} from './algebraic_value';
import { TypeMismatchError } from './errors';
import type { Typespace } from './typespace';

export function isAlgebraicValue(value: unknown): value is AlgebraicValue {
  return (
    value instanceof SumValue ||
    value instanceof ProductValue ||
    value instanceof BuiltinValue
  );
}

/**
 * Encode positional reducer arguments as the JSON array text a
 * `CallReducer` carries.
 *
 * Without `params`, every argument must already be an {@link AlgebraicValue}.
 * With `params`, the arguments are checked against the reducer's parameter
 * types first; they may be values or plain JavaScript data as accepted by
 * {@link AlgebraicValue.fromNative}.
 */
export function encodeReducerArgs(
  values: readonly unknown[],
  params?: ProductType,
  typespace?: Typespace
): string {
  if (!params) {
    const elements = values.map((value, i) => {
      if (!isAlgebraicValue(value)) {
        throw new TypeMismatchError(
          `$[${i}]`,
          'expected an AlgebraicValue when no parameter types are given'
        );
      }
      return value;
    });
    return AlgebraicValue.serialize(new ProductValue(elements));
  }
  const args = AlgebraicValue.fromNative(
    [...values],
    AlgebraicType.Product(params),
    typespace
  );
  return AlgebraicValue.serialize(args);
}
