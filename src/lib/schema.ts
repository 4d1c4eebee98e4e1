import { AlgebraicType, type ProductType } from './algebraic_type';
import { MalformedMessageError, TypeMismatchError } from './errors';
import type { JsonObject, JsonValue } from './json';
import { JsonReader } from './json_reader';
import { Typespace } from './typespace';

export type TableType = 'User' | 'System';
export type TableAccess = 'Public' | 'Private';
export type ReducerLifecycle = 'Init' | 'OnConnect' | 'OnDisconnect';

const TABLE_TYPES: readonly TableType[] = ['User', 'System'];
const TABLE_ACCESS: readonly TableAccess[] = ['Public', 'Private'];
const LIFECYCLES: readonly ReducerLifecycle[] = ['Init', 'OnConnect', 'OnDisconnect'];

export type ScheduleDef = {
  name?: string;
  reducerName: string;
};

export type TableDef = {
  name: string;
  /** Points at the row's product type in the module's typespace. */
  productTypeRef: number;
  primaryKey: number[];
  indexes: JsonValue[];
  constraints: JsonValue[];
  sequences: JsonValue[];
  schedule?: ScheduleDef;
  tableType: TableType;
  tableAccess: TableAccess;
};

export type ReducerDef = {
  name: string;
  params: ProductType;
  lifecycle?: ReducerLifecycle;
};

export type TypeName = {
  scope: string[];
  name: string;
};

export type NamedTypeDef = {
  name: TypeName;
  ty: number;
  customOrdering: boolean;
};

/**
 * The module description served by the schema endpoint.
 */
export type RawModuleDef = {
  typespace: Typespace;
  tables: TableDef[];
  reducers: ReducerDef[];
  types: NamedTypeDef[];
  miscExports: JsonValue[];
  rowLevelSecurity: JsonValue[];
};

function readUnitTag<T extends string>(
  reader: JsonReader,
  allowed: readonly T[]
): T {
  const [tag] = reader.asTagged();
  const found = allowed.find(a => a === tag);
  if (found === undefined) {
    throw new MalformedMessageError(reader.path, `one of ${allowed.join(', ')}`, tag);
  }
  return found;
}

function readOpaqueList(reader: JsonReader | undefined): JsonValue[] {
  return reader ? reader.asArray().map(r => r.value) : [];
}

function readListOf<T>(
  reader: JsonReader | undefined,
  read: (reader: JsonReader) => T
): T[] {
  return reader ? reader.asArray().map(r => read(r)) : [];
}

function readTable(reader: JsonReader): TableDef {
  const schedule = reader
    .optionalField('schedule')
    ?.asOption(
      (r): ScheduleDef => ({
        name: r.optionalField('name')?.asOption(n => n.asString()),
        reducerName: r.field('reducer_name').asString(),
      })
    );
  return {
    name: reader.field('name').asString(),
    productTypeRef: reader.field('product_type_ref').asU32(),
    primaryKey: reader.field('primary_key').asArray().map(r => r.asU32()),
    indexes: readOpaqueList(reader.optionalField('indexes')),
    constraints: readOpaqueList(reader.optionalField('constraints')),
    sequences: readOpaqueList(reader.optionalField('sequences')),
    schedule,
    tableType: readUnitTag(reader.field('table_type'), TABLE_TYPES),
    tableAccess: readUnitTag(reader.field('table_access'), TABLE_ACCESS),
  };
}

function readReducer(reader: JsonReader): ReducerDef {
  return {
    name: reader.field('name').asString(),
    params: AlgebraicType.productFromReader(reader.field('params')),
    lifecycle: reader
      .optionalField('lifecycle')
      ?.asOption(r => readUnitTag(r, LIFECYCLES)),
  };
}

function readNamedType(reader: JsonReader): NamedTypeDef {
  const name = reader.field('name');
  return {
    name: {
      scope: name.field('scope').asArray().map(r => r.asString()),
      name: name.field('name').asString(),
    },
    ty: reader.field('ty').asU32(),
    customOrdering: reader.optionalField('custom_ordering')?.asBool() ?? false,
  };
}

function optionToJson<T>(value: T | undefined, write: (v: T) => JsonValue): JsonValue {
  return value === undefined ? { none: [] } : { some: write(value) };
}

/**
 * Decoding, encoding, lookup and construction of module definitions.
 */
export const ModuleDef = {
  fromJson(json: JsonValue): RawModuleDef {
    return ModuleDef.fromReader(new JsonReader(json));
  },

  fromReader(reader: JsonReader): RawModuleDef {
    const typespace = Typespace.fromReader(reader.field('typespace'));
    return {
      typespace,
      tables: reader.field('tables').asArray().map(readTable),
      reducers: reader.field('reducers').asArray().map(readReducer),
      types: readListOf(reader.optionalField('types'), readNamedType),
      miscExports: readOpaqueList(reader.optionalField('misc_exports')),
      rowLevelSecurity: readOpaqueList(reader.optionalField('row_level_security')),
    };
  },

  toJson(def: RawModuleDef): JsonObject {
    return {
      typespace: def.typespace.toJson(),
      tables: def.tables.map(t => ({
        name: t.name,
        product_type_ref: t.productTypeRef,
        primary_key: t.primaryKey,
        indexes: t.indexes,
        constraints: t.constraints,
        sequences: t.sequences,
        schedule: optionToJson(t.schedule, s => ({
          name: optionToJson(s.name, n => n),
          reducer_name: s.reducerName,
        })),
        table_type: { [t.tableType]: [] },
        table_access: { [t.tableAccess]: [] },
      })),
      reducers: def.reducers.map(r => ({
        name: r.name,
        params: AlgebraicType.productToJson(r.params),
        lifecycle: optionToJson(r.lifecycle, l => ({ [l]: [] })),
      })),
      types: def.types.map(t => ({
        name: { scope: t.name.scope, name: t.name.name },
        ty: t.ty,
        custom_ordering: t.customOrdering,
      })),
      misc_exports: def.miscExports,
      row_level_security: def.rowLevelSecurity,
    };
  },

  table(def: RawModuleDef, name: string): TableDef | undefined {
    return def.tables.find(t => t.name === name);
  },

  reducer(def: RawModuleDef, name: string): ReducerDef | undefined {
    return def.reducers.find(r => r.name === name);
  },

  /**
   * The resolved product type of a table's rows.
   */
  rowType(def: RawModuleDef, tableName: string): ProductType | undefined {
    const table = ModuleDef.table(def, tableName);
    if (!table) return undefined;
    const ty = def.typespace.resolve(AlgebraicType.Ref(table.productTypeRef));
    if (ty.tag !== 'Product') {
      throw new TypeMismatchError(
        `&${table.productTypeRef}`,
        `row type of table ${tableName} is not a product`
      );
    }
    return ty.value;
  },

  /**
   * A public user table with no keys, indexes or schedule.
   */
  userTable(name: string, productTypeRef: number): TableDef {
    return {
      name,
      productTypeRef,
      primaryKey: [],
      indexes: [],
      constraints: [],
      sequences: [],
      schedule: undefined,
      tableType: 'User',
      tableAccess: 'Public',
    };
  },

  reducerDef(name: string, params: ProductType): ReducerDef {
    return { name, params, lifecycle: undefined };
  },

  initReducer(name: string, params: ProductType): ReducerDef {
    return { name, params, lifecycle: 'Init' };
  },
};
