export * from './lib/json';
export * from './lib/json_reader';
export * from './lib/errors';
export * from './lib/algebraic_type';
export * from './lib/algebraic_value';
export * from './lib/typespace';
export * from './lib/schema';
export * from './lib/reducer_args';
export * from './lib/identity';
export * from './lib/connection_id';
export * from './lib/time_duration';
export * from './lib/timestamp';
export * from './lib/util';
export * from './sdk';
