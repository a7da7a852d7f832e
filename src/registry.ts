/**
 * Type registry - maps case-insensitive type names onto schema types
 */

import { ContainerKind, ScalarKind } from './types';

export type RegisteredType = { kind: 'scalar'; dtype: ScalarKind } | { kind: ContainerKind };

const SCALAR_NAMES: Array<[string, ScalarKind]> = [
  ['int8', 'int8'],
  ['int16', 'int16'],
  ['int32', 'int32'],
  ['int64', 'int64'],
  ['uint8', 'uint8'],
  ['uint16', 'uint16'],
  ['uint32', 'uint32'],
  ['uint64', 'uint64'],
  ['float32', 'float32'],
  ['float64', 'float64'],
  ['utf8', 'utf8'],
  // shorthands
  ['int', 'int64'],
  ['integer', 'int64'],
  ['float', 'float64'],
  ['real', 'float64'],
  ['string', 'utf8'],
];

const CONTAINER_NAMES: Array<[string, ContainerKind]> = [
  ['list', 'list'],
  ['array', 'list'],
  ['struct', 'struct'],
];

const REGISTRY = new Map<string, RegisteredType>([
  ...SCALAR_NAMES.map(([name, dtype]): [string, RegisteredType] => [name, { kind: 'scalar', dtype }]),
  ...CONTAINER_NAMES.map(([name, kind]): [string, RegisteredType] => [name, { kind }]),
]);

const DISPLAY_NAMES: Record<ScalarKind, string> = {
  int8: 'Int8',
  int16: 'Int16',
  int32: 'Int32',
  int64: 'Int64',
  uint8: 'UInt8',
  uint16: 'UInt16',
  uint32: 'UInt32',
  uint64: 'UInt64',
  float32: 'Float32',
  float64: 'Float64',
  utf8: 'Utf8',
};

export function lookupType(name: string): RegisteredType | undefined {
  return REGISTRY.get(name.toLowerCase());
}

export function isContainerName(name: string): boolean {
  const registered = lookupType(name);
  return registered !== undefined && registered.kind !== 'scalar';
}

export function displayName(dtype: ScalarKind): string {
  return DISPLAY_NAMES[dtype];
}
