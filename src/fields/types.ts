import type { Parsed } from '../types';

/**
 * Big-endian unsigned integer formats
 */
type FieldFormat = 'uint8' | 'uint16' | 'uint24' | 'uint32';

type FieldSpec<K extends string = string> = readonly [
  name: K,
  format: FieldFormat,
  defaultValue: number,
];

type FieldValues<K extends string> = Record<K, number>;

type FieldCodec<K extends string> = {
  readonly fields: ReadonlyArray<FieldSpec<K>>;
  /**
   * Fixed length in bytes of all fields
   */
  readonly size: number;
  defaults(): FieldValues<K>;
  parse(input: Uint8Array): Parsed<FieldValues<K>>;
  generate(values?: Partial<FieldValues<K>>): Uint8Array;
};

type BitRange = {
  shift: number;
  width: number;
};

type BitLayout<K extends string> = Readonly<Record<K, BitRange>>;

export type {
  FieldFormat,
  FieldSpec,
  FieldValues,
  FieldCodec,
  BitRange,
  BitLayout,
};
