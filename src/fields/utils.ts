import type {
  FieldCodec,
  FieldFormat,
  FieldSpec,
  FieldValues,
} from './types';
import * as errors from '../errors';

const fieldSizes: Readonly<Record<FieldFormat, number>> = {
  uint8: 1,
  uint16: 2,
  uint24: 3,
  uint32: 4,
};

const fieldMaximums: Readonly<Record<FieldFormat, number>> = {
  uint8: 0xff,
  uint16: 0xffff,
  uint24: 0xffffff,
  uint32: 0xffffffff,
};

function readField(dv: DataView, offset: number, format: FieldFormat): number {
  switch (format) {
    case 'uint8':
      return dv.getUint8(offset);
    case 'uint16':
      return dv.getUint16(offset, false);
    case 'uint24':
      return (dv.getUint8(offset) << 16) | dv.getUint16(offset + 1, false);
    case 'uint32':
      return dv.getUint32(offset, false);
  }
}

function writeField(
  dv: DataView,
  offset: number,
  format: FieldFormat,
  value: number,
): void {
  switch (format) {
    case 'uint8':
      dv.setUint8(offset, value);
      return;
    case 'uint16':
      dv.setUint16(offset, value, false);
      return;
    case 'uint24':
      dv.setUint8(offset, (value >>> 16) & 0xff);
      dv.setUint16(offset + 1, value & 0xffff, false);
      return;
    case 'uint32':
      dv.setUint32(offset, value, false);
      return;
  }
}

function hasAllFields<K extends string>(
  fields: ReadonlyArray<FieldSpec<K>>,
  values: Partial<FieldValues<K>>,
): values is FieldValues<K> {
  return fields.every(([name]) => typeof values[name] === 'number');
}

/**
 * Creates a codec for an ordered list of fixed width big-endian fields.
 * Whatever follows the fields in the input is returned as the remainder.
 */
function createFieldCodec<K extends string>(
  fields: ReadonlyArray<FieldSpec<K>>,
): FieldCodec<K> {
  const size = fields.reduce((acc, [, format]) => acc + fieldSizes[format], 0);

  const complete = (values: Partial<FieldValues<K>>): FieldValues<K> => {
    if (!hasAllFields(fields, values)) {
      throw new errors.ErrorCodec('Field values are incomplete');
    }
    return values;
  };

  const defaults = (): FieldValues<K> => {
    const values: Partial<FieldValues<K>> = {};
    for (const [name, , defaultValue] of fields) {
      values[name] = defaultValue;
    }
    return complete(values);
  };

  const parse = (input: Uint8Array) => {
    if (input.length < size) {
      throw new errors.ErrorCodecNeedData(
        `Expected ${size} bytes of fields but got ${input.length}`,
        { data: { size, length: input.length } },
      );
    }
    const dv = new DataView(input.buffer, input.byteOffset, size);
    const values: Partial<FieldValues<K>> = {};
    let offset = 0;
    for (const [name, format] of fields) {
      values[name] = readField(dv, offset, format);
      offset += fieldSizes[format];
    }
    return {
      data: complete(values),
      remainder: input.subarray(size),
    };
  };

  const generate = (values: Partial<FieldValues<K>> = {}): Uint8Array => {
    const buffer = new Uint8Array(size);
    const dv = new DataView(buffer.buffer);
    let offset = 0;
    for (const [name, format, defaultValue] of fields) {
      const value = values[name] ?? defaultValue;
      if (
        !Number.isInteger(value) ||
        value < 0 ||
        value > fieldMaximums[format]
      ) {
        throw new errors.ErrorCodecGenerate(
          `Field ${name} value ${value} does not fit ${format}`,
          { data: { name, value, format } },
        );
      }
      writeField(dv, offset, format, value);
      offset += fieldSizes[format];
    }
    return buffer;
  };

  return {
    fields,
    size,
    defaults,
    parse,
    generate,
  };
}

export { fieldSizes, createFieldCodec };
