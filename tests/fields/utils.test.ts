import { fc, testProp } from '@fast-check/jest';
import { createFieldCodec, fieldSizes } from '@/fields';
import * as errors from '@/errors';

describe('field codec', () => {
  const codec = createFieldCodec([
    ['version', 'uint8', 2],
    ['length', 'uint16', 0],
    ['sequence', 'uint24', 0],
    ['teid', 'uint32', 0],
  ] as const);

  test('size is the sum of field widths', () => {
    expect(codec.size).toBe(10);
    expect(fieldSizes.uint24).toBe(3);
  });
  test('defaults', () => {
    expect(codec.defaults()).toEqual({
      version: 2,
      length: 0,
      sequence: 0,
      teid: 0,
    });
  });
  test('generate is big-endian and fills defaults', () => {
    const bytes = codec.generate({
      length: 0x0102,
      sequence: 0x030405,
      teid: 0x06070809,
    });
    expect([...bytes]).toEqual([
      0x02, 0x01, 0x02, 0x03, 0x04, 0x05, 0x06, 0x07, 0x08, 0x09,
    ]);
  });
  test('parse leaves the remainder as a view', () => {
    const input = new Uint8Array([
      0x02, 0x00, 0x29, 0x01, 0x00, 0x0a, 0x00, 0x00, 0x00, 0x10, 0xaa, 0xbb,
    ]);
    const parsed = codec.parse(input);
    expect(parsed.data).toEqual({
      version: 2,
      length: 0x29,
      sequence: 0x01000a,
      teid: 0x10,
    });
    expect([...parsed.remainder]).toEqual([0xaa, 0xbb]);
    expect(parsed.remainder.byteOffset).toBe(input.byteOffset + 10);
  });
  test('parse needs the full width', () => {
    expect(() => codec.parse(new Uint8Array(9))).toThrow(
      errors.ErrorCodecNeedData,
    );
  });
  test('values must fit their format', () => {
    expect(() => codec.generate({ version: 0x100 })).toThrow(
      errors.ErrorCodecGenerate,
    );
    expect(() => codec.generate({ sequence: -1 })).toThrow(
      errors.ErrorCodecGenerate,
    );
    expect(() => codec.generate({ teid: 1.5 })).toThrow(
      errors.ErrorCodecGenerate,
    );
  });
  testProp(
    'generate then parse',
    [
      fc.record({
        version: fc.integer({ min: 0, max: 0xff }),
        length: fc.integer({ min: 0, max: 0xffff }),
        sequence: fc.integer({ min: 0, max: 0xffffff }),
        teid: fc.integer({ min: 0, max: 0xffffffff }),
      }),
    ],
    (values) => {
      const parsed = codec.parse(codec.generate(values));
      expect(parsed.data).toEqual(values);
      expect(parsed.remainder.length).toBe(0);
    },
  );
});
