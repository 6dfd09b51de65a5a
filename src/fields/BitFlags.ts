import type { BitLayout, BitRange } from './types';
import * as errors from '../errors';

/**
 * Named views over the bits of a single backing integer.
 * Setting a view only touches the bits within its own range, views are
 * allowed to overlap.
 */
class BitFlags<K extends string> {
  public readonly bitLength: number;
  protected readonly layout: BitLayout<K>;
  protected _value: number = 0;

  public constructor(
    layout: BitLayout<K>,
    bitLength: number,
    value: number | Partial<Record<K, number>> = 0,
  ) {
    if (bitLength < 1 || bitLength > 32) {
      throw new errors.ErrorCodec(
        `Backing integer must be 1 to 32 bits, got ${bitLength}`,
      );
    }
    this.layout = layout;
    this.bitLength = bitLength;
    for (const name of this.names()) {
      const range: BitRange = layout[name];
      if (range.width < 1 || range.shift + range.width > bitLength) {
        throw new errors.ErrorCodec(`Bit range ${name} exceeds the backing integer`, {
          data: { ...range, bitLength },
        });
      }
    }
    if (typeof value === 'number') {
      this.value = value;
    } else {
      this.assign(value);
    }
  }

  public get value(): number {
    return this._value;
  }

  public set value(value: number) {
    this._value = (value & BitFlags.mask(this.bitLength)) >>> 0;
  }

  public get(name: K): number {
    const { shift, width } = this.layout[name];
    return (this._value >>> shift) & BitFlags.mask(width);
  }

  public set(name: K, value: number): this {
    const { shift, width } = this.layout[name];
    const mask = BitFlags.mask(width);
    this._value =
      ((this._value & ~(mask << shift)) | ((value & mask) << shift)) >>> 0;
    return this;
  }

  public assign(values: Partial<Record<K, number>>): this {
    for (const name of this.names()) {
      const value = values[name];
      if (value != null) this.set(name, value);
    }
    return this;
  }

  public names(): Array<K> {
    return Object.keys(this.layout).filter((name): name is K =>
      Object.prototype.hasOwnProperty.call(this.layout, name),
    );
  }

  public clone(): BitFlags<K> {
    return new BitFlags(this.layout, this.bitLength, this._value);
  }

  public toJSON(): Record<string, number> {
    return Object.fromEntries(this.names().map((name) => [name, this.get(name)]));
  }

  protected static mask(width: number): number {
    return width >= 32 ? 0xffffffff : 2 ** width - 1;
  }
}

export default BitFlags;
