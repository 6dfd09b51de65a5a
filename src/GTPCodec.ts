import type {
  GTPMessage,
  GTPv1Message,
  GTPv2Message,
  TVLengthTable,
} from './gtp/types';
import Logger from '@matrixai/logger';
import {
  generateGTPv1Message,
  generateGTPv2Message,
  parseGTPv1Message,
  parseGTPv2Message,
  parseGTPVersion,
  tvLengths as defaultTVLengths,
} from './gtp/utils';
import * as errors from './gtp/errors';

/**
 * Decodes and encodes GTPv1-C and GTPv2-C messages.
 * Vendor TV types can be added through `tvLengths`, they take precedence
 * over the standard lengths.
 */
class GTPCodec {
  protected logger: Logger;
  protected tvLengths: TVLengthTable;

  public constructor({
    tvLengths,
    logger,
  }: {
    tvLengths?: Iterable<readonly [number, number]>;
    logger?: Logger;
  } = {}) {
    this.logger = logger ?? new Logger(this.constructor.name);
    this.tvLengths = new Map([...defaultTVLengths, ...(tvLengths ?? [])]);
  }

  /**
   * Decodes a single message of either version.
   * Bytes after the declared length are rejected, piggybacked messages are
   * handled by `parseGTPv2Messages`.
   */
  public decode(input: Uint8Array): GTPMessage {
    return this.wrap<GTPMessage>('decode', input, () => {
      const version = parseGTPVersion(input);
      switch (version) {
        case 1:
          return {
            version: 1,
            message: this.parseComplete(
              parseGTPv1Message(input, this.tvLengths),
            ),
          };
        case 2:
          return {
            version: 2,
            message: this.parseComplete(parseGTPv2Message(input)),
          };
        default:
          throw new errors.ErrorGTPParse(
            `Unsupported GTP version ${version}`,
          );
      }
    });
  }

  public decodeV1(input: Uint8Array): GTPv1Message {
    return this.wrap('decode', input, () =>
      this.parseComplete(parseGTPv1Message(input, this.tvLengths)),
    );
  }

  public decodeV2(input: Uint8Array): GTPv2Message {
    return this.wrap('decode', input, () =>
      this.parseComplete(parseGTPv2Message(input)),
    );
  }

  public encode(message: GTPMessage): Uint8Array {
    return message.version === 1
      ? this.encodeV1(message.message)
      : this.encodeV2(message.message);
  }

  public encodeV1(message: GTPv1Message): Uint8Array {
    return this.wrap('encode', message, () =>
      generateGTPv1Message(message, this.tvLengths),
    );
  }

  public encodeV2(message: GTPv2Message): Uint8Array {
    return this.wrap('encode', message, () => generateGTPv2Message(message));
  }

  protected parseComplete<T>({
    data,
    remainder,
  }: {
    data: T;
    remainder: Uint8Array;
  }): T {
    if (remainder.length > 0) {
      throw new errors.ErrorGTPParse(
        `Message has ${remainder.length} trailing bytes`,
      );
    }
    return data;
  }

  protected wrap<T>(
    operation: 'decode' | 'encode',
    subject: Uint8Array | GTPv1Message | GTPv2Message,
    f: () => T,
  ): T {
    const description =
      subject instanceof Uint8Array
        ? `${subject.length} bytes`
        : `message type ${subject.type}`;
    let result: T;
    try {
      result = f();
    } catch (e) {
      this.logger.warn(`Failed to ${operation} GTP ${description}: ${e}`);
      throw e;
    }
    this.logger.debug(`Completed GTP ${operation} of ${description}`);
    return result;
  }
}

export default GTPCodec;
