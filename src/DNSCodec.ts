import type { Packet } from './dns/types';
import Logger from '@matrixai/logger';
import { generatePacket, parsePacket } from './dns/utils';
import * as errors from './dns/errors';

/**
 * Decodes and encodes whole DNS messages.
 * Trailing bytes after the last announced record are rejected.
 */
class DNSCodec {
  protected logger: Logger;
  protected compression: boolean;

  public constructor({
    compression = true,
    logger,
  }: {
    compression?: boolean;
    logger?: Logger;
  } = {}) {
    this.logger = logger ?? new Logger(this.constructor.name);
    this.compression = compression;
  }

  public decode(input: Uint8Array): Packet {
    let packet: Packet;
    try {
      const parsed = parsePacket(input);
      if (parsed.remainder.length > 0) {
        throw new errors.ErrorDNSParse(
          `Packet has ${parsed.remainder.length} trailing bytes`,
        );
      }
      packet = parsed.data;
    } catch (e) {
      this.logger.warn(`Rejected DNS packet of ${input.length} bytes: ${e}`);
      throw e;
    }
    this.logger.debug(
      `Decoded DNS packet ${packet.id} with ${packet.questions.length} questions and ${packet.answers.length} answers`,
    );
    return packet;
  }

  public encode(packet: Packet): Uint8Array {
    let output: Uint8Array;
    try {
      output = generatePacket(packet, { compression: this.compression });
    } catch (e) {
      this.logger.warn(`Failed encoding DNS packet ${packet.id}: ${e}`);
      throw e;
    }
    this.logger.debug(
      `Encoded DNS packet ${packet.id} into ${output.length} bytes`,
    );
    return output;
  }
}

export default DNSCodec;
