import type { AMBR, BearerQoS } from './types';
import * as errors from './errors';
import { createFieldCodec } from '../fields/utils';
import { concatUInt8Array, encodeUInt8 } from '../utils';

const ambrFields = createFieldCodec([
  ['uplink', 'uint32', 50000],
  ['downlink', 'uint32', 100000],
] as const);

const bearerQoSFields = createFieldCodec([
  ['flags', 'uint8', 0],
  ['qci', 'uint8', 9],
] as const);

const BEARER_QOS_LENGTH = 22;

const MAX_BIT_RATE = 2 ** 40 - 1;

/**
 * Packs decimal digits as TBCD, low nibble first.
 * An odd digit count is padded with a 0xF high nibble.
 */
function generateTBCD(digits: string): Uint8Array {
  if (!/^[0-9]*$/.test(digits)) {
    throw new errors.ErrorGTPGenerate(`Invalid TBCD digits ${digits}`);
  }
  const padded = digits.length % 2 === 0 ? digits : digits + 'f';
  const bytes = new Uint8Array(padded.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] =
      (parseInt(padded[i * 2 + 1], 16) << 4) | parseInt(padded[i * 2], 16);
  }
  return bytes;
}

function parseTBCD(data: Uint8Array): string {
  let digits = '';
  for (let i = 0; i < data.length; i++) {
    for (const nibble of [data[i] & 0x0f, data[i] >>> 4]) {
      if (nibble === 0x0f) {
        if (i !== data.length - 1) {
          throw new errors.ErrorGTPParse('TBCD filler before the last octet');
        }
        return digits;
      }
      if (nibble > 9) {
        throw new errors.ErrorGTPParse(
          `Invalid TBCD digit 0x${nibble.toString(16)}`,
        );
      }
      digits += nibble.toString();
    }
  }
  return digits;
}

const labelDecoder = new TextDecoder('utf-8', {
  fatal: true,
  ignoreBOM: true,
});

function decodeLabel(label: Uint8Array): string {
  try {
    return labelDecoder.decode(label);
  } catch (e) {
    throw new errors.ErrorGTPParse('APN label is not valid UTF-8', {
      cause: e,
    });
  }
}

/**
 * Access point names are written as length prefixed labels without a
 * terminating zero.
 */
function generateAPN(apn: string): Uint8Array {
  const encoder = new TextEncoder();
  const parts: Array<Uint8Array> = [];
  for (const label of apn.split('.')) {
    const encoded = encoder.encode(label);
    if (encoded.length < 1 || encoded.length > 63) {
      throw new errors.ErrorGTPGenerate(
        `APN label of ${encoded.length} bytes in ${apn}`,
      );
    }
    parts.push(encodeUInt8(encoded.length), encoded);
  }
  return concatUInt8Array(...parts);
}

function parseAPN(data: Uint8Array): string {
  const labels: Array<string> = [];
  let offset = 0;
  while (offset < data.length) {
    const length = data[offset];
    if (offset + 1 + length > data.length) {
      throw new errors.ErrorGTPParse('APN label is truncated', {
        data: { offset, length },
      });
    }
    labels.push(decodeLabel(data.subarray(offset + 1, offset + 1 + length)));
    offset += 1 + length;
  }
  return labels.join('.');
}

function generateAMBR(ambr: Partial<AMBR> = {}): Uint8Array {
  return ambrFields.generate(ambr);
}

function parseAMBR(data: Uint8Array): AMBR {
  if (data.length !== ambrFields.size) {
    throw new errors.ErrorGTPParse(`AMBR must be ${ambrFields.size} bytes`);
  }
  return ambrFields.parse(data).data;
}

function generateBitRate(rate: number): Uint8Array {
  if (!Number.isInteger(rate) || rate < 0 || rate > MAX_BIT_RATE) {
    throw new errors.ErrorGTPGenerate(`Bit rate ${rate} does not fit 40 bits`);
  }
  const bytes = new Uint8Array(5);
  const dv = new DataView(bytes.buffer);
  dv.setUint8(0, Math.floor(rate / 2 ** 32));
  dv.setUint32(1, rate % 2 ** 32, false);
  return bytes;
}

function parseBitRate(data: Uint8Array, offset: number): number {
  const dv = new DataView(data.buffer, data.byteOffset + offset, 5);
  return dv.getUint8(0) * 2 ** 32 + dv.getUint32(1, false);
}

/**
 * Bearer level QoS, bit rates are in kbps
 */
function generateBearerQoS({
  pci = 0,
  pl = 15,
  pvi = 0,
  qci = 9,
  mbrUplink = 0,
  mbrDownlink = 0,
  gbrUplink = 0,
  gbrDownlink = 0,
}: Partial<BearerQoS> = {}): Uint8Array {
  const flags = ((pci & 0x1) << 6) | ((pl & 0xf) << 2) | ((pvi & 0x1) << 1);
  return concatUInt8Array(
    bearerQoSFields.generate({ flags, qci }),
    generateBitRate(mbrUplink),
    generateBitRate(mbrDownlink),
    generateBitRate(gbrUplink),
    generateBitRate(gbrDownlink),
  );
}

function parseBearerQoS(data: Uint8Array): BearerQoS {
  if (data.length !== BEARER_QOS_LENGTH) {
    throw new errors.ErrorGTPParse(
      `Bearer QoS must be ${BEARER_QOS_LENGTH} bytes`,
      { data: { length: data.length } },
    );
  }
  const { data: fields } = bearerQoSFields.parse(data);
  return {
    pci: (fields.flags >>> 6) & 0x1,
    pl: (fields.flags >>> 2) & 0xf,
    pvi: (fields.flags >>> 1) & 0x1,
    qci: fields.qci,
    mbrUplink: parseBitRate(data, 2),
    mbrDownlink: parseBitRate(data, 7),
    gbrUplink: parseBitRate(data, 12),
    gbrDownlink: parseBitRate(data, 17),
  };
}

function generateEBI(ebi: number): Uint8Array {
  return encodeUInt8(ebi & 0x0f);
}

function parseEBI(data: Uint8Array): number {
  if (data.length < 1) {
    throw new errors.ErrorGTPParse('EBI is empty');
  }
  return data[0] & 0x0f;
}

export {
  generateTBCD,
  parseTBCD,
  generateAPN,
  parseAPN,
  generateAMBR,
  parseAMBR,
  generateBearerQoS,
  parseBearerQoS,
  generateEBI,
  parseEBI,
};
