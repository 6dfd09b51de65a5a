import { IPv6, Validator, collapseIPv6Number } from 'ip-num';
import * as errors from './errors';

function concatUInt8Array(...arrays: Array<Uint8Array>): Uint8Array {
  const totalLength = arrays.reduce((acc, val) => acc + val.length, 0);
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

function encodeUInt8(value: number): Uint8Array {
  return new Uint8Array([value & 0xff]);
}

function encodeUInt16BE(value: number): Uint8Array {
  const buffer = new Uint8Array(2);
  new DataView(buffer.buffer).setUint16(0, value, false);
  return buffer;
}

function encodeUInt32BE(value: number): Uint8Array {
  const buffer = new Uint8Array(4);
  new DataView(buffer.buffer).setUint32(0, value, false);
  return buffer;
}

/**
 * Is it an IPv4 address in dotted decimal?
 */
function isIPv4(host: string): boolean {
  const [isIPv4] = Validator.isValidIPv4String(host);
  return isIPv4;
}

/**
 * Is it an IPv6 address?
 * IPv4 mapped dotted decimal forms are not accepted.
 */
function isIPv6(host: string): boolean {
  const [isIPv6] = Validator.isValidIPv6String(host);
  return isIPv6;
}

function parseIPv4(input: Uint8Array): string {
  if (input.length < 4) {
    throw new errors.ErrorCodecNeedData('IPv4 address is too short', {
      data: { length: input.length },
    });
  }
  return input.subarray(0, 4).join('.');
}

function generateIPv4(ip: string): Uint8Array {
  if (!isIPv4(ip)) {
    throw new errors.ErrorCodecGenerate(`Invalid IPv4 address ${ip}`);
  }
  return new Uint8Array(ip.split('.').map((v) => Number(v)));
}

/**
 * Renders 16 bytes in the RFC 5952 canonical text form
 */
function parseIPv6(input: Uint8Array): string {
  if (input.length < 16) {
    throw new errors.ErrorCodecNeedData('IPv6 address is too short', {
      data: { length: input.length },
    });
  }
  const dv = new DataView(input.buffer, input.byteOffset, 16);
  const groups: Array<string> = [];
  for (let i = 0; i < 16; i += 2) {
    groups.push(dv.getUint16(i, false).toString(16));
  }
  return collapseIPv6Number(groups.join(':'));
}

function generateIPv6(ip: string): Uint8Array {
  const buffer = new Uint8Array(16);
  const dv = new DataView(buffer.buffer);
  let parts: ReturnType<IPv6['getHexadecatet']>;
  try {
    parts = new IPv6(ip).getHexadecatet();
  } catch (e) {
    throw new errors.ErrorCodecGenerate(`Invalid IPv6 address ${ip}`, {
      cause: e,
    });
  }
  for (let i = 0; i < 8; i++) {
    dv.setUint16(i * 2, parts[i].getValue(), false);
  }
  return buffer;
}

function toHex(input: Uint8Array): string {
  return Array.from(input, (byte) => byte.toString(16).padStart(2, '0')).join(
    '',
  );
}

function fromHex(hex: string): Uint8Array {
  if (hex.length % 2 !== 0 || /[^0-9a-fA-F]/.test(hex)) {
    throw new errors.ErrorCodecGenerate(`Invalid hex string ${hex}`);
  }
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

export {
  concatUInt8Array,
  encodeUInt8,
  encodeUInt16BE,
  encodeUInt32BE,
  isIPv4,
  isIPv6,
  parseIPv4,
  generateIPv4,
  parseIPv6,
  generateIPv6,
  toHex,
  fromHex,
};
