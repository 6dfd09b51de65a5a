import type { Parsed } from '../types';
import type { FTEID } from './types';
import * as errors from './errors';
import { createFieldCodec } from '../fields/utils';
import {
  concatUInt8Array,
  generateIPv4,
  generateIPv6,
  parseIPv4,
  parseIPv6,
} from '../utils';

// 3GPP TS 29.274 8.22
enum FTEIDInterface {
  S1U_ENB = 0,
  S1U_SGW = 1,
  S12_RNC = 2,
  S12_SGW = 3,
  S5S8_SGW_GTPU = 4,
  S5S8_PGW_GTPU = 5,
  S5S8_SGW_GTPC = 6,
  S5S8_PGW_GTPC = 7,
  S5S8_SGW_PMIPV6 = 8,
  S5S8_PGW_PMIPV6 = 9,
  S11_MME = 10,
  S11S4_SGW = 11,
}

const FTEID_IPV4_MASK = 0x80;
const FTEID_IPV6_MASK = 0x40;
const FTEID_INTERFACE_MASK = 0x3f;

const fteidFields = createFieldCodec([
  ['flags', 'uint8', 0],
  ['teid', 'uint32', 0],
] as const);

function generateFTEID(fteid: FTEID): Uint8Array {
  const { interfaceType, teid, ipv4, ipv6 } = fteid;
  if (ipv4 == null && ipv6 == null) {
    throw new errors.ErrorGTPFTEIDAddress('F-TEID has neither address', {
      data: { interfaceType, teid },
    });
  }
  if (
    !Number.isInteger(interfaceType) ||
    interfaceType < 0 ||
    interfaceType > FTEID_INTERFACE_MASK
  ) {
    throw new errors.ErrorGTPGenerate(
      `F-TEID interface type ${interfaceType} does not fit 6 bits`,
    );
  }
  let flags: number = interfaceType;
  const addresses: Array<Uint8Array> = [];
  if (ipv4 != null) {
    flags |= FTEID_IPV4_MASK;
    addresses.push(generateIPv4(ipv4));
  }
  if (ipv6 != null) {
    flags |= FTEID_IPV6_MASK;
    addresses.push(generateIPv6(ipv6));
  }
  return concatUInt8Array(fteidFields.generate({ flags, teid }), ...addresses);
}

function parseFTEID(input: Uint8Array): Parsed<FTEID> {
  if (input.length < fteidFields.size) {
    throw new errors.ErrorGTPParse('F-TEID is too short', {
      data: { length: input.length },
    });
  }
  const { data, remainder } = fteidFields.parse(input);
  const fteid: FTEID = {
    interfaceType: data.flags & FTEID_INTERFACE_MASK,
    teid: data.teid,
  };
  let rest = remainder;
  if (data.flags & FTEID_IPV4_MASK) {
    if (rest.length < 4) {
      throw new errors.ErrorGTPParse('F-TEID IPv4 address is truncated');
    }
    fteid.ipv4 = parseIPv4(rest);
    rest = rest.subarray(4);
  }
  if (data.flags & FTEID_IPV6_MASK) {
    if (rest.length < 16) {
      throw new errors.ErrorGTPParse('F-TEID IPv6 address is truncated');
    }
    fteid.ipv6 = parseIPv6(rest);
    rest = rest.subarray(16);
  }
  return { data: fteid, remainder: rest };
}

export { FTEIDInterface, generateFTEID, parseFTEID };
