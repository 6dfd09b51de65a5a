import type { Parsed } from '../types';
import type { BitLayout } from '../fields/types';
import type {
  ExtensionHeader,
  GTPv1FlagName,
  GTPv1Flags,
  GTPv1Message,
  GTPv2FlagName,
  GTPv2Flags,
  GTPv2Message,
  IEv1,
  IEv2,
  TVLengthTable,
} from './types';
import * as errors from './errors';
import BitFlags from '../fields/BitFlags';
import { createFieldCodec } from '../fields/utils';
import { concatUInt8Array, encodeUInt8 } from '../utils';

// 3GPP TS 29.060 7.1, incomplete list
enum GTPv1MessageType {
  ECHO_REQUEST = 1,
  ECHO_RESPONSE = 2,
  VERSION_NOT_SUPPORTED = 3,
  CREATE_PDP_CONTEXT_REQUEST = 16,
  CREATE_PDP_CONTEXT_RESPONSE = 17,
  UPDATE_PDP_CONTEXT_REQUEST = 18,
  UPDATE_PDP_CONTEXT_RESPONSE = 19,
  DELETE_PDP_CONTEXT_REQUEST = 20,
  DELETE_PDP_CONTEXT_RESPONSE = 21,
  ERROR_INDICATION = 26,
  PDU_NOTIFICATION_REQUEST = 27,
  PDU_NOTIFICATION_RESPONSE = 28,
  SUPPORTED_EXTENSION_HEADERS_NOTIFICATION = 31,
  DATA_RECORD_TRANSFER_REQUEST = 240,
  DATA_RECORD_TRANSFER_RESPONSE = 241,
}

// 3GPP TS 29.274 6.1, incomplete list
enum GTPv2MessageType {
  ECHO_REQUEST = 1,
  ECHO_RESPONSE = 2,
  VERSION_NOT_SUPPORTED = 3,
  CREATE_SESSION_REQUEST = 32,
  CREATE_SESSION_RESPONSE = 33,
  MODIFY_BEARER_REQUEST = 34,
  MODIFY_BEARER_RESPONSE = 35,
  DELETE_SESSION_REQUEST = 36,
  DELETE_SESSION_RESPONSE = 37,
  CREATE_BEARER_REQUEST = 95,
  CREATE_BEARER_RESPONSE = 96,
  UPDATE_BEARER_REQUEST = 97,
  UPDATE_BEARER_RESPONSE = 98,
  DELETE_BEARER_REQUEST = 99,
  DELETE_BEARER_RESPONSE = 100,
  RELEASE_ACCESS_BEARERS_REQUEST = 170,
  RELEASE_ACCESS_BEARERS_RESPONSE = 171,
  DOWNLINK_DATA_NOTIFICATION = 176,
  DOWNLINK_DATA_NOTIFICATION_ACKNOWLEDGE = 177,
}

// 3GPP TS 29.060 7.7, incomplete list
enum IEv1Type {
  CAUSE = 1,
  IMSI = 2,
  RAI = 3,
  TLLI = 4,
  P_TMSI = 5,
  REORDERING_REQUIRED = 8,
  AUTHENTICATION_TRIPLET = 9,
  MAP_CAUSE = 11,
  P_TMSI_SIGNATURE = 12,
  MS_VALIDATED = 13,
  RECOVERY = 14,
  SELECTION_MODE = 15,
  TEID_DATA_I = 16,
  TEID_CONTROL_PLANE = 17,
  TEID_DATA_II = 18,
  TEARDOWN_INDICATOR = 19,
  NSAPI = 20,
  RANAP_CAUSE = 21,
  RAB_CONTEXT = 22,
  RADIO_PRIORITY_SMS = 23,
  RADIO_PRIORITY = 24,
  PACKET_FLOW_ID = 25,
  CHARGING_CHARACTERISTICS = 26,
  TRACE_REFERENCE = 27,
  TRACE_TYPE = 28,
  MS_NOT_REACHABLE_REASON = 29,
  CHARGING_ID = 127,
  END_USER_ADDRESS = 128,
  APN = 131,
  PCO = 132,
  GSN_ADDRESS = 133,
  MSISDN = 134,
  QOS_PROFILE = 135,
}

// 3GPP TS 29.274 8.1, incomplete list
enum IEv2Type {
  IMSI = 1,
  CAUSE = 2,
  RECOVERY = 3,
  APN = 71,
  AMBR = 72,
  EBI = 73,
  IP_ADDRESS = 74,
  MEI = 75,
  MSISDN = 76,
  INDICATION = 77,
  PCO = 78,
  PAA = 79,
  BEARER_QOS = 80,
  RAT_TYPE = 82,
  F_TEID = 87,
  BEARER_CONTEXT = 93,
  CHARGING_ID = 94,
  CHARGING_CHARACTERISTICS = 95,
  PDN_TYPE = 99,
  PDN_CONNECTION = 109,
  THROTTLING = 154,
  ARP = 155,
  EPC_TIMER = 156,
  OVERLOAD_CONTROL_INFORMATION = 180,
  LOAD_CONTROL_INFORMATION = 181,
  REMOTE_UE_CONTEXT = 191,
  PRIVATE_EXTENSION = 255,
}

const gtpv1FlagsLayout: BitLayout<GTPv1FlagName> = {
  version: { shift: 5, width: 3 },
  protocolType: { shift: 4, width: 1 },
  extension: { shift: 2, width: 1 },
  sequence: { shift: 1, width: 1 },
  npdu: { shift: 0, width: 1 },
  // Any of the three indicators above
  additionalFields: { shift: 0, width: 3 },
};

const gtpv2FlagsLayout: BitLayout<GTPv2FlagName> = {
  version: { shift: 5, width: 3 },
  piggyback: { shift: 4, width: 1 },
  teid: { shift: 3, width: 1 },
};

// Version 1, GTP rather than GTP'
const defaultGTPv1Flags = 0x30;

const defaultGTPv2Flags = 0x40;

/**
 * Value lengths of the GTPv1 TV encoded types
 */
const tvLengths: TVLengthTable = new Map([
  [0, 0],
  [IEv1Type.CAUSE, 1],
  [IEv1Type.IMSI, 8],
  [IEv1Type.RAI, 6],
  [IEv1Type.TLLI, 4],
  [IEv1Type.P_TMSI, 4],
  [IEv1Type.REORDERING_REQUIRED, 1],
  [IEv1Type.AUTHENTICATION_TRIPLET, 28],
  [IEv1Type.MAP_CAUSE, 1],
  [IEv1Type.P_TMSI_SIGNATURE, 3],
  [IEv1Type.MS_VALIDATED, 1],
  [IEv1Type.RECOVERY, 1],
  [IEv1Type.SELECTION_MODE, 1],
  [IEv1Type.TEID_DATA_I, 4],
  [IEv1Type.TEID_CONTROL_PLANE, 4],
  [IEv1Type.TEID_DATA_II, 5],
  [IEv1Type.TEARDOWN_INDICATOR, 1],
  [IEv1Type.NSAPI, 1],
  [IEv1Type.RANAP_CAUSE, 1],
  [IEv1Type.RAB_CONTEXT, 9],
  [IEv1Type.RADIO_PRIORITY_SMS, 1],
  [IEv1Type.RADIO_PRIORITY, 1],
  [IEv1Type.PACKET_FLOW_ID, 2],
  [IEv1Type.CHARGING_CHARACTERISTICS, 2],
  [IEv1Type.TRACE_REFERENCE, 2],
  [IEv1Type.TRACE_TYPE, 2],
  [IEv1Type.MS_NOT_REACHABLE_REASON, 1],
  [IEv1Type.CHARGING_ID, 4],
]);

const groupedIEv2Types: ReadonlySet<number> = new Set([
  IEv2Type.BEARER_CONTEXT,
  IEv2Type.PDN_CONNECTION,
  IEv2Type.OVERLOAD_CONTROL_INFORMATION,
  IEv2Type.LOAD_CONTROL_INFORMATION,
  IEv2Type.REMOTE_UE_CONTEXT,
]);

const gtpv1HeaderFields = createFieldCodec([
  ['flags', 'uint8', defaultGTPv1Flags],
  ['type', 'uint8', 0],
  ['length', 'uint16', 0],
  ['teid', 'uint32', 0],
] as const);

const gtpv1OptionalFields = createFieldCodec([
  ['sequenceNumber', 'uint16', 0],
  ['npduNumber', 'uint8', 0],
  ['nextExtensionType', 'uint8', 0],
] as const);

const gtpv2HeaderFields = createFieldCodec([
  ['flags', 'uint8', defaultGTPv2Flags],
  ['type', 'uint8', 0],
  ['length', 'uint16', 0],
] as const);

const gtpv2TEIDFields = createFieldCodec([['teid', 'uint32', 0]] as const);

const gtpv2SequenceFields = createFieldCodec([
  ['sequenceNumber', 'uint24', 0],
  ['spare', 'uint8', 0],
] as const);

const iev1TLVLengthFields = createFieldCodec([
  ['length', 'uint16', 0],
] as const);

const iev2HeaderFields = createFieldCodec([
  ['type', 'uint8', 0],
  ['length', 'uint16', 0],
  ['flags', 'uint8', 0],
] as const);

function createGTPv1Flags(
  value: number | Partial<Record<GTPv1FlagName, number>> = defaultGTPv1Flags,
): GTPv1Flags {
  return new BitFlags(gtpv1FlagsLayout, 8, value);
}

function createGTPv2Flags(
  value: number | Partial<Record<GTPv2FlagName, number>> = defaultGTPv2Flags,
): GTPv2Flags {
  return new BitFlags(gtpv2FlagsLayout, 8, value);
}

function isTLVType(type: number): boolean {
  return (type & 0x80) !== 0;
}

function isGroupedIEv2Type(type: number): boolean {
  return groupedIEv2Types.has(type);
}

/**
 * Takes the payload bounded by the header's length field.
 * Anything after it belongs to the next message.
 */
function takePayload(input: Uint8Array, length: number): Parsed<Uint8Array> {
  if (input.length < length) {
    throw new errors.ErrorGTPParse(
      `Message declares ${length} bytes but ${input.length} remain`,
      { data: { length, remaining: input.length } },
    );
  }
  return {
    data: input.subarray(0, length),
    remainder: input.subarray(length),
  };
}

function getIEv1Length(ie: IEv1): number {
  return 1 + (isTLVType(ie.type) ? 2 : 0) + ie.data.length;
}

function parseIEv1(
  input: Uint8Array,
  lengths: TVLengthTable = tvLengths,
): Parsed<IEv1> {
  if (input.length < 1) {
    throw new errors.ErrorGTPParse('IE is empty');
  }
  const type = input[0];
  let rest = input.subarray(1);
  let length: number;
  if (isTLVType(type)) {
    if (rest.length < iev1TLVLengthFields.size) {
      throw new errors.ErrorGTPParse(`IE ${type} length is truncated`);
    }
    const parsed = iev1TLVLengthFields.parse(rest);
    length = parsed.data.length;
    rest = parsed.remainder;
  } else {
    const tvLength = lengths.get(type);
    if (tvLength === undefined) {
      throw new errors.ErrorGTPParse(`Unknown TV IE type ${type}`, {
        data: { type },
      });
    }
    length = tvLength;
  }
  if (rest.length < length) {
    throw new errors.ErrorGTPParse(`IE ${type} value is truncated`, {
      data: { type, length, remaining: rest.length },
    });
  }
  return {
    data: { type, data: rest.slice(0, length) },
    remainder: rest.subarray(length),
  };
}

function generateIEv1(
  ie: IEv1,
  lengths: TVLengthTable = tvLengths,
): Uint8Array {
  if (!Number.isInteger(ie.type) || ie.type < 0 || ie.type > 0xff) {
    throw new errors.ErrorGTPGenerate(`Invalid IE type ${ie.type}`);
  }
  if (isTLVType(ie.type)) {
    return concatUInt8Array(
      encodeUInt8(ie.type),
      iev1TLVLengthFields.generate({ length: ie.data.length }),
      ie.data,
    );
  }
  const tvLength = lengths.get(ie.type);
  if (tvLength === undefined) {
    throw new errors.ErrorGTPGenerate(`Unknown TV IE type ${ie.type}`, {
      data: { type: ie.type },
    });
  }
  if (ie.data.length !== tvLength) {
    throw new errors.ErrorGTPGenerate(
      `TV IE ${ie.type} must be ${tvLength} bytes but is ${ie.data.length}`,
    );
  }
  return concatUInt8Array(encodeUInt8(ie.type), ie.data);
}

function parseIEsV1(
  input: Uint8Array,
  lengths: TVLengthTable = tvLengths,
): Array<IEv1> {
  const ies: Array<IEv1> = [];
  while (input.length > 0) {
    const ie = parseIEv1(input, lengths);
    ies.push(ie.data);
    input = ie.remainder;
  }
  return ies;
}

function getIEv2Length(ie: IEv2): number {
  return iev2HeaderFields.size + ie.data.length;
}

function parseIEv2(input: Uint8Array): Parsed<IEv2> {
  if (input.length < iev2HeaderFields.size) {
    throw new errors.ErrorGTPParse('IE header is truncated', {
      data: { remaining: input.length },
    });
  }
  const { data: header, remainder } = iev2HeaderFields.parse(input);
  if (remainder.length < header.length) {
    throw new errors.ErrorGTPParse(`IE ${header.type} value is truncated`, {
      data: {
        type: header.type,
        length: header.length,
        remaining: remainder.length,
      },
    });
  }
  return {
    data: {
      type: header.type,
      crFlag: header.flags >>> 4,
      instance: header.flags & 0x0f,
      data: remainder.slice(0, header.length),
    },
    remainder: remainder.subarray(header.length),
  };
}

function generateIEv2(ie: IEv2): Uint8Array {
  for (const [name, value] of [
    ['crFlag', ie.crFlag],
    ['instance', ie.instance],
  ] as const) {
    if (!Number.isInteger(value) || value < 0 || value > 0x0f) {
      throw new errors.ErrorGTPGenerate(`IE ${name} ${value} does not fit 4 bits`);
    }
  }
  return concatUInt8Array(
    iev2HeaderFields.generate({
      type: ie.type,
      length: ie.data.length,
      flags: (ie.crFlag << 4) | ie.instance,
    }),
    ie.data,
  );
}

function parseIEsV2(input: Uint8Array): Array<IEv2> {
  const ies: Array<IEv2> = [];
  while (input.length > 0) {
    const ie = parseIEv2(input);
    ies.push(ie.data);
    input = ie.remainder;
  }
  return ies;
}

function createIEv2(
  type: number,
  data: Uint8Array,
  instance: number = 0,
  crFlag: number = 0,
): IEv2 {
  return { type, crFlag, instance, data };
}

/**
 * Wraps already built IEs as the value of a grouped IE
 */
function createGroupedIE(
  type: number,
  ies: Array<IEv2>,
  instance: number = 0,
): IEv2 {
  if (!isGroupedIEv2Type(type)) {
    throw new errors.ErrorGTPGenerate(`IE ${type} is not a grouped type`);
  }
  return createIEv2(type, concatUInt8Array(...ies.map(generateIEv2)), instance);
}

/**
 * Decodes the inner IEs of a grouped IE.
 * The outer decode leaves grouped values as opaque bytes.
 */
function parseGroupedIE(ie: IEv2): Array<IEv2> {
  if (!isGroupedIEv2Type(ie.type)) {
    throw new errors.ErrorGTPParse(`IE ${ie.type} is not a grouped type`);
  }
  return parseIEsV2(ie.data);
}

function parseExtensionHeaders(
  input: Uint8Array,
  nextType: number,
): Parsed<Array<ExtensionHeader>> {
  const headers: Array<ExtensionHeader> = [];
  while (nextType !== 0) {
    if (input.length < 1) {
      throw new errors.ErrorGTPParse('Extension header is truncated');
    }
    // Length counts 4 octet units including itself and the next type
    const length = input[0] * 4;
    if (length === 0 || input.length < length) {
      throw new errors.ErrorGTPParse('Extension header is truncated', {
        data: { type: nextType, length, remaining: input.length },
      });
    }
    headers.push({
      type: nextType,
      content: input.slice(1, length - 1),
    });
    nextType = input[length - 1];
    input = input.subarray(length);
  }
  return { data: headers, remainder: input };
}

function generateExtensionHeaders(
  headers: Array<ExtensionHeader>,
): Uint8Array {
  const parts: Array<Uint8Array> = [];
  headers.forEach((header, i) => {
    const length = header.content.length + 2;
    if (length % 4 !== 0 || length / 4 > 0xff) {
      throw new errors.ErrorGTPGenerate(
        `Extension header ${header.type} content must fill 4 octet units`,
        { data: { length: header.content.length } },
      );
    }
    parts.push(
      encodeUInt8(length / 4),
      header.content,
      encodeUInt8(i + 1 < headers.length ? headers[i + 1].type : 0),
    );
  });
  return concatUInt8Array(...parts);
}

function createGTPv1Message(
  message: Partial<GTPv1Message> = {},
): GTPv1Message {
  return {
    flags: message.flags ?? createGTPv1Flags(),
    type: message.type ?? GTPv1MessageType.ECHO_REQUEST,
    teid: message.teid ?? 0,
    sequenceNumber: message.sequenceNumber ?? 0,
    npduNumber: message.npduNumber ?? 0,
    nextExtensionType: message.nextExtensionType ?? 0,
    extensionHeaders: message.extensionHeaders ?? [],
    ies: message.ies ?? [],
  };
}

function parseGTPv1Message(
  input: Uint8Array,
  lengths: TVLengthTable = tvLengths,
): Parsed<GTPv1Message> {
  const { data: header, remainder } = gtpv1HeaderFields.parse(input);
  const flags = createGTPv1Flags(header.flags);
  if (flags.get('version') !== 1) {
    throw new errors.ErrorGTPParse(
      `Expected GTP version 1 but got ${flags.get('version')}`,
    );
  }
  const payload = takePayload(remainder, header.length);
  const message = createGTPv1Message({
    flags,
    type: header.type,
    teid: header.teid,
  });
  let body = payload.data;
  if (flags.get('additionalFields') !== 0) {
    const optional = gtpv1OptionalFields.parse(body);
    message.sequenceNumber = optional.data.sequenceNumber;
    message.npduNumber = optional.data.npduNumber;
    message.nextExtensionType = optional.data.nextExtensionType;
    body = optional.remainder;
    if (flags.get('extension') === 1) {
      const extensionHeaders = parseExtensionHeaders(
        body,
        message.nextExtensionType,
      );
      message.extensionHeaders = extensionHeaders.data;
      body = extensionHeaders.remainder;
    }
  }
  message.ies = parseIEsV1(body, lengths);
  return { data: message, remainder: payload.remainder };
}

/**
 * Generates a GTPv1 message, the length field is derived from the body.
 * The optional fields are written when any of the E, S or PN flags is set.
 */
function generateGTPv1Message(
  message: GTPv1Message,
  lengths: TVLengthTable = tvLengths,
): Uint8Array {
  const parts: Array<Uint8Array> = [];
  const flags = message.flags;
  if (flags.get('additionalFields') !== 0) {
    const extended = flags.get('extension') === 1;
    if (!extended && message.extensionHeaders.length > 0) {
      throw new errors.ErrorGTPGenerate(
        'Extension headers require the E flag',
      );
    }
    if (
      extended &&
      message.nextExtensionType !== (message.extensionHeaders[0]?.type ?? 0)
    ) {
      throw new errors.ErrorGTPGenerate(
        `Next extension type ${message.nextExtensionType} does not match the extension headers`,
        {
          data: {
            nextExtensionType: message.nextExtensionType,
            headers: message.extensionHeaders.length,
          },
        },
      );
    }
    parts.push(
      gtpv1OptionalFields.generate({
        sequenceNumber: message.sequenceNumber,
        npduNumber: message.npduNumber,
        nextExtensionType: message.nextExtensionType,
      }),
    );
    if (extended) {
      parts.push(generateExtensionHeaders(message.extensionHeaders));
    }
  } else if (message.extensionHeaders.length > 0) {
    throw new errors.ErrorGTPGenerate('Extension headers require the E flag');
  }
  for (const ie of message.ies) {
    parts.push(generateIEv1(ie, lengths));
  }
  const body = concatUInt8Array(...parts);
  return concatUInt8Array(
    gtpv1HeaderFields.generate({
      flags: flags.value,
      type: message.type,
      length: body.length,
      teid: message.teid,
    }),
    body,
  );
}

function createGTPv2Message(
  message: Partial<GTPv2Message> = {},
): GTPv2Message {
  const flags =
    message.flags ??
    createGTPv2Flags({ version: 2, teid: message.teid != null ? 1 : 0 });
  const created: GTPv2Message = {
    flags,
    type: message.type ?? GTPv2MessageType.ECHO_REQUEST,
    sequenceNumber: message.sequenceNumber ?? 0,
    priority: message.priority ?? 0,
    ies: message.ies ?? [],
  };
  if (message.teid != null) {
    created.teid = message.teid;
  }
  return created;
}

function parseGTPv2Message(input: Uint8Array): Parsed<GTPv2Message> {
  const { data: header, remainder } = gtpv2HeaderFields.parse(input);
  const flags = createGTPv2Flags(header.flags);
  if (flags.get('version') !== 2) {
    throw new errors.ErrorGTPParse(
      `Expected GTP version 2 but got ${flags.get('version')}`,
    );
  }
  const payload = takePayload(remainder, header.length);
  let body = payload.data;
  let teid: number | undefined;
  if (flags.get('teid') === 1) {
    const parsed = gtpv2TEIDFields.parse(body);
    teid = parsed.data.teid;
    body = parsed.remainder;
  }
  const sequence = gtpv2SequenceFields.parse(body);
  const message = createGTPv2Message({
    flags,
    type: header.type,
    teid,
    sequenceNumber: sequence.data.sequenceNumber,
    priority: sequence.data.spare >>> 4,
    ies: parseIEsV2(sequence.remainder),
  });
  return { data: message, remainder: payload.remainder };
}

/**
 * Generates a GTPv2 message, the length field is derived from the body.
 * The TEID is written exactly when the TEID flag is set.
 */
function generateGTPv2Message(message: GTPv2Message): Uint8Array {
  const parts: Array<Uint8Array> = [];
  const flags = message.flags;
  if (flags.get('teid') === 1) {
    if (message.teid == null) {
      throw new errors.ErrorGTPGenerate('TEID flag is set without a TEID');
    }
    parts.push(gtpv2TEIDFields.generate({ teid: message.teid }));
  } else if (message.teid != null) {
    throw new errors.ErrorGTPGenerate('TEID is given without the TEID flag');
  }
  if (
    !Number.isInteger(message.priority) ||
    message.priority < 0 ||
    message.priority > 0x0f
  ) {
    throw new errors.ErrorGTPGenerate(
      `Message priority ${message.priority} does not fit 4 bits`,
    );
  }
  parts.push(
    gtpv2SequenceFields.generate({
      sequenceNumber: message.sequenceNumber,
      spare: message.priority << 4,
    }),
  );
  for (const ie of message.ies) {
    parts.push(generateIEv2(ie));
  }
  const body = concatUInt8Array(...parts);
  return concatUInt8Array(
    gtpv2HeaderFields.generate({
      flags: flags.value,
      type: message.type,
      length: body.length,
    }),
    body,
  );
}

/**
 * Parses a datagram of GTPv2 messages chained by the piggyback flag
 */
function parseGTPv2Messages(input: Uint8Array): Parsed<Array<GTPv2Message>> {
  const messages: Array<GTPv2Message> = [];
  let rest = input;
  for (;;) {
    const message = parseGTPv2Message(rest);
    messages.push(message.data);
    rest = message.remainder;
    if (message.data.flags.get('piggyback') !== 1 || rest.length === 0) {
      break;
    }
  }
  return { data: messages, remainder: rest };
}

/**
 * Version of a GTP message from the top 3 bits of its first byte
 */
function parseGTPVersion(input: Uint8Array): number {
  if (input.length < 1) {
    throw new errors.ErrorGTPParse('Message is empty');
  }
  return input[0] >>> 5;
}

export {
  GTPv1MessageType,
  GTPv2MessageType,
  IEv1Type,
  IEv2Type,
  gtpv1FlagsLayout,
  gtpv2FlagsLayout,
  tvLengths,
  createGTPv1Flags,
  createGTPv2Flags,
  isTLVType,
  isGroupedIEv2Type,
  getIEv1Length,
  parseIEv1,
  generateIEv1,
  parseIEsV1,
  getIEv2Length,
  parseIEv2,
  generateIEv2,
  parseIEsV2,
  createIEv2,
  createGroupedIE,
  parseGroupedIE,
  parseExtensionHeaders,
  generateExtensionHeaders,
  createGTPv1Message,
  parseGTPv1Message,
  generateGTPv1Message,
  createGTPv2Message,
  parseGTPv2Message,
  generateGTPv2Message,
  parseGTPv2Messages,
  parseGTPVersion,
};
