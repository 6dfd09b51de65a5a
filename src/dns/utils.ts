import type { Parsed } from '../types';
import type { BitLayout } from '../fields/types';
import type {
  GeneratePacketOptions,
  LabelPointerTable,
  Packet,
  PacketFlagName,
  PacketFlags,
  PacketHeader,
  QuestionRecord,
  RecordDataCodecs,
  RecordDataMap,
  ResourceRecord,
  ResourceRecordOf,
} from './types';
import * as errors from './errors';
import BitFlags from '../fields/BitFlags';
import { createFieldCodec } from '../fields/utils';
import {
  concatUInt8Array,
  encodeUInt8,
  encodeUInt16BE,
  generateIPv4,
  generateIPv6,
  parseIPv4,
  parseIPv6,
} from '../utils';

enum PacketType {
  QUERY = 0,
  RESPONSE = 1, // 16th bit set
}

enum PacketOpCode { // RFC 6895 2.2.
  QUERY = 0,
  IQUERY = 1,
  STATUS = 2,
  NOTIFY = 4,
  UPDATE = 5,
}

enum RCode { // RFC 6895 2.3.
  NoError = 0,
  FormErr = 1,
  ServFail = 2,
  NXDomain = 3,
  NotImp = 4,
  Refused = 5,
  YXDomain = 6,
  YXRRSet = 7,
  NXRRSet = 8,
  NotAuth = 9,
  NotZone = 10,
}

// Answer RR Types
enum RType { // RFC 1035 3.2.2.
  A = 1,
  NS = 2,
  CNAME = 5,
  SOA = 6,
  NULL = 10,
  PTR = 12,
  HINFO = 13,
  MX = 15,
  TXT = 16,
  AAAA = 28, // RFC 3596 2.1.
  SRV = 33, // RFC 2782
  OPT = 41, // RFC 6891
}

// Question RR Types
enum QType { // RFC 1035 3.2.2. 3.2.3.
  A = 1,
  NS = 2,
  CNAME = 5,
  SOA = 6,
  NULL = 10,
  PTR = 12,
  HINFO = 13,
  MX = 15,
  TXT = 16,
  AAAA = 28,
  SRV = 33,
  OPT = 41,
  AXFR = 252,
  ANY = 255,
}

// Answer RR Classes
enum RClass { // RFC 1035 3.2.4.
  IN = 1, // The internet
  CHAOS = 3,
  HESIOD = 4,
}

// Question RR Classes
enum QClass { // RFC 1035 3.2.4. 3.2.5.
  IN = 1,
  CHAOS = 3,
  HESIOD = 4,
  ANY = 255,
}

const packetFlagsLayout: BitLayout<PacketFlagName> = {
  qr: { shift: 15, width: 1 },
  opcode: { shift: 11, width: 4 },
  aa: { shift: 10, width: 1 },
  tc: { shift: 9, width: 1 },
  rd: { shift: 8, width: 1 },
  ra: { shift: 7, width: 1 },
  z: { shift: 6, width: 1 },
  ad: { shift: 5, width: 1 },
  cd: { shift: 4, width: 1 },
  rcode: { shift: 0, width: 4 },
};

// Recursion desired
const defaultPacketFlags = 0x0100;

// Pointers carry a 14 bit offset
const maxPointerOffset = 0x3fff;

const maxLabelLength = 63;

const maxNameLength = 255;

const packetHeaderFields = createFieldCodec([
  ['id', 'uint16', 0],
  ['flags', 'uint16', defaultPacketFlags],
  ['qdcount', 'uint16', 0],
  ['ancount', 'uint16', 0],
  ['nscount', 'uint16', 0],
  ['arcount', 'uint16', 0],
] as const);

const questionFields = createFieldCodec([
  ['type', 'uint16', QType.A],
  ['class', 'uint16', QClass.IN],
] as const);

const resourceRecordFields = createFieldCodec([
  ['type', 'uint16', RType.A],
  ['class', 'uint16', RClass.IN],
  ['ttl', 'uint32', 0],
  ['rdlength', 'uint16', 0],
] as const);

const soaFields = createFieldCodec([
  ['serial', 'uint32', 0],
  ['refresh', 'uint32', 0],
  ['retry', 'uint32', 0],
  ['expire', 'uint32', 0],
  ['minimum', 'uint32', 0],
] as const);

const mxFields = createFieldCodec([['preference', 'uint16', 0]] as const);

const srvFields = createFieldCodec([
  ['priority', 'uint16', 0],
  ['weight', 'uint16', 0],
  ['port', 'uint16', 0],
] as const);

function createPacketFlags(
  value: number | Partial<Record<PacketFlagName, number>> = defaultPacketFlags,
): PacketFlags {
  return new BitFlags(packetFlagsLayout, 16, value);
}

function createPacket(packet: Partial<Packet> = {}): Packet {
  return {
    id: packet.id ?? 0,
    flags: packet.flags ?? createPacketFlags(),
    questions: packet.questions ?? [],
    answers: packet.answers ?? [],
    authorities: packet.authorities ?? [],
    additionals: packet.additionals ?? [],
  };
}

function isRType(type: number): type is RType {
  return Object.prototype.hasOwnProperty.call(recordDataCodecs, type);
}

/**
 * Offset of `input` relative to the start of `original`.
 * Both must view the same buffer.
 */
function offsetOf(input: Uint8Array, original: Uint8Array): number {
  const offset = input.byteOffset - original.byteOffset;
  if (
    input.buffer !== original.buffer ||
    offset < 0 ||
    offset > original.length
  ) {
    throw new errors.ErrorDNSParse('Input is not a view of the packet');
  }
  return offset;
}

/**
 * The bytes of `rdata` after a name whose remainder is `remainder`.
 * The name must not have run past the rdata.
 */
function rdataAfter(rdata: Uint8Array, remainder: Uint8Array): Uint8Array {
  const consumed = remainder.byteOffset - rdata.byteOffset;
  if (consumed > rdata.length) {
    throw new errors.ErrorDNSParse('Name overruns the record data', {
      data: { consumed, rdlength: rdata.length },
    });
  }
  return rdata.subarray(consumed);
}

function assertRDataEnd(rest: Uint8Array, type: RType): void {
  if (rest.length !== 0) {
    throw new errors.ErrorDNSParse(
      `Record data of type ${RType[type]} has ${rest.length} trailing bytes`,
    );
  }
}

/**
 * Parses a possibly compressed domain name starting at `input`.
 * Pointers must refer strictly backwards of where the current run of labels
 * began, which rules out loops. The remainder begins after the first pointer
 * or the terminating zero length label.
 */
const textDecoder = new TextDecoder('utf-8', {
  fatal: true,
  ignoreBOM: true,
});

function decodeText(input: Uint8Array): string {
  try {
    return textDecoder.decode(input);
  } catch (e) {
    throw new errors.ErrorDNSParse('Text is not valid UTF-8', {
      data: { length: input.length },
      cause: e,
    });
  }
}

function parseLabels(
  input: Uint8Array,
  original: Uint8Array,
): Parsed<string> {
  let offset = offsetOf(input, original);
  let startOffset = offset;
  let endOffset: number | undefined;
  let nameLength = 0;
  const labels: Array<Uint8Array> = [];
  for (;;) {
    if (offset >= original.length) {
      throw new errors.ErrorDNSParse('Name is truncated', {
        data: { offset },
      });
    }
    const length = original[offset];
    if (length === 0) {
      offset += 1;
      break;
    }
    if ((length & 0xc0) === 0xc0) {
      if (offset + 1 >= original.length) {
        throw new errors.ErrorDNSParse('Label pointer is truncated', {
          data: { offset },
        });
      }
      const pointer = ((length << 8) | original[offset + 1]) & maxPointerOffset;
      if (pointer >= startOffset) {
        throw new errors.ErrorDNSParse('Invalid label compression pointer', {
          data: { pointer, startOffset },
        });
      }
      offset += 2;
      endOffset ??= offset;
      startOffset = pointer;
      offset = pointer;
    } else if ((length & 0xc0) === 0) {
      offset += 1;
      if (offset + length > original.length) {
        throw new errors.ErrorDNSParse('Label is truncated', {
          data: { offset, length },
        });
      }
      nameLength += length + 1;
      if (nameLength > maxNameLength) {
        throw new errors.ErrorDNSParse('Name exceeds 255 bytes');
      }
      labels.push(original.subarray(offset, offset + length));
      offset += length;
    } else {
      throw new errors.ErrorDNSParse(
        `Invalid label length 0x${length.toString(16)}`,
      );
    }
  }
  endOffset ??= offset;
  return {
    data: labels.map(decodeText).join('.'),
    remainder: original.subarray(endOffset),
  };
}

function toLabelKey(labels: Array<string>): string {
  // Only ASCII letters are folded
  return labels.join('.').replace(/[a-z]+/g, (s) => s.toUpperCase());
}

/**
 * Generates the label encoding of a name written at `offset` of the packet.
 * When a pointer table is given, the longest suffix already in it is
 * replaced by a pointer and every newly written suffix is recorded.
 */
function generateLabels(
  name: string,
  offset: number = 0,
  labelPointers?: LabelPointerTable,
): Uint8Array {
  const trimmed = name.endsWith('.') ? name.slice(0, -1) : name;
  const labels = trimmed === '' ? [] : trimmed.split('.');
  const encoder = new TextEncoder();
  const encodedLabels = labels.map((label) => encoder.encode(label));
  let nameLength = 0;
  for (const label of encodedLabels) {
    if (label.length === 0) {
      throw new errors.ErrorDNSGenerate(`Name ${name} has an empty label`);
    }
    if (label.length > maxLabelLength) {
      throw new errors.ErrorDNSGenerate(
        `Label of ${label.length} bytes exceeds ${maxLabelLength}`,
        { data: { name } },
      );
    }
    nameLength += label.length + 1;
  }
  if (nameLength > maxNameLength) {
    throw new errors.ErrorDNSGenerate(`Name exceeds ${maxNameLength} bytes`, {
      data: { name, nameLength },
    });
  }
  const parts: Array<Uint8Array> = [];
  let written = 0;
  for (let i = 0; i < encodedLabels.length; i++) {
    if (labelPointers != null) {
      const key = toLabelKey([...labels.slice(i), '']);
      const pointer = labelPointers.get(key);
      if (pointer !== undefined) {
        parts.push(encodeUInt16BE(0xc000 | pointer));
        return concatUInt8Array(...parts);
      }
      const candidate = offset + written;
      if (candidate <= maxPointerOffset) {
        labelPointers.set(key, candidate);
      }
    }
    const label = encodedLabels[i];
    parts.push(encodeUInt8(label.length), label);
    written += label.length + 1;
  }
  parts.push(encodeUInt8(0));
  return concatUInt8Array(...parts);
}

function parseStrings(rdata: Uint8Array): Array<string> {
  const strings: Array<string> = [];
  let offset = 0;
  while (offset < rdata.length) {
    const length = rdata[offset];
    if (offset + 1 + length > rdata.length) {
      throw new errors.ErrorDNSParse('Character string is truncated', {
        data: { offset, length },
      });
    }
    strings.push(decodeText(rdata.subarray(offset + 1, offset + 1 + length)));
    offset += 1 + length;
  }
  return strings;
}

function generateStrings(strings: Array<string>): Uint8Array {
  const encoder = new TextEncoder();
  const parts: Array<Uint8Array> = [];
  for (const s of strings) {
    const encoded = encoder.encode(s);
    if (encoded.length > 0xff) {
      throw new errors.ErrorDNSGenerate(
        `Character string of ${encoded.length} bytes exceeds 255`,
      );
    }
    parts.push(encodeUInt8(encoded.length), encoded);
  }
  return concatUInt8Array(...parts);
}

function parseAddress(
  rdata: Uint8Array,
  type: RType.A | RType.AAAA,
): string {
  const length = type === RType.A ? 4 : 16;
  if (rdata.length !== length) {
    throw new errors.ErrorDNSParse(
      `${RType[type]} record data must be ${length} bytes`,
      { data: { rdlength: rdata.length } },
    );
  }
  return type === RType.A ? parseIPv4(rdata) : parseIPv6(rdata);
}

function createNameCodec(type: RType) {
  return {
    parse: (rdata: Uint8Array, original: Uint8Array): string => {
      const name = parseLabels(rdata, original);
      assertRDataEnd(rdataAfter(rdata, name.remainder), type);
      return name.data;
    },
    generate: generateLabels,
  };
}

const recordDataCodecs: RecordDataCodecs = {
  [RType.A]: {
    parse: (rdata) => parseAddress(rdata, RType.A),
    generate: (data) => generateIPv4(data),
  },
  [RType.NS]: createNameCodec(RType.NS),
  [RType.CNAME]: createNameCodec(RType.CNAME),
  [RType.SOA]: {
    parse: (rdata, original) => {
      const mname = parseLabels(rdata, original);
      const rname = parseLabels(rdataAfter(rdata, mname.remainder), original);
      const fields = soaFields.parse(rdataAfter(rdata, rname.remainder));
      assertRDataEnd(fields.remainder, RType.SOA);
      return {
        mname: mname.data,
        rname: rname.data,
        ...fields.data,
      };
    },
    generate: (data, offset, labelPointers) => {
      const mname = generateLabels(data.mname, offset, labelPointers);
      const rname = generateLabels(
        data.rname,
        offset + mname.length,
        labelPointers,
      );
      return concatUInt8Array(mname, rname, soaFields.generate(data));
    },
  },
  [RType.NULL]: {
    parse: (rdata) => rdata.slice(),
    generate: (data) => data,
  },
  [RType.PTR]: createNameCodec(RType.PTR),
  [RType.HINFO]: {
    parse: parseStrings,
    generate: generateStrings,
  },
  [RType.MX]: {
    parse: (rdata, original) => {
      const fields = mxFields.parse(rdata);
      const exchange = parseLabels(fields.remainder, original);
      assertRDataEnd(rdataAfter(rdata, exchange.remainder), RType.MX);
      return {
        preference: fields.data.preference,
        exchange: exchange.data,
      };
    },
    generate: (data, offset, labelPointers) =>
      concatUInt8Array(
        mxFields.generate(data),
        generateLabels(data.exchange, offset + mxFields.size, labelPointers),
      ),
  },
  [RType.TXT]: {
    parse: parseStrings,
    generate: generateStrings,
  },
  [RType.AAAA]: {
    parse: (rdata) => parseAddress(rdata, RType.AAAA),
    generate: (data) => generateIPv6(data),
  },
  [RType.SRV]: {
    parse: (rdata, original) => {
      const fields = srvFields.parse(rdata);
      const target = parseLabels(fields.remainder, original);
      assertRDataEnd(rdataAfter(rdata, target.remainder), RType.SRV);
      return {
        ...fields.data,
        target: target.data,
      };
    },
    generate: (data, offset, labelPointers) =>
      concatUInt8Array(
        srvFields.generate(data),
        generateLabels(data.target, offset + srvFields.size, labelPointers),
      ),
  },
  [RType.OPT]: {
    parse: (rdata) => rdata.slice(),
    generate: (data) => data,
  },
};

function parseRecordData<T extends RType>(
  type: T,
  rdata: Uint8Array,
  original: Uint8Array,
): RecordDataMap[T] {
  return recordDataCodecs[type].parse(rdata, original);
}

function generateRecordData<T extends RType>(
  record: ResourceRecordOf<T>,
  offset: number,
  labelPointers?: LabelPointerTable,
): Uint8Array {
  const codec = recordDataCodecs[record.type];
  if (codec == null) {
    throw new errors.ErrorDNSGenerate(
      `Unsupported record type ${record.type}`,
    );
  }
  return codec.generate(record.data, offset, labelPointers);
}

function createRecord<T extends RType>(
  name: string,
  type: T,
  rclass: number,
  ttl: number,
  data: RecordDataMap[T],
): ResourceRecordOf<T> {
  return { name, type, class: rclass, ttl, data };
}

function parsePacketFlags(input: Uint8Array): Parsed<PacketFlags> {
  if (input.length < 2) {
    throw new errors.ErrorDNSParse('Packet flags are too short');
  }
  const dv = new DataView(input.buffer, input.byteOffset, 2);
  return {
    data: createPacketFlags(dv.getUint16(0, false)),
    remainder: input.subarray(2),
  };
}

function generatePacketFlags(flags: PacketFlags): Uint8Array {
  return encodeUInt16BE(flags.value);
}

function parsePacketHeader(input: Uint8Array): Parsed<PacketHeader> {
  const { data, remainder } = packetHeaderFields.parse(input);
  return {
    data: {
      ...data,
      flags: createPacketFlags(data.flags),
    },
    remainder,
  };
}

function generatePacketHeader(header: PacketHeader): Uint8Array {
  return packetHeaderFields.generate({
    ...header,
    flags: header.flags.value,
  });
}

function parseQuestionRecord(
  input: Uint8Array,
  original: Uint8Array,
): Parsed<QuestionRecord> {
  const name = parseLabels(input, original);
  const fields = questionFields.parse(name.remainder);
  return {
    data: {
      name: name.data,
      type: fields.data.type,
      class: fields.data.class,
    },
    remainder: fields.remainder,
  };
}

function parseQuestionRecords(
  input: Uint8Array,
  original: Uint8Array,
  count: number,
): Parsed<Array<QuestionRecord>> {
  const questions: Array<QuestionRecord> = [];
  for (let i = 0; i < count; i++) {
    const question = parseQuestionRecord(input, original);
    questions.push(question.data);
    input = question.remainder;
  }
  return { data: questions, remainder: input };
}

function generateQuestionRecord(
  question: QuestionRecord,
  offset: number = 0,
  labelPointers?: LabelPointerTable,
): Uint8Array {
  return concatUInt8Array(
    generateLabels(question.name, offset, labelPointers),
    questionFields.generate(question),
  );
}

function parseResourceRecord(
  input: Uint8Array,
  original: Uint8Array,
): Parsed<ResourceRecord> {
  const name = parseLabels(input, original);
  const fields = resourceRecordFields.parse(name.remainder);
  const { type, class: rclass, ttl, rdlength } = fields.data;
  if (fields.remainder.length < rdlength) {
    throw new errors.ErrorDNSParse('Record data is truncated', {
      data: { rdlength, length: fields.remainder.length },
    });
  }
  if (!isRType(type)) {
    throw new errors.ErrorDNSParse(`Unsupported record type ${type}`, {
      data: { type },
    });
  }
  const rdata = fields.remainder.subarray(0, rdlength);
  const record: ResourceRecord = createRecord(
    name.data,
    type,
    rclass,
    ttl,
    parseRecordData(type, rdata, original),
  );
  return {
    data: record,
    remainder: fields.remainder.subarray(rdlength),
  };
}

function parseResourceRecords(
  input: Uint8Array,
  original: Uint8Array,
  count: number,
): Parsed<Array<ResourceRecord>> {
  const records: Array<ResourceRecord> = [];
  for (let i = 0; i < count; i++) {
    const record = parseResourceRecord(input, original);
    records.push(record.data);
    input = record.remainder;
  }
  return { data: records, remainder: input };
}

function generateResourceRecord(
  record: ResourceRecord,
  offset: number = 0,
  labelPointers?: LabelPointerTable,
): Uint8Array {
  const name = generateLabels(record.name, offset, labelPointers);
  const rdata = generateRecordData(
    record,
    offset + name.length + resourceRecordFields.size,
    labelPointers,
  );
  return concatUInt8Array(
    name,
    resourceRecordFields.generate({
      type: record.type,
      class: record.class,
      ttl: record.ttl,
      rdlength: rdata.length,
    }),
    rdata,
  );
}

/**
 * Parses a whole packet.
 * Exactly the number of records the header announces are read from each
 * section, trailing bytes are left in the remainder.
 */
function parsePacket(input: Uint8Array): Parsed<Packet> {
  const original = input;
  const header = parsePacketHeader(input);
  const questions = parseQuestionRecords(
    header.remainder,
    original,
    header.data.qdcount,
  );
  const answers = parseResourceRecords(
    questions.remainder,
    original,
    header.data.ancount,
  );
  const authorities = parseResourceRecords(
    answers.remainder,
    original,
    header.data.nscount,
  );
  const additionals = parseResourceRecords(
    authorities.remainder,
    original,
    header.data.arcount,
  );
  return {
    data: {
      id: header.data.id,
      flags: header.data.flags,
      questions: questions.data,
      answers: answers.data,
      authorities: authorities.data,
      additionals: additionals.data,
    },
    remainder: additionals.remainder,
  };
}

/**
 * Generates a packet, the header counts are derived from the sections.
 * Compression state never outlives a single call.
 */
function generatePacket(
  packet: Packet,
  { compression = true }: GeneratePacketOptions = {},
): Uint8Array {
  const labelPointers: LabelPointerTable | undefined = compression
    ? new Map()
    : undefined;
  const parts: Array<Uint8Array> = [
    generatePacketHeader({
      id: packet.id,
      flags: packet.flags,
      qdcount: packet.questions.length,
      ancount: packet.answers.length,
      nscount: packet.authorities.length,
      arcount: packet.additionals.length,
    }),
  ];
  let offset = packetHeaderFields.size;
  for (const question of packet.questions) {
    const encoded = generateQuestionRecord(question, offset, labelPointers);
    parts.push(encoded);
    offset += encoded.length;
  }
  for (const record of [
    ...packet.answers,
    ...packet.authorities,
    ...packet.additionals,
  ]) {
    const encoded = generateResourceRecord(record, offset, labelPointers);
    parts.push(encoded);
    offset += encoded.length;
  }
  return concatUInt8Array(...parts);
}

export {
  PacketType,
  PacketOpCode,
  RCode,
  RType,
  QType,
  RClass,
  QClass,
  packetFlagsLayout,
  defaultPacketFlags,
  createPacketFlags,
  createPacket,
  isRType,
  parseLabels,
  generateLabels,
  parseStrings,
  generateStrings,
  parseRecordData,
  generateRecordData,
  parsePacketFlags,
  generatePacketFlags,
  parsePacketHeader,
  generatePacketHeader,
  parseQuestionRecord,
  parseQuestionRecords,
  generateQuestionRecord,
  parseResourceRecord,
  parseResourceRecords,
  generateResourceRecord,
  parsePacket,
  generatePacket,
};
