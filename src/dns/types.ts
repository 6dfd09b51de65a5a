import type { QClass, QType } from './utils';
import type BitFlags from '../fields/BitFlags';
import { RType } from './utils';

type PacketFlagName =
  | 'qr'
  | 'opcode'
  | 'aa'
  | 'tc'
  | 'rd'
  | 'ra'
  | 'z'
  | 'ad'
  | 'cd'
  | 'rcode';

/**
 * View over the 16 bit flags word of the header
 */
type PacketFlags = BitFlags<PacketFlagName>;

type Packet = {
  id: number;
  flags: PacketFlags;
  questions: Array<QuestionRecord>;
  answers: Array<ResourceRecord>;
  authorities: Array<ResourceRecord>;
  additionals: Array<ResourceRecord>;
};

type PacketHeader = {
  id: number;
  flags: PacketFlags;
  qdcount: number; // Question
  ancount: number; // Answer
  nscount: number; // Authority
  arcount: number; // Additional
};

type QuestionRecord = {
  name: string;
  type: QType;
  class: QClass;
};

type SOARecordValue = {
  mname: string;
  rname: string;
  serial: number;
  refresh: number;
  retry: number;
  expire: number;
  minimum: number;
};

type MXRecordValue = {
  preference: number;
  exchange: string;
};

type SRVRecordValue = {
  priority: number;
  weight: number;
  port: number;
  target: string;
};

/**
 * Decoded rdata for each supported record type
 */
type RecordDataMap = {
  [RType.A]: string;
  [RType.NS]: string;
  [RType.CNAME]: string;
  [RType.SOA]: SOARecordValue;
  [RType.NULL]: Uint8Array;
  [RType.PTR]: string;
  [RType.HINFO]: Array<string>;
  [RType.MX]: MXRecordValue;
  [RType.TXT]: Array<string>;
  [RType.AAAA]: string;
  [RType.SRV]: SRVRecordValue;
  // RFC 6891 OPT options are carried uninterpreted
  [RType.OPT]: Uint8Array;
};

type BaseResourceRecord<T, D> = {
  name: string;
  type: T;
  // OPT reuses the class as the requestor's UDP payload size
  class: number;
  // OPT reuses the ttl as the extended RCODE and flags
  ttl: number;
  data: D;
};

type ResourceRecordOf<T extends RType> = {
  [P in T]: BaseResourceRecord<P, RecordDataMap[P]>;
}[T];

type ResourceRecord = ResourceRecordOf<RType>;

type StringRecord = ResourceRecordOf<
  RType.A | RType.AAAA | RType.NS | RType.CNAME | RType.PTR
>;

type TextRecord = ResourceRecordOf<RType.TXT | RType.HINFO>;

type SOARecord = ResourceRecordOf<RType.SOA>;

type MXRecord = ResourceRecordOf<RType.MX>;

type SRVRecord = ResourceRecordOf<RType.SRV>;

type NULLRecord = ResourceRecordOf<RType.NULL>;

type OPTRecord = ResourceRecordOf<RType.OPT>;

/**
 * Uppercased dot-joined label suffix to the offset it was first written at.
 * Lives for exactly one packet generation.
 */
type LabelPointerTable = Map<string, number>;

type RecordDataCodec<D> = {
  parse(rdata: Uint8Array, original: Uint8Array): D;
  generate(
    data: D,
    offset: number,
    labelPointers?: LabelPointerTable,
  ): Uint8Array;
};

type RecordDataCodecs = {
  [T in RType]: RecordDataCodec<RecordDataMap[T]>;
};

type GeneratePacketOptions = {
  /**
   * Share name suffixes through compression pointers
   */
  compression?: boolean;
};

export type {
  PacketFlagName,
  PacketFlags,
  Packet,
  PacketHeader,
  QuestionRecord,
  SOARecordValue,
  MXRecordValue,
  SRVRecordValue,
  RecordDataMap,
  BaseResourceRecord,
  ResourceRecordOf,
  ResourceRecord,
  StringRecord,
  TextRecord,
  SOARecord,
  MXRecord,
  SRVRecord,
  NULLRecord,
  OPTRecord,
  LabelPointerTable,
  RecordDataCodec,
  RecordDataCodecs,
  GeneratePacketOptions,
};
