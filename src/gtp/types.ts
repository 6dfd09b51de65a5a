import type BitFlags from '../fields/BitFlags';
import type { FTEIDInterface } from './fteid';

type GTPv1FlagName =
  | 'version'
  | 'protocolType'
  | 'extension'
  | 'sequence'
  | 'npdu'
  | 'additionalFields';

type GTPv2FlagName = 'version' | 'piggyback' | 'teid';

type GTPv1Flags = BitFlags<GTPv1FlagName>;

type GTPv2Flags = BitFlags<GTPv2FlagName>;

/**
 * GTPv1 information element.
 * Types below 0x80 are TV encoded and their length comes from the TV length
 * table, the rest are TLV encoded.
 */
type IEv1 = {
  type: number;
  data: Uint8Array;
};

type IEv2 = {
  type: number;
  crFlag: number; // 4 bits
  instance: number; // 4 bits
  data: Uint8Array;
};

type ExtensionHeader = {
  type: number;
  content: Uint8Array;
};

type GTPv1Message = {
  flags: GTPv1Flags;
  type: number;
  teid: number;
  sequenceNumber: number;
  npduNumber: number;
  nextExtensionType: number;
  extensionHeaders: Array<ExtensionHeader>;
  ies: Array<IEv1>;
};

type GTPv2Message = {
  flags: GTPv2Flags;
  type: number;
  // Present exactly when the TEID flag is set
  teid?: number;
  sequenceNumber: number;
  priority: number;
  ies: Array<IEv2>;
};

type GTPMessage =
  | { version: 1; message: GTPv1Message }
  | { version: 2; message: GTPv2Message };

/**
 * GTPv1 TV type to its fixed value length
 */
type TVLengthTable = ReadonlyMap<number, number>;

type FTEID = {
  interfaceType: FTEIDInterface;
  teid: number;
  ipv4?: string;
  ipv6?: string;
};

type AMBR = {
  uplink: number; // Kbps
  downlink: number; // Kbps
};

type BearerQoS = {
  pci: number;
  pl: number;
  pvi: number;
  qci: number;
  mbrUplink: number;
  mbrDownlink: number;
  gbrUplink: number;
  gbrDownlink: number;
};

export type {
  GTPv1FlagName,
  GTPv2FlagName,
  GTPv1Flags,
  GTPv2Flags,
  IEv1,
  IEv2,
  ExtensionHeader,
  GTPv1Message,
  GTPv2Message,
  GTPMessage,
  TVLengthTable,
  FTEID,
  AMBR,
  BearerQoS,
};
