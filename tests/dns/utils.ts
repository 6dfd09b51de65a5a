import type {
  BaseResourceRecord,
  Packet,
  QuestionRecord,
  RecordDataMap,
  ResourceRecord,
} from '@/dns';
import { fc } from '@fast-check/jest';
import { QClass, QType, RType, createPacketFlags } from '@/dns';
import { generateIPv6, parseIPv6 } from '@/utils';

const uint32Arb = fc.integer({ min: 0, max: 4294967295 }); // 32-Bit Unsigned Integer Limits
const uint16Arb = fc.integer({ min: 0, max: 65535 }); // 16-Bit Unsigned Integer Limits

// Long generated domains can exceed the 255 byte wire limit
const domainArb = fc.domain().filter((domain) => domain.length <= 253);

const packetFlagsArb = uint16Arb.map((value) => createPacketFlags(value));

const qTypeArb = fc.constantFrom(
  QType.A,
  QType.NS,
  QType.CNAME,
  QType.SOA,
  QType.PTR,
  QType.MX,
  QType.TXT,
  QType.AAAA,
  QType.SRV,
  QType.ANY,
);
const qClassArb = fc.constantFrom(QClass.IN, QClass.CHAOS, QClass.ANY);

const questionRecordArb: fc.Arbitrary<QuestionRecord> = fc.record({
  name: domainArb,
  type: qTypeArb,
  class: qClassArb,
});

function recordArb<T extends RType>(
  type: T,
  dataArb: fc.Arbitrary<RecordDataMap[T]>,
): fc.Arbitrary<BaseResourceRecord<T, RecordDataMap[T]>> {
  return fc
    .record({
      name: domainArb,
      class: uint16Arb,
      ttl: uint32Arb,
    })
    .chain((fields) => dataArb.map((data) => ({ ...fields, type, data })));
}

const aRecordArb = recordArb(RType.A, fc.ipV4());

const aaaaRecordArb = recordArb(
  RType.AAAA,
  // Filter out mapped ipv6 addresses
  fc
    .ipV6()
    .filter((ip) => ip.indexOf('.') === -1)
    .map((ip) => parseIPv6(generateIPv6(ip))),
);

const nameRecordArb = fc.oneof(
  recordArb(RType.NS, domainArb),
  recordArb(RType.CNAME, domainArb),
  recordArb(RType.PTR, domainArb),
);

const soaRecordArb = recordArb(
  RType.SOA,
  fc.record({
    mname: domainArb,
    rname: domainArb,
    serial: uint32Arb,
    refresh: uint32Arb,
    retry: uint32Arb,
    expire: uint32Arb,
    minimum: uint32Arb,
  }),
);

const mxRecordArb = recordArb(
  RType.MX,
  fc.record({
    preference: uint16Arb,
    exchange: domainArb,
  }),
);

const stringsArb = fc.array(fc.string({ maxLength: 64 }), { maxLength: 4 });

const textRecordArb = fc.oneof(
  recordArb(RType.TXT, stringsArb),
  recordArb(RType.HINFO, stringsArb),
);

const srvRecordArb = recordArb(
  RType.SRV,
  fc.record({
    priority: uint16Arb,
    weight: uint16Arb,
    port: uint16Arb,
    target: domainArb,
  }),
);

const nullRecordArb = recordArb(RType.NULL, fc.uint8Array({ maxLength: 64 }));

const optRecordArb = recordArb(RType.OPT, fc.uint8Array({ maxLength: 64 }));

const resourceRecordArb: fc.Arbitrary<ResourceRecord> = fc.oneof(
  aRecordArb,
  aaaaRecordArb,
  nameRecordArb,
  soaRecordArb,
  mxRecordArb,
  textRecordArb,
  srvRecordArb,
  nullRecordArb,
  optRecordArb,
);

const packetArb: fc.Arbitrary<Packet> = fc.record({
  id: uint16Arb,
  flags: packetFlagsArb,
  questions: fc.array(questionRecordArb, { maxLength: 4 }),
  answers: fc.array(resourceRecordArb, { maxLength: 4 }),
  authorities: fc.array(resourceRecordArb, { maxLength: 4 }),
  additionals: fc.array(resourceRecordArb, { maxLength: 4 }),
});

export {
  uint16Arb,
  uint32Arb,
  domainArb,
  packetFlagsArb,
  qTypeArb,
  qClassArb,
  questionRecordArb,
  aRecordArb,
  aaaaRecordArb,
  nameRecordArb,
  soaRecordArb,
  mxRecordArb,
  textRecordArb,
  srvRecordArb,
  nullRecordArb,
  optRecordArb,
  resourceRecordArb,
  packetArb,
};
