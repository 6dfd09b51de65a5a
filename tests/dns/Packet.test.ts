import type { Packet } from '@/dns';
import * as dnsPacket from 'dns-packet';
import {
  PacketOpCode,
  PacketType,
  QClass,
  QType,
  RClass,
  RCode,
  RType,
  createPacket,
  createPacketFlags,
  generatePacket,
  parsePacket,
} from '@/dns';
import * as dnsErrors from '@/dns/errors';
import { toHex } from '@/utils';

// Response for www.google.com with every answer name pointing at the question
const googleResponse = new Uint8Array([
  // Header
  0x12,
  0x34, // ID
  0x81,
  0x80, // Flags: Response, Recursion Desired, Recursion Available
  0x00,
  0x01, // Question count
  0x00,
  0x03, // Answer count
  0x00,
  0x00, // Authority count
  0x00,
  0x00, // Additional count

  // Question
  0x03,
  0x77,
  0x77,
  0x77,
  0x06,
  0x67,
  0x6f,
  0x6f,
  0x67,
  0x6c,
  0x65,
  0x03,
  0x63,
  0x6f,
  0x6d,
  0x00, // www.google.com
  0x00,
  0x01, // Type: A
  0x00,
  0x01, // Class: IN

  // Answer
  0xc0,
  0x0c, // Name pointer to the question name
  0x00,
  0x01, // Type: A
  0x00,
  0x01, // Class: IN
  0x00,
  0x00,
  0x01,
  0x2c, // TTL: 300
  0x00,
  0x04, // Data length
  0x8e,
  0xfa,
  0x41,
  0x44, // 142.250.65.68

  // Answer
  0xc0,
  0x0c,
  0x00,
  0x1c, // Type: AAAA
  0x00,
  0x01,
  0x00,
  0x00,
  0x01,
  0x2c,
  0x00,
  0x10,
  0x26,
  0x07,
  0xf8,
  0xb0,
  0x40,
  0x06,
  0x08,
  0x0f,
  0x00,
  0x00,
  0x00,
  0x00,
  0x00,
  0x00,
  0x20,
  0x04, // 2607:f8b0:4006:80f::2004

  // Answer
  0xc0,
  0x0c,
  0x00,
  0x10, // Type: TXT
  0x00,
  0x01,
  0x00,
  0x00,
  0x01,
  0x2c,
  0x00,
  0x06,
  0x05,
  0x68,
  0x65,
  0x6c,
  0x6c,
  0x6f, // hello
]);

describe('Packet', () => {
  test('parse www.google.com response', () => {
    expect(googleResponse.length).toBe(94);
    const { data: packet, remainder } = parsePacket(googleResponse);
    expect(remainder.length).toBe(0);
    expect(packet.id).toBe(0x1234);
    expect(packet.flags.get('qr')).toBe(PacketType.RESPONSE);
    expect(packet.flags.get('opcode')).toBe(PacketOpCode.QUERY);
    expect(packet.flags.get('rcode')).toBe(RCode.NoError);
    expect(packet.questions).toEqual([
      { name: 'www.google.com', type: QType.A, class: QClass.IN },
    ]);
    expect(packet.answers).toEqual([
      {
        name: 'www.google.com',
        type: RType.A,
        class: RClass.IN,
        ttl: 300,
        data: '142.250.65.68',
      },
      {
        name: 'www.google.com',
        type: RType.AAAA,
        class: RClass.IN,
        ttl: 300,
        data: '2607:f8b0:4006:80f::2004',
      },
      {
        name: 'www.google.com',
        type: RType.TXT,
        class: RClass.IN,
        ttl: 300,
        data: ['hello'],
      },
    ]);
    expect(packet.authorities).toEqual([]);
    expect(packet.additionals).toEqual([]);
  });
  test('generate www.google.com response byte for byte', () => {
    const { data: packet } = parsePacket(googleResponse);
    expect(toHex(generatePacket(packet))).toBe(toHex(googleResponse));
  });
  test('generate without compression', () => {
    const { data: packet } = parsePacket(googleResponse);
    const generated = generatePacket(packet, { compression: false });
    // Each answer name is written out in full instead of a 2 byte pointer
    expect(generated.length).toBe(94 + 3 * 14);
    expect(parsePacket(generated).data).toEqual(packet);
  });
  test('compression state does not leak between packets', () => {
    const { data: packet } = parsePacket(googleResponse);
    const first = generatePacket(packet);
    const second = generatePacket(packet);
    expect(toHex(second)).toBe(toHex(first));
  });
  test('truncated packet', () => {
    expect(() => parsePacket(googleResponse.subarray(0, 93))).toThrow(
      dnsErrors.ErrorDNSParse,
    );
  });
  test('trailing bytes are left in the remainder', () => {
    const padded = new Uint8Array([...googleResponse, 0xde, 0xad]);
    expect([...parsePacket(padded).remainder]).toEqual([0xde, 0xad]);
  });
  test('create packet defaults', () => {
    const packet = createPacket();
    expect(packet.id).toBe(0);
    expect(packet.flags.value).toBe(0x0100);
    expect(toHex(generatePacket(packet))).toBe('000001000000000000000000');
  });
  test('PTR response round trip', () => {
    const packet = createPacket({
      id: 7,
      flags: createPacketFlags({ qr: 1, aa: 1, rd: 1 }),
      questions: [
        { name: '1.2.0.192.in-addr.arpa', type: QType.PTR, class: QClass.IN },
      ],
      answers: [
        {
          name: '1.2.0.192.in-addr.arpa',
          type: RType.PTR,
          class: RClass.IN,
          ttl: 3600,
          data: 'host.example.com',
        },
      ],
    });
    const generated = generatePacket(packet);
    // Header, question and answer with a pointer name and uncompressed data
    expect(generated.length).toBe(12 + 28 + 12 + 18);
    expect(parsePacket(generated).data).toEqual(packet);
  });
  test('EDNS0 query', () => {
    const packet = createPacket({
      id: 0x8d6e,
      flags: createPacketFlags(0x0110),
      questions: [{ name: 'example.com', type: QType.A, class: QClass.IN }],
      additionals: [
        {
          name: '',
          type: RType.OPT,
          class: 4096,
          ttl: 0x8000,
          data: new Uint8Array(),
        },
      ],
    });
    const generated = generatePacket(packet);
    expect(toHex(generated.subarray(0, 12))).toBe('8d6e01100001000000000001');
    expect(toHex(generated.subarray(generated.length - 11))).toBe(
      '0000291000000080000000',
    );
    expect(parsePacket(generated).data).toEqual(packet);
  });
  test('NULL record carries opaque bytes', () => {
    const packet: Packet = createPacket({
      answers: [
        {
          name: 'example.com',
          type: RType.NULL,
          class: RClass.IN,
          ttl: 0,
          data: new Uint8Array([0xca, 0xfe, 0x00]),
        },
      ],
    });
    const [answer] = parsePacket(generatePacket(packet)).data.answers;
    expect(answer.type).toBe(RType.NULL);
    if (answer.type !== RType.NULL) return;
    expect(toHex(answer.data)).toBe('cafe00');
  });
  test('generated packets decode with an independent decoder', () => {
    const packet = createPacket({
      id: 42,
      flags: createPacketFlags({ qr: 1, rd: 1, ra: 1 }),
      questions: [{ name: 'example.com', type: QType.A, class: QClass.IN }],
      answers: [
        {
          name: 'example.com',
          type: RType.A,
          class: RClass.IN,
          ttl: 60,
          data: '192.0.2.1',
        },
        {
          name: 'www.example.com',
          type: RType.CNAME,
          class: RClass.IN,
          ttl: 60,
          data: 'example.com',
        },
      ],
    });
    const decoded = dnsPacket.decode(Buffer.from(generatePacket(packet)));
    expect(decoded.id).toBe(42);
    expect(decoded.type).toBe('response');
    expect(decoded.questions?.[0].name).toBe('example.com');
    const [a, cname] = decoded.answers ?? [];
    if (a?.type !== 'A' || cname?.type !== 'CNAME') {
      throw new Error('Unexpected answer types');
    }
    expect(a.name).toBe('example.com');
    expect(a.ttl).toBe(60);
    expect(a.data).toBe('192.0.2.1');
    expect(cname.name).toBe('www.example.com');
    expect(cname.data).toBe('example.com');
  });
  test('packets from an independent encoder parse', () => {
    const encoded = dnsPacket.encode({
      type: 'query',
      id: 99,
      flags: dnsPacket.RECURSION_DESIRED,
      questions: [{ type: 'MX', name: 'example.org' }],
    });
    const { data: packet } = parsePacket(new Uint8Array(encoded));
    expect(packet.id).toBe(99);
    expect(packet.flags.get('rd')).toBe(1);
    expect(packet.flags.get('qr')).toBe(0);
    expect(packet.questions).toEqual([
      { name: 'example.org', type: QType.MX, class: QClass.IN },
    ]);
  });
});
