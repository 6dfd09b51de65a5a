import {
  GTPv2MessageType,
  IEv1Type,
  IEv2Type,
  getGTPv1MessageName,
  getGTPv2MessageName,
  getIEv1Name,
  getIEv2Name,
} from '@/gtp';

describe('names', () => {
  test('message names', () => {
    expect(getGTPv1MessageName(1)).toBe('Echo Request');
    expect(getGTPv1MessageName(255)).toBe('G-PDU');
    expect(getGTPv2MessageName(GTPv2MessageType.CREATE_SESSION_REQUEST)).toBe(
      'Create Session Request',
    );
  });
  test('IE names', () => {
    expect(getIEv1Name(IEv1Type.RECOVERY)).toBe('Recovery');
    expect(getIEv1Name(IEv1Type.APN)).toBe('Access Point Name');
    expect(getIEv2Name(IEv2Type.F_TEID)).toBe('F-TEID');
    expect(getIEv2Name(IEv2Type.BEARER_CONTEXT)).toBe('Bearer Context');
  });
  test('unknown codes', () => {
    expect(getGTPv2MessageName(254)).toBeUndefined();
    expect(getIEv2Name(254)).toBeUndefined();
    expect(getIEv1Name(32)).toBeUndefined();
  });
});
