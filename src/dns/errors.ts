import { ErrorCodecGenerate, ErrorCodecParse } from '../errors';

class ErrorDNSParse<T> extends ErrorCodecParse<T> {
  static description = 'DNS Packet parse error';
}

class ErrorDNSGenerate<T> extends ErrorCodecGenerate<T> {
  static description = 'DNS Packet generation error';
}

export { ErrorDNSParse, ErrorDNSGenerate };
