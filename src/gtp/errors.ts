import { ErrorCodecGenerate, ErrorCodecParse } from '../errors';

class ErrorGTPParse<T> extends ErrorCodecParse<T> {
  static description = 'GTP message parse error';
}

class ErrorGTPGenerate<T> extends ErrorCodecGenerate<T> {
  static description = 'GTP message generation error';
}

class ErrorGTPFTEIDAddress<T> extends ErrorGTPGenerate<T> {
  static description = 'F-TEID requires an IPv4 or IPv6 address';
}

export { ErrorGTPParse, ErrorGTPGenerate, ErrorGTPFTEIDAddress };
