import { AbstractError } from '@matrixai/errors';

class ErrorCodec<T> extends AbstractError<T> {
  static description = 'Codec error';
}

class ErrorCodecParse<T> extends ErrorCodec<T> {
  static description = 'Codec parse error';
}

class ErrorCodecNeedData<T> extends ErrorCodecParse<T> {
  static description = 'Input is shorter than a required field';
}

class ErrorCodecGenerate<T> extends ErrorCodec<T> {
  static description = 'Codec generation error';
}

export { ErrorCodec, ErrorCodecParse, ErrorCodecNeedData, ErrorCodecGenerate };
