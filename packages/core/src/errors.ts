// morphseg/errors - Errors raised by the segmentation layer

export type AnalyzerBackend = 'mecab' | 'jieba';

/**
 * An external analyzer could not produce morphemes (missing executable,
 * crashed process, unreadable output). Raised from `segment()` and never
 * swallowed there.
 */
export class AnalyzerError extends Error {
  constructor(public backend: AnalyzerBackend, message: string, options?: { cause?: unknown }) {
    super(`${backend}: ${message}`, options);
    this.name = 'AnalyzerError';
  }
}

export class UnknownMorphemizerError extends Error {
  constructor(public morphemizer: string) {
    super(`Unknown morphemizer: ${morphemizer}`);
    this.name = 'UnknownMorphemizerError';
  }
}
