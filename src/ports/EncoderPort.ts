export type EncodeWindow = {
  startSec: number;
  /** Omitted to encode until the end of the input. */
  durationSec?: number;
};

export type EncodeRequest = {
  inputPath: string;
  outputPath: string;
  bitrateKbps: 320;
  window?: EncodeWindow;
  verbose?: boolean;
};

export type EncodeResult = {
  bytes: number;
  /** Duration read back from the encoded file, when it could be parsed. */
  durationSec?: number;
};

export interface EncoderPort {
  encode(request: EncodeRequest): Promise<EncodeResult>;
}
