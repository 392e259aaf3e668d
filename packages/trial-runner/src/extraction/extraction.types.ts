import type {
  ClipboardPayload,
  DepthMode,
  RawFrame,
} from '@depth-trials/shared';

export type ExtractionFailureReason =
  | 'wrong-type'
  | 'empty'
  | 'zero-size'
  | 'decode-error'
  | 'channel-mismatch';

export type ExtractionSource =
  | { from: 'clipboard'; payload: ClipboardPayload }
  | { from: 'region'; frame: RawFrame };

export interface ExtractionRequest {
  source: ExtractionSource;
  mode: DepthMode;
}
