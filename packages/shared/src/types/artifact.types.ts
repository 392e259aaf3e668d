import { DepthMode } from "./sample.types";
import { TrialRecord } from "./trial.types";

export type ArtifactSource = "clipboard" | "region";

export type ClipboardPayload =
  | { kind: "image"; data: Buffer; hash: string }
  | { kind: "text"; text: string; hash: string }
  | { kind: "empty"; hash: string };

export type ClipboardWrite =
  | { kind: "image"; data: Buffer }
  | { kind: "text"; text: string };

/**
 * Pixels grabbed from the response pane, always in RGB(A) order.
 */
export type RawFrame = {
  data: Buffer;
  width: number;
  height: number;
  channels: number;
};

export type CapturedArtifact = {
  // PNG-encoded
  data: Buffer;
  width: number;
  height: number;
  channels: number;
  mode: DepthMode;
  source: ArtifactSource;
  valid: boolean;
};

export type ArtifactInfo = {
  file: string;
  width: number;
  height: number;
  channels: number;
  mode: DepthMode;
  source: ArtifactSource;
};

export type ResultMetadata = {
  sampleId: string;
  outcome: "succeeded";
  attempts: number;
  startedAt: string;
  endedAt: string;
  imagePath: string;
  groundTruthPath?: string;
  templateId: string;
  artifact: ArtifactInfo;
  // Chat text reply stored beside the metadata, when one was seen
  responseFile?: string;
  trials: TrialRecord[];
};

export type FailureMetadata = {
  sampleId: string;
  outcome: "failed";
  attempts: number;
  startedAt: string;
  endedAt: string;
  imagePath: string;
  groundTruthPath?: string;
  templateId: string;
  failureReason: string;
  responseFile?: string;
  trials: TrialRecord[];
};
