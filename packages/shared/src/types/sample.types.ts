export type ScreenRegion = {
  x: number;
  y: number;
  width: number;
  height: number;
};

export type ScreenPoint = { x: number; y: number };

/**
 * How the generated depth map is expected to look.
 * "grayscale" is a single-channel map, "colormap" a 3-channel false-colour one.
 */
export type DepthMode = "grayscale" | "colormap";

export type Sample = {
  readonly id: string;
  readonly imagePath: string;
  readonly groundTruthPath?: string;
  readonly templateId: string;
};

export type PromptExample = {
  imagePath: string;
  depthPath: string;
};

// Opaque to the pipeline: the text is pasted as-is, examples are pasted before it.
export type PromptBundle = {
  templateId: string;
  text: string;
  examples: PromptExample[];
};
