import type {
  ClipboardPayload,
  ClipboardWrite,
} from '@depth-trials/shared';

export const CLIPBOARD_BRIDGE = Symbol('CLIPBOARD_BRIDGE');
export const CLIPBOARD_BACKEND = Symbol('CLIPBOARD_BACKEND');

export type ClipboardChange =
  | { changed: true; payload: ClipboardPayload }
  | { changed: false; reason: 'timeout' };

/**
 * Tagged read/write access to the shared OS clipboard.
 */
export interface ClipboardBridge {
  set(payload: ClipboardWrite): Promise<void>;
  get(): Promise<ClipboardPayload>;
  waitForChange(
    baselineHash: string,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<ClipboardChange>;
}

/**
 * Platform-specific clipboard access. Reads return null when the clipboard
 * holds nothing of the requested type.
 */
export interface ClipboardBackend {
  readonly name: string;
  checkAvailable(): Promise<void>;
  readImage(): Promise<Buffer | null>;
  readText(): Promise<string | null>;
  writeText(text: string): Promise<void>;
  writeImage(png: Buffer): Promise<void>;
}
