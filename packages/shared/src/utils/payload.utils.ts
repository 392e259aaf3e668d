import { ClipboardPayload } from "../types/artifact.types";

type PayloadOf<K extends ClipboardPayload["kind"]> = Extract<
  ClipboardPayload,
  { kind: K }
>;

/**
 * Type guard factory for clipboard payloads
 */
function createPayloadGuard<K extends ClipboardPayload["kind"]>(
  kind: K,
): (payload: ClipboardPayload) => payload is PayloadOf<K> {
  return (payload: ClipboardPayload): payload is PayloadOf<K> =>
    payload.kind === kind;
}

export const isImagePayload = createPayloadGuard("image");
export const isTextPayload = createPayloadGuard("text");
export const isEmptyPayload = createPayloadGuard("empty");

export function describePayload(payload: ClipboardPayload): string {
  switch (payload.kind) {
    case "image":
      return `image (${payload.data.length} bytes)`;
    case "text":
      return `text (${payload.text.length} chars)`;
    case "empty":
      return "empty";
  }
}
