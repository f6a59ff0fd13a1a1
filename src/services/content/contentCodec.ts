import {
  ButtonAction,
  ButtonLayout,
  ContentButton,
  ContentPayload,
  MEDIA_KINDS,
  MediaKind,
  ProtocolButton,
  ProtocolMessage,
  SendDescriptor,
  StoredButton,
  StoredContent,
} from "@/types/content";

export const EMPTY_TEXT_PLACEHOLDER = "(no text)";
export const UNSUPPORTED_KIND_PLACEHOLDER = "(unsupported kind treated as text)";

const MEDIA_KIND_SET: ReadonlySet<string> = new Set(MEDIA_KINDS);

function isMediaKind(kind: string): kind is MediaKind {
  return MEDIA_KIND_SET.has(kind);
}

function nonEmpty(value?: string | null): value is string {
  return typeof value === "string" && value.length > 0;
}

function encodeButtonAction(button: ProtocolButton): ButtonAction {
  if (nonEmpty(button.url)) {
    return { type: "url", url: button.url };
  }

  if (nonEmpty(button.callbackData)) {
    return { type: "callback", data: button.callbackData };
  }

  if (nonEmpty(button.switchInlineQuery)) {
    return { type: "switch_inline", query: button.switchInlineQuery };
  }

  if (nonEmpty(button.switchInlineQueryCurrentChat)) {
    return { type: "switch_inline_current_chat", query: button.switchInlineQueryCurrentChat };
  }

  return { type: "placeholder" };
}

function encodeButtons(rows: ProtocolButton[][]): ButtonLayout {
  return rows.map((row) =>
    row.map((button) => ({
      label: button.text,
      action: encodeButtonAction(button),
    })),
  );
}

/**
 * Converts an adapter-level message into a storable payload. The first media
 * kind present in {@link MEDIA_KINDS} order wins.
 */
export function encodeContent(message: ProtocolMessage): ContentPayload {
  const payload: ContentPayload = { kind: "text" };

  const text = nonEmpty(message.text) ? message.text : message.caption;
  if (nonEmpty(text)) {
    payload.text = text;
  }

  const media = message.media ?? {};
  for (const kind of MEDIA_KINDS) {
    const mediaRef = media[kind];
    if (nonEmpty(mediaRef)) {
      payload.kind = kind;
      payload.mediaRef = mediaRef;
      break;
    }
  }

  if (message.buttons && message.buttons.length > 0) {
    payload.buttons = encodeButtons(message.buttons);
  }

  return payload;
}

function decodeButtonAction(action: StoredButton["action"]): ButtonAction {
  switch (action.type) {
    case "url":
      return nonEmpty(action.url) ? { type: "url", url: action.url } : { type: "placeholder" };
    case "callback":
      return nonEmpty(action.data) ? { type: "callback", data: action.data } : { type: "placeholder" };
    case "switch_inline":
      return nonEmpty(action.query) ? { type: "switch_inline", query: action.query } : { type: "placeholder" };
    case "switch_inline_current_chat":
      return nonEmpty(action.query)
        ? { type: "switch_inline_current_chat", query: action.query }
        : { type: "placeholder" };
    default:
      return { type: "placeholder" };
  }
}

function decodeButton(button: StoredButton): ContentButton {
  return {
    label: button.label,
    action: decodeButtonAction(button.action),
  };
}

function decodeButtons(rows?: StoredButton[][]): ButtonLayout | undefined {
  if (!rows || rows.length === 0) {
    return undefined;
  }

  return rows.map((row) => row.map(decodeButton));
}

/**
 * Builds send parameters from a stored payload. Never throws: unknown kinds and
 * media kinds without a reference degrade to a text send.
 */
export function decodeContent(payload: StoredContent): SendDescriptor {
  const buttons = decodeButtons(payload.buttons);
  const text = nonEmpty(payload.text) ? payload.text : undefined;

  if (isMediaKind(payload.kind) && nonEmpty(payload.mediaRef)) {
    return {
      method: "media",
      kind: payload.kind,
      mediaRef: payload.mediaRef,
      ...(text !== undefined ? { caption: text } : {}),
      ...(buttons ? { buttons } : {}),
    };
  }

  const placeholder = payload.kind === "text" ? EMPTY_TEXT_PLACEHOLDER : UNSUPPORTED_KIND_PLACEHOLDER;

  return {
    method: "text",
    text: text ?? placeholder,
    ...(buttons ? { buttons } : {}),
  };
}
