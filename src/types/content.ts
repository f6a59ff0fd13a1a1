export const MEDIA_KINDS = [
  "photo",
  "video",
  "document",
  "sticker",
  "animation",
  "audio",
  "voice",
  "video_note",
] as const;

export type MediaKind = (typeof MEDIA_KINDS)[number];

export type ContentKind = "text" | MediaKind;

export type ButtonAction =
  | { type: "url"; url: string }
  | { type: "callback"; data: string }
  | { type: "switch_inline"; query: string }
  | { type: "switch_inline_current_chat"; query: string }
  | { type: "placeholder" };

export interface ContentButton {
  label: string;
  action: ButtonAction;
}

export type ButtonLayout = ContentButton[][];

/** Protocol-agnostic message content as stored on a relay job. */
export interface ContentPayload {
  kind: ContentKind;
  text?: string;
  mediaRef?: string;
  buttons?: ButtonLayout;
}

/**
 * A payload read back from storage. It may have been written by another
 * version of the relay, so kind and action types are open strings.
 */
export interface StoredContent {
  kind: string;
  text?: string;
  mediaRef?: string;
  buttons?: StoredButton[][];
}

export interface StoredButton {
  label: string;
  action: {
    type: string;
    url?: string;
    data?: string;
    query?: string;
  };
}

export interface ProtocolButton {
  text: string;
  url?: string;
  callbackData?: string;
  switchInlineQuery?: string;
  switchInlineQueryCurrentChat?: string;
}

/**
 * What the protocol adapter extracts from a native message. Attachments are a
 * closed record keyed by media kind; the value is the reusable media reference.
 */
export interface ProtocolMessage {
  text?: string;
  caption?: string;
  media?: Partial<Record<MediaKind, string>>;
  buttons?: ProtocolButton[][];
}

export type SendDescriptor =
  | { method: "text"; text: string; buttons?: ButtonLayout }
  | { method: "media"; kind: MediaKind; mediaRef: string; caption?: string; buttons?: ButtonLayout };
