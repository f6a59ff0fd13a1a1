import { Api } from "telegram";

import { formatMediaRef } from "@/services/telegram/mediaRef";
import { ButtonLayout, ContentButton, MediaKind, ProtocolButton, ProtocolMessage } from "@/types/content";

const PLACEHOLDER_CALLBACK_DATA = "noop";
// Telegram rejects inline buttons without text.
const FALLBACK_BUTTON_LABEL = "Button";

function classifyDocument(document: Api.Document): MediaKind {
  const { attributes } = document;

  const video = attributes.find(
    (attribute): attribute is Api.DocumentAttributeVideo => attribute instanceof Api.DocumentAttributeVideo,
  );
  const audio = attributes.find(
    (attribute): attribute is Api.DocumentAttributeAudio => attribute instanceof Api.DocumentAttributeAudio,
  );

  if (video?.roundMessage) {
    return "video_note";
  }

  if (attributes.some((attribute) => attribute instanceof Api.DocumentAttributeSticker)) {
    return "sticker";
  }

  if (attributes.some((attribute) => attribute instanceof Api.DocumentAttributeAnimated)) {
    return "animation";
  }

  if (video) {
    return "video";
  }

  if (audio?.voice) {
    return "voice";
  }

  if (audio) {
    return "audio";
  }

  return "document";
}

/** Exactly one media kind per message, or null for text and unsupported media. */
export function extractMedia(media: Api.TypeMessageMedia | undefined): Partial<Record<MediaKind, string>> | null {
  if (media instanceof Api.MessageMediaPhoto && media.photo instanceof Api.Photo) {
    return { photo: formatMediaRef(media.photo) };
  }

  if (media instanceof Api.MessageMediaDocument && media.document instanceof Api.Document) {
    const attachment: Partial<Record<MediaKind, string>> = {};
    attachment[classifyDocument(media.document)] = formatMediaRef(media.document);
    return attachment;
  }

  return null;
}

function toProtocolButton(button: Api.TypeKeyboardButton): ProtocolButton {
  const text = "text" in button && typeof button.text === "string" ? button.text : "";

  if (button instanceof Api.KeyboardButtonUrl) {
    return { text, url: button.url };
  }

  if (button instanceof Api.KeyboardButtonCallback) {
    return { text, callbackData: button.data.toString("base64") };
  }

  if (button instanceof Api.KeyboardButtonSwitchInline) {
    return button.samePeer ? { text, switchInlineQueryCurrentChat: button.query } : { text, switchInlineQuery: button.query };
  }

  return { text };
}

export function extractButtons(markup: Api.TypeReplyMarkup | undefined): ProtocolButton[][] | undefined {
  if (!(markup instanceof Api.ReplyInlineMarkup)) {
    return undefined;
  }

  return markup.rows.map((row) => row.buttons.map(toProtocolButton));
}

/** Reduces a gramjs message to what the content codec understands. */
export function toProtocolMessage(message: Api.Message): ProtocolMessage {
  const media = extractMedia(message.media);
  const body = message.message || undefined;

  return {
    ...(media ? { media, caption: body } : { text: body }),
    buttons: extractButtons(message.replyMarkup),
  };
}

function toKeyboardButton(button: ContentButton): Api.TypeKeyboardButton {
  const { action } = button;
  const text = button.label.length > 0 ? button.label : FALLBACK_BUTTON_LABEL;

  switch (action.type) {
    case "url":
      return new Api.KeyboardButtonUrl({ text, url: action.url });
    case "callback":
      return new Api.KeyboardButtonCallback({ text, data: Buffer.from(action.data, "base64") });
    case "switch_inline":
      return new Api.KeyboardButtonSwitchInline({ text, query: action.query });
    case "switch_inline_current_chat":
      return new Api.KeyboardButtonSwitchInline({ text, query: action.query, samePeer: true });
    case "placeholder":
      return new Api.KeyboardButtonCallback({ text, data: Buffer.from(PLACEHOLDER_CALLBACK_DATA) });
  }
}

export function toReplyMarkup(layout: ButtonLayout): Api.ReplyInlineMarkup {
  return new Api.ReplyInlineMarkup({
    rows: layout.map((row) => new Api.KeyboardButtonRow({ buttons: row.map(toKeyboardButton) })),
  });
}
