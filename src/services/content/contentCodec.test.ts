import { describe, expect, it } from "vitest";

import {
  EMPTY_TEXT_PLACEHOLDER,
  UNSUPPORTED_KIND_PLACEHOLDER,
  decodeContent,
  encodeContent,
} from "@/services/content/contentCodec";
import { parseStoredContent } from "@/services/content/contentSchemas";
import {
  ButtonLayout,
  MEDIA_KINDS,
  MediaKind,
  ProtocolButton,
  ProtocolMessage,
  SendDescriptor,
} from "@/types/content";

const SAMPLE_BUTTONS: ProtocolButton[][] = [
  [
    { text: "Site", url: "https://example.com" },
    { text: "Vote", callbackData: "dm90ZQ==" },
  ],
  [
    { text: "Share", switchInlineQuery: "share me" },
    { text: "Here", switchInlineQueryCurrentChat: "here" },
    { text: "Login" },
  ],
];

function attachment(kind: MediaKind, mediaRef: string): ProtocolMessage["media"] {
  const media: Partial<Record<MediaKind, string>> = {};
  media[kind] = mediaRef;
  return media;
}

// What the receiving side would hand back to the codec after a send.
function echo(descriptor: SendDescriptor): ProtocolMessage {
  const buttons = descriptor.buttons ? toProtocolButtons(descriptor.buttons) : undefined;

  if (descriptor.method === "text") {
    return { text: descriptor.text, buttons };
  }

  return {
    caption: descriptor.caption,
    media: attachment(descriptor.kind, descriptor.mediaRef),
    buttons,
  };
}

function toProtocolButtons(layout: ButtonLayout): ProtocolButton[][] {
  return layout.map((row) =>
    row.map((button) => {
      switch (button.action.type) {
        case "url":
          return { text: button.label, url: button.action.url };
        case "callback":
          return { text: button.label, callbackData: button.action.data };
        case "switch_inline":
          return { text: button.label, switchInlineQuery: button.action.query };
        case "switch_inline_current_chat":
          return { text: button.label, switchInlineQueryCurrentChat: button.action.query };
        case "placeholder":
          return { text: button.label };
      }
    }),
  );
}

describe("encodeContent", () => {
  it("encodes a plain text DM", () => {
    expect(encodeContent({ text: "Hello" })).toEqual({ kind: "text", text: "Hello" });
  });

  it("falls back to the caption when the body is empty", () => {
    expect(encodeContent({ text: "", caption: "A caption", media: { photo: "photo:1:2:AA" } })).toEqual({
      kind: "photo",
      text: "A caption",
      mediaRef: "photo:1:2:AA",
    });
  });

  it("omits text entirely for a bare attachment", () => {
    expect(encodeContent({ media: { voice: "document:9:9:BB" } })).toEqual({
      kind: "voice",
      mediaRef: "document:9:9:BB",
    });
  });

  it("picks the first attachment in priority order", () => {
    const payload = encodeContent({
      media: { video_note: "ref-note", document: "ref-doc", sticker: "ref-sticker" },
    });

    expect(payload.kind).toBe("document");
    expect(payload.mediaRef).toBe("ref-doc");
  });

  it("ignores attachments with an empty reference", () => {
    expect(encodeContent({ text: "hi", media: { photo: "" } })).toEqual({ kind: "text", text: "hi" });
  });

  it("keeps button rows and encodes unknown actions as placeholders", () => {
    const payload = encodeContent({ text: "pick one", buttons: SAMPLE_BUTTONS });

    expect(payload.buttons).toEqual([
      [
        { label: "Site", action: { type: "url", url: "https://example.com" } },
        { label: "Vote", action: { type: "callback", data: "dm90ZQ==" } },
      ],
      [
        { label: "Share", action: { type: "switch_inline", query: "share me" } },
        { label: "Here", action: { type: "switch_inline_current_chat", query: "here" } },
        { label: "Login", action: { type: "placeholder" } },
      ],
    ]);
  });

  it("treats an empty inline query as no action", () => {
    const payload = encodeContent({ text: "x", buttons: [[{ text: "Empty", switchInlineQuery: "" }]] });
    expect(payload.buttons).toEqual([[{ label: "Empty", action: { type: "placeholder" } }]]);
  });

  it("drops an empty button layout", () => {
    expect(encodeContent({ text: "x", buttons: [] })).toEqual({ kind: "text", text: "x" });
  });
});

describe("decodeContent", () => {
  it("builds a text send", () => {
    expect(decodeContent({ kind: "text", text: "Hi there!" })).toEqual({ method: "text", text: "Hi there!" });
  });

  it("uses a placeholder for empty text", () => {
    expect(decodeContent({ kind: "text" })).toEqual({ method: "text", text: EMPTY_TEXT_PLACEHOLDER });
  });

  it("attaches media and caption", () => {
    expect(decodeContent({ kind: "animation", text: "lol", mediaRef: "document:1:2:CC" })).toEqual({
      method: "media",
      kind: "animation",
      mediaRef: "document:1:2:CC",
      caption: "lol",
    });
  });

  it("falls back to text for an unrecognized kind", () => {
    expect(decodeContent({ kind: "poll", text: "Question?" })).toEqual({ method: "text", text: "Question?" });
    expect(decodeContent({ kind: "poll" })).toEqual({ method: "text", text: UNSUPPORTED_KIND_PLACEHOLDER });
  });

  it("falls back to text when a media kind has no reference", () => {
    expect(decodeContent({ kind: "photo", text: "lost photo" })).toEqual({ method: "text", text: "lost photo" });
  });

  it("never throws for any stored kind", () => {
    for (const kind of ["", "location", "contact", "dice", "text", ...MEDIA_KINDS]) {
      const descriptor = decodeContent({ kind });
      if (descriptor.method === "text") {
        expect(descriptor.text.length).toBeGreaterThan(0);
      }
    }
  });

  it("renders unknown or incomplete stored actions as placeholders", () => {
    const descriptor = decodeContent({
      kind: "text",
      text: "t",
      buttons: [
        [
          { label: "Game", action: { type: "callback_game" } },
          { label: "", action: { type: "url" } },
        ],
      ],
    });

    expect(descriptor.buttons).toEqual([
      [
        { label: "Game", action: { type: "placeholder" } },
        { label: "", action: { type: "placeholder" } },
      ],
    ]);
  });

  it("keeps an empty button label through a decode and re-encode", () => {
    const first = encodeContent({ text: "t", buttons: [[{ text: "", url: "https://example.com" }]] });

    expect(first.buttons).toEqual([[{ label: "", action: { type: "url", url: "https://example.com" } }]]);
    expect(encodeContent(echo(decodeContent(first)))).toEqual(first);
  });
});

describe("codec round trip", () => {
  const cases: Array<{ name: string; message: ProtocolMessage }> = [
    { name: "text", message: { text: "Hello", buttons: SAMPLE_BUTTONS } },
    ...MEDIA_KINDS.map((kind) => ({
      name: kind,
      message: { caption: `${kind} caption`, media: attachment(kind, `document:${kind.length}:7:ZZ`), buttons: SAMPLE_BUTTONS },
    })),
  ];

  it.each(cases)("re-encodes $name content identically", ({ message }) => {
    const first = encodeContent(message);
    const second = encodeContent(echo(decodeContent(first)));

    expect(second).toEqual(first);
  });

  it("survives storage as JSON", () => {
    const first = encodeContent({ caption: "file", media: { document: "document:1:2:QQ" }, buttons: SAMPLE_BUTTONS });
    const stored = parseStoredContent(JSON.parse(JSON.stringify(first)));

    expect(stored).not.toBeNull();
    expect(encodeContent(echo(decodeContent(stored ?? { kind: "text" })))).toEqual(first);
  });
});
