import bigInt from "big-integer";
import { Api } from "telegram";

import { ValidationError } from "@/utils/errors";

export type MediaRefType = "photo" | "document";

export interface ParsedMediaRef {
  type: MediaRefType;
  id: string;
  accessHash: string;
  fileReference: Buffer;
}

const MEDIA_REF_PATTERN = /^(photo|document):(-?\d+):(-?\d+):([A-Za-z0-9_-]*)$/;

/**
 * Serializes a photo or document into a reusable reference:
 * `photo|document:<id>:<accessHash>:<fileReference base64url>`.
 */
export function formatMediaRef(media: Api.Photo | Api.Document): string {
  const type: MediaRefType = media instanceof Api.Photo ? "photo" : "document";
  return [type, media.id.toString(), media.accessHash.toString(), media.fileReference.toString("base64url")].join(":");
}

export function parseMediaRef(ref: string): ParsedMediaRef | null {
  const match = MEDIA_REF_PATTERN.exec(ref);
  if (!match) {
    return null;
  }

  const [, type, id = "", accessHash = "", fileReference = ""] = match;
  return {
    type: type === "photo" ? "photo" : "document",
    id,
    accessHash,
    fileReference: Buffer.from(fileReference, "base64url"),
  };
}

export function toInputMedia(ref: string): Api.InputMediaPhoto | Api.InputMediaDocument {
  const parsed = parseMediaRef(ref);
  if (!parsed) {
    throw new ValidationError("Malformed media reference", { ref });
  }

  const location = {
    id: bigInt(parsed.id),
    accessHash: bigInt(parsed.accessHash),
    fileReference: parsed.fileReference,
  };

  if (parsed.type === "photo") {
    return new Api.InputMediaPhoto({ id: new Api.InputPhoto(location) });
  }

  return new Api.InputMediaDocument({ id: new Api.InputDocument(location) });
}
