/**
 * mime-types.ts — MIME type → file extension / content category lookup.
 *
 * Used to name clipboard payloads before upload. Every function here is
 * total: unknown input yields a default rather than an exception.
 */

import type { ClipboardContentType } from "./assistant-types.ts";
import mimeExtensions from "./data/mime-extensions.json";

export const DEFAULT_EXTENSION = ".bin";

const MIME_TO_EXTENSION: Readonly<Record<string, string>> = mimeExtensions;

/** Known MIME types, in table order. */
export const KNOWN_MIME_TYPES: readonly string[] = Object.keys(MIME_TO_EXTENSION);

/** Strip parameters ("; charset=utf-8") and normalise case. */
function baseType(mimeType: string): string {
  return mimeType.split(";")[0].trim().toLowerCase();
}

export function mimeTypeToExtension(mimeType: string | null | undefined): string {
  if (!mimeType) return DEFAULT_EXTENSION;
  const key = baseType(mimeType);
  return Object.prototype.hasOwnProperty.call(MIME_TO_EXTENSION, key) ? MIME_TO_EXTENSION[key] : DEFAULT_EXTENSION;
}

/** Like mimeTypeToExtension, but unknown image types fall back to .png. */
export function imageTypeToExtension(imageType: string): string {
  const ext = mimeTypeToExtension(imageType);
  return ext === DEFAULT_EXTENSION ? ".png" : ext;
}

export function extensionFromFileName(filename: string | null | undefined): string {
  if (!filename) return DEFAULT_EXTENSION;
  const parts = filename.split(".");
  return parts.length > 1 && parts[parts.length - 1] !== "" ? `.${parts[parts.length - 1].toLowerCase()}` : DEFAULT_EXTENSION;
}

export function contentCategory(mimeType: string | null | undefined): ClipboardContentType {
  if (!mimeType) return "file";
  const type = baseType(mimeType);
  if (type.startsWith("image/")) return "image";
  if (type.startsWith("audio/")) return "audio";
  if (type.startsWith("video/")) return "video";
  if (type.startsWith("text/")) return "text";
  if (/pdf|document|sheet|presentation|msword|ms-excel|ms-powerpoint/.test(type)) return "document";
  if (/zip|compressed|archive|x-tar/.test(type)) return "archive";
  return "file";
}
