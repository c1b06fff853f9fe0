import { describe, it, expect } from "vitest";
import {
  DEFAULT_EXTENSION,
  KNOWN_MIME_TYPES,
  contentCategory,
  extensionFromFileName,
  imageTypeToExtension,
  mimeTypeToExtension,
} from "../mime-types.ts";

describe("mimeTypeToExtension", () => {
  it("maps known types", () => {
    expect(mimeTypeToExtension("image/png")).toBe(".png");
    expect(mimeTypeToExtension("image/jpeg")).toBe(".jpg");
    expect(mimeTypeToExtension("application/pdf")).toBe(".pdf");
    expect(mimeTypeToExtension("video/quicktime")).toBe(".mov");
    expect(mimeTypeToExtension("application/gzip")).toBe(".gz");
  });

  it("ignores case and parameters", () => {
    expect(mimeTypeToExtension("TEXT/PLAIN; charset=utf-8")).toBe(".txt");
    expect(mimeTypeToExtension(" Image/WebP ")).toBe(".webp");
  });

  it("returns .bin for empty, missing and unknown types", () => {
    expect(DEFAULT_EXTENSION).toBe(".bin");
    expect(mimeTypeToExtension("")).toBe(".bin");
    expect(mimeTypeToExtension(null)).toBe(".bin");
    expect(mimeTypeToExtension(undefined)).toBe(".bin");
    expect(mimeTypeToExtension("application/x-made-up")).toBe(".bin");
  });

  it("does not resolve object prototype keys", () => {
    expect(mimeTypeToExtension("toString")).toBe(".bin");
    expect(mimeTypeToExtension("constructor")).toBe(".bin");
  });

  it("every table entry yields a dotted extension", () => {
    expect(KNOWN_MIME_TYPES.length).toBe(34);
    for (const type of KNOWN_MIME_TYPES) {
      expect(mimeTypeToExtension(type)).toMatch(/^\.[a-z0-9]+$/);
    }
  });
});

describe("imageTypeToExtension", () => {
  it("uses the table when the type is known", () => {
    expect(imageTypeToExtension("image/gif")).toBe(".gif");
  });

  it("falls back to .png for unknown image types", () => {
    expect(imageTypeToExtension("image/heic")).toBe(".png");
  });
});

describe("extensionFromFileName", () => {
  it("returns the lower-cased last extension", () => {
    expect(extensionFromFileName("report.PDF")).toBe(".pdf");
    expect(extensionFromFileName("archive.tar.gz")).toBe(".gz");
  });

  it("returns .bin when there is no extension", () => {
    expect(extensionFromFileName("README")).toBe(".bin");
    expect(extensionFromFileName("trailing.")).toBe(".bin");
    expect(extensionFromFileName(null)).toBe(".bin");
  });
});

describe("contentCategory", () => {
  it("categorises by top-level type", () => {
    expect(contentCategory("image/png")).toBe("image");
    expect(contentCategory("audio/mpeg")).toBe("audio");
    expect(contentCategory("video/mp4")).toBe("video");
    expect(contentCategory("text/html")).toBe("text");
  });

  it("recognises office documents and archives", () => {
    expect(contentCategory("application/pdf")).toBe("document");
    expect(contentCategory("application/msword")).toBe("document");
    expect(contentCategory("application/vnd.ms-excel")).toBe("document");
    expect(contentCategory("application/vnd.openxmlformats-officedocument.presentationml.presentation")).toBe("document");
    expect(contentCategory("application/zip")).toBe("archive");
    expect(contentCategory("application/x-rar-compressed")).toBe("archive");
    expect(contentCategory("application/x-tar")).toBe("archive");
  });

  it("falls back to file", () => {
    expect(contentCategory("application/json")).toBe("file");
    expect(contentCategory("")).toBe("file");
    expect(contentCategory(undefined)).toBe("file");
  });
});
