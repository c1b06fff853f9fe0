/**
 * capture-dispatcher.ts — Screenshot and clipboard capture.
 *
 * Each capture picks exactly one strategy: the browser path when its API
 * exists and acquisition succeeds, the Assistant Service otherwise.
 *
 * Screenshot:  getDisplayMedia → first decoded frame → PNG upload
 *              (any acquisition failure) → POST /take-screenshot, no body
 * Clipboard:   clipboard.read()     images first, then any non-text type
 *              clipboard.readText() non-empty text
 *              POST /sense-clipboard {fallback, use_system_clipboard}
 *
 * Upload failures do not fall through to the next strategy; they are
 * reported. Display-capture tracks are always stopped, whatever happens.
 */

import type { CaptureResponse, ClipboardUpload, ContentKind, ContentRef } from "./assistant-types.ts";
import type { ActivityLog } from "./activity-log.ts";
import type { NotificationCenter } from "./notification-center.ts";
import { contentId } from "./assistant-client.ts";
import { classifyError, errorMessage } from "./errors.ts";
import { contentCategory, imageTypeToExtension, mimeTypeToExtension } from "./mime-types.ts";

export type CaptureStrategy = "browser" | "server";

export interface CaptureResult {
  kind: ContentKind;
  /** Null when the capture was rejected before any strategy ran. */
  strategy: CaptureStrategy | null;
  success: boolean;
  ref?: ContentRef;
}

export interface CaptureService {
  takeScreenshot(image?: Blob): Promise<CaptureResponse>;
  uploadClipboard(upload: ClipboardUpload): Promise<CaptureResponse>;
  senseSystemClipboard(): Promise<CaptureResponse>;
  contentUrl(kind: ContentKind, ref: Pick<ContentRef, "filepath">): string;
  qrUrl(kind: ContentKind, ref: Pick<ContentRef, "filepath">): string;
}

/** Browser facilities, injected so tests can run without a DOM. */
export interface CaptureEnvironment {
  mediaDevices?: Partial<Pick<MediaDevices, "getDisplayMedia">>;
  clipboard?: Partial<Pick<Clipboard, "read" | "readText">>;
  /** Turn a live display stream into a PNG. */
  grabFrame: (stream: MediaStream) => Promise<Blob>;
  now?: () => number;
}

export interface CaptureDispatcherDeps {
  service: CaptureService;
  env: CaptureEnvironment;
  notifications: NotificationCenter;
  log: ActivityLog;
  listRefreshDelayMs: number;
  qrNotificationDurationMs: number;
  /** Called with an optimistic ref when the service returned a filepath. */
  onCaptured?: (kind: ContentKind, ref: ContentRef) => void;
  /** Called after listRefreshDelayMs when no filepath came back. */
  refreshStatus?: () => void;
}

const SOURCE = "Capture";
const PREVIEW_LIMIT = 50;

/** Clip text previews to 50 characters ("..." included). */
export function truncatePreview(text: string, limit = PREVIEW_LIMIT): string {
  return text.length > limit ? `${text.slice(0, limit - 3)}...` : text;
}

/**
 * Draw the first decoded frame of a display stream onto a canvas.
 * Resolves on the video's `loadeddata` event rather than after a fixed delay.
 */
export async function grabVideoFrame(stream: MediaStream): Promise<Blob> {
  const video = document.createElement("video");
  video.muted = true;
  video.playsInline = true;
  video.srcObject = stream;

  await new Promise<void>((resolve, reject) => {
    video.addEventListener("loadeddata", () => resolve(), { once: true });
    video.addEventListener("error", () => reject(new Error("Display stream could not be decoded")), { once: true });
  });
  await video.play();

  const canvas = document.createElement("canvas");
  canvas.width = video.videoWidth;
  canvas.height = video.videoHeight;
  const ctx = canvas.getContext("2d");
  if (!ctx) throw new Error("Canvas 2D context unavailable");
  ctx.drawImage(video, 0, 0);
  video.pause();
  video.srcObject = null;

  return new Promise<Blob>((resolve, reject) => {
    canvas.toBlob((blob) => (blob ? resolve(blob) : reject(new Error("Frame encoding failed"))), "image/png");
  });
}

export class CaptureDispatcher {
  private busy = false;
  private readonly deps: CaptureDispatcherDeps;
  private readonly now: () => number;

  constructor(deps: CaptureDispatcherDeps) {
    this.deps = deps;
    this.now = deps.env.now ?? Date.now;
  }

  isBusy(): boolean {
    return this.busy;
  }

  async captureScreenshot(): Promise<CaptureResult> {
    if (!this.acquire("screenshot")) return { kind: "screenshot", strategy: null, success: false };
    try {
      const image = await this.tryBrowserScreenshot();
      const strategy: CaptureStrategy = image ? "browser" : "server";
      this.deps.log.info(SOURCE, `Screenshot via ${strategy}`);

      let resp: CaptureResponse;
      try {
        resp = image ? await this.deps.service.takeScreenshot(image) : await this.deps.service.takeScreenshot();
      } catch (err) {
        this.deps.log.error(SOURCE, `Screenshot request failed: ${errorMessage(err)}`);
        this.deps.notifications.danger("Failed to take screenshot");
        return { kind: "screenshot", strategy, success: false };
      }
      return this.handleResponse("screenshot", strategy, resp, "Screenshot taken");
    } finally {
      this.busy = false;
    }
  }

  async captureClipboard(): Promise<CaptureResult> {
    if (!this.acquire("clipboard")) return { kind: "clipboard", strategy: null, success: false };
    try {
      const upload = (await this.readRichClipboard()) ?? (await this.readClipboardText());
      if (upload) {
        this.deps.log.info(SOURCE, `Clipboard via browser (${upload.type}${upload.mimeType ? `, ${upload.mimeType}` : ""})`);
        return await this.send("browser", () => this.deps.service.uploadClipboard(upload));
      }
      this.deps.log.info(SOURCE, "Clipboard via server");
      return await this.send("server", () => this.deps.service.senseSystemClipboard());
    } finally {
      this.busy = false;
    }
  }

  private acquire(kind: ContentKind): boolean {
    if (this.busy) {
      this.deps.log.warn(SOURCE, `Rejected ${kind} capture: another capture is in progress`);
      this.deps.notifications.warning("A capture is already in progress");
      return false;
    }
    this.busy = true;
    return true;
  }

  /** PNG of the shared screen, or null when the browser path is unavailable or failed. */
  private async tryBrowserScreenshot(): Promise<Blob | null> {
    const mediaDevices = this.deps.env.mediaDevices;
    if (!mediaDevices || typeof mediaDevices.getDisplayMedia !== "function") {
      this.deps.log.debug(SOURCE, "getDisplayMedia not available");
      return null;
    }

    let stream: MediaStream | null = null;
    try {
      stream = await mediaDevices.getDisplayMedia({ video: true, audio: false });
      return await this.deps.env.grabFrame(stream);
    } catch (err) {
      const kind = classifyError(err);
      this.deps.log.warn(SOURCE, `Browser screen capture failed (${kind}): ${errorMessage(err)}`);
      if (kind === "permission") {
        this.deps.notifications.warning("Screen sharing was not allowed, using the assistant's capture instead");
      }
      return null;
    } finally {
      if (stream) {
        for (const track of stream.getTracks()) track.stop();
      }
    }
  }

  private async readRichClipboard(): Promise<ClipboardUpload | null> {
    const clipboard = this.deps.env.clipboard;
    if (!clipboard || typeof clipboard.read !== "function") return null;

    try {
      const items = await clipboard.read();
      const stamp = this.now();

      for (const item of items) {
        const imageType = item.types.find((t) => t.startsWith("image/"));
        if (imageType) {
          return {
            content: await item.getType(imageType),
            type: "image",
            mimeType: imageType,
            filename: `clipboard_${stamp}${imageTypeToExtension(imageType)}`,
          };
        }
      }
      for (const item of items) {
        const otherType = item.types.find((t) => !t.startsWith("text/"));
        if (otherType) {
          return {
            content: await item.getType(otherType),
            type: contentCategory(otherType),
            mimeType: otherType,
            filename: `clipboard_${stamp}${mimeTypeToExtension(otherType)}`,
          };
        }
      }
      return null;
    } catch (err) {
      const kind = classifyError(err);
      this.deps.log.warn(SOURCE, `clipboard.read() failed (${kind}): ${errorMessage(err)}`);
      if (kind === "permission") {
        this.deps.notifications.warning("Clipboard permission denied, trying another method");
      }
      return null;
    }
  }

  private async readClipboardText(): Promise<ClipboardUpload | null> {
    const clipboard = this.deps.env.clipboard;
    if (!clipboard || typeof clipboard.readText !== "function") return null;

    try {
      const text = await clipboard.readText();
      if (!text.trim()) return null;
      return { content: text, type: "text", mimeType: "text/plain" };
    } catch (err) {
      this.deps.log.warn(SOURCE, `clipboard.readText() failed: ${errorMessage(err)}`);
      return null;
    }
  }

  private async send(strategy: CaptureStrategy, request: () => Promise<CaptureResponse>): Promise<CaptureResult> {
    let resp: CaptureResponse;
    try {
      resp = await request();
    } catch (err) {
      this.deps.log.error(SOURCE, `Clipboard request failed: ${errorMessage(err)}`);
      this.deps.notifications.danger("Failed to capture clipboard");
      return { kind: "clipboard", strategy, success: false };
    }
    return this.handleResponse("clipboard", strategy, resp, "Clipboard captured");
  }

  private handleResponse(
    kind: ContentKind,
    strategy: CaptureStrategy,
    resp: CaptureResponse,
    fallbackMessage: string,
  ): CaptureResult {
    if (!resp.success) {
      this.deps.log.warn(SOURCE, `Service rejected ${kind}: ${resp.message || "no message"}`);
      this.deps.notifications.danger(resp.message || `Failed to capture ${kind}`);
      return { kind, strategy, success: false };
    }

    const preview = resp.content_preview ? truncatePreview(resp.content_preview) : "";
    const message = resp.message || fallbackMessage;
    this.deps.notifications.success(preview ? `${message}: ${preview}` : message);

    if (!resp.filepath) {
      setTimeout(() => this.deps.refreshStatus?.(), this.deps.listRefreshDelayMs);
      return { kind, strategy, success: true };
    }

    const ref: ContentRef = {
      filepath: resp.filepath,
      filename: contentId(resp.filepath),
      timestamp: new Date(this.now()).toISOString(),
      content_preview: resp.content_preview,
    };
    this.deps.onCaptured?.(kind, ref);
    this.deps.notifications.info(`Scan to open the ${kind} on another device`, {
      imageUrl: this.deps.service.qrUrl(kind, ref),
      actions: [{ label: "Download", href: this.deps.service.contentUrl(kind, ref) }],
      durationMs: this.deps.qrNotificationDurationMs,
    });
    return { kind, strategy, success: true, ref };
  }
}
