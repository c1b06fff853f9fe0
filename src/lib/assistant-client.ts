/**
 * assistant-client.ts — HTTP client for the Assistant Service.
 *
 * The service owns process control, server-side capture and persistence;
 * this client only speaks its REST contract. Responses are mapped
 * defensively: the service is a separate process and older builds omit
 * fields (e.g. /start answers with {status: "started"} instead of
 * {running: true}).
 */

import type {
  AssistantStatus,
  CaptureResponse,
  ClipboardUpload,
  CommandResponse,
  ContentKind,
  ContentRef,
  ToggleResponse,
} from "./assistant-types.ts";
import { ServiceError } from "./errors.ts";

type Json = Record<string, unknown>;

const AJAX_HEADERS = { "X-Requested-With": "XMLHttpRequest" };

function isRecord(value: unknown): value is Json {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function str(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/** Last path segment of an opaque filepath ("a/b/c.png" → "c.png"). */
export function contentId(filepath: string): string {
  const parts = filepath.split(/[\\/]/);
  return parts[parts.length - 1];
}

export function toContentRef(raw: unknown): ContentRef | null {
  if (!isRecord(raw)) return null;
  const filepath = str(raw.filepath);
  if (!filepath) return null;
  return {
    filepath,
    filename: str(raw.filename) || contentId(filepath),
    timestamp: str(raw.timestamp) ?? "",
    content_preview: str(raw.content_preview),
  };
}

function toContentList(raw: unknown): ContentRef[] {
  if (!Array.isArray(raw)) return [];
  const refs: ContentRef[] = [];
  for (const item of raw) {
    const ref = toContentRef(item);
    if (ref) refs.push(ref);
  }
  return refs;
}

export function toStatus(data: unknown): AssistantStatus {
  const d = isRecord(data) ? data : {};
  return {
    running: d.running === true,
    microphone_available: d.microphone_available === true,
    screenshots: toContentList(d.screenshots),
    clipboard_items: toContentList(d.clipboard_items),
  };
}

const RUNNING_STATUSES = new Set(["started", "already_running", "running"]);
const STOPPED_STATUSES = new Set(["stopped", "not_running"]);

function toToggleResponse(data: unknown, target: boolean): ToggleResponse {
  const d = isRecord(data) ? data : {};
  const status = str(d.status);
  let running: boolean;
  if (typeof d.running === "boolean") running = d.running;
  else if (status && RUNNING_STATUSES.has(status)) running = true;
  else if (status && STOPPED_STATUSES.has(status)) running = false;
  else running = !target;

  return {
    running,
    success: typeof d.success === "boolean" ? d.success : status === "failed" ? false : undefined,
    message: str(d.message) ?? str(d.error),
  };
}

function toCaptureResponse(data: unknown): CaptureResponse {
  const d = isRecord(data) ? data : {};
  return {
    success: d.success === true,
    message: str(d.message) ?? "",
    filepath: str(d.filepath) || undefined,
    content_preview: str(d.content_preview),
    content_type: str(d.content_type),
  };
}

function toCommandResponse(data: unknown): CommandResponse {
  const d = isRecord(data) ? data : {};
  return { success: d.success === true, message: str(d.message) ?? "" };
}

export class AssistantClient {
  private readonly baseUrl: string;

  constructor(baseUrl = "") {
    // Strip trailing slash
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  url(path: string): string {
    return `${this.baseUrl}${path}`;
  }

  async getStatus(): Promise<AssistantStatus> {
    return toStatus(await this.request("/status"));
  }

  async start(): Promise<ToggleResponse> {
    return toToggleResponse(await this.request("/start", { method: "POST", headers: AJAX_HEADERS }), true);
  }

  async stop(): Promise<ToggleResponse> {
    return toToggleResponse(await this.request("/stop", { method: "POST", headers: AJAX_HEADERS }), false);
  }

  /** Upload a browser-captured image, or ask the service to capture when no blob is given. */
  async takeScreenshot(image?: Blob): Promise<CaptureResponse> {
    const init: RequestInit = { method: "POST" };
    if (image) {
      const form = new FormData();
      form.append("screenshot", image, "screenshot.png");
      init.body = form;
    } else {
      init.headers = AJAX_HEADERS;
    }
    return toCaptureResponse(await this.request("/take-screenshot", init));
  }

  async uploadClipboard(upload: ClipboardUpload): Promise<CaptureResponse> {
    const form = new FormData();
    form.append("content", upload.content);
    form.append("type", upload.type);
    if (upload.mimeType) form.append("mime_type", upload.mimeType);
    if (upload.filename) form.append("filename", upload.filename);
    return toCaptureResponse(await this.request("/sense-clipboard", { method: "POST", body: form }));
  }

  /** Server-side clipboard read (last tier of the capture chain). */
  async senseSystemClipboard(): Promise<CaptureResponse> {
    return toCaptureResponse(
      await this.request("/sense-clipboard", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ fallback: true, use_system_clipboard: true }),
      }),
    );
  }

  async sendCommand(command: string): Promise<CommandResponse> {
    return toCommandResponse(
      await this.request("/command", {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded", ...AJAX_HEADERS },
        body: new URLSearchParams({ command }).toString(),
      }),
    );
  }

  contentUrl(kind: ContentKind, ref: Pick<ContentRef, "filepath">): string {
    return this.url(`/${kind}/${encodeURIComponent(contentId(ref.filepath))}`);
  }

  qrUrl(kind: ContentKind, ref: Pick<ContentRef, "filepath">): string {
    return this.url(`/qr/${kind}/${encodeURIComponent(contentId(ref.filepath))}`);
  }

  /** Download a clipboard snapshot as text for the in-page viewer. */
  async fetchClipboardText(ref: Pick<ContentRef, "filepath">): Promise<string> {
    const resp = await fetch(this.contentUrl("clipboard", ref));
    if (!resp.ok) {
      throw new ServiceError(`/clipboard/${contentId(ref.filepath)}`, resp.status, resp.statusText);
    }
    return resp.text();
  }

  private async request(path: string, init?: RequestInit): Promise<unknown> {
    const resp = init ? await fetch(this.url(path), init) : await fetch(this.url(path));
    if (!resp.ok) {
      throw new ServiceError(path, resp.status, resp.statusText);
    }
    return resp.json();
  }
}
