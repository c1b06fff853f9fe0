import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { AssistantClient, contentId, toContentRef, toStatus } from "../assistant-client.ts";
import { ServiceError } from "../errors.ts";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

let fetchMock: ReturnType<typeof vi.fn>;

beforeEach(() => {
  fetchMock = vi.fn();
  vi.stubGlobal("fetch", fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("response mapping", () => {
  it("contentId takes the last path segment", () => {
    expect(contentId("/data/screenshots/shot_1.png")).toBe("shot_1.png");
    expect(contentId("C:\\data\\clip.txt")).toBe("clip.txt");
    expect(contentId("plain.txt")).toBe("plain.txt");
  });

  it("toContentRef requires a filepath", () => {
    expect(toContentRef({ timestamp: "x" })).toBeNull();
    expect(toContentRef("nope")).toBeNull();
    expect(toContentRef({ filepath: "/d/a.png", timestamp: "2024-05-01T10:00:00" })).toEqual({
      filepath: "/d/a.png",
      filename: "a.png",
      timestamp: "2024-05-01T10:00:00",
      content_preview: undefined,
    });
  });

  it("toStatus fills missing fields", () => {
    expect(toStatus(null)).toEqual({ running: false, microphone_available: false, screenshots: [], clipboard_items: [] });
    const status = toStatus({ running: true, screenshots: [{ filepath: "/d/a.png" }, { bogus: 1 }] });
    expect(status.running).toBe(true);
    expect(status.screenshots.map((s) => s.filename)).toEqual(["a.png"]);
  });
});

describe("AssistantClient", () => {
  it("GETs /status from the base URL", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ running: true, microphone_available: true }));
    const client = new AssistantClient("http://assistant.test/");
    const status = await client.getStatus();
    expect(fetchMock).toHaveBeenCalledWith("http://assistant.test/status");
    expect(status.microphone_available).toBe(true);
  });

  it("maps legacy start/stop answers", async () => {
    const client = new AssistantClient();
    fetchMock.mockResolvedValueOnce(jsonResponse({ status: "started" }));
    expect(await client.start()).toEqual({ running: true, success: undefined, message: undefined });

    fetchMock.mockResolvedValueOnce(jsonResponse({ status: "not_running" }));
    expect((await client.stop()).running).toBe(false);

    fetchMock.mockResolvedValueOnce(jsonResponse({ status: "failed", error: "no microphone" }));
    expect(await client.start()).toEqual({ running: false, success: false, message: "no microphone" });
  });

  it("rejects with ServiceError on a non-2xx response", async () => {
    fetchMock.mockResolvedValue(new Response("oops", { status: 500, statusText: "Internal Server Error" }));
    const client = new AssistantClient();
    const err = await client.getStatus().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ServiceError);
    expect(err).toMatchObject({ status: 500, path: "/status" });
  });

  it("posts commands form-encoded", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ success: true, message: "Opened" }));
    const client = new AssistantClient("http://assistant.test");
    await expect(client.sendCommand("open last screenshot")).resolves.toEqual({ success: true, message: "Opened" });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://assistant.test/command");
    expect(init.method).toBe("POST");
    expect(init.body).toBe("command=open+last+screenshot");
  });

  it("uploads a browser screenshot as multipart", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ success: true, message: "Saved", filepath: "/d/s.png" }));
    const client = new AssistantClient();
    const resp = await client.takeScreenshot(new Blob(["png"], { type: "image/png" }));
    const init = fetchMock.mock.calls[0][1];
    expect(init.body).toBeInstanceOf(FormData);
    expect(init.body.has("screenshot")).toBe(true);
    expect(resp).toEqual({ success: true, message: "Saved", filepath: "/d/s.png", content_preview: undefined, content_type: undefined });
  });

  it("asks the service to capture when no image is given", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ success: true, message: "Saved", filepath: "" }));
    const client = new AssistantClient();
    const resp = await client.takeScreenshot();
    expect(fetchMock.mock.calls[0][1].body).toBeUndefined();
    expect(resp.filepath).toBeUndefined();
  });

  it("uploads clipboard text fields", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ success: true, message: "Clipboard captured" }));
    const client = new AssistantClient();
    await client.uploadClipboard({ content: "hello", type: "text", mimeType: "text/plain" });
    const form = fetchMock.mock.calls[0][1].body;
    expect(form.get("content")).toBe("hello");
    expect(form.get("type")).toBe("text");
    expect(form.get("mime_type")).toBe("text/plain");
    expect(form.has("filename")).toBe(false);
  });

  it("requests a server-side clipboard read as JSON", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ success: true, message: "ok" }));
    const client = new AssistantClient();
    await client.senseSystemClipboard();
    const init = fetchMock.mock.calls[0][1];
    expect(JSON.parse(init.body)).toEqual({ fallback: true, use_system_clipboard: true });
  });

  it("builds content and QR URLs from the file name", () => {
    const client = new AssistantClient("http://assistant.test");
    const ref = { filepath: "/data/shots/my shot.png" };
    expect(client.contentUrl("screenshot", ref)).toBe("http://assistant.test/screenshot/my%20shot.png");
    expect(client.qrUrl("clipboard", ref)).toBe("http://assistant.test/qr/clipboard/my%20shot.png");
  });

  it("downloads clipboard text", async () => {
    fetchMock.mockResolvedValue(new Response("copied words"));
    const client = new AssistantClient();
    await expect(client.fetchClipboardText({ filepath: "/d/c.txt" })).resolves.toBe("copied words");
    expect(fetchMock).toHaveBeenCalledWith("/clipboard/c.txt");
  });
});
