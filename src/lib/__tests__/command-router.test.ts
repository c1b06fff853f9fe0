import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { CommandRouter, classifyCommand, parseUtterance, type CommandRouterDeps } from "../command-router.ts";
import { ActivityLog } from "../activity-log.ts";
import { NotificationCenter } from "../notification-center.ts";

describe("classifyCommand", () => {
  it.each([
    ["take a screenshot", "take-screenshot"],
    ["Hey, take a screenshot please", "take-screenshot"],
    ["capture the screen", "take-screenshot"],
    ["screen shot", "take-screenshot"],
    ["take a picture", "take-screenshot"],
    ["Screenshot.", "take-screenshot"],
    ["sense clipboard", "sense-clipboard"],
    ["check my clipboard", "sense-clipboard"],
    ["what's in my clipboard", "sense-clipboard"],
    ["what have I copied", "sense-clipboard"],
    ["clipboard", "sense-clipboard"],
    ["show me the last screenshot", "open-screenshot"],
    ["open last screenshot", "open-screenshot"],
    ["display the last screen", "open-screenshot"],
    ["read clipboard", "read-clipboard"],
    ["tell me the clipboard", "read-clipboard"],
    ["help", "help"],
    ["what can I do", "help"],
    ["open the browser", "forward"],
    ["", "forward"],
  ] as const)("%s → %s", (text, action) => {
    expect(classifyCommand(text)).toBe(action);
  });

  it("first matching rule wins when several match", () => {
    // take+screenshot (rule 1) and show+screenshot (rule 3) both match
    expect(classifyCommand("show and take a screenshot")).toBe("take-screenshot");
    // clipboard+content (rule 2) beats read+clipboard (rule 4)
    expect(classifyCommand("read the clipboard content")).toBe("sense-clipboard");
  });

  it.each([
    ["take screenshots", "take-screenshot"],
    ["capture screenshot", "take-screenshot"],
    ["show my screenshots", "open-screenshot"],
    ["check the clipboards", "sense-clipboard"],
    ["reading my clipboard", "read-clipboard"],
  ] as const)("keywords match plurals and compounds: %s → %s", (text, action) => {
    expect(classifyCommand(text)).toBe(action);
  });

  it("matches keywords at the start of a word only", () => {
    expect(parseUtterance("Show me the LAST screenshot!").words).toEqual(["show", "me", "the", "last", "screenshot"]);
    // "shot" does not start "screenshot", so screen+shot stays unmatched
    expect(classifyCommand("show me the last screenshot")).toBe("open-screenshot");
    expect(classifyCommand("screenshots are great")).toBe("forward");
  });
});

describe("CommandRouter", () => {
  let notifications: NotificationCenter;
  let deps: CommandRouterDeps;
  let sendCommand: ReturnType<typeof vi.fn>;
  let takeScreenshot: ReturnType<typeof vi.fn>;
  let senseClipboard: ReturnType<typeof vi.fn>;
  let speak: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    vi.useFakeTimers();
    notifications = new NotificationCenter();
    sendCommand = vi.fn().mockResolvedValue({ success: true, message: "Opened screenshot" });
    takeScreenshot = vi.fn().mockResolvedValue(undefined);
    senseClipboard = vi.fn().mockResolvedValue(undefined);
    speak = vi.fn();
    deps = {
      sendCommand,
      handlers: { takeScreenshot, senseClipboard },
      notifications,
      log: new ActivityLog({ mirrorToConsole: false }),
      speak,
    };
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("runs the screenshot handler without calling the service", async () => {
    const router = new CommandRouter(deps);
    await expect(router.route("take a screenshot")).resolves.toBe("take-screenshot");
    expect(takeScreenshot).toHaveBeenCalledTimes(1);
    expect(sendCommand).not.toHaveBeenCalled();
  });

  it("runs the clipboard handler", async () => {
    const router = new CommandRouter(deps);
    await router.route("get clipboard");
    expect(senseClipboard).toHaveBeenCalledTimes(1);
  });

  it("sends the canonical phrase for open-screenshot", async () => {
    const router = new CommandRouter(deps);
    await expect(router.route("show me the last screenshot")).resolves.toBe("open-screenshot");
    expect(sendCommand).toHaveBeenCalledWith("open last screenshot");
    expect(notifications.getAll()[0]).toMatchObject({ level: "success", message: "Opened screenshot" });
    expect(speak).toHaveBeenCalledWith("Opened screenshot");
  });

  it("sends the canonical phrase for read-clipboard", async () => {
    const router = new CommandRouter(deps);
    await router.route("please read my clipboard");
    expect(sendCommand).toHaveBeenCalledWith("read clipboard");
  });

  it("shows help without a service call", async () => {
    const router = new CommandRouter(deps);
    await expect(router.route("help")).resolves.toBe("help");
    expect(sendCommand).not.toHaveBeenCalled();
    expect(notifications.getAll()[0]).toMatchObject({
      level: "info",
      message: "Available commands: Take a screenshot, Sense clipboard, Read clipboard, Show last screenshot",
    });
    expect(speak).toHaveBeenCalledWith("You can say: Take a screenshot, Sense clipboard, Read clipboard, Show last screenshot.");
  });

  it("forwards unknown commands verbatim", async () => {
    sendCommand.mockResolvedValue({ success: true, message: "Done that" });
    const router = new CommandRouter(deps);
    await expect(router.route("  open the browser ")).resolves.toBe("forward");
    expect(sendCommand).toHaveBeenCalledWith("open the browser");
    expect(notifications.getAll()[0]).toMatchObject({ level: "success", message: "Done that" });
  });

  it("reports an unrecognized command when the service declines", async () => {
    sendCommand.mockResolvedValue({ success: false, message: "" });
    const router = new CommandRouter(deps);
    await router.route("open the garage");
    expect(notifications.getAll()[0]).toMatchObject({ level: "warning", message: "Command not recognized: open the garage" });
  });

  it("reports an unrecognized command when the service is unreachable", async () => {
    sendCommand.mockRejectedValue(new TypeError("Failed to fetch"));
    const router = new CommandRouter(deps);
    await expect(router.route("open the garage")).resolves.toBe("forward");
    expect(notifications.getAll()[0]).toMatchObject({ level: "warning", message: "Command not recognized: open the garage" });
  });

  it("shows a danger notification when a canonical command fails", async () => {
    sendCommand.mockResolvedValue({ success: false, message: "No screenshots yet" });
    const router = new CommandRouter(deps);
    await router.route("open screenshot");
    expect(notifications.getAll()[0]).toMatchObject({ level: "danger", message: "No screenshots yet" });
  });

  it("never rejects when a handler throws", async () => {
    takeScreenshot.mockRejectedValue(new Error("boom"));
    const router = new CommandRouter(deps);
    await expect(router.route("take a screenshot")).resolves.toBe("take-screenshot");
    expect(notifications.getAll()[0]).toMatchObject({ level: "danger", message: 'Could not run "take a screenshot"' });
  });

  it("ignores blank input", async () => {
    const router = new CommandRouter(deps);
    await expect(router.route("   ")).resolves.toBeNull();
    expect(sendCommand).not.toHaveBeenCalled();
  });
});
