/**
 * command-router.ts — Maps a free-text utterance onto one fixed action.
 *
 * The classifier is an ordered list of (action, predicate) rules; the first
 * rule that matches wins and nothing falls through. Several rules can match
 * the same utterance, so the order is the priority and must not change:
 *
 *   1. take-screenshot   take+screenshot | capture+screen | screen+shot | take+picture | "screenshot"
 *   2. sense-clipboard   (sense|get|check|save|copy)+clipboard | clipboard+content | what+(clipboard|copied) | "clipboard"
 *   3. open-screenshot   (show|open|view)+screenshot | (display|see)+last+screen
 *   4. read-clipboard    (read|say|tell|speak)+clipboard
 *   5. help              help | what+do
 *   6. forward           anything else, sent verbatim to the service
 *
 * A keyword matches any word it starts, so plurals and compounds count
 * ("take screenshots", "capture screenshot"). "shot" never starts
 * "screenshot", which keeps "show me the last screenshot" on rule 3.
 */

import type { CommandResponse } from "./assistant-types.ts";
import type { ActivityLog } from "./activity-log.ts";
import type { NotificationCenter } from "./notification-center.ts";
import { errorMessage } from "./errors.ts";

export type CommandAction =
  | "take-screenshot"
  | "sense-clipboard"
  | "open-screenshot"
  | "read-clipboard"
  | "help"
  | "forward";

export interface Utterance {
  /** Lower-cased words, punctuation removed, in order. */
  words: string[];
  /** Words re-joined with single spaces. */
  normalized: string;
}

export interface CommandRule {
  action: Exclude<CommandAction, "forward">;
  matches: (u: Utterance) => boolean;
}

export function parseUtterance(text: string): Utterance {
  const words = text.toLowerCase().split(/[^\p{L}\p{N}]+/u).filter(Boolean);
  return { words, normalized: words.join(" ") };
}

const has = (u: Utterance, keyword: string) => u.words.some((w) => w.startsWith(keyword));
const all = (u: Utterance, ...keywords: string[]) => keywords.every((k) => has(u, k));
const some = (u: Utterance, ...keywords: string[]) => keywords.some((k) => has(u, k));

export const COMMAND_RULES: readonly CommandRule[] = [
  {
    action: "take-screenshot",
    matches: (u) =>
      all(u, "take", "screenshot") ||
      all(u, "capture", "screen") ||
      all(u, "screen", "shot") ||
      all(u, "take", "picture") ||
      u.normalized === "screenshot",
  },
  {
    action: "sense-clipboard",
    matches: (u) =>
      (some(u, "sense", "get", "check", "save", "copy") && all(u, "clipboard")) ||
      all(u, "clipboard", "content") ||
      (all(u, "what") && some(u, "clipboard", "copied")) ||
      u.normalized === "clipboard",
  },
  {
    action: "open-screenshot",
    matches: (u) =>
      (some(u, "show", "open", "view") && all(u, "screenshot")) ||
      (some(u, "display", "see") && all(u, "last", "screen")),
  },
  {
    action: "read-clipboard",
    matches: (u) => some(u, "read", "say", "tell", "speak") && all(u, "clipboard"),
  },
  {
    action: "help",
    matches: (u) => all(u, "help") || all(u, "what", "do"),
  },
];

/** Pure classifier: first matching rule, or "forward". */
export function classifyCommand(text: string): CommandAction {
  const u = parseUtterance(text);
  for (const rule of COMMAND_RULES) {
    if (rule.matches(u)) return rule.action;
  }
  return "forward";
}

/** Fixed phrases sent to /command instead of the raw utterance. */
export const CANONICAL_COMMANDS = {
  "open-screenshot": "open last screenshot",
  "read-clipboard": "read clipboard",
} as const;

export const HELP_COMMANDS = [
  "Take a screenshot",
  "Sense clipboard",
  "Read clipboard",
  "Show last screenshot",
] as const;

export interface CommandHandlers {
  takeScreenshot: () => Promise<void>;
  senseClipboard: () => Promise<void>;
}

export interface CommandRouterDeps {
  sendCommand: (command: string) => Promise<CommandResponse>;
  handlers: CommandHandlers;
  notifications: NotificationCenter;
  log: ActivityLog;
  /** Optional spoken reply (help text, service messages). */
  speak?: (text: string) => void;
}

const SOURCE = "CommandRouter";

export class CommandRouter {
  private deps: CommandRouterDeps;

  constructor(deps: CommandRouterDeps) {
    this.deps = deps;
  }

  /** Classify and execute. Resolves to the action taken, or null for blank input. Never rejects. */
  async route(text: string): Promise<CommandAction | null> {
    const command = text.trim();
    if (!command) return null;

    const action = classifyCommand(command);
    this.deps.log.info(SOURCE, `"${command}" → ${action}`);

    try {
      switch (action) {
        case "take-screenshot":
          await this.deps.handlers.takeScreenshot();
          break;
        case "sense-clipboard":
          await this.deps.handlers.senseClipboard();
          break;
        case "open-screenshot":
        case "read-clipboard":
          await this.runCanonical(CANONICAL_COMMANDS[action]);
          break;
        case "help":
          this.showHelp();
          break;
        case "forward":
          await this.forward(command);
          break;
      }
    } catch (err) {
      this.deps.log.error(SOURCE, `Action ${action} failed: ${errorMessage(err)}`);
      this.deps.notifications.danger(`Could not run "${command}"`);
    }
    return action;
  }

  private async runCanonical(phrase: string) {
    let resp: CommandResponse;
    try {
      resp = await this.deps.sendCommand(phrase);
    } catch (err) {
      this.deps.log.error(SOURCE, `Command "${phrase}" failed: ${errorMessage(err)}`);
      this.deps.notifications.danger("Could not reach the assistant service");
      return;
    }
    if (resp.success) {
      this.deps.notifications.success(resp.message || "Done");
      if (resp.message) this.deps.speak?.(resp.message);
    } else {
      this.deps.notifications.danger(resp.message || `Command "${phrase}" failed`);
    }
  }

  private showHelp() {
    const list = HELP_COMMANDS.join(", ");
    this.deps.notifications.info(`Available commands: ${list}`, { durationMs: 10_000 });
    this.deps.speak?.(`You can say: ${list}.`);
  }

  private async forward(command: string) {
    let resp: CommandResponse;
    try {
      resp = await this.deps.sendCommand(command);
    } catch (err) {
      this.deps.log.warn(SOURCE, `Forwarding "${command}" failed: ${errorMessage(err)}`);
      this.deps.notifications.warning(`Command not recognized: ${command}`);
      return;
    }
    if (resp.success) {
      this.deps.notifications.success(resp.message || "Done");
      if (resp.message) this.deps.speak?.(resp.message);
    } else {
      this.deps.notifications.warning(`Command not recognized: ${command}`);
    }
  }
}
