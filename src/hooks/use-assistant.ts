/**
 * use-assistant.ts — React hook that bridges AssistantController to React state.
 *
 * One controller lives for the lifetime of the app. Each of its stores is
 * read with useSyncExternalStore; every getter returns a referentially
 * stable snapshot, so components only re-render when that store changed.
 */

import { useCallback, useEffect, useRef, useSyncExternalStore } from "react";
import { AssistantController, browserControllerDeps } from "@/lib/assistant-controller.ts";
import { ActivityLog } from "@/lib/activity-log.ts";
import { ActivationTone } from "@/lib/activation-tone.ts";
import { loadConfig } from "@/lib/assistant-config.ts";
import { SpokenFeedback } from "@/lib/spoken-feedback.ts";

function createController(): AssistantController {
  const config = loadConfig();
  const log = new ActivityLog();
  const speaker = new SpokenFeedback({
    onFallback: (reason) => log.warn("SpokenFeedback", `Using SpeechSynthesis: ${reason}`),
  });
  const tone = new ActivationTone((message) => log.warn("ActivationTone", `Tone failed: ${message}`));
  return new AssistantController({ ...browserControllerDeps(config, { speaker, tone }), log });
}

export function useAssistant() {
  const controllerRef = useRef<AssistantController | null>(null);
  if (!controllerRef.current) {
    controllerRef.current = createController();
  }
  const controller = controllerRef.current;

  useEffect(() => {
    controller.start();
    return () => controller.dispose();
  }, [controller]);

  const app = useSyncExternalStore(
    useCallback((cb: () => void) => controller.subscribe(cb), [controller]),
    useCallback(() => controller.getState(), [controller]),
  );

  const poller = useSyncExternalStore(
    useCallback((cb: () => void) => controller.poller.subscribe(cb), [controller]),
    useCallback(() => controller.poller.getState(), [controller]),
  );

  const voice = useSyncExternalStore(
    useCallback((cb: () => void) => controller.gate.subscribe(cb), [controller]),
    useCallback(() => controller.gate.getSnapshot(), [controller]),
  );

  const settings = useSyncExternalStore(
    useCallback((cb: () => void) => controller.settings.subscribe(cb), [controller]),
    useCallback(() => controller.settings.get(), [controller]),
  );

  const training = useSyncExternalStore(
    useCallback((cb: () => void) => controller.trainer.subscribe(cb), [controller]),
    useCallback(() => controller.trainer.getSnapshot(), [controller]),
  );

  return { controller, app, poller, voice, settings, training };
}

/** Notification stack, independent of the rest so toasts don't re-render panels. */
export function useNotifications(controller: AssistantController) {
  return useSyncExternalStore(
    useCallback((cb: () => void) => controller.notifications.subscribe(cb), [controller]),
    useCallback(() => controller.notifications.getAll(), [controller]),
  );
}

export function useActivityLog(controller: AssistantController) {
  return useSyncExternalStore(
    useCallback((cb: () => void) => controller.log.subscribe(cb), [controller]),
    useCallback(() => controller.log.getAll(), [controller]),
  );
}

export type UseAssistantReturn = ReturnType<typeof useAssistant>;
