/**
 * App.tsx — Root component for the OMIFI companion dashboard.
 *
 * Wires the AssistantController (via useAssistant) to the panels arranged
 * in the dashboard layout (assistant, content and voice sections).
 */

import { useCallback } from "react";
import { AppLayout } from "@/components/layout/app-layout.tsx";
import { StatusCard } from "@/components/status/status-card.tsx";
import { CaptureControls } from "@/components/capture/capture-controls.tsx";
import { ContentList } from "@/components/content/content-list.tsx";
import { VoicePanel } from "@/components/voice/voice-panel.tsx";
import { VoiceSettingsForm } from "@/components/voice/voice-settings-form.tsx";
import { TrainingPanel } from "@/components/voice/training-panel.tsx";
import { NotificationStack } from "@/components/notifications/notification-stack.tsx";
import { ActivityPanel } from "@/components/activity/activity-panel.tsx";
import { CapabilityBanner } from "@/components/capabilities/capability-banner.tsx";
import { useActivityLog, useAssistant, useNotifications } from "@/hooks/use-assistant.ts";
import { mergeContent } from "@/lib/assistant-controller.ts";
import type { VoiceSettings } from "@/lib/assistant-types.ts";
import { Radio } from "lucide-react";

function App() {
  const { controller, app, poller, voice, settings, training } = useAssistant();
  const notifications = useNotifications(controller);
  const activity = useActivityLog(controller);

  const handleToggleAssistant = useCallback(() => {
    void controller.toggleAssistant();
  }, [controller]);

  const handleScreenshot = useCallback(() => {
    void controller.takeScreenshot();
  }, [controller]);

  const handleClipboard = useCallback(() => {
    void controller.captureClipboard();
  }, [controller]);

  const handleCommand = useCallback((text: string) => {
    void controller.submitCommand(text);
  }, [controller]);

  const handleToggleVoice = useCallback(() => {
    void controller.toggleVoice();
  }, [controller]);

  const handleReconnect = useCallback(() => {
    void controller.reconnectMicrophone();
  }, [controller]);

  const handleSaveSettings = useCallback((next: VoiceSettings) => {
    controller.saveSettings(next);
  }, [controller]);

  const screenshots = mergeContent(poller.status, app.recentCaptures, "screenshot");
  const clipboardItems = mergeContent(poller.status, app.recentCaptures, "clipboard");

  return (
    <AppLayout
      header={
        <div className="flex items-center gap-2">
          <Radio className="h-5 w-5 text-primary" />
          <h1 className="text-base font-semibold">OMIFI</h1>
          <span className="text-xs text-muted-foreground">companion · build {__BUILD_NUMBER__}</span>
        </div>
      }
      banner={<CapabilityBanner />}
      assistant={
        <>
          <StatusCard state={poller} onToggle={handleToggleAssistant} />
          <CaptureControls
            capturing={app.capturing}
            disabled={poller.toggling}
            onScreenshot={handleScreenshot}
            onClipboard={handleClipboard}
          />
        </>
      }
      content={
        <>
          <ContentList kind="screenshot" title="Screenshots" items={screenshots} client={controller.client} />
          <ContentList kind="clipboard" title="Clipboard" items={clipboardItems} client={controller.client} />
        </>
      }
      voice={
        <>
          <VoicePanel
            voice={voice}
            supported={controller.gate.isSupported()}
            onToggle={handleToggleVoice}
            onReconnect={handleReconnect}
            onCommand={handleCommand}
          />
          <VoiceSettingsForm settings={settings} onSave={handleSaveSettings} />
          <TrainingPanel training={training} trainer={controller.trainer} wakeWord={settings.wakeWord} />
        </>
      }
      activity={<ActivityPanel entries={activity} onClear={() => controller.log.clear()} />}
      overlay={
        <NotificationStack notifications={notifications} onDismiss={(id) => controller.notifications.dismiss(id)} />
      }
    />
  );
}

export default App;
