import { useEffect, useState } from "react";
import { Button } from "@/components/ui/button.tsx";
import { Card, CardHeader, CardTitle, CardContent } from "@/components/ui/card.tsx";
import { SUPPORTED_LANGUAGES, type VoiceSettings } from "@/lib/assistant-types.ts";

interface VoiceSettingsFormProps {
  settings: VoiceSettings;
  onSave: (settings: VoiceSettings) => void;
}

export function VoiceSettingsForm({ settings, onSave }: VoiceSettingsFormProps) {
  const [draft, setDraft] = useState<VoiceSettings>(settings);

  // Saved values are normalised by the store; show what was stored
  useEffect(() => setDraft(settings), [settings]);

  const set = <K extends keyof VoiceSettings>(key: K, value: VoiceSettings[K]) =>
    setDraft((d) => ({ ...d, [key]: value }));

  return (
    <Card>
      <CardHeader>
        <CardTitle>Voice Settings</CardTitle>
      </CardHeader>
      <CardContent>
        <form
          className="space-y-3 text-sm"
          onSubmit={(e) => {
            e.preventDefault();
            onSave(draft);
          }}
        >
          <label className="block space-y-1">
            <span className="text-xs text-muted-foreground">Language</span>
            <select
              value={draft.language}
              onChange={(e) => set("language", e.target.value)}
              className="w-full rounded-md border border-input bg-background px-2 py-1"
            >
              {SUPPORTED_LANGUAGES.map((l) => (
                <option key={l.code} value={l.code}>{l.label}</option>
              ))}
            </select>
          </label>

          <label className="block space-y-1">
            <span className="text-xs text-muted-foreground">Wake word</span>
            <input
              value={draft.wakeWord}
              onChange={(e) => set("wakeWord", e.target.value)}
              className="w-full rounded-md border border-input bg-background px-2 py-1"
            />
          </label>

          <label className="block space-y-1">
            <span className="text-xs text-muted-foreground">Sensitivity: {draft.sensitivity}</span>
            <input
              type="range"
              min={0}
              max={100}
              value={draft.sensitivity}
              onChange={(e) => set("sensitivity", Number(e.target.value))}
              className="w-full"
            />
          </label>

          <label className="flex items-center gap-2">
            <input
              type="checkbox"
              checked={draft.continualListening}
              onChange={(e) => set("continualListening", e.target.checked)}
            />
            <span>Keep listening after each session ends</span>
          </label>

          <label className="flex items-center gap-2">
            <input
              type="checkbox"
              checked={draft.spokenFeedback}
              onChange={(e) => set("spokenFeedback", e.target.checked)}
            />
            <span>Speak replies aloud</span>
          </label>

          <Button size="sm" type="submit">Save Settings</Button>
        </form>
      </CardContent>
    </Card>
  );
}
