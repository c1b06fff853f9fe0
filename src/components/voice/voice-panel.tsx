import { useState } from "react";
import { Button } from "@/components/ui/button.tsx";
import { Card, CardHeader, CardTitle, CardContent } from "@/components/ui/card.tsx";
import { Mic, MicOff, RefreshCw, Send } from "lucide-react";
import { cn } from "@/lib/utils.ts";
import type { WakeGateState, WakeWordGateSnapshot } from "@/lib/wake-word-gate.ts";

const STATE_COLOR: Record<WakeGateState, string> = {
  idle: "bg-muted-foreground/40",
  listening: "bg-green-500",
  "wake-detected": "bg-yellow-400 animate-pulse",
};

interface VoicePanelProps {
  voice: WakeWordGateSnapshot;
  supported: boolean;
  onToggle: () => void;
  onReconnect: () => void;
  onCommand: (text: string) => void;
}

export function VoicePanel({ voice, supported, onToggle, onReconnect, onCommand }: VoicePanelProps) {
  const [command, setCommand] = useState("");
  const active = voice.state !== "idle";

  const submit = () => {
    const text = command.trim();
    if (!text) return;
    onCommand(text);
    setCommand("");
  };

  return (
    <Card>
      <CardHeader>
        <CardTitle>Voice Commands</CardTitle>
      </CardHeader>
      <CardContent className="space-y-3">
        <div className="flex flex-wrap items-center gap-2">
          <Button size="sm" variant={active ? "destructive" : "default"} disabled={!supported} onClick={onToggle}>
            {active ? <MicOff className="h-3.5 w-3.5" /> : <Mic className="h-3.5 w-3.5" />}
            {active ? "Stop Listening" : "Start Listening"}
          </Button>
          {voice.reconnectAvailable && (
            <Button size="sm" variant="outline" onClick={onReconnect}>
              <RefreshCw className="h-3.5 w-3.5" />
              Reconnect Microphone
            </Button>
          )}
        </div>

        <div className="flex items-center gap-2 text-xs">
          <span className={cn("h-2 w-2 rounded-full", STATE_COLOR[voice.state])} />
          <span>{supported ? voice.statusText : "Speech recognition is not supported in this browser."}</span>
        </div>

        {(voice.interimTranscript || voice.lastTranscript) && (
          <div className="rounded bg-muted/50 p-2 font-mono text-[11px]">
            {voice.interimTranscript ? (
              <span className="text-muted-foreground">{voice.interimTranscript}</span>
            ) : (
              <span>{voice.lastTranscript}</span>
            )}
          </div>
        )}

        <form
          className="flex gap-2"
          onSubmit={(e) => {
            e.preventDefault();
            submit();
          }}
        >
          <input
            value={command}
            onChange={(e) => setCommand(e.target.value)}
            placeholder='Type a command, e.g. "take a screenshot"'
            className="flex-1 rounded-md border border-input bg-background px-2 py-1 text-sm"
          />
          <Button size="sm" type="submit" disabled={!command.trim()}>
            <Send className="h-3.5 w-3.5" />
            Send
          </Button>
        </form>
      </CardContent>
    </Card>
  );
}
