import type { ReactNode } from "react";
import { Button } from "@/components/ui/button.tsx";
import { Card, CardHeader, CardTitle, CardContent } from "@/components/ui/card.tsx";
import { Loader2, Mic, MicOff, Play, Square } from "lucide-react";
import { cn } from "@/lib/utils.ts";
import { formatTimestamp } from "@/lib/format-time.ts";
import { isMicrophoneAvailable, type StatusPollerState } from "@/lib/status-poller.ts";

interface StatusCardProps {
  state: StatusPollerState;
  onToggle: () => void;
}

function Badge({ ok, children }: { ok: boolean; children: ReactNode }) {
  return (
    <span
      className={cn(
        "inline-flex items-center gap-1 rounded-full px-2 py-0.5 text-xs font-medium",
        ok ? "bg-green-500/15 text-green-400" : "bg-red-500/15 text-red-400",
      )}
    >
      {children}
    </span>
  );
}

export function StatusCard({ state, onToggle }: StatusCardProps) {
  const { status, toggling, loaded, lastUpdatedAt } = state;
  const micOk = isMicrophoneAvailable(state);

  return (
    <Card>
      <CardHeader>
        <CardTitle>Assistant</CardTitle>
      </CardHeader>
      <CardContent className="space-y-3">
        <div className="flex flex-wrap items-center gap-2">
          <Badge ok={status.running}>{status.running ? "Running" : "Stopped"}</Badge>
          <Badge ok={micOk}>
            {micOk ? <Mic className="h-3 w-3" /> : <MicOff className="h-3 w-3" />}
            {micOk ? "Microphone available" : "No microphone"}
          </Badge>
          {!loaded && <span className="text-xs text-muted-foreground">Connecting to service...</span>}
        </div>

        <Button
          size="sm"
          variant={status.running ? "destructive" : "default"}
          disabled={toggling}
          onClick={onToggle}
        >
          {toggling ? (
            <Loader2 className="h-3.5 w-3.5 animate-spin" />
          ) : status.running ? (
            <Square className="h-3.5 w-3.5" />
          ) : (
            <Play className="h-3.5 w-3.5" />
          )}
          {status.running ? "Stop Assistant" : "Start Assistant"}
        </Button>

        {lastUpdatedAt !== null && (
          <div className="text-[10px] text-muted-foreground">
            Updated {formatTimestamp(lastUpdatedAt, "local")}
          </div>
        )}
      </CardContent>
    </Card>
  );
}
