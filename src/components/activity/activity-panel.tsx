import { useEffect, useRef, useState } from "react";
import { Button } from "@/components/ui/button.tsx";
import { Card, CardHeader, CardTitle, CardContent } from "@/components/ui/card.tsx";
import { ChevronDown, Trash2 } from "lucide-react";
import { cn } from "@/lib/utils.ts";
import type { ActivityEntry, LogLevel } from "@/lib/activity-log.ts";
import { formatTimestamp, formatTimezoneLabel, type TimezoneMode } from "@/lib/format-time.ts";

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "text-muted-foreground",
  info: "text-foreground",
  warn: "text-yellow-400",
  error: "text-red-400",
};

interface ActivityPanelProps {
  entries: ActivityEntry[];
  onClear: () => void;
}

export function ActivityPanel({ entries, onClear }: ActivityPanelProps) {
  const [open, setOpen] = useState(true);
  const [showDebug, setShowDebug] = useState(false);
  const [timezone, setTimezone] = useState<TimezoneMode>("local");
  const bottomRef = useRef<HTMLDivElement>(null);

  const visible = showDebug ? entries : entries.filter((e) => e.level !== "debug");

  useEffect(() => {
    bottomRef.current?.scrollIntoView({ behavior: "smooth" });
  }, [visible.length]);

  return (
    <Card className="rounded-none border-0">
      <CardHeader className="pb-2">
        <div className="flex items-center justify-between">
          <button className="flex items-center gap-2" onClick={() => setOpen(!open)}>
            <CardTitle>Activity</CardTitle>
            <span className="text-xs text-muted-foreground">{visible.length} entries</span>
            <ChevronDown className={cn("h-4 w-4 transition-transform", open && "rotate-180")} />
          </button>
          <div className="flex items-center gap-2 text-[10px]">
            <label className="flex items-center gap-1">
              <input type="checkbox" checked={showDebug} onChange={(e) => setShowDebug(e.target.checked)} />
              debug
            </label>
            <button
              className="rounded border border-border px-1.5 py-0.5"
              onClick={() => setTimezone(timezone === "local" ? "utc" : "local")}
            >
              {formatTimezoneLabel(timezone)}
            </button>
            <Button size="icon" variant="ghost" className="h-6 w-6" title="Clear" onClick={onClear}>
              <Trash2 className="h-3 w-3" />
            </Button>
          </div>
        </div>
      </CardHeader>
      {open && (
        <CardContent>
          <div className="max-h-[140px] space-y-0.5 overflow-y-auto font-mono text-[10px]">
            {visible.length === 0 && <div className="text-muted-foreground italic">No activity yet.</div>}
            {visible.map((e) => (
              <div key={e.id} className="flex gap-1.5">
                <span className="shrink-0 text-muted-foreground/60">{formatTimestamp(e.timestampMs, timezone)}</span>
                <span className="w-24 shrink-0 truncate text-muted-foreground/80">{e.source}</span>
                <span className={cn("min-w-0 break-words", LEVEL_COLORS[e.level])}>{e.message}</span>
              </div>
            ))}
            <div ref={bottomRef} />
          </div>
        </CardContent>
      )}
    </Card>
  );
}
