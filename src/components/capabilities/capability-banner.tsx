/**
 * capability-banner.tsx — Shows a dismissible banner with browser capability results.
 *
 * Runs detectCapabilities() on mount and displays:
 *  - Green "Browser capture and voice available" if everything passes
 *  - Yellow when some captures fall back to the assistant service
 *  - Red when everything runs through the service (e.g. not a secure context)
 *
 * Users can dismiss the banner. It stays dismissed for the session.
 */

import { useState } from "react";
import { Button } from "@/components/ui/button.tsx";
import { X, CheckCircle, AlertTriangle, XCircle, Monitor } from "lucide-react";
import {
  browserCapabilityEnvironment,
  detectCapabilities,
  type CapabilityReport,
  type CapabilityStatus,
} from "@/lib/capabilities.ts";
import { cn } from "@/lib/utils.ts";

const STATUS_ICON: Record<CapabilityStatus, typeof CheckCircle> = {
  pass: CheckCircle,
  warn: AlertTriangle,
  fail: XCircle,
};

const STATUS_COLOR: Record<CapabilityStatus, string> = {
  pass: "text-green-400",
  warn: "text-yellow-400",
  fail: "text-red-400",
};

const OVERALL: Record<CapabilityReport["overall"], { text: string; box: string; color: string }> = {
  full: {
    text: "Browser capture and voice available",
    box: "border-green-500/30 bg-green-500/5",
    color: "text-green-400",
  },
  partial: {
    text: "Some features use the assistant service instead",
    box: "border-yellow-500/30 bg-yellow-500/5",
    color: "text-yellow-400",
  },
  "server-only": {
    text: "Browser capture unavailable; everything runs through the assistant service",
    box: "border-red-500/30 bg-red-500/5",
    color: "text-red-400",
  },
};

export function CapabilityBanner() {
  const [report] = useState<CapabilityReport>(() => detectCapabilities(browserCapabilityEnvironment()));
  const [dismissed, setDismissed] = useState(false);
  const [expanded, setExpanded] = useState(false);

  if (dismissed) return null;

  const isExpanded = expanded || report.overall === "server-only";
  const overall = OVERALL[report.overall];

  return (
    <div className={cn("border rounded-md px-3 py-2 text-xs", overall.box)}>
      <div className="flex items-center justify-between gap-3">
        <button className="flex items-center gap-2 text-left flex-1" onClick={() => setExpanded(!isExpanded)}>
          <Monitor className={cn("h-3.5 w-3.5 shrink-0", overall.color)} />
          <span className={cn("font-medium", overall.color)}>{overall.text}</span>
          <span className="text-muted-foreground ml-auto shrink-0">
            {report.checks.filter((c) => c.status === "pass").length}/{report.checks.length} checks passed
          </span>
        </button>
        <Button size="icon" variant="ghost" className="h-5 w-5 shrink-0" onClick={() => setDismissed(true)}>
          <X className="h-3 w-3" />
        </Button>
      </div>

      {isExpanded && (
        <div className="mt-2 pt-2 border-t border-border/50 space-y-1">
          {report.checks.map((check) => {
            const Icon = STATUS_ICON[check.status];
            return (
              <div key={check.name} className="flex items-start gap-2">
                <Icon className={cn("h-3.5 w-3.5 mt-0.5 shrink-0", STATUS_COLOR[check.status])} />
                <div>
                  <span className="font-medium">{check.name}</span>
                  <span className="text-muted-foreground ml-1">— {check.detail}</span>
                </div>
              </div>
            );
          })}
        </div>
      )}
    </div>
  );
}
