import { Button } from "@/components/ui/button.tsx";
import { Camera, ClipboardCopy, Loader2 } from "lucide-react";
import type { ContentKind } from "@/lib/assistant-types.ts";

interface CaptureControlsProps {
  capturing: ContentKind | null;
  disabled: boolean;
  onScreenshot: () => void;
  onClipboard: () => void;
}

export function CaptureControls({ capturing, disabled, onScreenshot, onClipboard }: CaptureControlsProps) {
  const busy = capturing !== null;
  return (
    <div className="flex flex-wrap gap-2">
      <Button size="sm" variant="secondary" disabled={disabled || busy} onClick={onScreenshot}>
        {capturing === "screenshot" ? <Loader2 className="h-3.5 w-3.5 animate-spin" /> : <Camera className="h-3.5 w-3.5" />}
        Take Screenshot
      </Button>
      <Button size="sm" variant="secondary" disabled={disabled || busy} onClick={onClipboard}>
        {capturing === "clipboard" ? <Loader2 className="h-3.5 w-3.5 animate-spin" /> : <ClipboardCopy className="h-3.5 w-3.5" />}
        Sense Clipboard
      </Button>
    </div>
  );
}
