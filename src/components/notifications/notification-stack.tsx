import { X } from "lucide-react";
import { cn } from "@/lib/utils.ts";
import type { AppNotification, NotificationLevel } from "@/lib/assistant-types.ts";

const LEVEL_CLASSES: Record<NotificationLevel, string> = {
  info: "border-sky-500/40 bg-sky-500/10 text-sky-200",
  success: "border-green-500/40 bg-green-500/10 text-green-200",
  warning: "border-yellow-500/40 bg-yellow-500/10 text-yellow-200",
  danger: "border-red-500/40 bg-red-500/10 text-red-200",
};

interface NotificationStackProps {
  notifications: AppNotification[];
  onDismiss: (id: number) => void;
}

export function NotificationStack({ notifications, onDismiss }: NotificationStackProps) {
  if (notifications.length === 0) return null;
  return (
    <div className="fixed right-4 top-4 z-50 flex w-80 flex-col gap-2" role="status" aria-live="polite">
      {notifications.map((n) => (
        <div key={n.id} className={cn("rounded-md border p-3 text-xs shadow-lg backdrop-blur", LEVEL_CLASSES[n.level])}>
          <div className="flex items-start gap-2">
            <div className="min-w-0 flex-1 break-words">{n.message}</div>
            <button className="shrink-0 opacity-70 hover:opacity-100" onClick={() => onDismiss(n.id)} aria-label="Dismiss">
              <X className="h-3.5 w-3.5" />
            </button>
          </div>
          {n.imageUrl && <img src={n.imageUrl} alt="QR code" className="mt-2 h-28 w-28 rounded bg-white p-1" />}
          {n.actions.length > 0 && (
            <div className="mt-2 flex gap-3">
              {n.actions.map((a) => (
                <a key={a.href} href={a.href} target="_blank" rel="noreferrer" className="underline">
                  {a.label}
                </a>
              ))}
            </div>
          )}
        </div>
      ))}
    </div>
  );
}
