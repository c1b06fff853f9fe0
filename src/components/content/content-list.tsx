/**
 * content-list.tsx — Screenshots or clipboard items the service has stored.
 *
 * Each entry links to the raw content, a download, and a QR code of the
 * download URL for opening it on another device. Clipboard text can be read
 * inline.
 */

import { useState } from "react";
import { Button } from "@/components/ui/button.tsx";
import { Card, CardHeader, CardTitle, CardContent } from "@/components/ui/card.tsx";
import { Download, ExternalLink, FileText, QrCode } from "lucide-react";
import type { AssistantClient } from "@/lib/assistant-client.ts";
import type { ContentKind, ContentRef } from "@/lib/assistant-types.ts";
import { truncatePreview } from "@/lib/capture-dispatcher.ts";
import { errorMessage } from "@/lib/errors.ts";
import { formatCaptureTime } from "@/lib/format-time.ts";

interface ContentListProps {
  kind: ContentKind;
  title: string;
  items: ContentRef[];
  client: AssistantClient;
}

interface TextView {
  filepath: string;
  text: string;
}

export function ContentList({ kind, title, items, client }: ContentListProps) {
  const [qrFor, setQrFor] = useState<string | null>(null);
  const [textView, setTextView] = useState<TextView | null>(null);
  const [textError, setTextError] = useState<string | null>(null);

  const readText = (ref: ContentRef) => {
    setTextError(null);
    client
      .fetchClipboardText(ref)
      .then((text) => setTextView({ filepath: ref.filepath, text }))
      .catch((err: unknown) => setTextError(errorMessage(err)));
  };

  return (
    <Card>
      <CardHeader>
        <CardTitle>
          {title} <span className="text-muted-foreground font-normal">({items.length})</span>
        </CardTitle>
      </CardHeader>
      <CardContent>
        {items.length === 0 && <div className="text-xs text-muted-foreground italic">Nothing captured yet.</div>}
        <ul className="space-y-2">
          {items.map((ref) => (
            <li key={ref.filepath} className="rounded-md border border-border/60 p-2 text-xs">
              <div className="flex items-center justify-between gap-2">
                <div className="min-w-0">
                  <div className="font-medium truncate">{ref.filename}</div>
                  <div className="text-muted-foreground">{formatCaptureTime(ref.timestamp)}</div>
                </div>
                <div className="flex shrink-0 gap-1">
                  {kind === "clipboard" && (
                    <Button size="icon" variant="ghost" className="h-7 w-7" title="Read" onClick={() => readText(ref)}>
                      <FileText className="h-3.5 w-3.5" />
                    </Button>
                  )}
                  <a
                    href={client.contentUrl(kind, ref)}
                    target="_blank"
                    rel="noreferrer"
                    title="Open"
                    className="inline-flex h-7 w-7 items-center justify-center rounded-md hover:bg-muted"
                  >
                    <ExternalLink className="h-3.5 w-3.5" />
                  </a>
                  <a
                    href={client.contentUrl(kind, ref)}
                    download={ref.filename}
                    title="Download"
                    className="inline-flex h-7 w-7 items-center justify-center rounded-md hover:bg-muted"
                  >
                    <Download className="h-3.5 w-3.5" />
                  </a>
                  <Button
                    size="icon"
                    variant="ghost"
                    className="h-7 w-7"
                    title="QR code"
                    onClick={() => setQrFor(qrFor === ref.filepath ? null : ref.filepath)}
                  >
                    <QrCode className="h-3.5 w-3.5" />
                  </Button>
                </div>
              </div>
              {ref.content_preview && (
                <div className="mt-1 text-muted-foreground break-words">{truncatePreview(ref.content_preview)}</div>
              )}
              {qrFor === ref.filepath && (
                <img
                  src={client.qrUrl(kind, ref)}
                  alt={`QR code for ${ref.filename}`}
                  className="mt-2 h-32 w-32 rounded bg-white p-1"
                />
              )}
              {textView?.filepath === ref.filepath && (
                <pre className="mt-2 max-h-40 overflow-auto whitespace-pre-wrap rounded bg-muted p-2 font-mono text-[11px]">
                  {textView.text}
                </pre>
              )}
            </li>
          ))}
        </ul>
        {textError && <div className="mt-2 text-xs text-red-400">Could not load clipboard text: {textError}</div>}
      </CardContent>
    </Card>
  );
}
