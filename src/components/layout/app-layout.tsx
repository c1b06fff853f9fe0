/**
 * app-layout.tsx — Top-level layout for the OMIFI dashboard.
 *
 * Desktop (md and up):
 *   ┌──────────────── Header ────────────────┐
 *   ├──────────────── Banner ────────────────┤
 *   ├─ Assistant (pinned) ─┬─ Content ───────┤
 *   ├─ Voice (scrolls) ────┤  (scrolls)      │
 *   ├──────────────────────┴─────────────────┤
 *   │               Activity                 │
 *   └────────────────────────────────────────┘
 *
 * On phones everything scrolls as one column in the order assistant,
 * content, voice, so captures show up right under the capture buttons.
 * The overlay (notifications) floats above the page.
 */

import type { ReactNode } from "react";

interface AppLayoutProps {
  header: ReactNode;
  /** Full-width notice above the columns; omitted when null. */
  banner?: ReactNode;
  /** Service status and capture buttons. */
  assistant: ReactNode;
  /** Screenshot and clipboard lists. */
  content: ReactNode;
  /** Voice control, settings and training. */
  voice: ReactNode;
  activity: ReactNode;
  overlay?: ReactNode;
}

export function AppLayout({ header, banner, assistant, content, voice, activity, overlay }: AppLayoutProps) {
  return (
    <div className="flex flex-col h-screen overflow-hidden">
      <header className="shrink-0 border-b bg-card/50 px-4 py-2">
        {header}
      </header>

      {banner && <div className="shrink-0 px-4 pt-3">{banner}</div>}

      <main className="flex-1 min-h-0 overflow-y-auto md:overflow-hidden md:grid md:grid-cols-[2fr_3fr] md:grid-rows-[auto_minmax(0,1fr)]">
        <section className="p-4 space-y-4 md:col-start-1 md:row-start-1 md:border-r">
          {assistant}
        </section>
        <section className="p-4 space-y-4 md:col-start-2 md:row-start-1 md:row-span-2 md:overflow-y-auto">
          {content}
        </section>
        <section className="p-4 pt-0 md:pt-4 space-y-4 md:col-start-1 md:row-start-2 md:border-r md:border-t md:overflow-y-auto">
          {voice}
        </section>
      </main>

      <footer className="shrink-0 border-t max-h-[220px] overflow-hidden">
        {activity}
      </footer>

      {overlay}
    </div>
  );
}
