// src/events.ts
//
// Filesystem notifications as the dispatcher and supervisor see them,
// independent of the watch backend that produced them.

export type EntryKind = "file" | "folder" | "any";

export type EventKind =
  | { type: "create"; entry: EntryKind }
  | { type: "modify" }
  | { type: "remove"; entry: EntryKind }
  | { type: "other" };

export interface WatchEvent {
  kind: EventKind;
  paths: string[];
  // the backend restarted its bookkeeping; the event carries no real change.
  // chokidar never sets it; backends with rescan notices do.
  rescan?: boolean;
}

export type SourceMessage =
  | { ok: true; event: WatchEvent }
  | { ok: false; error: Error };

export function createdEvent(path: string, entry: EntryKind): WatchEvent {
  return { kind: { type: "create", entry }, paths: [path] };
}

export function modifiedEvent(path: string): WatchEvent {
  return { kind: { type: "modify" }, paths: [path] };
}

export function removedEvent(path: string, entry: EntryKind): WatchEvent {
  return { kind: { type: "remove", entry }, paths: [path] };
}

export function describeEvent(event: WatchEvent): string {
  const { kind } = event;
  const label = "entry" in kind ? `${kind.type}:${kind.entry}` : kind.type;
  return event.rescan ? `${label} (rescan)` : label;
}
