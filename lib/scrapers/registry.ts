import type { SourceAdapter } from "./types";

const adapters = new Map<string, SourceAdapter>();

export function registerAdapter(adapter: SourceAdapter): void {
  if (adapters.has(adapter.id)) return;
  adapters.set(adapter.id, adapter);
}

export function getAdapters(): SourceAdapter[] {
  return [...adapters.values()];
}

export function getAdapterById(id: string): SourceAdapter | undefined {
  return adapters.get(id);
}
