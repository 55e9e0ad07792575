import { registerAdapter } from "../registry";
import { metTeensAdapter } from "./met";
import { mfaProgramsAdapter } from "./mfa";
import { momaKidsAdapter, momaTeensAdapter } from "./moma";
import { whitneyTeensAdapter } from "./whitney";

export function registerAllAdapters(): void {
  registerAdapter(metTeensAdapter);
  registerAdapter(momaTeensAdapter);
  registerAdapter(momaKidsAdapter);
  registerAdapter(mfaProgramsAdapter);
  registerAdapter(whitneyTeensAdapter);
}

export { metTeensAdapter, momaTeensAdapter, momaKidsAdapter, mfaProgramsAdapter, whitneyTeensAdapter };
