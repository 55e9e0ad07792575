import { initializeApp, getApps, cert, type App, type ServiceAccount } from "firebase-admin/app";
import { getFirestore, type Firestore } from "firebase-admin/firestore";
import { readFileSync } from "fs";
import { isAbsolute, join } from "path";

function parseServiceAccount(json: string, origin: string): ServiceAccount | null {
  try {
    const parsed: unknown = JSON.parse(json);
    if (parsed == null || typeof parsed !== "object") return null;
    const projectId = "project_id" in parsed && typeof parsed.project_id === "string" ? parsed.project_id : undefined;
    const clientEmail =
      "client_email" in parsed && typeof parsed.client_email === "string" ? parsed.client_email : undefined;
    const privateKey = "private_key" in parsed && typeof parsed.private_key === "string" ? parsed.private_key : undefined;
    return { projectId, clientEmail, privateKey };
  } catch (e) {
    console.error(`[firebase] could not parse service account from ${origin}:`, e);
    return null;
  }
}

function getCredential(): ServiceAccount | null {
  const path = process.env.FIREBASE_SERVICE_ACCOUNT_PATH?.trim();
  if (path) {
    const resolved = isAbsolute(path) ? path : join(process.cwd(), path);
    try {
      return parseServiceAccount(readFileSync(resolved, "utf-8"), resolved);
    } catch (e) {
      console.error(`[firebase] could not read ${resolved}:`, e);
      return null;
    }
  }
  const key = process.env.FIREBASE_SERVICE_ACCOUNT_KEY?.trim();
  if (key) return parseServiceAccount(key, "FIREBASE_SERVICE_ACCOUNT_KEY");
  return null;
}

let cached: Firestore | null | undefined;

/**
 * The catalog's Firestore handle, initialized on first use. Null when the app
 * cannot be initialized; callers that need the catalog report that and stop.
 */
export function getAdminDb(): Firestore | null {
  if (cached !== undefined) return cached;
  const existing = getApps();
  if (existing.length > 0) {
    cached = getFirestore(existing[0]);
    return cached;
  }
  const projectId = process.env.FIREBASE_PROJECT_ID?.trim() || undefined;
  const cred = getCredential();
  if (!cred && !process.env.FIRESTORE_EMULATOR_HOST) {
    console.warn(
      "[firebase] No service account credential loaded. Set FIREBASE_SERVICE_ACCOUNT_PATH (path to JSON key file) or FIREBASE_SERVICE_ACCOUNT_KEY (JSON string). Without it, Firestore will return UNAUTHENTICATED.",
      { projectId: projectId ?? "(missing)" }
    );
  }
  try {
    const app: App = initializeApp({
      projectId,
      ...(cred ? { credential: cert(cred) } : {}),
    });
    cached = getFirestore(app);
  } catch (e) {
    console.error("[firebase] Admin init error:", e);
    cached = null;
  }
  return cached;
}
