export const COLLECTIONS = {
  SOURCES: "sources",
  VENUES: "venues",
  ACTIVITIES: "activities",
  ACTIVITY_TAGS: "activity_tags",
  INGESTION_RUNS: "ingestion_runs",
} as const;

/** Firestore caps a write batch at 500 operations. */
export const BATCH_SIZE = 500;
