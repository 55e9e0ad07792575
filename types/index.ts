export const FREE_VERIFICATION_STATUSES = ["confirmed", "inferred", "uncertain"] as const;
export type FreeVerificationStatus = (typeof FREE_VERIFICATION_STATUSES)[number];

export const EXTRACTION_METHODS = ["hardcoded", "llm"] as const;
export type ExtractionMethod = (typeof EXTRACTION_METHODS)[number];

export const ACTIVITY_STATUSES = ["active", "cancelled", "expired", "needs_review"] as const;
export type ActivityStatus = (typeof ACTIVITY_STATUSES)[number];

export const RUN_STATUSES = ["running", "success", "failed"] as const;
export type RunStatus = (typeof RUN_STATUSES)[number];

/** Fields that carry their own confidence in the catalog. */
export const CONFIDENCE_FIELDS = [
  "title",
  "startAt",
  "endAt",
  "freeStatus",
  "description",
  "age",
  "venue",
  "locationText",
  "activityType",
  "dropIn",
  "registrationRequired",
  "recurrenceText",
  "externalId",
] as const;
export type ConfidenceField = (typeof CONFIDENCE_FIELDS)[number];
export type FieldConfidence = Partial<Record<ConfidenceField, number>>;

export interface Source {
  id: string;
  name: string;
  baseUrl: string;
  adapterType: string;
  crawlFrequency: string;
  active: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface Venue {
  id: string;
  name: string;
  address: string | null;
  city: string | null;
  state: string | null;
  zip: string | null;
  lat: number | null;
  lng: number | null;
  website: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface Activity {
  id: string;
  sourceId: string;
  sourceUrl: string;
  externalId: string | null;
  title: string;
  description: string | null;
  activityType: string | null;
  ageMin: number | null;
  ageMax: number | null;
  /** Always true; rows that are not free are never written. */
  isFree: true;
  freeVerificationStatus: FreeVerificationStatus;
  dropIn: boolean | null;
  registrationRequired: boolean | null;
  startAt: Date;
  endAt: Date | null;
  timezone: string;
  recurrenceText: string | null;
  locationText: string | null;
  venueId: string | null;
  extractionMethod: ExtractionMethod;
  extractorVersion: string | null;
  llmProvider: string | null;
  llmModel: string | null;
  llmConfidence: number | null;
  status: ActivityStatus;
  confidenceScore: number;
  fieldConfidence: FieldConfidence;
  dedupKey: string;
  firstSeenAt: Date;
  lastSeenAt: Date;
  updatedAt: Date;
}

export interface ActivityTag {
  activityId: string;
  tag: string;
}

export interface IngestionRun {
  id: string;
  sourceId: string;
  startedAt: Date;
  finishedAt: Date | null;
  status: RunStatus;
  itemsFound: number;
  itemsSaved: number;
  errors: string | null;
}

export const DEFAULT_TIMEZONE = "America/New_York";
