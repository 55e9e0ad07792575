import type { FieldConfidence } from "@/types";
import type { ReadinessCondition } from "./fetchPlaywright";

export type FetchStrategy =
  | {
      kind: "http";
      method?: "GET" | "POST";
      headers?: Record<string, string>;
      body?: string;
      /** Render with a headless browser once HTTP retries are spent or the site blocks plain clients. */
      browserFallback?: ReadinessCondition;
    }
  | {
      kind: "browser";
      readiness: ReadinessCondition;
      settleMs?: number;
    };

/** One page an adapter wants fetched. The first one is the source's entry document. */
export interface DocumentRequest {
  url: string;
  strategy: FetchStrategy;
}

export interface RawDocument {
  url: string;
  finalUrl: string;
  html: string;
  fetchedAt: Date;
  via: "http" | "browser" | "file";
}

/**
 * Activity as returned by an extractor before normalization.
 * Times may be ISO strings with or without an offset; offset-less values are
 * read in `timezone` (or the source default) during normalization.
 */
export interface CandidateActivity {
  title: string | null;
  startAt: string | Date | null;
  endAt?: string | Date | null;
  timezone?: string | null;
  sourceUrl: string;
  externalId?: string | null;
  description?: string | null;
  /** Whatever the page says about cost, verbatim ("Free", "$15", "Pay what you wish"). */
  priceText?: string | null;
  /** Audience wording such as "Ages 5–12" or "For teens". */
  ageText?: string | null;
  ageMin?: number | null;
  ageMax?: number | null;
  venueName?: string | null;
  locationText?: string | null;
  address?: string | null;
  city?: string | null;
  state?: string | null;
  zip?: string | null;
  activityType?: string | null;
  dropIn?: boolean | null;
  registrationRequired?: boolean | null;
  recurrenceText?: string | null;
  tags?: string[];
  /** Lower-than-certain confidences for fields the parser had to guess. */
  fieldConfidence?: FieldConfidence;
  raw?: Record<string, unknown>;
}

export interface VenueDefaults {
  name: string;
  address?: string | null;
  city: string;
  state: string;
  zip?: string | null;
  website?: string | null;
}

export interface SourceDefaults {
  timezone: string;
  venue: VenueDefaults;
  /** The listing is pre-filtered to free programs, or the venue's admission is free. */
  freeListing: boolean;
  activityType?: string | null;
  tags?: string[];
}

export interface SourceAdapter {
  id: string;
  name: string;
  baseUrl: string;
  adapterType: string;
  crawlFrequency: string;
  defaults: SourceDefaults;
  /** Below this candidate confidence the fallback extractor is consulted. */
  fallbackThreshold: number;
  documents(): DocumentRequest[];
  /** Parse a fetched document into candidates (pure). */
  parse(doc: RawDocument): CandidateActivity[];
}
