import type { ConfidenceField, ExtractionMethod, FieldConfidence } from "@/types";
import type { CandidateActivity } from "@/lib/scrapers/types";

export interface LlmProvenance {
  provider: string;
  model: string;
  confidence: number;
}

/** A candidate with per-field confidence and which extractor supplied each field. */
export interface ScoredCandidate {
  candidate: CandidateActivity;
  fieldConfidence: FieldConfidence;
  fieldOrigin: Partial<Record<ConfidenceField, ExtractionMethod>>;
  /** Weighted aggregate; 0 when a required field is missing. */
  confidence: number;
  method: ExtractionMethod;
  llm: LlmProvenance | null;
}

/** A candidate dropped before it reached the catalog, and why. */
export interface Rejection {
  title: string | null;
  sourceUrl: string;
  reason: string;
}
