import { ExtractionError, errorMessage } from "@/lib/errors";
import { getFallbackConfig } from "@/lib/pipeline/policy";
import type { CandidateActivity, RawDocument, SourceAdapter } from "@/lib/scrapers/types";
import { documentToText } from "@/lib/scrapers/pageText";
import { scoreCandidate } from "./confidence";
import type { FallbackExtractor } from "./fallback";
import { mergeCandidateSets } from "./merge";
import type { Rejection, ScoredCandidate } from "./types";

export interface ExtractOptions {
  /** null when the fallback is disabled. */
  fallback: FallbackExtractor | null;
  maxDocumentChars?: number;
}

export interface ExtractionOutcome {
  /** Candidates with a title and a start, ready for normalization. */
  candidates: ScoredCandidate[];
  /** Candidates without a title or start. */
  rejections: Rejection[];
  usedFallback: boolean;
  /** Readable page text, kept for corroborating fallback claims. */
  documentText: string;
  /** Non-fatal problems worth recording on the run. */
  errors: string[];
}

function parseSafely(adapter: SourceAdapter, doc: RawDocument, errors: string[]): CandidateActivity[] {
  try {
    return adapter.parse(doc);
  } catch (e) {
    const message = `[${adapter.id}] parser failed on ${doc.url}: ${errorMessage(e)}`;
    console.warn(`[extract] ${message}`);
    errors.push(message);
    return [];
  }
}

function fallbackReason(adapter: SourceAdapter, doc: RawDocument, hard: ScoredCandidate[]): ExtractionError | null {
  if (hard.length === 0) {
    return new ExtractionError("no_candidates", `[${adapter.id}] no candidates in ${doc.url}`);
  }
  if (hard.every((c) => c.confidence < adapter.fallbackThreshold)) {
    return new ExtractionError(
      "low_confidence",
      `[${adapter.id}] all ${hard.length} candidates in ${doc.url} below ${adapter.fallbackThreshold}`
    );
  }
  return null;
}

/**
 * Run the site parser over a document, consult the fallback extractor when it
 * finds nothing or nothing confident, and merge the two candidate sets.
 */
export async function extractDocument(
  adapter: SourceAdapter,
  doc: RawDocument,
  opts: ExtractOptions
): Promise<ExtractionOutcome> {
  const errors: string[] = [];
  const maxChars = opts.maxDocumentChars ?? getFallbackConfig().maxDocumentChars;
  const documentText = documentToText(doc.html, maxChars);
  const hard = parseSafely(adapter, doc, errors).map((c) => scoreCandidate(c, adapter.defaults, "hardcoded"));

  let scored = hard;
  let usedFallback = false;
  const reason = fallbackReason(adapter, doc, hard);
  if (reason) {
    if (opts.fallback) {
      try {
        const result = await opts.fallback.extract({
          documentText,
          sourceUrl: doc.finalUrl,
          timezone: adapter.defaults.timezone,
        });
        usedFallback = true;
        const soft = result.candidates.map((c, i) => {
          const confidence = result.confidences[i] ?? 0;
          return scoreCandidate(c, adapter.defaults, "llm", confidence, {
            provider: result.provider,
            model: result.model,
            confidence,
          });
        });
        if (result.dropped > 0) errors.push(`[${adapter.id}] fallback returned ${result.dropped} invalid activities`);
        console.log(`[extract] ${doc.url}: ${reason.kind}; fallback returned ${soft.length} candidates`);
        scored = mergeCandidateSets(hard, soft);
      } catch (e) {
        const message = `[${adapter.id}] fallback failed for ${doc.url}: ${errorMessage(e)}`;
        console.warn(`[extract] ${message}`);
        errors.push(message);
      }
    } else {
      console.log(`[extract] ${reason.message}; fallback disabled`);
    }
    if (scored.length === 0) errors.push(reason.message);
  }

  const candidates: ScoredCandidate[] = [];
  const rejections: Rejection[] = [];
  for (const c of scored) {
    if (c.fieldConfidence.title == null || c.fieldConfidence.startAt == null) {
      rejections.push({
        title: c.candidate.title,
        sourceUrl: c.candidate.sourceUrl,
        reason: c.fieldConfidence.title == null ? "missing title" : "missing start time",
      });
      continue;
    }
    candidates.push(c);
  }
  return { candidates, rejections, usedFallback, documentText, errors };
}
