import { z } from "zod";
import { getFallbackConfig, type FallbackConfig } from "@/lib/pipeline/policy";
import type { HttpFetch } from "@/lib/scrapers/fetchHtml";
import type { CandidateActivity } from "@/lib/scrapers/types";

export interface FallbackInput {
  /** Readable page text, already stripped of markup and truncated. */
  documentText: string;
  sourceUrl: string;
  /** Timezone assumed for times written without an offset. */
  timezone: string;
}

export interface FallbackResult {
  candidates: CandidateActivity[];
  /** Model confidence per candidate, same order as `candidates`. */
  confidences: number[];
  provider: string;
  model: string;
  /** Candidates the model returned that failed validation. */
  dropped: number;
}

/** Model-backed extractor consulted when the site parser finds nothing usable. */
export interface FallbackExtractor {
  readonly provider: string;
  readonly model: string;
  extract(input: FallbackInput): Promise<FallbackResult>;
}

const optionalText = z
  .string()
  .nullish()
  .transform((v) => (v && v.trim() ? v.trim() : null));

export const FallbackCandidateSchema = z.object({
  title: z.string().trim().min(1),
  start_at: z.string().trim().min(1),
  end_at: optionalText,
  timezone: optionalText,
  source_url: optionalText,
  description: optionalText,
  price_text: optionalText,
  age_text: optionalText,
  age_min: z.number().int().min(0).max(120).nullish(),
  age_max: z.number().int().min(0).max(120).nullish(),
  venue_name: optionalText,
  location_text: optionalText,
  city: optionalText,
  state: optionalText,
  activity_type: optionalText,
  drop_in: z.boolean().nullish(),
  registration_required: z.boolean().nullish(),
  recurrence_text: optionalText,
  confidence: z.number().min(0).max(1).nullish(),
});
export type FallbackCandidate = z.infer<typeof FallbackCandidateSchema>;

const FallbackPayloadSchema = z.object({
  activities: z.array(z.unknown()),
  confidence: z.number().min(0).max(1).nullish(),
});

/** Confidence given to model fields when the model states none. */
export const DEFAULT_MODEL_CONFIDENCE = 0.5;

function absoluteUrl(value: string | null, base: string): string {
  if (!value) return base;
  try {
    return new URL(value, base).toString();
  } catch {
    return base;
  }
}

function toCandidate(item: FallbackCandidate, sourceUrl: string): CandidateActivity {
  return {
    title: item.title,
    startAt: item.start_at,
    endAt: item.end_at,
    timezone: item.timezone,
    sourceUrl: absoluteUrl(item.source_url, sourceUrl),
    description: item.description,
    priceText: item.price_text,
    ageText: item.age_text,
    ageMin: item.age_min ?? null,
    ageMax: item.age_max ?? null,
    venueName: item.venue_name,
    locationText: item.location_text,
    city: item.city,
    state: item.state,
    activityType: item.activity_type,
    dropIn: item.drop_in ?? null,
    registrationRequired: item.registration_required ?? null,
    recurrenceText: item.recurrence_text,
  };
}

/**
 * Validate the model's JSON reply. Invalid activities are dropped and counted;
 * a reply that is not the expected envelope yields nothing.
 */
export function parseFallbackReply(content: string, sourceUrl: string): Omit<FallbackResult, "provider" | "model"> {
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch {
    console.warn("[fallback] reply is not JSON");
    return { candidates: [], confidences: [], dropped: 0 };
  }
  const envelope = FallbackPayloadSchema.safeParse(json);
  if (!envelope.success) {
    console.warn("[fallback] reply has no activities array");
    return { candidates: [], confidences: [], dropped: 0 };
  }
  const candidates: CandidateActivity[] = [];
  const confidences: number[] = [];
  let dropped = 0;
  for (const raw of envelope.data.activities) {
    const item = FallbackCandidateSchema.safeParse(raw);
    if (!item.success) {
      dropped++;
      continue;
    }
    candidates.push(toCandidate(item.data, sourceUrl));
    confidences.push(item.data.confidence ?? envelope.data.confidence ?? DEFAULT_MODEL_CONFIDENCE);
  }
  return { candidates, confidences, dropped };
}

const SYSTEM_MESSAGE =
  "You extract structured listings of art activities for children and teens from museum and community web pages. You never invent details that are not on the page.";

function buildPrompt(input: FallbackInput): string {
  return [
    "Extract every scheduled art activity, class, workshop or program for kids, teens or families from the page text below.",
    "",
    "Rules:",
    "- Only include activities with a concrete date. Use ISO 8601 for start_at and end_at; omit the offset when the page gives none.",
    "- Copy the page's own wording about cost into price_text (for example \"Free\", \"$15\", \"Pay what you wish\"). Use null when the page says nothing about cost. Never write \"Free\" unless the page says so.",
    "- Copy the audience wording into age_text (\"Ages 5-12\", \"For teens\"); set age_min/age_max only when numbers are stated.",
    "- confidence is 0-1: how sure you are that this is a real, correctly read activity.",
    "",
    `Page URL: ${input.sourceUrl}`,
    `Local timezone: ${input.timezone}`,
    "",
    'Respond with JSON: {"activities": [{"title": string, "start_at": string, "end_at": string|null, "timezone": string|null, "source_url": string|null, "description": string|null, "price_text": string|null, "age_text": string|null, "age_min": number|null, "age_max": number|null, "venue_name": string|null, "location_text": string|null, "city": string|null, "state": string|null, "activity_type": string|null, "drop_in": boolean|null, "registration_required": boolean|null, "recurrence_text": string|null, "confidence": number}]}',
    "",
    "Page text:",
    input.documentText,
  ].join("\n");
}

const ChatCompletionSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullable() }) })),
});

export class OpenAIFallbackExtractor implements FallbackExtractor {
  readonly provider = "openai";
  readonly model: string;
  private readonly apiKey: string;
  private readonly httpFetch: HttpFetch;
  private readonly timeoutMs: number;

  constructor(options: { apiKey: string; model: string; httpFetch?: HttpFetch; timeoutMs?: number }) {
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.httpFetch = options.httpFetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 60_000;
  }

  async extract(input: FallbackInput): Promise<FallbackResult> {
    const response = await this.httpFetch("https://api.openai.com/v1/chat/completions", {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: this.model,
        messages: [
          { role: "system", content: SYSTEM_MESSAGE },
          { role: "user", content: buildPrompt(input) },
        ],
        temperature: 0,
        response_format: { type: "json_object" },
      }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      const err = await response.text();
      throw new Error(`Fallback extraction failed: ${response.status} ${err.slice(0, 300)}`);
    }

    const completion = ChatCompletionSchema.safeParse(await response.json());
    const content = completion.success ? completion.data.choices[0]?.message.content : null;
    if (!content) {
      return { candidates: [], confidences: [], provider: this.provider, model: this.model, dropped: 0 };
    }
    return { ...parseFallbackReply(content, input.sourceUrl), provider: this.provider, model: this.model };
  }
}

/** The configured fallback extractor, or null when disabled or unconfigured. */
export function createFallbackExtractor(
  config: FallbackConfig = getFallbackConfig(),
  httpFetch?: HttpFetch
): FallbackExtractor | null {
  if (!config.enabled || !config.apiKey) return null;
  if (config.provider !== "openai") {
    console.warn(`[fallback] unsupported LLM_PROVIDER "${config.provider}"; fallback disabled`);
    return null;
  }
  return new OpenAIFallbackExtractor({ apiKey: config.apiKey, model: config.model, httpFetch });
}
