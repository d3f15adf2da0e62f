import axios from "axios";
import type { SearchHit } from "../types";

interface SearchSerpApiParams {
  apiKey: string;
  query: string;
  location?: string;
  numResults?: number;
  signal?: AbortSignal;
}

const SERP_URL = "https://serpapi.com/search.json";

export async function searchSerpApi({
  apiKey,
  query,
  location,
  numResults = 10,
  signal
}: SearchSerpApiParams): Promise<SearchHit[]> {
  if (!query || query.trim().length === 0) {
    throw new Error("SerpAPI query must be a non-empty string");
  }

  const params: Record<string, string | number> = {
    api_key: apiKey,
    engine: "google",
    q: query
  };

  if (location && location.trim().length > 0) {
    params.location = location.trim();
  }

  if (Number.isFinite(numResults) && numResults > 0) {
    params.num = numResults;
  }

  const response = await axios.get<unknown>(SERP_URL, { params, timeout: 15_000, signal });
  return mapSerpResults(response.data).slice(0, numResults);
}

/**
 * Flattens a SerpAPI Google payload into hits. Local (map pack) results come
 * first because they carry addresses.
 */
export function mapSerpResults(payload: unknown): SearchHit[] {
  if (!isRecord(payload)) {
    return [];
  }

  const local = extractLocalResults(payload.local_results).map((record) => ({
    title: toOptionalString(record.title),
    snippet: toOptionalString(record.description) ?? toOptionalString(record.type) ?? "",
    link: toOptionalString(isRecord(record.links) ? record.links.website : undefined) ?? toOptionalString(record.place_id_search) ?? "",
    address: toOptionalString(record.address)
  }));

  const organic = (Array.isArray(payload.organic_results) ? payload.organic_results : [])
    .filter(isRecord)
    .map((record) => ({
      title: toOptionalString(record.title),
      snippet: toOptionalString(record.snippet) ?? "",
      link: toOptionalString(record.link) ?? "",
      address: undefined
    }));

  return [...local, ...organic]
    .filter((entry): entry is { title: string; snippet: string; link: string; address: string | undefined } =>
      Boolean(entry.title)
    )
    .map((entry, index) => {
      const hit: SearchHit = {
        position: index + 1,
        title: entry.title,
        snippet: entry.snippet,
        link: entry.link
      };
      if (entry.address) {
        hit.address = entry.address;
      }
      return hit;
    });
}

function extractLocalResults(value: unknown): Array<Record<string, unknown>> {
  if (Array.isArray(value)) {
    return value.filter(isRecord);
  }
  if (isRecord(value) && Array.isArray(value.places)) {
    return value.places.filter(isRecord);
  }
  return [];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toOptionalString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}
