import { z } from "zod";
import { DynamicStructuredTool } from "@langchain/core/tools";
import { searchSerpApi } from "../data/serp";
import { logger } from "../utils/logger";
import { MAX_SEARCH_POOL_SIZE } from "../config/env";
import type { SearchHit } from "../types";

export interface SearchParams {
  query: string;
  location: string;
  limit: number;
  signal?: AbortSignal;
}

export interface SearchProvider {
  search(params: SearchParams): Promise<SearchHit[]>;
}

const SerpApiInputSchema = z.object({
  query: z.string().min(3),
  location: z.string().min(1),
  numResults: z.number().int().min(1).max(MAX_SEARCH_POOL_SIZE)
});

const SearchHitSchema = z.object({
  position: z.number().int(),
  title: z.string(),
  snippet: z.string(),
  link: z.string(),
  address: z.string().optional()
});

const SearchHitsSchema = z.array(SearchHitSchema);

export function createSerpApiTool(apiKey: string, signal?: AbortSignal) {
  return new DynamicStructuredTool({
    name: "serp_api_search",
    description: "Search Google via SerpAPI for places and products near a location, with snippets and addresses.",
    schema: SerpApiInputSchema,
    func: async ({ query, location, numResults }: z.infer<typeof SerpApiInputSchema>) =>
      searchSerpApi({ apiKey, query, location, numResults, signal })
  });
}

export function createSearchGrounding(apiKey: string): SearchProvider {
  const log = logger.search;
  return {
    async search({ query, location, limit, signal }: SearchParams): Promise<SearchHit[]> {
      const tool = createSerpApiTool(apiKey, signal);
      const output: unknown = await tool.invoke({ query, location, numResults: limit });
      const hits = SearchHitsSchema.safeParse(output);
      if (!hits.success) {
        throw new Error(`Search tool returned an unexpected payload: ${hits.error.issues[0]?.message ?? "invalid"}`);
      }
      log.debug("Search grounding complete", { query, location, hits: hits.data.length });
      return hits.data.map((hit) => {
        const { address, ...rest } = hit;
        return address ? { ...rest, address } : rest;
      });
    }
  };
}
