/**
 * RAG search tool — adapts the retrieval collaborator to the tool contract.
 */

import { z } from 'zod';
import type { ToolCollaborator } from './catalog.js';

export interface RagHit {
  text: string;
  score: number;
  source: string;
}

export interface RagCollaborator {
  /** Ordered best first. */
  semanticSearch(workspace: string, query: string, k: number, minScore: number): Promise<RagHit[]>;
}

const RagParams = z.object({
  query: z.string().min(1),
  workspace: z.string().min(1),
  top_k: z.number().int().positive().default(5),
  min_score: z.number().min(0).max(1).default(0.7),
});

export function createRagSearchTool(rag: RagCollaborator): ToolCollaborator {
  return {
    async invoke(params) {
      const parsed = RagParams.safeParse(params);
      if (!parsed.success) {
        return { ok: false, kind: 'error', message: `Invalid rag_search parameters: ${parsed.error.issues.map((i) => i.message).join('; ')}` };
      }
      const { workspace, query, top_k, min_score } = parsed.data;
      const hits = await rag.semanticSearch(workspace, query, top_k, min_score);
      return {
        ok: true,
        data: { results: hits.filter((h) => h.score >= min_score).slice(0, top_k) },
      };
    },
  };
}
