import type { AppLogger } from "../../logging";
import {
  MemoryDecisionSchema,
  type MemoryDecision,
  type MemoryOperation,
  type SimilarMemory,
} from "../../schemas/llm";
import { errorMessage } from "../errors";
import type { LlmProvider } from "../types";

export const DECISION_SYSTEM_PROMPT = `You are a memory management expert. Analyze the new memory and similar existing memories to decide what operation to perform.

Your goal is to:
1. Prevent duplicate information
2. Keep memory coherent and up-to-date
3. Resolve conflicts (prefer newer information)
4. Maintain information quality

Always respond with valid JSON.`;

export function decision(
  operation: MemoryOperation,
  confidence: number,
  reasoning: string,
  fields: Partial<Omit<MemoryDecision, "operation" | "confidence" | "reasoning">> = {},
): MemoryDecision {
  return { operation, confidence, reasoning, relatesTo: [], ...fields };
}

export function buildDecisionPrompt(
  newMemory: string,
  similar: SimilarMemory[],
  userId: string,
): string {
  const candidates = similar
    .map(
      (memory) =>
        `  ID: ${memory.memoryId}\n  Content: ${memory.content}\n  Similarity: ${memory.score.toFixed(2)}\n  Created: ${memory.createdAt ?? "unknown"}\n`,
    )
    .join("\n");

  return `Analyze this new memory and decide what operation to perform.

**New Memory:**
"${newMemory}"

**Similar Existing Memories:**
${candidates}

**User ID:** ${userId}

**Your Task:**
Decide what to do with the new memory. Choose ONE operation:

1. **ADD** - Add as completely new memory (information is new and different)
2. **UPDATE** - Update existing memory with new information; provide \`merged_content\` and \`target_memory_id\`
3. **DELETE** - Delete an existing memory the new one proves wrong; set \`target_memory_id\`
4. **NOOP** - Ignore (duplicate or redundant)
5. **SUPERSEDE** - Replace an old memory with its evolved version; set \`supersedes_memory_id\`
6. **CONTRADICT** - Two memories conflict but both might be valid; set \`contradicts_memory_id\`

**Response Format (JSON):**
{
  "operation": "ADD|UPDATE|DELETE|NOOP|SUPERSEDE|CONTRADICT",
  "target_memory_id": "mem_xxx" or null,
  "confidence": 0-100,
  "reasoning": "Why you made this decision",
  "merged_content": "New combined content" or null,
  "supersedes_memory_id": "mem_xxx" or null,
  "contradicts_memory_id": "mem_xxx" or null,
  "relates_to": [["mem_xxx", "IMPLIES"]] or null
}

**Important:**
- SUPERSEDE for temporal evolution, UPDATE for adding details
- CONTRADICT keeps both, DELETE removes one
- Be conservative with DELETE
- Use NOOP to avoid duplicates`;
}

export interface DecisionEngineOptions {
  duplicateThreshold: number;
  logger?: AppLogger;
}

/**
 * Chooses what to do with a new memory given its near neighbours. Only
 * candidates at or above the duplicate threshold reach the LLM. Never throws.
 */
export class DecisionEngine {
  #llm?: LlmProvider;
  #duplicateThreshold: number;
  #logger?: AppLogger;

  constructor(llm: LlmProvider | undefined, options: DecisionEngineOptions) {
    this.#llm = llm;
    this.#duplicateThreshold = options.duplicateThreshold;
    this.#logger = options.logger?.child({ component: "decision" });
  }

  get hasLlm(): boolean {
    return this.#llm !== undefined;
  }

  async decide(
    newMemory: string,
    similar: SimilarMemory[],
    userId: string,
  ): Promise<MemoryDecision> {
    if (similar.length === 0) {
      return decision("ADD", 100, "No similar memories found, adding as new.");
    }

    const candidates = similar.filter((memory) => memory.score >= this.#duplicateThreshold);
    if (candidates.length === 0) {
      return decision(
        "ADD",
        95,
        `No memories above ${this.#duplicateThreshold} similarity threshold, adding as new.`,
      );
    }

    if (!this.#llm) {
      return decision("ADD", 50, "No LLM configured for near-duplicate review, defaulting to ADD.");
    }

    let raw: string;
    try {
      const generation = await this.#llm.generate(
        DECISION_SYSTEM_PROMPT,
        buildDecisionPrompt(newMemory, candidates, userId),
        "json_object",
      );
      raw = generation.text;
    } catch (error) {
      this.#logger?.warn({ err: errorMessage(error) }, "Decision call failed");
      return decision("ADD", 50, `LLM call failed (${errorMessage(error)}), defaulting to ADD.`);
    }

    const parsed = this.#parse(raw);
    if (typeof parsed === "string") {
      this.#logger?.warn({ err: parsed, response: raw.slice(0, 200) }, "Unusable decision response");
      return decision("ADD", 50, `JSON parse failed (${parsed}), defaulting to ADD.`);
    }

    this.#logger?.info(
      {
        operation: parsed.operation,
        confidence: parsed.confidence,
        target: parsed.targetMemoryId,
      },
      "Decision made",
    );
    return parsed;
  }

  /**
   * Returns the decision, or the failure reason.
   */
  #parse(raw: string): MemoryDecision | string {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      return errorMessage(error);
    }

    const result = MemoryDecisionSchema.safeParse(json);
    if (!result.success) {
      return result.error.issues
        .map((issue) => `${issue.path.join(".") || "response"}: ${issue.message}`)
        .join("; ");
    }

    const data = result.data;
    return {
      operation: data.operation,
      targetMemoryId: data.target_memory_id,
      confidence: data.confidence,
      reasoning: data.reasoning,
      mergedContent: data.merged_content,
      supersedesMemoryId: data.supersedes_memory_id,
      contradictsMemoryId: data.contradicts_memory_id,
      relatesTo: data.relates_to,
    };
  }
}
