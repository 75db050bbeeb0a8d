import { describe, expect, it } from "vitest";
import type { SimilarMemory } from "../src/schemas/llm";
import {
  DecisionEngine,
  buildDecisionPrompt,
} from "../src/services/llm/decision-engine";
import { LlmExtractor, buildExtractionPrompt } from "../src/services/llm/extractor";
import { FakeLlm } from "./helpers/fakes";

const near: SimilarMemory = {
  memoryId: "mem_old",
  content: "Lives in Berlin",
  score: 0.96,
  createdAt: "2026-01-01T00:00:00.000Z",
};
const far: SimilarMemory = { memoryId: "mem_far", content: "Owns a cat", score: 0.8 };

describe("DecisionEngine", () => {
  it("adds without a model call when nothing is similar enough", async () => {
    const llm = new FakeLlm();
    const engine = new DecisionEngine(llm, { duplicateThreshold: 0.92 });

    await expect(engine.decide("Lives in Munich", [], "user-1")).resolves.toEqual({
      operation: "ADD",
      confidence: 100,
      reasoning: "No similar memories found, adding as new.",
      relatesTo: [],
    });
    await expect(engine.decide("Lives in Munich", [far], "user-1")).resolves.toMatchObject({
      operation: "ADD",
      confidence: 95,
      reasoning: "No memories above 0.92 similarity threshold, adding as new.",
    });
    expect(llm.calls).toHaveLength(0);
  });

  it("defaults to ADD without a model", async () => {
    const engine = new DecisionEngine(undefined, { duplicateThreshold: 0.92 });

    expect(engine.hasLlm).toBe(false);
    await expect(engine.decide("Lives in Munich", [near], "user-1")).resolves.toMatchObject({
      operation: "ADD",
      confidence: 50,
    });
  });

  it("sends only near duplicates and parses the answer", async () => {
    const llm = new FakeLlm({
      decision: JSON.stringify({
        operation: "supersede",
        target_memory_id: null,
        confidence: "87.6",
        reasoning: "Moved cities",
        merged_content: "  ",
        supersedes_memory_id: "mem_old",
        contradicts_memory_id: null,
        relates_to: [["mem_old", "IMPLIES"]],
      }),
    });
    const engine = new DecisionEngine(llm, { duplicateThreshold: 0.92 });

    const result = await engine.decide("Lives in Munich now", [near, far], "user-1");

    expect(result).toEqual({
      operation: "SUPERSEDE",
      confidence: 88,
      reasoning: "Moved cities",
      supersedesMemoryId: "mem_old",
      relatesTo: [["mem_old", "IMPLIES"]],
    });
    const [call] = llm.callsFor("decision");
    expect(call?.responseFormat).toBe("json_object");
    expect(call?.user).toContain("  ID: mem_old\n  Content: Lives in Berlin\n  Similarity: 0.96\n");
    expect(call?.user).not.toContain("mem_far");
  });

  it("falls back to ADD on unusable answers", async () => {
    const llm = new FakeLlm({ decision: "not json" });
    const engine = new DecisionEngine(llm, { duplicateThreshold: 0.92 });

    const notJson = await engine.decide("x", [near], "user-1");
    expect(notJson.operation).toBe("ADD");
    expect(notJson.confidence).toBe(50);
    expect(notJson.reasoning).toMatch(/^JSON parse failed \(/);

    llm.decision = JSON.stringify({ operation: "MERGE", confidence: 90 });
    const badOperation = await engine.decide("x", [near], "user-1");
    expect(badOperation).toMatchObject({ operation: "ADD", confidence: 50 });
    expect(badOperation.reasoning).toContain("operation:");

    llm.decision = undefined;
    await expect(engine.decide("x", [near], "user-1")).resolves.toMatchObject({
      operation: "ADD",
      reasoning: "LLM call failed (No scripted response for this prompt), defaulting to ADD.",
    });
  });

  it("lists unknown creation times in the prompt", () => {
    expect(buildDecisionPrompt("new", [far], "user-7")).toContain(
      "  Similarity: 0.80\n  Created: unknown\n",
    );
  });
});

describe("LlmExtractor", () => {
  it("parses memories, entities and relations with defaults", async () => {
    const llm = new FakeLlm({
      extraction: JSON.stringify({
        memories: [
          { text: "Works at Acme", memory_type: "fact", certainty: 140, entities: ["e1"] },
          { text: "Wants to learn Go" },
        ],
        entities: [{ id: "e1", name: "Acme", type: "organization" }],
        relations: [
          {
            from_memory_content: "Works at Acme",
            to_memory_content: "Wants to learn Go",
            relation_type: "IMPLIES",
          },
        ],
      }),
    });
    const extractor = new LlmExtractor(llm);

    const result = await extractor.extract("I work at Acme and want to learn Go", "user-1");

    expect(result).toEqual({
      memories: [
        {
          text: "Works at Acme",
          memory_type: "fact",
          certainty: 100,
          importance: 50,
          entities: ["e1"],
        },
        { text: "Wants to learn Go", memory_type: "fact", certainty: 80, importance: 50, entities: [] },
      ],
      entities: [{ id: "e1", name: "Acme", type: "organization" }],
      relations: [
        {
          from_memory_content: "Works at Acme",
          to_memory_content: "Wants to learn Go",
          relation_type: "IMPLIES",
          strength: 80,
          confidence: 80,
          explanation: "",
        },
      ],
    });
    expect(llm.calls[0]?.user).toBe(
      "Extract information from this text:\n\nI work at Acme and want to learn Go",
    );
  });

  it("returns an empty extraction on failures", async () => {
    const empty = { memories: [], entities: [], relations: [] };
    const llm = new FakeLlm({ extraction: "{" });
    const extractor = new LlmExtractor(llm);

    await expect(extractor.extract("text", "user-1")).resolves.toEqual(empty);
    llm.extraction = JSON.stringify({ memories: [{ text: "" }] });
    await expect(extractor.extract("text", "user-1")).resolves.toEqual(empty);
    llm.extraction = undefined;
    await expect(extractor.extract("text", "user-1")).resolves.toEqual(empty);
  });

  it("asks for entities and relations only when enabled", () => {
    const full = buildExtractionPrompt({ extractEntities: true, extractRelations: true });
    const bare = buildExtractionPrompt({ extractEntities: false, extractRelations: false });

    expect(full).toContain('"relation_type": "IMPLIES|BECAUSE|CONTRADICTS|SUPPORTS"');
    expect(bare).toContain(',\n  "entities": [],\n  "relations": []\n}');
    expect(bare).not.toContain("relation_type");
  });
});
