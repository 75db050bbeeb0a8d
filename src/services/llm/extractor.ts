import type { AppLogger } from "../../logging";
import { ExtractionResultSchema, type ExtractionResult } from "../../schemas/llm";
import { errorMessage } from "../errors";
import type { LlmProvider } from "../types";

export interface ExtractOptions {
  extractEntities?: boolean;
  extractRelations?: boolean;
}

export const EXTRACTION_SYSTEM_PROMPT_HEADER =
  "You are a memory extraction system. Analyze the text and extract structured information.";

export function emptyExtraction(): ExtractionResult {
  return { memories: [], entities: [], relations: [] };
}

export function buildExtractionPrompt(options: Required<ExtractOptions>): string {
  const sections = [
    `${EXTRACTION_SYSTEM_PROMPT_HEADER}

Output JSON with this structure:
{
  "memories": [
    {
      "text": "atomic fact or preference",
      "memory_type": "fact|preference|goal|opinion|experience|achievement",
      "certainty": 80,
      "importance": 50,
      "entities": ["entity_id1", "entity_id2"]
    }
  ]`,
  ];

  sections.push(
    options.extractEntities
      ? `,
  "entities": [
    {
      "id": "unique_id",
      "name": "Entity Name",
      "type": "person|organization|location|technology|concept|event|product|system"
    }
  ]`
      : `,
  "entities": []`,
  );

  sections.push(
    options.extractRelations
      ? `,
  "relations": [
    {
      "from_memory_content": "FULL text of the source memory, copied from the memories array",
      "to_memory_content": "FULL text of the target memory, copied from the memories array",
      "relation_type": "IMPLIES|BECAUSE|CONTRADICTS|SUPPORTS",
      "strength": 80,
      "confidence": 80,
      "explanation": "Why this relation exists"
    }
  ]
}

Relations must reference memory texts from the "memories" array exactly; skip any relation you cannot match.`
      : `,
  "relations": []
}`,
  );

  sections.push("\n\nExtract atomic, standalone facts. Each memory should be self-contained.");
  return sections.join("");
}

/**
 * Turns free text into atomic memories with a single JSON-mode completion.
 * Provider and parse failures yield an empty extraction.
 */
export class LlmExtractor {
  #provider: LlmProvider;
  #logger?: AppLogger;

  constructor(provider: LlmProvider, logger?: AppLogger) {
    this.#provider = provider;
    this.#logger = logger?.child({ component: "extractor" });
  }

  async extract(
    text: string,
    userId: string,
    options: ExtractOptions = {},
  ): Promise<ExtractionResult> {
    const system = buildExtractionPrompt({
      extractEntities: options.extractEntities ?? true,
      extractRelations: options.extractRelations ?? true,
    });
    const user = `Extract information from this text:\n\n${text}`;

    this.#logger?.debug({ userId, preview: text.slice(0, 50) }, "Extracting memories");

    let raw: string;
    try {
      const generation = await this.#provider.generate(system, user, "json_object");
      raw = generation.text;
    } catch (error) {
      this.#logger?.warn({ userId, err: errorMessage(error) }, "Extraction call failed");
      return emptyExtraction();
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.#logger?.warn({ userId, err: errorMessage(error) }, "Extraction response is not JSON");
      return emptyExtraction();
    }

    const parsed = ExtractionResultSchema.safeParse(json);
    if (!parsed.success) {
      this.#logger?.warn(
        { userId, issues: parsed.error.issues.length },
        "Extraction response does not match the expected shape",
      );
      return emptyExtraction();
    }

    this.#logger?.debug(
      {
        memories: parsed.data.memories.length,
        entities: parsed.data.entities.length,
        relations: parsed.data.relations.length,
      },
      "Extraction complete",
    );
    return parsed.data;
  }
}
