import path from "node:path";
import process from "node:process";
import { writeFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { ensureDir } from "fs-extra";
import { zodToJsonSchema } from "zod-to-json-schema";
import { loadConfig } from "../config";
import { createLogger } from "../logging";
import { MemoryRecordSchema } from "../schemas/memory";
import {
  AddMemoryResultSchema,
  ChainSearchResultSchema,
  CleanupStatsSchema,
  DeletionResultSchema,
  EvolutionResultSchema,
  MemoryGraphSchema,
  OntoSearchResultSchema,
  RetrievalResultSchema,
  SearchResultSchema,
  TOOL_INPUT_SCHEMAS,
} from "../schemas/tools";

interface SchemaEntry {
  filename: string;
  schema: Parameters<typeof zodToJsonSchema>[0];
  id: string;
}

const RESULT_ENTRIES: SchemaEntry[] = [
  { filename: "memory-record", schema: MemoryRecordSchema, id: "MemoryRecord" },
  { filename: "add-memory-result", schema: AddMemoryResultSchema, id: "AddMemoryResult" },
  { filename: "search-result", schema: SearchResultSchema, id: "SearchResult" },
  { filename: "onto-search-result", schema: OntoSearchResultSchema, id: "OntoSearchResult" },
  { filename: "chain-search-result", schema: ChainSearchResultSchema, id: "ChainSearchResult" },
  { filename: "evolution-result", schema: EvolutionResultSchema, id: "EvolutionResult" },
  { filename: "deletion-result", schema: DeletionResultSchema, id: "DeletionResult" },
  { filename: "cleanup-stats", schema: CleanupStatsSchema, id: "CleanupStats" },
  { filename: "memory-graph", schema: MemoryGraphSchema, id: "MemoryGraph" },
  { filename: "retrieval-result", schema: RetrievalResultSchema, id: "RetrievalResult" },
];

export function schemaEntries(): SchemaEntry[] {
  const inputs = Object.entries(TOOL_INPUT_SCHEMAS).map(([tool, schema]) => ({
    filename: `${tool.replace(/_/g, "-")}-input`,
    schema,
    id: `${tool}_input`,
  }));
  return [...inputs, ...RESULT_ENTRIES];
}

export async function main(outputDir = path.resolve(process.cwd(), "generated", "schemas")): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config);
  const entries = schemaEntries();

  await ensureDir(outputDir);
  logger.info({ outputDir }, "Generating JSON schemas from Zod definitions.");

  for (const entry of entries) {
    const jsonSchema = zodToJsonSchema(entry.schema, entry.id, {
      target: "jsonSchema7",
      $refStrategy: "none",
    });
    const filepath = path.join(outputDir, `${entry.filename}.json`);
    await writeFile(filepath, JSON.stringify(jsonSchema, null, 2), "utf8");
    logger.info({ schema: entry.id, filepath }, "Schema written.");
  }

  logger.info({ count: entries.length }, "Schema generation completed.");
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    console.error("Schema generation script failed:", error);
    process.exit(1);
  });
}
