import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import type { AppContainer } from "../container";
import type { AppLogger } from "../logging";
import {
  AddMemoryInputSchema,
  AddMemoryResultSchema,
  ChainSearchResultSchema,
  CleanupOrphansInputSchema,
  CleanupStatsSchema,
  ConceptSearchInputSchema,
  DeleteMemoryInputSchema,
  DeletionResultSchema,
  EvolutionResultSchema,
  GetMemoryInputSchema,
  MemoryGraphInputSchema,
  MemoryGraphSchema,
  MemoryViewSchema,
  OntoSearchResultSchema,
  ReasoningChainInputSchema,
  RestoreResultSchema,
  RetrievalResultSchema,
  RetrieveContextInputSchema,
  SearchMemoryInputSchema,
  SearchResultSchema,
  SystemStatusSchema,
  UndeleteMemoryInputSchema,
  UpdateMemoryInputSchema,
} from "../schemas/tools";
import type { ServiceRegistry } from "../services/types";

export const SERVER_NAME = "ontological-memory-core";

export interface McpServerHandle {
  readonly server: McpServer;
  readonly transport: StdioServerTransport;
}

export function createMcpServer(services: ServiceRegistry, logger?: AppLogger): McpServer {
  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: process.env.npm_package_version ?? "0.1.0",
    },
    {
      instructions: buildInstructions(),
    },
  );
  registerTools(server, services, logger?.child({ component: "mcp" }));
  return server;
}

export async function startMcpServer(container: AppContainer): Promise<McpServerHandle> {
  const { logger, services } = container;
  const server = createMcpServer(services, logger);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("MCP stdio server initialized.");

  return { server, transport };
}

function registerTools(server: McpServer, services: ServiceRegistry, logger?: AppLogger) {
  const { memory } = services;

  server.registerTool(
    "add_memory",
    {
      title: "Add memories from a message",
      description:
        "Extracts atomic memories from the message and integrates each one: new memories are added, near duplicates are skipped, merged, superseded or marked as contradicting.",
      inputSchema: AddMemoryInputSchema.shape,
      outputSchema: { result: AddMemoryResultSchema },
    },
    async (args) =>
      respond(logger, "add_memory", async () => ({
        result: await memory.addMemory({
          message: args.message,
          userId: args.user_id,
          agentId: args.agent_id,
          contextTags: args.context_tags,
          metadata: args.metadata,
        }),
      })),
  );

  server.registerTool(
    "search_memory",
    {
      title: "Search memories",
      description:
        "Vector search followed by graph expansion over reasoning edges. Modes: recent (last 4h), contextual (last 30 days), deep (last 90 days), full (no cutoff).",
      inputSchema: SearchMemoryInputSchema.shape,
      outputSchema: { results: z.array(SearchResultSchema) },
    },
    async (args) =>
      respond(logger, "search_memory", async () => ({
        results: await memory.searchMemory({
          query: args.query,
          userId: args.user_id,
          limit: args.limit,
          mode: args.mode,
          temporalDays: args.temporal_days,
          graphDepth: args.graph_depth,
        }),
      })),
  );

  server.registerTool(
    "update_memory",
    {
      title: "Update a memory",
      description: "Replaces the content of a memory in place and re-embeds it.",
      inputSchema: UpdateMemoryInputSchema.shape,
      outputSchema: { result: EvolutionResultSchema },
    },
    async (args) =>
      respond(logger, "update_memory", async () => ({
        result: await memory.updateMemory({
          memoryId: args.memory_id,
          newContent: args.new_content,
          userId: args.user_id,
        }),
      })),
  );

  server.registerTool(
    "get_memory",
    {
      title: "Get memory by id",
      description: "Returns one memory, with its content rebuilt from its chunks when it was chunked.",
      inputSchema: GetMemoryInputSchema.shape,
      outputSchema: { memory: MemoryViewSchema.optional() },
    },
    async (args) =>
      respond(logger, "get_memory", async () => ({
        memory: await memory.getMemory(args.memory_id),
      })),
  );

  server.registerTool(
    "delete_memory",
    {
      title: "Delete a memory",
      description:
        "Soft delete by default; soft-deleted memories can be restored. `hard` removes the node for good, `cascade` also removes its edges.",
      inputSchema: DeleteMemoryInputSchema.shape,
      outputSchema: { result: DeletionResultSchema },
    },
    async (args) =>
      respond(logger, "delete_memory", async () => ({
        result: await memory.deleteMemory({
          memoryId: args.memory_id,
          userId: args.user_id,
          hard: args.hard,
          cascade: args.cascade,
          reason: args.reason,
        }),
      })),
  );

  server.registerTool(
    "undelete_memory",
    {
      title: "Restore a soft-deleted memory",
      description: "Clears the deletion flag of a soft-deleted memory.",
      inputSchema: UndeleteMemoryInputSchema.shape,
      outputSchema: { result: RestoreResultSchema },
    },
    async (args) =>
      respond(logger, "undelete_memory", async () => ({
        result: await memory.undeleteMemory(args.memory_id, args.user_id),
      })),
  );

  server.registerTool(
    "get_memory_graph",
    {
      title: "Get memory graph",
      description: "Memories and the reasoning edges between them, around one memory or a user's memories.",
      inputSchema: MemoryGraphInputSchema.shape,
      outputSchema: MemoryGraphSchema.shape,
    },
    async (args) =>
      respond(logger, "get_memory_graph", async () => {
        const graph = await memory.getMemoryGraph({
          userId: args.user_id,
          memoryId: args.memory_id,
          depth: args.depth,
          limit: args.limit,
        });
        return { nodes: graph.nodes, edges: graph.edges };
      }),
  );

  server.registerTool(
    "search_by_concept",
    {
      title: "Search by concept",
      description:
        "Ontology-aware search: blends vector, concept, tag, graph and recency scores. `concept_type` restricts results to one concept.",
      inputSchema: ConceptSearchInputSchema.shape,
      outputSchema: { results: z.array(OntoSearchResultSchema) },
    },
    async (args) =>
      respond(logger, "search_by_concept", async () => ({
        results: await memory.searchByConcept({
          query: args.query,
          userId: args.user_id,
          conceptType: args.concept_type,
          tags: args.tags,
          mode: args.mode,
          limit: args.limit,
        }),
      })),
  );

  server.registerTool(
    "search_reasoning_chain",
    {
      title: "Search reasoning chains",
      description:
        "Follows IMPLIES / BECAUSE (and, in deep mode, SUPPORTS / REFUTES / CONTRADICTS) edges from the best matching memories. Modes: both, causal, forward, deep.",
      inputSchema: ReasoningChainInputSchema.shape,
      outputSchema: { result: ChainSearchResultSchema },
    },
    async (args) =>
      respond(logger, "search_reasoning_chain", async () => ({
        result: await memory.searchReasoningChain({
          query: args.query,
          userId: args.user_id,
          chainMode: args.chain_mode,
          maxDepth: args.max_depth,
          limit: args.limit,
        }),
      })),
  );

  server.registerTool(
    "retrieve_context",
    {
      title: "Retrieve context",
      description:
        "Search plus chunk reconstruction, related memories, reasoning links and entities, sized by depth (shallow, medium, deep).",
      inputSchema: RetrieveContextInputSchema.shape,
      outputSchema: { result: RetrievalResultSchema },
    },
    async (args) =>
      respond(logger, "retrieve_context", async () => ({
        result: await memory.retrieve({
          query: args.query,
          userId: args.user_id,
          depth: args.depth,
          limit: args.limit,
          includeReasoning: args.include_reasoning,
          includeEntities: args.include_entities,
        }),
      })),
  );

  server.registerTool(
    "cleanup_orphans",
    {
      title: "Clean up orphans",
      description: "Finds entities and edges no memory refers to; deletes them unless `dry_run` is set.",
      inputSchema: CleanupOrphansInputSchema.shape,
      outputSchema: { stats: CleanupStatsSchema },
    },
    async (args) =>
      respond(logger, "cleanup_orphans", async () => ({
        stats: await memory.cleanupOrphans(args.dry_run ?? false),
      })),
  );

  server.registerTool(
    "system_status",
    {
      title: "System status",
      description: "Store health, providers, cache statistics and scheduled jobs.",
      inputSchema: {},
      outputSchema: { status: SystemStatusSchema },
    },
    async () =>
      respond(logger, "system_status", async () => ({
        status: await services.system.status(),
      })),
  );
}

async function respond<T extends Record<string, unknown>>(
  logger: AppLogger | undefined,
  tool: string,
  run: () => Promise<T>,
) {
  try {
    const structured = await run();
    return {
      content: [{ type: "text" as const, text: formatStructured(structured) }],
      structuredContent: structured,
    };
  } catch (error) {
    logger?.error({ tool, err: error }, "Tool call failed");
    throw error;
  }
}

function buildInstructions(): string {
  return [
    "Long-term memory for agents, scoped by user_id.",
    "Store with `add_memory`; it decides per extracted fact whether to add, merge, supersede or skip.",
    "Read with `search_memory` (recent facts), `search_by_concept` (typed questions such as preferences or skills), `search_reasoning_chain` (why / what follows) or `retrieve_context` (everything around a query).",
    "Maintain with `update_memory`, `delete_memory`, `undelete_memory` and `cleanup_orphans`.",
  ].join("\n");
}

function formatStructured(value: unknown): string {
  try {
    return JSON.stringify(value, null, 2);
  } catch {
    return String(value);
  }
}
