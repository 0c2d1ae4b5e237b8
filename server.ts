import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from 'zod';
import { corpusFromRecord, pages } from './src/corpus.js';
import { type RankConfig, loadConfig } from './src/config.js';
import { iteratePagerank } from './src/iterate.js';
import { samplePagerank } from './src/pagerank.js';
import { randomFor, rankDirectory } from './src/rank.js';
import { ranksToRecord } from './src/report.js';
import { transitionModel } from './src/transition.js';

export const SERVER_NAME = "corpus-rank";
export const SERVER_VERSION = "1.0.0";

// Passed through untouched: a zod record would drop a "__proto__" page.
// corpusFromRecord checks the shape.
const corpusArg = z.custom<unknown>((value) => value !== undefined, { message: "Required" });

const ValidateArgs = z.object({
  corpus: corpusArg,
});

const TransitionArgs = z.object({
  corpus: corpusArg,
  page: z.string(),
  damping: z.number().optional(),
});

const SampleArgs = z.object({
  corpus: corpusArg,
  damping: z.number().optional(),
  samples: z.number().optional(),
  seed: z.number().int().optional(),
});

const IterateArgs = z.object({
  corpus: corpusArg,
  damping: z.number().optional(),
  threshold: z.number().optional(),
  maxIterations: z.number().optional(),
});

const RankDirectoryArgs = z.object({
  directory: z.string().min(1),
  samples: z.number().optional(),
  seed: z.number().int().optional(),
});

type ToolResult = {
  content: { type: "text"; text: string }[];
  isError?: boolean;
};

function jsonResult(value: unknown): ToolResult {
  return { content: [{ type: "text", text: JSON.stringify(value, null, 2) }] };
}

function errorResult(name: string, error: unknown): ToolResult {
  let text: string;
  if (error instanceof z.ZodError) {
    const problems = error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    text = `Invalid arguments for ${name}: ${problems.join('; ')}`;
  } else if (error instanceof Error) {
    text = error.message;
  } else {
    text = String(error);
  }
  return { content: [{ type: "text", text }], isError: true };
}

const corpusProperty = {
  type: "object",
  additionalProperties: { type: "array", items: { type: "string" } },
  description: "Link graph: each page name maps to the pages it links to. Every target must be a page; no page may link to itself.",
};

/**
 * Creates a configured MCP server instance with all ranking tools registered.
 * @param config Defaults for damping, samples and convergence (defaults to the PAGERANK_* environment variables)
 */
export function createServer(config: RankConfig = loadConfig()): Server {
  const server = new Server({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  }, {
    capabilities: {
      tools: {},
    },
  });

  async function runTool(name: string, args: Record<string, unknown>): Promise<ToolResult> {
    switch (name) {
      case "validate_corpus": {
        const { corpus } = ValidateArgs.parse(args);
        return jsonResult({ valid: true, pages: pages(corpusFromRecord(corpus)).length });
      }
      case "transition_model": {
        const a = TransitionArgs.parse(args);
        const model = transitionModel(corpusFromRecord(a.corpus), a.page, a.damping ?? config.damping);
        return jsonResult(ranksToRecord(model));
      }
      case "sample_pagerank": {
        const a = SampleArgs.parse(args);
        const samples = a.samples ?? config.samples;
        const random = randomFor({ seed: a.seed ?? config.seed });
        const ranks = samplePagerank(corpusFromRecord(a.corpus), a.damping ?? config.damping, samples, random);
        return jsonResult({ samples, ranks: ranksToRecord(ranks) });
      }
      case "iterate_pagerank": {
        const a = IterateArgs.parse(args);
        const ranks = iteratePagerank(corpusFromRecord(a.corpus), a.damping ?? config.damping, {
          threshold: a.threshold ?? config.threshold,
          maxIterations: a.maxIterations ?? config.maxIterations,
        });
        return jsonResult({ ranks: ranksToRecord(ranks) });
      }
      case "rank_directory": {
        const a = RankDirectoryArgs.parse(args);
        const result = await rankDirectory(a.directory, {
          ...config,
          samples: a.samples ?? config.samples,
          seed: a.seed ?? config.seed,
        });
        return jsonResult({
          samples: result.samples,
          sampling: ranksToRecord(result.sampling),
          iteration: ranksToRecord(result.iteration),
        });
      }
      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  }

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: [
        {
          name: "validate_corpus",
          description: "Check that a link graph is well formed: every link target is a page and no page links to itself. Returns the page count.",
          inputSchema: {
            type: "object",
            properties: {
              corpus: corpusProperty,
            },
            required: ["corpus"],
          },
        },
        {
          name: "transition_model",
          description: "Probability distribution over the next page a random surfer visits from the given page.",
          inputSchema: {
            type: "object",
            properties: {
              corpus: corpusProperty,
              page: { type: "string", description: "The current page" },
              damping: { type: "number", description: `Probability of following a link, in (0, 1) (default: ${config.damping})` },
            },
            required: ["corpus", "page"],
          },
        },
        {
          name: "sample_pagerank",
          description: "Estimate PageRank as the visit frequency of a random walk over the link graph.",
          inputSchema: {
            type: "object",
            properties: {
              corpus: corpusProperty,
              damping: { type: "number", description: `Probability of following a link, in (0, 1) (default: ${config.damping})` },
              samples: { type: "number", description: `Number of pages to sample (default: ${config.samples})` },
              seed: { type: "number", description: "Integer seed for a reproducible walk. Omit for a random walk." },
            },
            required: ["corpus"],
          },
        },
        {
          name: "iterate_pagerank",
          description: "Compute PageRank by iterating the PageRank recurrence until every page's rank changes by less than the threshold.",
          inputSchema: {
            type: "object",
            properties: {
              corpus: corpusProperty,
              damping: { type: "number", description: `Probability of following a link, in (0, 1) (default: ${config.damping})` },
              threshold: { type: "number", description: `Convergence threshold (default: ${config.threshold})` },
              maxIterations: { type: "number", description: `Iteration cap before reporting non-convergence (default: ${config.maxIterations})` },
            },
            required: ["corpus"],
          },
        },
        {
          name: "rank_directory",
          description: "Crawl a directory of HTML pages and rank them with both sampling and iteration.",
          inputSchema: {
            type: "object",
            properties: {
              directory: { type: "string", description: "Directory containing the .html pages" },
              samples: { type: "number", description: `Number of pages to sample (default: ${config.samples})` },
              seed: { type: "number", description: "Integer seed for a reproducible walk" },
            },
            required: ["directory"],
          },
        },
      ],
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    try {
      return await runTool(name, args ?? {});
    } catch (error) {
      return errorResult(name, error);
    }
  });

  return server;
}
