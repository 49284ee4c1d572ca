import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import type { CollectionHandle } from '../ingestion/types';
import type { LLMService } from '../services/llm';
import { BaseAgent } from './base/BaseAgent';
import type { AgentAction, AgentInput, AgentOutput } from './base/AgentTypes';
import type { RagMeTool } from './tools/ragme';

export type AgentDecision =
  | { kind: 'tool'; tool: string; arguments: Record<string, unknown> }
  | { kind: 'answer'; answer: string };

type AgentStep = {
  tool: string;
  arguments: Record<string, unknown>;
  observation: string;
};

const decisionSchema = z.union([
  z.object({
    tool: z.string().min(1),
    arguments: z.record(z.unknown()).default({}),
  }),
  z.object({ answer: z.string() }),
]);

export const STEP_LIMIT_REPLY =
  'I could not finish that request within the allowed number of steps.';

/**
 * Reads the first JSON object out of an LLM reply. Anything that is not a
 * well-formed decision is taken as the final answer.
 */
export function parseDecision(raw: string): AgentDecision {
  const text = raw.trim();
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start !== -1 && end > start) {
    try {
      const parsed = decisionSchema.safeParse(
        JSON.parse(text.slice(start, end + 1))
      );
      if (parsed.success) {
        return 'tool' in parsed.data
          ? {
              kind: 'tool',
              tool: parsed.data.tool,
              arguments: parsed.data.arguments,
            }
          : { kind: 'answer', answer: parsed.data.answer };
      }
    } catch {
      return { kind: 'answer', answer: text };
    }
  }
  return { kind: 'answer', answer: text };
}

export function buildAgentPrompt(
  collection: string,
  tools: RagMeTool[],
  message: string,
  steps: AgentStep[]
): string {
  const toolList = tools
    .map(t => `- ${t.name} ${t.signature}: ${t.description}`)
    .join('\n');
  const history = steps
    .map(
      (s, i) =>
        `Step ${i + 1}: called ${s.tool} with ${JSON.stringify(s.arguments)}\nResult: ${s.observation}`
    )
    .join('\n\n');

  return `You are RagMe, an assistant that stores web pages in the ${collection} collection and answers questions from it.
Use the tools to add URLs, list or delete the stored documents, and answer questions about them.
For any question about stored content, call query_agent instead of answering from memory.

Tools:
${toolList}

Reply with ONLY one JSON object (no markdown, no comments):
- to call a tool: {"tool": "<name>", "arguments": { ... }}
- to finish: {"answer": "<reply to the user>"}

User: ${message}
${history ? `\n${history}\n` : ''}
JSON:`;
}

export class RagMeAgent extends BaseAgent {
  private readonly tools: Map<string, RagMeTool>;

  constructor(
    llm: LLMService,
    logger: FastifyBaseLogger,
    collection: CollectionHandle,
    tools: RagMeTool[],
    private readonly maxSteps: number = 5
  ) {
    super(llm, logger, collection, 'ragme');
    this.tools = new Map(tools.map(t => [t.name, t]));
  }

  getCapabilities() {
    return [...this.tools.keys()];
  }

  async process(input: AgentInput): Promise<AgentOutput> {
    try {
      const steps: AgentStep[] = [];
      const actions: AgentAction[] = [];
      let usageTotalTokens: number | undefined;

      for (let i = 0; i < this.maxSteps; i++) {
        const prompt = buildAgentPrompt(
          this.collection.name,
          [...this.tools.values()],
          input.message,
          steps
        );
        const completion = await this.complete(prompt, 0);
        if (typeof completion.usageTotalTokens === 'number') {
          usageTotalTokens =
            (usageTotalTokens ?? 0) + completion.usageTotalTokens;
        }

        const decision = parseDecision(completion.text);
        if (decision.kind === 'answer') {
          return withUsage({ reply: decision.answer, actions }, usageTotalTokens);
        }

        const tool = this.tools.get(decision.tool);
        const result = tool
          ? await tool.execute(decision.arguments)
          : { ok: false as const, error: `unknown tool ${decision.tool}` };
        this.logger.info(
          { step: i + 1, tool: decision.tool, ok: result.ok },
          'ragme agent step'
        );
        actions.push(
          result.ok
            ? { type: decision.tool, status: 'done' }
            : {
                type: decision.tool,
                status: 'failed',
                payload: { error: result.error },
              }
        );
        steps.push({
          tool: decision.tool,
          arguments: decision.arguments,
          observation: result.ok ? result.output : `Error: ${result.error}`,
        });
      }

      this.logger.warn({ maxSteps: this.maxSteps }, 'ragme agent step limit');
      return withUsage({ reply: STEP_LIMIT_REPLY, actions }, usageTotalTokens);
    } catch (error) {
      this.logger.error(
        {
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined,
          sessionId: input.sessionId,
          originalMessage: input.message,
        },
        'RagMeAgent processing error:'
      );
      return this.errorOutput('RAGME_AGENT_PROCESSING_ERROR', error);
    }
  }
}

function withUsage(output: AgentOutput, usageTotalTokens?: number): AgentOutput {
  return typeof usageTotalTokens === 'number'
    ? { ...output, usageTotalTokens }
    : output;
}
