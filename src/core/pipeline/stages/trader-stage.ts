/**
 * TraderStage - turns the market analysis into a Buy/Sell/Hold call.
 */

import { z } from "zod";
import { Capability, bindCapabilities } from "../../capabilities/capability";
import { AgentProvider } from "../../provider/agent-provider";
import { RoleDefinition, buildSystemPrompt } from "../../role/role-definition";
import {
  Confidence,
  MarketAnalysis,
  MarketAnalysisSchema,
  Recommendation,
  RecommendationSchema,
  TradeAction,
} from "../../models/market";
import { AnalysisRequest } from "../../models/stage";
import { StageContractViolationError } from "../../errors/pipeline-errors";
import { PipelineStage } from "../pipeline-stage";
import { StageContext, readStageOutput } from "../pipeline-context";
import { OutputContract } from "../output-contract";
import { StageResult } from "../stage-result";
import { callAgent } from "./agent-call";
import { formatSnapshot } from "./market-analyst-stage";

export interface TraderStageConfig {
  definition: RoleDefinition;
  capabilities?: readonly Capability[];
  provider: AgentProvider;
  /** Name of the stage whose MarketAnalysis this stage reads */
  analysisStage?: string;
}

const RawRecommendationSchema = z.object({
  action: z.string(),
  confidence: z.string().nullish(),
  rationale: z.union([z.array(z.string()), z.string()]).optional(),
  summary: z.string().optional(),
});

/**
 * Stage 2: Trading Decision
 *
 * This stage:
 * 1. Reads the market analysis from the context
 * 2. Asks the model for a JSON recommendation
 * 3. Parses the reply (JSON first, plain text as a fallback)
 */
export class TraderStage implements PipelineStage<AnalysisRequest, Recommendation> {
  readonly name: string;
  readonly role: string;
  readonly goal: string;
  readonly capabilities: readonly Capability[];
  readonly outputContract: OutputContract<Recommendation>;

  private definition: RoleDefinition;
  private provider: AgentProvider;
  private analysisStage: string;

  constructor(config: TraderStageConfig) {
    this.definition = config.definition;
    this.name = config.definition.name;
    this.role = config.definition.role;
    this.goal = config.definition.goal;
    this.provider = config.provider;
    this.analysisStage = config.analysisStage ?? "market-analyst";
    this.capabilities = bindCapabilities(
      this.name,
      config.definition.capabilities,
      config.capabilities ?? []
    );
    this.outputContract = {
      description: config.definition.expectedOutput,
      schema: RecommendationSchema,
    };
  }

  async execute(context: StageContext<AnalysisRequest>): Promise<StageResult<Recommendation>> {
    const analysis = readStageOutput(context, this.name, this.analysisStage, {
      description: "Market analysis",
      schema: MarketAnalysisSchema,
    });

    const reply = await callAgent(this.provider, this.name, context, {
      role: this.role,
      systemPrompt: buildSystemPrompt(this.definition),
      prompt: this.buildTradePrompt(analysis),
    });

    const recommendation = parseRecommendation(analysis.symbol, reply);
    if (!recommendation) {
      return StageResult.Failed(
        new StageContractViolationError(this.name, [
          "reply does not contain a BUY, SELL or HOLD decision",
        ])
      );
    }
    return StageResult.Completed(recommendation);
  }

  private buildTradePrompt(analysis: MarketAnalysis): string {
    return `
Based on the analysis of ${analysis.symbol}, give a Buy/Sell/Hold recommendation.

## Market Data
${formatSnapshot(analysis.snapshot)}

## Analyst Summary
${analysis.summary}

## Your Response

Respond with a single JSON object and nothing else:

\`\`\`json
{
  "action": "BUY" | "SELL" | "HOLD",
  "confidence": "LOW" | "MEDIUM" | "HIGH",
  "rationale": ["reason 1", "reason 2"],
  "summary": "One short paragraph"
}
\`\`\`
`.trim();
  }
}

/**
 * Parse a model reply into a Recommendation.
 *
 * Accepts a bare or fenced JSON object; otherwise falls back to the first
 * standalone BUY/SELL/HOLD word and the reply's bullet lines.
 *
 * @returns null when no decision can be found
 */
export function parseRecommendation(symbol: string, reply: string): Recommendation | null {
  return parseJsonRecommendation(symbol, reply) ?? parseTextRecommendation(symbol, reply);
}

function parseJsonRecommendation(symbol: string, reply: string): Recommendation | null {
  const json = extractJson(reply);
  if (json === null) return null;

  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch {
    return null;
  }

  const raw = RawRecommendationSchema.safeParse(data);
  if (!raw.success) return null;

  const action = toAction(raw.data.action);
  if (!action) return null;

  const rationale = (
    typeof raw.data.rationale === "string" ? [raw.data.rationale] : raw.data.rationale ?? []
  )
    .map((r) => r.trim())
    .filter((r) => r.length > 0);
  const summary = raw.data.summary?.trim() || rationale.join(" ");

  const candidate = {
    symbol,
    action,
    confidence: toConfidence(raw.data.confidence ?? null),
    rationale: rationale.length > 0 ? rationale : [summary],
    summary,
  };
  const checked = RecommendationSchema.safeParse(candidate);
  return checked.success ? checked.data : null;
}

function parseTextRecommendation(symbol: string, reply: string): Recommendation | null {
  const text = reply.trim();
  const action = findDecision(text);
  if (!action) return null;

  const bullets = text
    .split("\n")
    .map((line) => /^\s*(?:[-*•]|\d+[.)])\s+(.*\S)\s*$/.exec(line)?.[1])
    .filter((line): line is string => line !== undefined);

  const confidenceMatch = /confidence\s*[:\-]?\s*(low|medium|high)\b/i.exec(text);

  return {
    symbol,
    action,
    confidence: toConfidence(confidenceMatch ? confidenceMatch[1] : null),
    rationale: bullets.length > 0 ? bullets : [text],
    summary: text,
  };
}

const LABELLED_DECISION = /\b(?:recommendation|action|decision|verdict)\s*[:\-=]\s*[*_"']*\s*(buy|sell|hold)\b/i;
const OPTION_LIST =
  /["']?\b(?:BUY|SELL|HOLD)\b["']?(?:(?:\s*[|/,]\s*(?:or\s+)?|\s+or\s+)["']?\b(?:BUY|SELL|HOLD)\b["']?)+/gi;
const NEGATED = /\b(?:not|never|no|don't|do not|wouldn't|would not)\s+$/i;

/**
 * Find the decision in free text: a labelled decision ("Action: HOLD") wins,
 * then the first upper-case decision word, then any casing. Echoed option
 * lists ("BUY" | "SELL" | "HOLD") and negated words ("not BUY") are skipped.
 */
function findDecision(text: string): TradeAction | null {
  const labelled = LABELLED_DECISION.exec(text);
  if (labelled) return toAction(labelled[1]);

  const cleaned = text.replace(OPTION_LIST, (list) => " ".repeat(list.length));
  return (
    firstDecisionWord(cleaned, /\b(BUY|SELL|HOLD)\b/g) ??
    firstDecisionWord(cleaned, /\b(buy|sell|hold)\b/gi)
  );
}

function firstDecisionWord(text: string, pattern: RegExp): TradeAction | null {
  for (const match of text.matchAll(pattern)) {
    const before = text.slice(0, match.index ?? 0);
    if (NEGATED.test(before)) continue;
    return toAction(match[1]);
  }
  return null;
}

function extractJson(reply: string): string | null {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(reply);
  const candidate = fenced ? fenced[1] : reply;
  const start = candidate.indexOf("{");
  const end = candidate.lastIndexOf("}");
  if (start === -1 || end <= start) return null;
  return candidate.slice(start, end + 1);
}

function toAction(value: string): TradeAction | null {
  switch (value.trim().toUpperCase()) {
    case "BUY":
      return TradeAction.BUY;
    case "SELL":
      return TradeAction.SELL;
    case "HOLD":
      return TradeAction.HOLD;
    default:
      return null;
  }
}

function toConfidence(value: string | null): Confidence | null {
  switch (value?.trim().toUpperCase()) {
    case "LOW":
      return Confidence.LOW;
    case "MEDIUM":
      return Confidence.MEDIUM;
    case "HIGH":
      return Confidence.HIGH;
    default:
      return null;
  }
}
