/**
 * RoleDefinition - complete definition of a pipeline stage's role.
 *
 * These definitions tell the LLM how to behave when operating as each role
 * and declare which capabilities the stage is bound to.
 */

import { CapabilityKind } from "../capabilities/capability";

export interface RoleDefinition {
  /** Stage name, unique within a pipeline (e.g. "market-analyst") */
  name: string;

  /** Display role shown to the model and users */
  role: string;

  /** What the stage is trying to achieve */
  goal: string;

  /** Background that shapes the model's voice */
  backstory: string;

  /** Plain-language description of the expected output */
  expectedOutput: string;

  /** Capability kinds the stage must be bound to */
  capabilities: CapabilityKind[];

  /** Where the definition was loaded from */
  source: string;
}

/**
 * Build the system prompt injected ahead of every task prompt.
 */
export function buildSystemPrompt(definition: RoleDefinition): string {
  return `
You are a ${definition.role}.

## Goal
${definition.goal}

## Background
${definition.backstory}

## Expected Output
${definition.expectedOutput}

Only use the data you are given. Never invent prices, figures or news.
`.trim();
}
