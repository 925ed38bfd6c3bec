import { z } from "zod";
import { textBlock } from "../message";
import { defineTool, type ToolResponse } from "../tool/types";

export interface HumanToolOptions {
  name?: string;
  description?: string;
}

/** Answers a question, or resolves undefined when no answer could be read. */
export type AskHuman = (question: string, signal: AbortSignal) => Promise<string | undefined>;

export type ConfirmWithHuman = (actionDescription: string, signal: AbortSignal) => Promise<boolean>;

/** Lets the model ask the person at the other end for help or missing information. */
export function createAskHumanTool(ask: AskHuman, options: HumanToolOptions = {}) {
  return defineTool({
    name: options.name ?? "ask_human",
    description: options.description,
    doc: `Ask the human operator for help, clarification or confirmation.
Use this when a decision is uncertain or risky, or when information is missing.

@param question - The question for the human`,
    parameters: z.object({ question: z.string().min(1) }),
    async execute({ question }, ctx): Promise<ToolResponse> {
      const answer = await ask(question, ctx.signal);
      return {
        content: [textBlock(answer === undefined ? "(no answer provided)" : `Human reply: ${answer}`)],
        metadata: { answered: answer !== undefined },
      };
    },
  });
}

/** A yes/no confirmation the model can request before acting. */
export function createConfirmationTool(confirm: ConfirmWithHuman, options: HumanToolOptions = {}) {
  return defineTool({
    name: options.name ?? "confirm_action",
    description: options.description,
    doc: `Ask the human operator to confirm an action before carrying it out.

@param action_description - What is about to happen`,
    parameters: z.object({ action_description: z.string().min(1) }),
    async execute({ action_description }, ctx): Promise<ToolResponse> {
      const confirmed = await confirm(action_description, ctx.signal);
      return {
        content: [textBlock(confirmed ? "The user confirmed; go ahead." : "The user declined this action.")],
        metadata: { confirmed },
      };
    },
  });
}
