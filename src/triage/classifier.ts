import Anthropic from "@anthropic-ai/sdk";
import { z } from "zod";
import type { RawVerdict } from "./verdict.js";

export interface ClassifierAdapter {
  analyze(content: string, instruction: string): Promise<RawVerdict>;
  suggestUpdate(
    currentInstruction: string,
    feedback: string,
    exampleContent: string
  ): Promise<string>;
}

export class ClassifierError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ClassifierError";
  }
}

export interface ClassifierConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
  timeoutSeconds: number;
}

const VerdictSchema = z.object({
  recommendation: z.string(),
  category: z.string(),
  confidence: z.coerce.number(),
  reasoning: z.string(),
  key_factors: z.array(z.string()).optional(),
  red_flags: z.array(z.string()).optional(),
});

const SYSTEM_PROMPT =
  "You are an expert email categorization assistant. Always respond with valid JSON in the specified format.";

const SUGGESTION_SYSTEM_PROMPT =
  "You are a prompt engineering expert focused on improving email classification systems.";

function extractJson(text: string): string {
  const trimmed = text.trim();

  if (trimmed.includes("```json")) {
    return trimmed.split("```json")[1].split("```")[0].trim();
  }
  if (trimmed.includes("```")) {
    return trimmed.split("```")[1].split("```")[0].trim();
  }
  return trimmed;
}

/**
 * Parse a model reply into a verdict. Throws ClassifierError when the reply
 * is not JSON or lacks a required field.
 */
export function parseVerdictResponse(text: string): RawVerdict {
  let data: unknown;
  try {
    data = JSON.parse(extractJson(text));
  } catch (error) {
    throw new ClassifierError(
      `Malformed classifier response: ${text.slice(0, 200)}`,
      { cause: error }
    );
  }

  const result = VerdictSchema.safeParse(data);
  if (!result.success) {
    const fields = result.error.issues.map((i) => i.path.join(".")).join(", ");
    throw new ClassifierError(
      `Classifier response missing or invalid fields: ${fields}`
    );
  }

  return result.data;
}

export function buildSuggestionPrompt(
  currentInstruction: string,
  feedback: string,
  exampleContent: string
): string {
  return `
You are a prompt engineering expert. A user has provided feedback on an email classification.

## Current Prompt Template:
${currentInstruction}

## Email Content:
${exampleContent}

## User Feedback:
${feedback}

## Task:
The user disagreed with the AI classification or wants it to be more confident, and provided their reasoning. Based on this feedback, suggest GENERAL improvements to the prompt template that would help the AI make better classifications for similar emails in the future.

IMPORTANT:
- Suggest general improvements, not overfitting to this specific email
- Focus on improving categorization criteria or adding new considerations
- Keep the same JSON response format
- Don't suggest changes based on sender names or specific content - focus on patterns and categories

Respond with ONLY the improved section(s) of the prompt that should be updated, not the entire prompt. Be specific about what to add or modify.
`;
}

export class AnthropicClassifier implements ClassifierAdapter {
  private readonly client: Anthropic;

  constructor(private readonly config: ClassifierConfig) {
    this.client = new Anthropic({
      apiKey: config.apiKey,
      timeout: config.timeoutSeconds * 1000,
      maxRetries: 1,
    });
  }

  get model(): string {
    return this.config.model;
  }

  private async complete(
    system: string,
    prompt: string,
    maxTokens: number,
    temperature: number
  ): Promise<string> {
    try {
      const response = await this.client.messages.create({
        model: this.config.model,
        max_tokens: maxTokens,
        temperature,
        system,
        messages: [
          {
            role: "user",
            content: prompt,
          },
        ],
      });

      const block = response.content[0];
      return block && block.type === "text" ? block.text : "";
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ClassifierError(`Classifier request failed: ${reason}`, {
        cause: error,
      });
    }
  }

  async analyze(content: string, instruction: string): Promise<RawVerdict> {
    const prompt = `${instruction}\n\n## Email to Analyze:\n\n${content}`;
    const text = await this.complete(
      SYSTEM_PROMPT,
      prompt,
      this.config.maxTokens,
      0.3
    );
    return parseVerdictResponse(text);
  }

  async suggestUpdate(
    currentInstruction: string,
    feedback: string,
    exampleContent: string
  ): Promise<string> {
    const text = await this.complete(
      SUGGESTION_SYSTEM_PROMPT,
      buildSuggestionPrompt(currentInstruction, feedback, exampleContent),
      800,
      0.7
    );

    const suggestion = text.trim();
    if (!suggestion) {
      throw new ClassifierError("Classifier returned an empty suggestion");
    }
    return suggestion;
  }
}
