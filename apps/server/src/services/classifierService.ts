import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import {
  ExternalServiceError,
  ticketCategorySchema,
  ticketPrioritySchema,
} from '@support-desk/shared';
import type { ClassifyResponse } from '@support-desk/shared';
import { refineSuggestions } from './classifier/keywordRules.js';

export interface ClassifierOptions {
  apiKey?: string;
  model: string;
  timeoutMs: number;
}

export const NO_SUGGESTIONS: ClassifyResponse = Object.freeze({
  suggested_category: null,
  suggested_priority: null,
});

export const CLASSIFY_PROMPT = `You are a support ticket classifier. Output ONLY valid JSON.

Category rules (apply in order):
- Login, password, password reset, account unlock or account access -> "account".
- Payment, refund, invoice, charge, subscription or billing -> "billing".
- API, webhook, endpoint, 500 error, server error, integration or logs -> "technical".
- Otherwise "general".

Priority rules:
- critical: outage, system down, data loss, breach, security incident, "urgent" or "restore"
- high: "no workaround", "blocking", "deadline", "can't access", "as soon as possible"
- low: "minor", "cosmetic", "not urgent", "feature request", "would be nice"
- medium: everything else

Output format (no other text):
{"category": "billing|technical|account|general", "priority": "low|medium|high|critical"}`;

const judgementSchema = z.object({
  category: z.unknown().optional(),
  priority: z.unknown().optional(),
});

const normalize = (value: unknown) => (typeof value === 'string' ? value.trim().toLowerCase() : value);

/**
 * Turns the model's reply into suggestions. Each field is checked on its own:
 * an unrecognized category does not discard a valid priority.
 * Throws when the reply is not a JSON object.
 */
export function parseJudgement(text: string): ClassifyResponse {
  let jsonText = text.trim();
  const fenced = jsonText.match(/```(?:json)?\s*([\s\S]*?)\s*```/);
  if (fenced) {
    jsonText = fenced[1];
  }
  if (!jsonText) {
    throw new ExternalServiceError('Empty classification reply', 'anthropic');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(jsonText);
  } catch {
    throw new ExternalServiceError('Classification reply is not valid JSON', 'anthropic');
  }

  const judgement = judgementSchema.safeParse(raw);
  if (!judgement.success) {
    throw new ExternalServiceError('Classification reply has an unexpected shape', 'anthropic');
  }

  const category = ticketCategorySchema.safeParse(normalize(judgement.data.category));
  const priority = ticketPrioritySchema.safeParse(normalize(judgement.data.priority));
  return {
    suggested_category: category.success ? category.data : null,
    suggested_priority: priority.success ? priority.data : null,
  };
}

export function createClassifierService(options: ClassifierOptions) {
  let client: Anthropic | null = null;

  function getClient(apiKey: string): Anthropic {
    if (!client) {
      client = new Anthropic({
        apiKey,
        timeout: options.timeoutMs,
        maxRetries: 0,
      });
    }
    return client;
  }

  async function requestJudgement(apiKey: string, description: string): Promise<string> {
    const response = await getClient(apiKey).messages.create({
      model: options.model,
      max_tokens: 100,
      temperature: 0,
      system: CLASSIFY_PROMPT,
      messages: [{ role: 'user', content: `Ticket description:\n${description}` }],
    });

    const content = response.content.find((block) => block.type === 'text');
    if (!content || content.type !== 'text') {
      throw new ExternalServiceError('Unexpected response type from Claude', 'anthropic');
    }
    return content.text;
  }

  /**
   * Suggests a category and priority for a ticket description.
   * Resolves to null suggestions when classification is unconfigured or the
   * upstream call fails in any way; never rejects.
   */
  async function classify(description: string): Promise<ClassifyResponse> {
    const text = description.trim();
    if (!text || !options.apiKey) {
      return NO_SUGGESTIONS;
    }

    try {
      const reply = await requestJudgement(options.apiKey, text);
      return refineSuggestions(text, parseJudgement(reply));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[classifier] Classification failed, returning no suggestions: ${message}`);
      return NO_SUGGESTIONS;
    }
  }

  return {
    classify,
    isConfigured: () => Boolean(options.apiKey),
  };
}

export type ClassifierService = ReturnType<typeof createClassifierService>;
