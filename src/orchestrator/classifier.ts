/**
 * Model-backed intent classifier
 *
 * The prompt is generated from the same rule table the keyword cascade
 * uses, so the two paths cannot drift apart.
 */

import {
  FALLBACK_INTENT,
  SPECIALIST_DOMAINS,
  type Classifier,
  type IntentRule,
  type LLMClient,
} from '../types/index.js';

export interface ClassifierConfig {
  model: string;
  rules: readonly IntentRule[];
}

/**
 * Render the routing instructions for the model
 */
export function buildClassifierPrompt(rules: readonly IntentRule[]): string {
  const intentLines = rules.map((rule) => {
    const params =
      rule.parameters.length > 0 ? ` Parameters: ${rule.parameters.join(', ')}.` : '';
    return `- ${rule.intent}: ${rule.description}.${params}`;
  });
  intentLines.push(
    `- ${FALLBACK_INTENT}: General questions that fit none of the above.`
  );

  return `You route questions about opening and running restaurants in Indian cities to the right advisor.

## ADVISORS
${intentLines.join('\n')}

For domain_specialist, also extract "domain_keywords": the terms that identify the specialist area (${SPECIALIST_DOMAINS.join(', ')}).

## OUTPUT
Reply with a single JSON object and nothing else:
{"intent": "<advisor name>", "parameters": {"<name>": "<value>"}, "rationale": "<one sentence>"}

Only include parameters that are stated or clearly implied in the question. All parameter values are strings.`;
}

/**
 * Create a classifier that returns the model's raw reply
 */
export function createLLMClassifier(
  llmClient: LLMClient,
  config: ClassifierConfig
): Classifier {
  const systemPrompt = buildClassifierPrompt(config.rules);

  return {
    async classify(query: string): Promise<string> {
      const response = await llmClient.complete({
        model: config.model,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: query },
        ],
        temperature: 0,
        max_tokens: 300,
      });
      return response.content;
    },
  };
}
