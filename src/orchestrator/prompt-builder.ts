/**
 * Prompt Builder
 *
 * Assembles the layered prompt for intent handlers:
 *   1. Core advisor rules (fixed)
 *   2. Intent instructions
 *   3. User profile (stored preferences)
 *   4. Retrieved context (documents, graph insights, relevant memories)
 *   5. Conversation history + current question with extracted parameters
 */

import type {
  ContextBundle,
  HandlerRequest,
  Intent,
  LLMMessage,
  PreferenceKey,
  RoutingParameters,
} from '../types/index.js';

/**
 * Layer 1: Core advisor rules
 */
export const CORE_INSTRUCTIONS = `## CORE RULES
You are an advisor for people planning and running restaurants in Indian cities.
1. Ground every claim in the provided context where possible and say when the context is silent.
2. Never invent statistics, licence fees or rents.
3. Be concrete and structured; prefer short sections and bullet points.
4. Flag regulatory or financial points that need a local professional's confirmation.`;

/**
 * Layer 2: Per-intent instructions
 */
export const INTENT_INSTRUCTIONS: Readonly<Record<Intent, string>> = {
  location_recommender:
    'Recommend specific areas to open the restaurant. Rank them, and for each cover foot traffic, competition, rent and fit with the concept and target customers.',
  regulatory_advisor:
    'List the licences and permits required, the issuing authority, documents needed, typical timelines and renewal obligations, in the order they should be obtained.',
  market_analysis:
    'Assess market potential, competition and saturation, consumer trends and a pricing strategy. End with a short go/no-go style summary.',
  consumer_survey:
    'Summarise consumer preferences and dining habits for the relevant segment, and what they imply for menu, pricing and format.',
  real_estate:
    'Advise on commercial property: typical rents, lease terms, space requirements and which localities offer the best value for the restaurant type.',
  demographics:
    'Describe the population, income levels and economic indicators that matter for a restaurant, and which segments to target.',
  pdf_research:
    'Synthesise findings from the research documents provided. Cite the document snippets you rely on and separate findings from interpretation.',
  domain_specialist:
    'Answer as a specialist in the area the question is about.',
  basic_query:
    'Answer the question helpfully and concisely. Suggest which specialised advice could help next.',
};

export interface PromptBuilderInput {
  instructions: string;
  parameters: RoutingParameters;
  context: ContextBundle;
  request: HandlerRequest;
}

export interface PromptBuilder {
  build(input: PromptBuilderInput): LLMMessage[];
}

const PREFERENCE_LABELS: ReadonlyArray<readonly [PreferenceKey, string]> = [
  ['cuisine', 'Preferred cuisine'],
  ['city', 'City of interest'],
  ['budget', 'Budget tier'],
];

function formatProfile(request: HandlerRequest): string {
  const preferences = request.profile?.preferences ?? {};
  const lines: string[] = [];
  for (const [key, label] of PREFERENCE_LABELS) {
    const value = preferences[key];
    if (value !== undefined) {
      lines.push(`- ${label}: ${value}`);
    }
  }

  if (lines.length === 0) {
    return '';
  }
  return `\n## USER PROFILE\n${lines.join('\n')}`;
}

function formatContext(context: ContextBundle): string {
  const sections: string[] = [];

  if (context.documents.length > 0) {
    const docs = context.documents.map((doc, i) => `[${i + 1}] ${doc}`).join('\n\n');
    sections.push(`\n## KNOWLEDGE BASE\n${docs}`);
  }
  if (context.graphInsights.length > 0) {
    sections.push(`\n## MARKET DATA\n${context.graphInsights.join('\n\n')}`);
  }
  if (context.sources.length > 0) {
    sections.push(`\nSources: ${context.sources.join(', ')}`);
  }
  if (sections.length === 0) {
    sections.push('\n## CONTEXT\nNo supporting data was available for this question.');
  }
  return sections.join('\n');
}

function formatMemories(request: HandlerRequest): string {
  const facts = request.memories.facts;
  if (facts.length === 0) {
    return '';
  }
  return `\n## KNOWN FACTS ABOUT THE USER\n${facts.map((f) => `- ${f}`).join('\n')}`;
}

function formatParameters(parameters: RoutingParameters): string {
  const entries = Object.entries(parameters);
  if (entries.length === 0) {
    return '';
  }
  return `\n\nDetails: ${entries.map(([k, v]) => `${k}=${v}`).join('; ')}`;
}

/**
 * Create a prompt builder instance
 */
export function createPromptBuilder(): PromptBuilder {
  return {
    build(input: PromptBuilderInput): LLMMessage[] {
      const systemParts: string[] = [CORE_INSTRUCTIONS];

      systemParts.push(`\n## TASK\n${input.instructions}`);

      const profile = formatProfile(input.request);
      if (profile) {
        systemParts.push(profile);
      }

      systemParts.push(formatContext(input.context));

      const memories = formatMemories(input.request);
      if (memories) {
        systemParts.push(memories);
      }

      const messages: LLMMessage[] = [
        { role: 'system', content: systemParts.join('\n') },
      ];

      for (const msg of input.request.history) {
        messages.push({ role: msg.role, content: msg.content });
      }

      messages.push({
        role: 'user',
        content: `${input.request.query}${formatParameters(input.parameters)}`,
      });

      return messages;
    },
  };
}
