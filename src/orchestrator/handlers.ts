/**
 * Intent Handlers
 *
 * One handler per intent. Each renders the layered prompt for its intent and
 * hands it to the text generator. Missing parameters never fail a handler;
 * the prompt simply carries fewer details.
 *
 * The domain specialist picks a sub-domain from the query and checks the
 * caller's domain access before answering as that specialist.
 */

import { containsTerm, titleCase } from '../config/vocabulary.js';
import type {
  ContextBundle,
  HandlerRegistry,
  HandlerRequest,
  Intent,
  IntentHandler,
  RoutingParameters,
  SpecialistDomain,
  TextGenerator,
} from '../types/index.js';

import { createPromptBuilder, INTENT_INSTRUCTIONS } from './prompt-builder.js';
import type { PromptBuilder } from './prompt-builder.js';

// ─────────────────────────────────────────────────────────────
// DEPENDENCIES
// ─────────────────────────────────────────────────────────────

export interface HandlersPermissionDep {
  canAccessDomain(role: string, domain: SpecialistDomain): boolean;
}

export interface IntentHandlersDeps {
  generator: TextGenerator;
  permissionService: HandlersPermissionDep;
  specialistTerms: ReadonlyArray<readonly [SpecialistDomain, readonly string[]]>;
  promptBuilder?: PromptBuilder;
}

const DOMAIN_INSTRUCTIONS: Readonly<Record<SpecialistDomain, string>> = {
  cuisine:
    'You are a culinary specialist. Advise on menu design, cuisine positioning, signature dishes and sourcing.',
  financial:
    'You are a restaurant finance specialist. Advise on budgets, funding, pricing, margins and break-even.',
  staffing:
    'You are a restaurant staffing specialist. Advise on hiring, team structure, training, scheduling and wages.',
  marketing:
    'You are a restaurant marketing specialist. Advise on branding, promotion, social media and customer acquisition.',
  technology:
    'You are a restaurant technology specialist. Advise on POS, ordering, delivery platforms and kitchen systems.',
  design:
    'You are a restaurant design specialist. Advise on interior design, layout, ambience and seating plans.',
};

/**
 * First specialist domain (in domain order) with a term present in the query
 */
export function detectSpecialistDomain(
  query: string,
  specialistTerms: IntentHandlersDeps['specialistTerms']
): SpecialistDomain | null {
  const text = query.toLowerCase();
  for (const [domain, terms] of specialistTerms) {
    if (terms.some((term) => containsTerm(text, term))) {
      return domain;
    }
  }
  return null;
}

/**
 * Create the handler registry, one entry per intent
 */
export function createIntentHandlers(deps: IntentHandlersDeps): HandlerRegistry {
  const { generator, permissionService, specialistTerms } = deps;
  const promptBuilder = deps.promptBuilder ?? createPromptBuilder();

  function promptHandler(intent: Intent): IntentHandler {
    return {
      async handle(
        parameters: RoutingParameters,
        context: ContextBundle,
        request: HandlerRequest
      ): Promise<string> {
        const messages = promptBuilder.build({
          instructions: INTENT_INSTRUCTIONS[intent],
          parameters,
          context,
          request,
        });
        return generator.generate(messages);
      },
    };
  }

  const domainSpecialist: IntentHandler = {
    async handle(parameters, context, request): Promise<string> {
      const domain = detectSpecialistDomain(request.query, specialistTerms);

      if (domain === null) {
        return promptHandler('domain_specialist').handle(parameters, context, request);
      }

      if (!permissionService.canAccessDomain(request.user.role, domain)) {
        const general = await promptHandler('basic_query').handle(
          parameters,
          context,
          request
        );
        return `Note: ${titleCase(domain)} specialist advice is not available for your role, so here is general guidance.\n\n${general}`;
      }

      const messages = promptBuilder.build({
        instructions: `${DOMAIN_INSTRUCTIONS[domain]} ${INTENT_INSTRUCTIONS.domain_specialist}`,
        parameters,
        context,
        request,
      });
      const text = await generator.generate(messages);
      return `[${domain.toUpperCase()} SPECIALIST RESPONSE]\n\n${text}`;
    },
  };

  return Object.freeze({
    location_recommender: promptHandler('location_recommender'),
    regulatory_advisor: promptHandler('regulatory_advisor'),
    market_analysis: promptHandler('market_analysis'),
    consumer_survey: promptHandler('consumer_survey'),
    real_estate: promptHandler('real_estate'),
    demographics: promptHandler('demographics'),
    pdf_research: promptHandler('pdf_research'),
    domain_specialist: domainSpecialist,
    basic_query: promptHandler('basic_query'),
  });
}
