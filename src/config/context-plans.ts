/**
 * Per-intent context plans
 *
 * Each plan fixes the derived query (domain phrase, parameter order,
 * trailing keywords), the document category filter, K, and the graph
 * lookups to run.
 */

import type { ContextLimits, ContextPlanTable } from '../types/index.js';

export const DEFAULT_CONTEXT_LIMITS: ContextLimits = {
  maxDocuments: 8,
  maxGraphInsights: 8,
  cachedDocuments: 2,
  cachedGraphInsights: 3,
};

export const CONTEXT_PLANS: ContextPlanTable = {
  location_recommender: {
    phrase: 'restaurant locations',
    useRawQuery: false,
    parameters: [
      { parameter: 'city', template: 'in {value}' },
      { parameter: 'cuisine', template: '{value} cuisine' },
      { parameter: 'concept', template: '{value} restaurant concept' },
      { parameter: 'demographic', template: 'for {value} demographic' },
    ],
    keywords: 'commercial real estate market insights foot traffic',
    filterTypes: ['real_estate', 'demographics', 'food_consumption'],
    k: 5,
    graph: ['location_recommendations'],
  },
  regulatory_advisor: {
    phrase: 'restaurant regulations',
    useRawQuery: false,
    parameters: [
      { parameter: 'city', template: 'in {value}' },
      { parameter: 'restaurant_type', template: '{value}' },
      {
        parameter: 'serves_alcohol',
        template: 'liquor license alcohol serving requirements',
        when: 'yes',
      },
    ],
    keywords: 'licensing permits requirements',
    filterTypes: ['regulation', 'food_consumption'],
    k: 5,
    graph: ['regulations'],
  },
  market_analysis: {
    phrase: 'restaurant market analysis',
    useRawQuery: false,
    parameters: [
      { parameter: 'city', template: 'in {value}' },
      { parameter: 'cuisine', template: '{value} cuisine' },
      { parameter: 'concept', template: '{value} concept' },
      { parameter: 'area', template: '{value} area' },
    ],
    keywords: 'consumer trends competition demographics food preferences',
    filterTypes: ['food_consumption', 'demographics', 'real_estate'],
    k: 5,
    graph: ['market_overview'],
  },
  consumer_survey: {
    phrase: 'consumer dining preferences',
    useRawQuery: false,
    parameters: [
      { parameter: 'city', template: 'in {value}' },
      { parameter: 'demographic', template: 'among {value} consumers' },
      { parameter: 'cuisine', template: '{value} cuisine' },
    ],
    keywords: 'survey dining habits food preferences spending behavior',
    filterTypes: ['food_consumption', 'demographics'],
    k: 5,
    graph: ['consumer_preferences'],
  },
  real_estate: {
    phrase: 'commercial restaurant property',
    useRawQuery: false,
    parameters: [
      { parameter: 'city', template: 'in {value}' },
      { parameter: 'locality', template: '{value} locality' },
      { parameter: 'restaurant_type', template: 'for {value}' },
    ],
    keywords: 'rent lease commercial space foot traffic',
    filterTypes: ['real_estate'],
    k: 5,
    graph: ['locality_analysis'],
  },
  demographics: {
    phrase: 'population and income demographics',
    useRawQuery: false,
    parameters: [
      { parameter: 'city', template: 'in {value}' },
      { parameter: 'restaurant_type', template: 'for {value} restaurants' },
    ],
    keywords: 'economic indicators consumer spending age groups',
    filterTypes: ['demographics'],
    k: 5,
    graph: ['city_profile'],
  },
  pdf_research: {
    phrase: 'restaurant business research',
    useRawQuery: false,
    parameters: [
      { parameter: 'research_topic', template: '{value}' },
      { parameter: 'specific_focus', template: '{value}' },
      { parameter: 'city', template: 'in {value}' },
    ],
    keywords: 'studies reports findings data statistics',
    filterTypes: ['research', 'food_consumption', 'demographics', 'real_estate'],
    k: 8,
    graph: ['research_summary'],
  },
  domain_specialist: {
    phrase: null,
    useRawQuery: true,
    parameters: [
      { parameter: 'domain_keywords', template: '{value}' },
      { parameter: 'city', template: 'in {value}' },
    ],
    keywords: null,
    filterTypes: [],
    k: 5,
    graph: ['city_profile'],
  },
  basic_query: {
    phrase: null,
    useRawQuery: true,
    parameters: [],
    keywords: null,
    filterTypes: [],
    k: 3,
    graph: ['city_summary'],
  },
};
