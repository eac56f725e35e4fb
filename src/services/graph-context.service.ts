/**
 * GraphContextService
 * Runs an intent's graph lookups and renders records as text
 *
 * SCOPE: Location, regulation, cuisine and city-profile insights
 *
 * Owns: No tables
 *
 * Dependencies:
 * - GraphReader (typed lookups keyed by city)
 *
 * GUARDRAILS:
 * - Sections run in plan order; output order is deterministic
 * - Any lookup failure fails the whole call; the caller substitutes []
 * - The insight cap counts data lines only; headings ride along with them
 */

import { withTimeout } from '../lib/index.js';
import {
  errorMessage,
  failure,
  success,
  type CityProfileRecord,
  type CuisinePopularityRecord,
  type GraphSection,
  type LocationRecord,
  type RecommendLocationsOptions,
  type RegulationRecord,
  type Result,
  type RoutingParameters,
} from '../types/index.js';

/**
 * Graph store lookups; records are flat maps of scalars and string lists
 */
export interface GraphReader {
  recommendLocations(city: string, options?: RecommendLocationsOptions): Promise<LocationRecord[]>;
  getLocationDetails(city: string, area: string): Promise<LocationRecord[]>;
  getRegulations(city: string): Promise<RegulationRecord[]>;
  getCuisinePopularity(city: string): Promise<CuisinePopularityRecord[]>;
  getCityProfile(city: string): Promise<CityProfileRecord | null>;
}

/**
 * GraphContextService interface
 */
export interface GraphContextService {
  collect(
    sections: readonly GraphSection[],
    city: string,
    parameters: RoutingParameters,
    maxInsights?: number
  ): Promise<Result<string[]>>;
}

export interface GraphContextServiceDeps {
  reader: GraphReader;
  timeoutMs: number;
}

/** Section heading; emitted only when a data line follows it */
export interface Heading {
  heading: string;
}

export type InsightLine = string | Heading;

function heading(text: string): Heading {
  return { heading: text };
}

/**
 * Keep the first `maxInsights` data lines with the headings above them.
 * A heading whose data was cut is dropped.
 */
export function capInsights(lines: readonly InsightLine[], maxInsights: number): string[] {
  const kept: string[] = [];
  let pending: string[] = [];
  let count = 0;
  for (const line of lines) {
    if (typeof line !== 'string') {
      pending.push(line.heading);
      continue;
    }
    if (count >= maxInsights) {
      break;
    }
    kept.push(...pending, line);
    pending = [];
    count += 1;
  }
  return kept;
}

// ─────────────────────────────────────────────────────────────
// FORMATTERS
// ─────────────────────────────────────────────────────────────

function fixed(value: number | null): string {
  return (value ?? 0).toFixed(2);
}

export function formatLocation(location: LocationRecord): string {
  const lines = [
    location.score === null
      ? `Area: ${location.area}`
      : `Location: ${location.area} - Overall Score: ${fixed(location.score)}`,
    `  - Foot Traffic: ${fixed(location.footTraffic)}`,
    `  - Competition Level: ${fixed(location.competitionScore)}`,
    `  - Growth Potential: ${fixed(location.growthPotential)}`,
  ];
  if (location.score !== null) {
    lines.push(`  - Rent Value (lower is better): ${fixed(location.rentScore)}`);
  }
  if (location.popularCuisines.length > 0) {
    lines.push(`  - Popular Cuisines: ${location.popularCuisines.join(', ')}`);
  }
  if (location.demographics.length > 0) {
    lines.push(`  - Key Demographics: ${location.demographics.join(', ')}`);
  }
  return lines.join('\n');
}

export function formatRegulation(regulation: RegulationRecord): string {
  const lines = [
    `Regulation: ${regulation.type}`,
    `Description: ${regulation.description}`,
    `Authority: ${regulation.authority}`,
  ];
  if (regulation.requirements.length > 0) {
    lines.push('Requirements:', ...regulation.requirements.map((r) => `  - ${r}`));
  }
  if (regulation.timeline !== null) {
    lines.push(`Timeline: ${regulation.timeline}`);
  }
  if (regulation.cost !== null) {
    lines.push(`Cost: ${regulation.cost}`);
  }
  if (regulation.renewal !== null) {
    lines.push(`Renewal: ${regulation.renewal}`);
  }
  return lines.join('\n');
}

function formatCuisine(cuisine: CuisinePopularityRecord): string {
  return `Cuisine: ${cuisine.cuisineType} - Popularity Score: ${cuisine.popularity}`;
}

function formatCityProfile(
  profile: CityProfileRecord,
  cuisines: CuisinePopularityRecord[]
): InsightLine[] {
  const lines: InsightLine[] = [
    heading(`== City Demographics for ${profile.name} ==`),
    `Population: ${profile.population === null ? 'Unknown' : profile.population.toLocaleString('en-US')}`,
  ];
  if (profile.demographics.length > 0) {
    lines.push(`Key Demographics: ${profile.demographics.slice(0, 3).join(', ')}`);
  }
  if (profile.keyMarkets.length > 0) {
    lines.push(`Key Markets: ${profile.keyMarkets.slice(0, 3).join(', ')}`);
  }
  if (cuisines.length > 0) {
    lines.push(heading(`== Popular Cuisines in ${profile.name} ==`));
    lines.push(...cuisines.slice(0, 3).map(formatCuisine));
  }
  return lines;
}

// ─────────────────────────────────────────────────────────────
// SECTIONS
// ─────────────────────────────────────────────────────────────

type SectionRunner = (
  reader: GraphReader,
  city: string,
  parameters: RoutingParameters
) => Promise<InsightLine[]>;

function optional(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

const SECTIONS: Readonly<Record<GraphSection, SectionRunner>> = {
  async location_recommendations(reader, city, parameters) {
    const options: RecommendLocationsOptions = {};
    const cuisine = optional(parameters.cuisine);
    const demographic = optional(parameters.demographic);
    if (cuisine !== undefined) {
      options.cuisine = cuisine;
    }
    if (demographic !== undefined) {
      options.demographic = demographic;
    }

    const locations = await reader.recommendLocations(city, options);
    return locations.map(formatLocation);
  },

  async regulations(reader, city) {
    const regulations = await reader.getRegulations(city);
    return regulations.map(formatRegulation);
  },

  async market_overview(reader, city, parameters) {
    const area = optional(parameters.area);
    const [cuisines, locations] = await Promise.all([
      reader.getCuisinePopularity(city),
      area === undefined
        ? reader.recommendLocations(city).then((list) => list.slice(0, 3))
        : reader.getLocationDetails(city, area),
    ]);

    const lines: InsightLine[] = [];
    if (cuisines.length > 0) {
      lines.push(heading('== Cuisine Preferences =='), ...cuisines.map(formatCuisine));
    }
    if (locations.length > 0) {
      lines.push(heading('== Location Analysis =='), ...locations.map(formatLocation));
    }
    return lines;
  },

  async consumer_preferences(reader, city) {
    const cuisines = await reader.getCuisinePopularity(city);
    if (cuisines.length === 0) {
      return [];
    }
    return [heading(`== Cuisine Preferences in ${city} ==`), ...cuisines.map(formatCuisine)];
  },

  async locality_analysis(reader, city, parameters) {
    const locality = optional(parameters.locality);
    if (locality !== undefined) {
      const details = await reader.getLocationDetails(city, locality);
      if (details.length > 0) {
        return details.map(formatLocation);
      }
    }
    const locations = await reader.recommendLocations(city);
    return locations.map(formatLocation);
  },

  async city_profile(reader, city) {
    const [profile, cuisines] = await Promise.all([
      reader.getCityProfile(city),
      reader.getCuisinePopularity(city),
    ]);
    if (profile === null) {
      return cuisines.slice(0, 3).map(formatCuisine);
    }
    return formatCityProfile(profile, cuisines);
  },

  async research_summary(reader, city) {
    const [regulations, cuisines] = await Promise.all([
      reader.getRegulations(city),
      reader.getCuisinePopularity(city),
    ]);
    const lines: InsightLine[] = [
      heading(`=== Research Data for ${city} ===`),
      `City has ${regulations.length} documented regulatory frameworks`,
    ];
    if (cuisines.length > 0) {
      lines.push(
        heading('Cuisine Preference Data:'),
        ...cuisines.slice(0, 5).map((c) => `- ${c.cuisineType}: ${c.popularity} popularity score`)
      );
    }
    if (regulations.length > 0) {
      lines.push(
        heading('Regulatory Framework Overview:'),
        ...regulations.slice(0, 3).map((r) => `- ${r.type} (Governing Body: ${r.authority})`)
      );
    }
    return lines;
  },

  async city_summary(reader, city) {
    const [regulations, locations, cuisines] = await Promise.all([
      reader.getRegulations(city),
      reader.recommendLocations(city),
      reader.getCuisinePopularity(city),
    ]);
    return [
      `City: ${city}`,
      `Number of regulations: ${regulations.length}`,
      `Top locations: ${locations.slice(0, 3).map((l) => l.area).join(', ')}`,
      `Popular cuisines: ${cuisines.slice(0, 3).map((c) => c.cuisineType).join(', ')}`,
    ];
  },
};

// ─────────────────────────────────────────────────────────────
// SERVICE IMPLEMENTATION
// ─────────────────────────────────────────────────────────────

export function createGraphContextService(
  deps: GraphContextServiceDeps
): GraphContextService {
  const { reader, timeoutMs } = deps;

  return {
    async collect(
      sections: readonly GraphSection[],
      city: string,
      parameters: RoutingParameters,
      maxInsights = Number.POSITIVE_INFINITY
    ): Promise<Result<string[]>> {
      const insights: InsightLine[] = [];
      try {
        for (const section of sections) {
          const lines = await withTimeout(
            () => SECTIONS[section](reader, city, parameters),
            timeoutMs,
            `graph ${section}`
          );
          insights.push(...lines);
        }
      } catch (err) {
        return failure('RETRIEVAL_FAILED', 'Graph lookup failed', {
          reason: errorMessage(err),
        });
      }
      return success(capInsights(insights, maxInsights));
    },
  };
}
