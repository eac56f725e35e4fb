/**
 * Graph Store Adapter
 * Implements GraphReader using neo4j-driver
 *
 * SCOPE: Read-only Cypher lookups over City / Location / Regulation nodes
 *
 * Graph shape:
 *   (:City {name, state, population, demographics, key_markets})
 *     -[:HAS_LOCATION]->(:Location {area, type, commercial, foot_traffic,
 *        competition_score, growth_potential, rent_score,
 *        popular_cuisines, demographics})
 *     -[:HAS_REGULATION]->(:Regulation {type, description, authority,
 *        requirements, timeline, cost, renewal})
 */

import neo4j, { type Driver } from 'neo4j-driver';

import type {
  CityProfileRecord,
  CuisinePopularityRecord,
  LocationRecord,
  RecommendLocationsOptions,
  RegulationRecord,
} from '../types/index.js';

import type { GraphReader } from './graph-context.service.js';

const DEFAULT_MIN_SCORE = 0.5;

// ─────────────────────────────────────────────────────────────
// FIELD HELPERS
// ─────────────────────────────────────────────────────────────

type Row = Record<string, unknown>;

function asString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function asOptionalString(value: unknown): string | null {
  return typeof value === 'string' && value !== '' ? value : null;
}

function asNumber(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (neo4j.isInt(value)) {
    return value.toNumber();
  }
  return null;
}

function asStringList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((item): item is string => typeof item === 'string');
}

function mapRowToLocation(row: Row): LocationRecord {
  return {
    area: asString(row.area),
    type: asOptionalString(row.type),
    score: asNumber(row.score),
    footTraffic: asNumber(row.foot_traffic),
    competitionScore: asNumber(row.competition_score),
    growthPotential: asNumber(row.growth_potential),
    rentScore: asNumber(row.rent_score),
    popularCuisines: asStringList(row.popular_cuisines),
    demographics: asStringList(row.demographics),
  };
}

// ─────────────────────────────────────────────────────────────
// QUERIES
// ─────────────────────────────────────────────────────────────

const LOCATION_FIELDS = `
  l.area AS area, l.type AS type,
  l.foot_traffic AS foot_traffic, l.competition_score AS competition_score,
  l.growth_potential AS growth_potential, l.rent_score AS rent_score,
  l.popular_cuisines AS popular_cuisines, l.demographics AS demographics`;

function recommendLocationsQuery(options: RecommendLocationsOptions): string {
  const filters: string[] = ['l.commercial = true'];
  if (options.cuisine !== undefined) {
    filters.push('(l.popular_cuisines IS NULL OR $cuisine IN l.popular_cuisines)');
  }
  if (options.demographic !== undefined) {
    filters.push('(l.demographics IS NULL OR $demographic IN l.demographics)');
  }

  return `
    MATCH (c:City {name: $city})-[:HAS_LOCATION]->(l:Location)
    WHERE ${filters.join(' AND ')}
    WITH l, (
      coalesce(l.foot_traffic, 0.0) * 0.3 +
      CASE WHEN l.competition_score IS NOT NULL
           THEN (1.0 - l.competition_score) * 0.2 ELSE 0.0 END +
      coalesce(l.growth_potential, 0.0) * 0.2 +
      CASE WHEN l.rent_score IS NOT NULL
           THEN (1.0 - l.rent_score) * 0.3 ELSE 0.0 END
    ) AS score
    WHERE score >= $minScore
    RETURN score, ${LOCATION_FIELDS}
    ORDER BY score DESC
    LIMIT 10`;
}

const LOCATION_DETAILS_QUERY = `
  MATCH (c:City {name: $city})-[:HAS_LOCATION]->(l:Location)
  WHERE l.commercial = true AND toLower(l.area) = toLower($area)
  RETURN null AS score, ${LOCATION_FIELDS}
  ORDER BY l.foot_traffic DESC`;

const REGULATIONS_QUERY = `
  MATCH (c:City {name: $city})-[:HAS_REGULATION]->(r:Regulation)
  RETURN r.type AS type, r.description AS description,
         r.authority AS authority, r.requirements AS requirements,
         r.timeline AS timeline, r.cost AS cost, r.renewal AS renewal
  ORDER BY r.type`;

const CUISINE_POPULARITY_QUERY = `
  MATCH (c:City {name: $city})-[:HAS_LOCATION]->(l:Location)
  WHERE l.popular_cuisines IS NOT NULL
  UNWIND l.popular_cuisines AS cuisine
  RETURN cuisine AS cuisine_type, count(*) AS popularity
  ORDER BY popularity DESC, cuisine_type ASC`;

const CITY_PROFILE_QUERY = `
  MATCH (c:City {name: $city})
  RETURN c.name AS name, c.state AS state, c.population AS population,
         c.demographics AS demographics, c.key_markets AS key_markets`;

/**
 * Create the Neo4j-backed graph reader
 */
export function createGraphReader(driver: Driver): GraphReader {
  async function read(cypher: string, params: Row): Promise<Row[]> {
    const session = driver.session({ defaultAccessMode: neo4j.session.READ });
    try {
      const result = await session.run(cypher, params);
      return result.records.map((record) => record.toObject());
    } finally {
      await session.close();
    }
  }

  return {
    async recommendLocations(
      city: string,
      options: RecommendLocationsOptions = {}
    ): Promise<LocationRecord[]> {
      const rows = await read(recommendLocationsQuery(options), {
        city,
        cuisine: options.cuisine ?? null,
        demographic: options.demographic ?? null,
        minScore: options.minScore ?? DEFAULT_MIN_SCORE,
      });
      return rows.map(mapRowToLocation);
    },

    async getLocationDetails(city: string, area: string): Promise<LocationRecord[]> {
      const rows = await read(LOCATION_DETAILS_QUERY, { city, area });
      return rows.map(mapRowToLocation);
    },

    async getRegulations(city: string): Promise<RegulationRecord[]> {
      const rows = await read(REGULATIONS_QUERY, { city });
      return rows.map((row) => ({
        type: asString(row.type),
        description: asString(row.description),
        authority: asString(row.authority),
        requirements: asStringList(row.requirements),
        timeline: asOptionalString(row.timeline),
        cost: asOptionalString(row.cost),
        renewal: asOptionalString(row.renewal),
      }));
    },

    async getCuisinePopularity(city: string): Promise<CuisinePopularityRecord[]> {
      const rows = await read(CUISINE_POPULARITY_QUERY, { city });
      return rows.map((row) => ({
        cuisineType: asString(row.cuisine_type),
        popularity: asNumber(row.popularity) ?? 0,
      }));
    },

    async getCityProfile(city: string): Promise<CityProfileRecord | null> {
      const [row] = await read(CITY_PROFILE_QUERY, { city });
      if (row === undefined) {
        return null;
      }
      return {
        name: asString(row.name),
        state: asOptionalString(row.state),
        population: asNumber(row.population),
        demographics: asStringList(row.demographics),
        keyMarkets: asStringList(row.key_markets),
      };
    },
  };
}
