/**
 * Neo4j Driver Configuration
 * Read-only access to the location/regulation graph
 */

import neo4j, { type Driver } from 'neo4j-driver';

export interface Neo4jConnection {
  uri: string;
  username: string;
  password: string;
}

export function createNeo4jDriver(connection: Neo4jConnection): Driver {
  return neo4j.driver(
    connection.uri,
    neo4j.auth.basic(connection.username, connection.password),
    {
      maxConnectionPoolSize: 20,
      connectionAcquisitionTimeout: 10_000,
      disableLosslessIntegers: true,
    }
  );
}
