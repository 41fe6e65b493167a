import neo4j, { Driver, Integer } from 'neo4j-driver';
import { config } from '../core/config';
import { logger } from '../core/logger';
import { RetrievalError, getErrorMessage } from '../core/errors';
import { withTimeout } from '../utils/timeout';
import { maskSensitiveData } from '../utils/security';

export type GraphValue =
  | string
  | number
  | boolean
  | null
  | GraphValue[]
  | { [key: string]: GraphValue };

export type GraphRow = Record<string, GraphValue>;

/**
 * Boundary to the labeled property graph. `execute` resolves to an empty
 * list while disconnected and rejects only when a connected backend fails.
 */
export interface GraphClient {
  isConnected(): boolean;
  execute(query: string, params?: Record<string, unknown>): Promise<GraphRow[]>;
}

export interface GraphHealth {
  status: 'connected' | 'disconnected' | 'error';
  message: string;
  version?: string;
}

export interface Neo4jSettings {
  uri: string;
  username: string;
  password: string;
}

export class Neo4jGraphService implements GraphClient {
  private driver: Driver | null = null;
  private connected = false;

  constructor(
    private settings: Neo4jSettings = config.neo4j,
    private timeoutMs: number = config.execution.externalTimeout
  ) {}

  /**
   * Probes the backend once. The result is cached for the process lifetime;
   * a failed probe leaves the service in fallback mode.
   */
  async connect(): Promise<boolean> {
    try {
      this.driver = neo4j.driver(
        this.settings.uri,
        neo4j.auth.basic(this.settings.username, this.settings.password),
        { connectionTimeout: 10000 }
      );

      const session = this.driver.session();
      try {
        const result = await withTimeout(
          session.run('RETURN 1 AS test'),
          this.timeoutMs,
          'Neo4j connectivity probe'
        );
        const value = toGraphValue(result.records[0]?.get('test'));
        this.connected = value === 1;
      } finally {
        await session.close();
      }

      if (this.connected) {
        logger.info('Connected to Neo4j', { uri: maskSensitiveData(this.settings.uri) });
      } else {
        logger.warn('Neo4j connection test failed - using fallback mode');
      }
    } catch (error) {
      this.connected = false;
      await this.closeDriver();
      logger.warn('Neo4j not available - using fallback mode', {
        error: getErrorMessage(error),
      });
    }

    return this.connected;
  }

  isConnected(): boolean {
    return this.connected;
  }

  async execute(query: string, params: Record<string, unknown> = {}): Promise<GraphRow[]> {
    if (!this.connected || !this.driver) {
      return [];
    }

    const session = this.driver.session();
    try {
      const result = await withTimeout(
        session.run(query, toCypherParams(params)),
        this.timeoutMs,
        'Neo4j query'
      );
      return result.records.map(record => {
        const row: GraphRow = {};
        for (const key of record.keys) {
          row[String(key)] = toGraphValue(record.get(key));
        }
        return row;
      });
    } catch (error) {
      logger.error('Neo4j query failed', { error: getErrorMessage(error) });
      throw new RetrievalError(`Graph query failed: ${getErrorMessage(error)}`);
    } finally {
      await session.close();
    }
  }

  async healthCheck(): Promise<GraphHealth> {
    if (!this.connected) {
      return { status: 'disconnected', message: 'Neo4j not available' };
    }

    try {
      const rows = await this.execute(
        'CALL dbms.components() YIELD name, versions RETURN name, versions'
      );
      const versions = rows[0]?.versions;
      const version = Array.isArray(versions) && typeof versions[0] === 'string' ? versions[0] : 'unknown';
      return { status: 'connected', message: 'Neo4j is healthy', version };
    } catch (error) {
      this.connected = false;
      return { status: 'error', message: `Health check failed: ${getErrorMessage(error)}` };
    }
  }

  async close(): Promise<void> {
    this.connected = false;
    await this.closeDriver();
  }

  private async closeDriver(): Promise<void> {
    if (!this.driver) return;
    try {
      await this.driver.close();
      logger.info('Neo4j connection closed');
    } catch (error) {
      logger.error('Error closing Neo4j connection', { error: getErrorMessage(error) });
    } finally {
      this.driver = null;
    }
  }
}

// Cypher LIMIT/SKIP reject floats, and every JS number is sent as one
function toCypherParams(params: Record<string, unknown>): Record<string, unknown> {
  const converted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(params)) {
    converted[key] = typeof value === 'number' && Number.isInteger(value) ? neo4j.int(value) : value;
  }
  return converted;
}

export function toGraphValue(value: unknown): GraphValue {
  if (value === null || value === undefined) return null;
  if (value instanceof Integer) return value.toNumber();
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) return value.map(toGraphValue);
  if (typeof value === 'object') {
    const mapped: { [key: string]: GraphValue } = {};
    for (const [key, nested] of Object.entries(value)) {
      mapped[key] = toGraphValue(nested);
    }
    return mapped;
  }
  return String(value);
}
