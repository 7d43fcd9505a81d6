/**
 * Saved Query Executor
 *
 * Contract between the series scheduler and whatever compiles saved
 * queries, plus a SQLite executor for the built-in query dialect:
 *
 *   product=Widgets&product=Gadgets&status=NEW&assignee=alice
 *
 * Repeated keys are alternatives (OR); different keys must all match (AND).
 * Queries run with the visibility of the series owner: entities restricted
 * to a security group are only returned when the owner belongs to it.
 *
 * @module @trailstats/core/series/query-executor
 */

import Database from 'better-sqlite3';
import { URLSearchParams } from 'url';
import { z } from 'zod';
import { QueryCompilationError } from '../errors/index.js';

/**
 * Executes a saved query definition as a given user.
 * Throws QueryCompilationError when the definition cannot be compiled.
 */
export interface QueryExecutor {
  /** Ids of the matching entities; may contain duplicates */
  execute(definition: string, ownerId: number): Promise<number[]>;
}

export const QUERY_PARAMETERS = ['product', 'component', 'status', 'resolution', 'assignee'] as const;

export type QueryParameter = (typeof QUERY_PARAMETERS)[number];

export type CompiledFilter = Partial<Record<QueryParameter, string[]>>;

const OwnerRowSchema = z.object({
  id: z.number().int(),
  login: z.string(),
  disabled: z.number().int(),
});
const IdRowSchema = z.object({ id: z.number().int() });

function isQueryParameter(key: string): key is QueryParameter {
  return QUERY_PARAMETERS.some(p => p === key);
}

/**
 * Split a definition into its filter terms
 */
export function parseQueryDefinition(definition: string): CompiledFilter {
  const params = new URLSearchParams(definition.trim().replace(/^\?/, ''));
  const filter: CompiledFilter = {};

  for (const [key, value] of params) {
    if (!isQueryParameter(key)) {
      throw new QueryCompilationError(`Unknown query parameter: ${key}`, { parameter: key });
    }
    if (value === '') continue;
    filter[key] = [...(filter[key] ?? []), value];
  }

  return filter;
}

// =============================================================================
// SQLite Executor
// =============================================================================

export class SqliteQueryExecutor implements QueryExecutor {
  constructor(private db: Database.Database) {}

  async execute(definition: string, ownerId: number): Promise<number[]> {
    this.resolveOwner(ownerId);
    const filter = parseQueryDefinition(definition);

    const clauses: string[] = [];
    const params: Array<string | number> = [];

    const productIds = filter.product ? this.resolveIds('product', filter.product) : null;
    if (productIds) {
      clauses.push(`e.product_id IN (${placeholders(productIds)})`);
      params.push(...productIds);
    }

    if (filter.component) {
      const componentIds = this.resolveComponents(filter.component, productIds);
      clauses.push(`e.component_id IN (${placeholders(componentIds)})`);
      params.push(...componentIds);
    }

    if (filter.assignee) {
      const userIds = this.resolveIds('assignee', filter.assignee);
      clauses.push(`e.assignee_id IN (${placeholders(userIds)})`);
      params.push(...userIds);
    }

    if (filter.status) {
      clauses.push(`e.status IN (${placeholders(filter.status)})`);
      params.push(...filter.status);
    }

    if (filter.resolution) {
      clauses.push(`e.resolution IN (${placeholders(filter.resolution)})`);
      params.push(...filter.resolution);
    }

    clauses.push(
      `(e.security_group IS NULL
        OR e.security_group IN (SELECT group_name FROM user_groups WHERE user_id = ?))`
    );
    params.push(ownerId);

    const rows = this.db
      .prepare(`SELECT e.id AS id FROM entities e WHERE ${clauses.join(' AND ')} ORDER BY e.id`)
      .all(...params);

    return z.array(IdRowSchema).parse(rows).map(r => r.id);
  }

  private resolveOwner(ownerId: number): void {
    const row = this.db.prepare('SELECT id, login, disabled FROM users WHERE id = ?').get(ownerId);
    if (row === undefined) {
      throw new QueryCompilationError(`Series owner ${ownerId} no longer exists`, {
        context: { ownerId },
      });
    }

    const owner = OwnerRowSchema.parse(row);
    if (owner.disabled) {
      throw new QueryCompilationError(`Series owner ${owner.login} is disabled`, {
        context: { ownerId },
      });
    }
  }

  /**
   * Map product names or assignee logins to ids; every name must exist
   */
  private resolveIds(parameter: 'product' | 'assignee', names: string[]): number[] {
    const sql =
      parameter === 'product'
        ? 'SELECT id FROM products WHERE name = ?'
        : 'SELECT id FROM users WHERE login = ?';
    const stmt = this.db.prepare(sql);

    return names.map(name => {
      const row = stmt.get(name);
      if (row === undefined) {
        throw new QueryCompilationError(`Unknown ${parameter}: ${name}`, { parameter });
      }
      return IdRowSchema.parse(row).id;
    });
  }

  private resolveComponents(names: string[], productIds: number[] | null): number[] {
    const ids: number[] = [];

    for (const name of names) {
      let sql = 'SELECT id FROM components WHERE name = ?';
      const params: Array<string | number> = [name];
      if (productIds) {
        sql += ` AND product_id IN (${placeholders(productIds)})`;
        params.push(...productIds);
      }

      const rows = z.array(IdRowSchema).parse(this.db.prepare(sql).all(...params));
      if (rows.length === 0) {
        throw new QueryCompilationError(`Unknown component: ${name}`, { parameter: 'component' });
      }
      ids.push(...rows.map(r => r.id));
    }

    return ids;
  }
}

function placeholders(values: readonly unknown[]): string {
  return values.map(() => '?').join(', ');
}
